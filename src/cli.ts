/**
 * Command-line front end: `shortsmith [topic words…]`.
 *
 * Without a topic the user is asked for one on a terminal; piped or scheduled
 * runs fall back to a random topic. Returns the process exit code.
 */
import { createInterface } from 'readline/promises';
import { env, loadConfig, type ShortsConfig } from './config.js';
import { createServices, runPipeline, type PipelineServices } from './pipeline/index.js';
import { describeFailure } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { createRandom, type RandomSource } from './utils/random.js';

export interface CliDeps {
  loadConfig: () => ShortsConfig;
  createServices: (config: ShortsConfig) => PipelineServices;
  runPipeline: typeof runPipeline;
  askTopic: () => Promise<string>;
  isInteractive: boolean;
  random: RandomSource;
  tempRoot: string;
}

async function askTopicOnTerminal(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question('Topic (leave empty for a random one): ');
  } finally {
    rl.close();
  }
}

export function defaultCliDeps(): CliDeps {
  return {
    loadConfig:     () => loadConfig(),
    createServices,
    runPipeline,
    askTopic:       askTopicOnTerminal,
    isInteractive:  Boolean(process.stdin.isTTY),
    random:         createRandom(env.RANDOM_SEED),
    tempRoot:       env.TEMP_DIR,
  };
}

export async function runCli(args: string[], deps: CliDeps = defaultCliDeps()): Promise<number> {
  try {
    const config = deps.loadConfig();

    let topic = args.join(' ').trim();
    if (!topic && deps.isInteractive) {
      topic = (await deps.askTopic()).trim();
    }

    const result = await deps.runPipeline(config, deps.createServices(config), {
      topic,
      random:   deps.random,
      tempRoot: deps.tempRoot,
    });

    logger.info('Short ready', {
      path: result.output.path,
      title: result.script.title,
      durationSec: Number(result.output.durationSec.toFixed(2)),
    });
    return 0;
  } catch (err) {
    logger.error(describeFailure(err), { err });
    return 1;
  }
}
