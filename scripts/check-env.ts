#!/usr/bin/env tsx
/**
 * Pre-flight check for shortsmith.
 * Validates the settings file, the ffmpeg toolchain and the asset folders.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { existsSync, readdirSync } from 'fs';
import { extname } from 'path';
import {
  env,
  loadConfig,
  MUSIC_EXTENSIONS,
  SOURCE_VIDEO_EXTENSIONS,
  type ShortsConfig,
} from '../src/config.js';
import { isFfmpegAvailable } from '../src/media/ffmpeg.js';
import { errorMessage } from '../src/utils/errors.js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const skip = (label: string) => console.log(`  ${YELLOW}○${RESET} ${label}`);

let anyRequiredFailed = false;

function countFiles(dir: string, extensions: readonly string[]): number {
  return readdirSync(dir).filter(f => extensions.includes(extname(f).toLowerCase())).length;
}

// ── Section: Settings file ────────────────────────────────────────────────────

console.log(`\n${BOLD}=== shortsmith — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Settings${RESET}`);

let config: ShortsConfig | undefined;
try {
  config = loadConfig();
  pass('Settings file', env.CONFIG_PATH);
} catch (err) {
  fail('Settings file', errorMessage(err));
  anyRequiredFailed = true;
}

skip(`TEMP_DIR  ${env.TEMP_DIR}`);
skip(`LOG_LEVEL  ${env.LOG_LEVEL}`);
skip(`RANDOM_SEED  ${env.RANDOM_SEED ?? '(unset — runs are not reproducible)'}`);

// ── Section: Toolchain ────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] FFmpeg${RESET}`);

if (isFfmpegAvailable()) {
  pass('ffmpeg on PATH');
} else {
  fail('ffmpeg on PATH', 'Install ffmpeg (it ships ffprobe) and make sure it is on PATH');
  anyRequiredFailed = true;
}

// ── Section: Asset folders ────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Asset folders${RESET}`);

if (config) {
  const { input_dir, music_dir } = config.video;
  if (!existsSync(input_dir)) {
    fail('Background videos', `Create: mkdir -p "${input_dir}" and add ${SOURCE_VIDEO_EXTENSIONS.join(' ')} files`);
    anyRequiredFailed = true;
  } else {
    const videos = countFiles(input_dir, SOURCE_VIDEO_EXTENSIONS);
    if (videos > 0) {
      pass('Background videos', `${videos} file(s) in ${input_dir}`);
    } else {
      fail('Background videos', `No ${SOURCE_VIDEO_EXTENSIONS.join(' ')} files in ${input_dir}`);
      anyRequiredFailed = true;
    }
  }

  if (!music_dir) {
    skip('Background music  (not configured — optional)');
  } else if (!existsSync(music_dir)) {
    skip(`Background music  (${music_dir} missing — optional)`);
  } else {
    pass('Background music', `${countFiles(music_dir, MUSIC_EXTENSIONS)} file(s) in ${music_dir}`);
  }
} else {
  skip('Asset folders  (skipped — settings invalid above)');
}

// ── Section: Uploads ──────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Uploads${RESET}`);

if (config) {
  if (config.upload.auto_upload) {
    pass('Instagram', `as ${config.upload.username}`);
  } else {
    skip('Instagram  (auto_upload off)');
  }

  if (config.youtube.auto_upload) {
    for (const [label, file] of [
      ['YouTube client secrets', config.youtube.client_secrets_file],
      ['YouTube token',          config.youtube.token_file],
    ] as const) {
      if (existsSync(file)) {
        pass(label, file);
      } else {
        fail(label, `Missing ${file}`);
        anyRequiredFailed = true;
      }
    }
  } else {
    skip('YouTube  (auto_upload off)');
  }
} else {
  skip('Uploads  (skipped — settings invalid above)');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm start -- "your topic"${RESET}\n`);
}
