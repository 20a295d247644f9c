/**
 * Script generator: turns a topic into a short narration script via the LLM.
 *
 * A "viral hook" is assembled from the hook matrix in data/hooks.json and
 * handed to the model as inspiration. The model answers with a JSON object
 * { title, story, hashtags }. No retry: a bad answer fails the run.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DATA_DIR, type ContentType } from '../config.js';
import type { TextGenerator } from '../ai/claude.js';
import { GenerationError, errorMessage, wrapStageError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { pickOne, type RandomSource } from '../utils/random.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface Script {
  topic: string;
  title: string;
  story: string;
  /** Space-separated, e.g. "#ocean #mystery #deepsea" */
  hashtags: string;
  contentType: ContentType;
}

export interface ScriptRequest {
  /** Empty or absent → a random default topic */
  topic?: string;
  contentType: ContentType;
  random: RandomSource;
}

// ── Hook matrix ───────────────────────────────────────────────────────────────

const HookMatrixSchema = z.object({
  topics:                z.array(z.string().min(1)).min(1),
  patternInterrupts:     z.array(z.string()).min(1),
  psychologicalTriggers: z.array(z.string()).min(1),
  curiosityGaps:         z.array(z.string()).min(1),
  powerPhrases:          z.array(z.string()).min(1),
  structures:            z.array(z.string()).min(1),
});

type HookMatrix = z.infer<typeof HookMatrixSchema>;

let hooks: HookMatrix | undefined;

function loadHooks(): HookMatrix {
  hooks ??= HookMatrixSchema.parse(JSON.parse(fs.readFileSync(path.join(DATA_DIR, 'hooks.json'), 'utf-8')));
  return hooks;
}

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

// ── Prompts ───────────────────────────────────────────────────────────────────

const SYSTEM_PROMPT = `You write narration for vertical short-form videos (Reels, Shorts, TikTok).
The narration is read aloud by a text-to-speech voice over background footage, so:
- write plain spoken sentences with no stage directions, speaker labels or emoji
- keep it between 150 and 200 words
- open with a line that stops the scroll and keep curiosity open until the end

Answer with ONE valid JSON object and nothing else:
{
  "title": "hook title, at most 50 characters",
  "story": "the narration",
  "hashtags": "exactly 3 one-word lowercase hashtags, e.g. #ocean #mystery #mindblown"
}`;

const CONTENT_BRIEFS: Record<ContentType, string> = {
  story:
    'Tell an emotionally charged story. Build tension with curiosity gaps and end on a line ' +
    'that leaves the viewer wanting more.',
  facts:
    'Present 3-4 surprising facts that sound unbelievable but are true and verifiable. ' +
    'Chain them with curiosity gaps so the viewer keeps watching.',
};

// ── Public API ─────────────────────────────────────────────────────────────────

export function resolveTopic(topic: string | undefined, random: RandomSource): string {
  const trimmed = topic?.trim() ?? '';
  if (trimmed) return trimmed;
  const picked = pickOne(loadHooks().topics, random);
  logger.info('Scriptwriter: no topic given — using random topic', { topic: picked });
  return picked;
}

/** Fill a random hook structure from the matrix. Draw order: interrupt, trigger, gap, power, structure. */
export function buildViralHook(topic: string, random: RandomSource): string {
  const m = loadHooks();
  const interrupt = pickOne(m.patternInterrupts, random);
  const trigger = fill(pickOne(m.psychologicalTriggers, random), { topic, action: 'start' });
  const gap = pickOne(m.curiosityGaps, random);
  const power = pickOne(m.powerPhrases, random);
  const structure = pickOne(m.structures, random);

  return fill(structure, { interrupt, topic, trigger, gap, power })
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

export function buildScriptPrompt(topic: string, contentType: ContentType, hook: string): string {
  return [
    `Topic: "${topic}"`,
    `Format: ${contentType}`,
    '',
    CONTENT_BRIEFS[contentType],
    '',
    `Hook inspiration (adapt it, do not copy it): "${hook}"`,
    '',
    'Return ONLY the JSON object — no markdown, no explanation, no code fences.',
  ].join('\n');
}

const ScriptResponseSchema = z.object({
  title:    z.string().trim().min(1),
  story:    z.string().trim(),
  hashtags: z.union([z.string(), z.array(z.string())]).default(''),
});

export type ScriptResponse = { title: string; story: string; hashtags: string };

function normalizeHashtags(raw: string | string[]): string {
  const tags = (Array.isArray(raw) ? raw : raw.split(/[\s,]+/))
    .map(t => t.trim().replace(/^#+/, '').toLowerCase())
    .filter(Boolean);
  return tags.map(t => `#${t}`).join(' ');
}

/**
 * Parse the model's answer. Code fences and any prose around the outermost
 * braces are ignored.
 */
export function parseScriptResponse(text: string): ScriptResponse {
  const clean = text.replace(/```(?:json)?/g, '').trim();
  const start = clean.indexOf('{');
  const end = clean.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new GenerationError('LLM answer contains no JSON object');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(clean.slice(start, end + 1));
  } catch (err) {
    throw new GenerationError(`LLM answer is not valid JSON: ${errorMessage(err)}`, err);
  }

  const parsed = ScriptResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new GenerationError(`LLM answer is missing fields: ${invalid}`);
  }

  return {
    title:    parsed.data.title,
    story:    parsed.data.story,
    hashtags: normalizeHashtags(parsed.data.hashtags),
  };
}

export async function generateScript(generator: TextGenerator, req: ScriptRequest): Promise<Script> {
  const topic = resolveTopic(req.topic, req.random);
  const hook = buildViralHook(topic, req.random);
  logger.info('Scriptwriter: generating script', { topic, contentType: req.contentType, hook });

  let answer: string;
  try {
    answer = await generator.complete(buildScriptPrompt(topic, req.contentType, hook), SYSTEM_PROMPT);
  } catch (err) {
    throw wrapStageError(err, GenerationError, 'LLM request failed');
  }

  if (!answer.trim()) {
    throw new GenerationError('LLM returned an empty answer');
  }

  const { title, story, hashtags } = parseScriptResponse(answer);
  if (!story) {
    throw new GenerationError('LLM returned an empty story');
  }

  logger.info('Scriptwriter: script ready', { title, words: story.split(/\s+/).length, hashtags });
  return { topic, title, story, hashtags, contentType: req.contentType };
}
