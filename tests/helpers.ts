/**
 * Shared fixtures: temp directories and in-process fakes for the external
 * collaborators (LLM, speech, ffmpeg).
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import type { TextGenerator } from '../src/ai/claude.js';
import type { SpeechClient, WordTiming } from '../src/ai/openai.js';
import type { MediaToolkit, VideoMetadata } from '../src/media/ffmpeg.js';

export function makeTempDir(prefix = 'shortsmith-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Create empty files named `names` inside `dir`. */
export function touch(dir: string, names: string[]): void {
  fs.mkdirSync(dir, { recursive: true });
  for (const name of names) fs.writeFileSync(path.join(dir, name), '');
}

/** Always returns `value`. */
export const constantRandom = (value: number) => () => value;

// ── Fakes ─────────────────────────────────────────────────────────────────────

export function scriptJson(fields: { title?: string; story?: string; hashtags?: string } = {}): string {
  return JSON.stringify({
    title:    fields.title ?? 'Stop. The ocean is hiding THIS',
    story:    fields.story ?? 'We have explored less than five percent of the ocean floor.',
    hashtags: fields.hashtags ?? '#ocean #mystery #deepsea',
  });
}

export function fakeText(answer = scriptJson()) {
  return { complete: vi.fn<TextGenerator['complete']>(async () => answer) };
}

export function fakeSpeech(words: WordTiming[] = [{ word: 'hello', start: 0, end: 0.5 }], bytes = 4_096) {
  return {
    synthesize: vi.fn<SpeechClient['synthesize']>(async (_text, _voice, outputPath) => {
      fs.writeFileSync(outputPath, Buffer.alloc(bytes));
    }),
    transcribeWords: vi.fn<SpeechClient['transcribeWords']>(async () => words),
  };
}

/** Last double-quoted argument of an ffmpeg argument string (the output path). */
export function lastQuotedPath(args: string): string {
  const match = /"([^"]+)"$/.exec(args);
  if (!match?.[1]) throw new Error(`no output path in: ${args}`);
  return match[1];
}

export interface FakeMediaOptions {
  available?: boolean;
  audioDuration?: number;
  source?: VideoMetadata;
}

export function fakeMedia(opts: FakeMediaOptions = {}) {
  const source = opts.source ?? { duration: 600, width: 1920, height: 1080 };
  return {
    isAvailable:      vi.fn<MediaToolkit['isAvailable']>(() => opts.available ?? true),
    probeDuration:    vi.fn<MediaToolkit['probeDuration']>(async () => opts.audioDuration ?? 30),
    probeVideo:       vi.fn<MediaToolkit['probeVideo']>(async () => source),
    cutClip:          vi.fn<MediaToolkit['cutClip']>(async (_src, _range, outputPath) => {
      fs.writeFileSync(outputPath, 'clip');
    }),
    normalizeAudio:   vi.fn<MediaToolkit['normalizeAudio']>(async (inputPath, outputPath) => {
      fs.copyFileSync(inputPath, outputPath);
    }),
    extractThumbnail: vi.fn<MediaToolkit['extractThumbnail']>(async (_video, _at, outputPath) => {
      fs.writeFileSync(outputPath, 'jpeg');
    }),
    run:              vi.fn<MediaToolkit['run']>(async (args) => {
      fs.writeFileSync(lastQuotedPath(args), Buffer.alloc(2_048));
    }),
  } satisfies MediaToolkit;
}
