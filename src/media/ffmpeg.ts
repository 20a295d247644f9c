/**
 * Core FFmpeg operations: availability check, probing, clip cutting,
 * narration loudness normalization, thumbnail extraction and the generic
 * runner used by the encoder.
 *
 * All functions throw on non-zero FFmpeg/FFprobe exit.
 * Callers are responsible for temp-file cleanup where paths are returned.
 */
import { execSync } from 'child_process';
import { logger } from '../utils/logger.js';

// ── Types ──────────────────────────────────────────────────────────────────────

export interface VideoMetadata {
  duration: number;
  width: number;
  height: number;
}

export interface TimeRange {
  start: number;
  duration: number;
}

/** The subset of FFmpeg the pipeline depends on; tests substitute a fake. */
export interface MediaToolkit {
  isAvailable(): boolean;
  probeDuration(filePath: string): Promise<number>;
  probeVideo(filePath: string): Promise<VideoMetadata>;
  cutClip(sourcePath: string, range: TimeRange, outputPath: string): Promise<void>;
  normalizeAudio(inputPath: string, outputPath: string): Promise<void>;
  extractThumbnail(videoPath: string, atSeconds: number, outputPath: string): Promise<void>;
  run(args: string, label: string): Promise<void>;
}

// ── Helpers ────────────────────────────────────────────────────────────────────

/** Double-quote a path for the shell. */
export function quotePath(p: string): string {
  return `"${p.replace(/(["\\$`])/g, '\\$1')}"`;
}

export function formatSeconds(s: number): string {
  return s.toFixed(3);
}

// execSync attaches the child's stderr to the thrown error
function stderrOf(err: unknown): string {
  if (typeof err !== 'object' || err === null || !('stderr' in err) || !err.stderr) return '';
  return String(err.stderr).trim();
}

function runFfmpeg(args: string, label: string): void {
  logger.debug(`FFmpeg [${label}]`, { args });
  try {
    execSync(`ffmpeg -y -hide_banner ${args}`, { stdio: ['ignore', 'pipe', 'pipe'] });
  } catch (err) {
    throw new Error(`FFmpeg ${label} failed: ${stderrOf(err) || String(err)}`);
  }
}

function runFfprobe(args: string, label: string): string {
  logger.debug(`FFprobe [${label}]`, { args });
  try {
    return execSync(`ffprobe ${args}`, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] }).trim();
  } catch (err) {
    throw new Error(`FFprobe ${label} failed: ${stderrOf(err) || String(err)}`);
  }
}

// ── Public API ─────────────────────────────────────────────────────────────────

/** True when an `ffmpeg` binary answers on PATH. */
export function isFfmpegAvailable(): boolean {
  try {
    execSync('ffmpeg -version', { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

/** Container duration in seconds. */
export async function probeDuration(filePath: string): Promise<number> {
  const raw = runFfprobe(
    `-v error -show_entries format=duration -of csv=p=0 ${quotePath(filePath)}`,
    'probeDuration',
  );
  const duration = parseFloat(raw);
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new Error(`FFprobe probeDuration: no usable duration for ${filePath} (got "${raw}")`);
  }
  return duration;
}

/** Duration plus the first video stream's frame size. */
export async function probeVideo(filePath: string): Promise<VideoMetadata> {
  const streamOut = runFfprobe(
    `-v error -select_streams v:0 -show_entries stream=width,height -of csv=s=,:p=0 ${quotePath(filePath)}`,
    'probeVideo',
  );
  const [widthStr, heightStr] = streamOut.split(',');
  const width = parseInt(widthStr ?? '', 10);
  const height = parseInt(heightStr ?? '', 10);
  if (!(width > 0) || !(height > 0)) {
    throw new Error(`FFprobe probeVideo: no video stream in ${filePath}`);
  }

  const duration = await probeDuration(filePath);
  const meta = { duration, width, height };
  logger.debug('FFmpeg: metadata probed', { filePath, ...meta });
  return meta;
}

/**
 * Cut `range` out of a source video into a silent, re-encoded intermediate.
 * Re-encoding keeps the cut frame-accurate regardless of keyframe spacing.
 */
export async function cutClip(
  sourcePath: string,
  range: TimeRange,
  outputPath: string,
): Promise<void> {
  logger.info('FFmpeg: cutting clip', { sourcePath, ...range, outputPath });
  runFfmpeg(
    `-ss ${formatSeconds(range.start)} -t ${formatSeconds(range.duration)} -i ${quotePath(sourcePath)} ` +
    `-an -c:v libx264 -preset veryfast -crf 18 -pix_fmt yuv420p ${quotePath(outputPath)}`,
    'cutClip',
  );
}

// -16 LUFS target; compand softens TTS reverb tails
const NARRATION_FILTER =
  'highpass=f=80,loudnorm=I=-16:TP=-1.5:LRA=11,' +
  'compand=attacks=0.3:decays=0.8:points=-80/-80|-45/-45|-27/-25|0/-7:soft-knee=6:gain=0:volume=0';

/** Level a narration track into a mono 22.05 kHz MP3. */
export async function normalizeAudio(inputPath: string, outputPath: string): Promise<void> {
  logger.info('FFmpeg: normalizing narration', { inputPath, outputPath });
  runFfmpeg(
    `-i ${quotePath(inputPath)} -af "${NARRATION_FILTER}" -ar 22050 -ac 1 -b:a 128k ${quotePath(outputPath)}`,
    'normalizeAudio',
  );
}

/** Write a single JPEG frame taken at `atSeconds`. */
export async function extractThumbnail(
  videoPath: string,
  atSeconds: number,
  outputPath: string,
): Promise<void> {
  logger.info('FFmpeg: extracting thumbnail', { videoPath, atSeconds });
  runFfmpeg(
    `-ss ${formatSeconds(atSeconds)} -i ${quotePath(videoPath)} -frames:v 1 -q:v 2 ${quotePath(outputPath)}`,
    'extractThumbnail',
  );
}

export const ffmpegToolkit: MediaToolkit = {
  isAvailable:      isFfmpegAvailable,
  probeDuration,
  probeVideo,
  cutClip,
  normalizeAudio,
  extractThumbnail,
  run:              async (args, label) => runFfmpeg(args, label),
};
