/**
 * Encoder: renders a CompositionPlan to the final H.264/AAC MP4.
 *
 * The encode writes a uniquely named `.partial.mp4` and links it to its final
 * name only on success, so the output directory never holds a half-written
 * short. A final name already taken gets a `_2`, `_3`… suffix; an existing
 * short is never replaced.
 */
import { randomBytes } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { ENCODING } from '../config.js';
import { formatSeconds, quotePath, type MediaToolkit } from '../media/ffmpeg.js';
import { EncodeError, wrapStageError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { CompositionPlan } from './compositor.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface EncodingPlan {
  videoKbps: number;
  bufsizeKbps: number;
  audioKbps: number;
  crf: number;
}

export interface OutputVideo {
  path: string;
  durationSec: number;
  sizeBytes: number;
}

export interface EncodeRequest {
  title: string;
  outputDir: string;
  targetSizeMb: number;
  /** Timestamp used in the file name; defaults to now */
  now?: Date;
}

// ── Naming ────────────────────────────────────────────────────────────────────

const MAX_TITLE_CHARS = 30;

/** File-system safe slug of a title, e.g. "Stop. The ocean!" → "Stop_The_ocean". */
export function safeTitle(title: string): string {
  const slug = title
    .replace(/[^\p{L}\p{M}\p{N}_\s-]/gu, '')
    .trim()
    .replace(/[-\s]+/g, '_');
  // Slice by code point so a surrogate pair is never split
  return Array.from(slug).slice(0, MAX_TITLE_CHARS).join('') || 'short';
}

/** UTC timestamp as YYYYMMDD_HHMMSS. */
export function fileTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

export function outputStem(title: string, now: Date): string {
  return `${safeTitle(title)}_${fileTimestamp(now)}`;
}

const MAX_NAME_SUFFIX = 1_000;

function isAlreadyTaken(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

/**
 * Give the finished partial file the first free name `<stem>.mp4`,
 * `<stem>_2.mp4`, … . linkSync fails instead of overwriting, so two runs can
 * never claim the same name.
 */
function claimOutputPath(partialPath: string, outputDir: string, stem: string): string {
  for (let n = 1; n <= MAX_NAME_SUFFIX; n++) {
    const candidate = path.join(outputDir, n === 1 ? `${stem}.mp4` : `${stem}_${n}.mp4`);
    try {
      fs.linkSync(partialPath, candidate);
    } catch (err) {
      if (isAlreadyTaken(err)) continue;
      throw err;
    }
    fs.rmSync(partialPath, { force: true });
    return candidate;
  }
  throw new EncodeError(`No free output name for ${stem} in ${outputDir}`);
}

// ── Planning ──────────────────────────────────────────────────────────────────

/**
 * Bitrate cap that keeps a `durationSec` video under `targetSizeMb`.
 * Total kbps = ⌊MB × 8192 ÷ s⌋; the audio share is subtracted and the result
 * clamped to the configured video bitrate range.
 */
export function planEncoding(durationSec: number, targetSizeMb: number): EncodingPlan {
  if (!(durationSec > 0)) {
    throw new EncodeError(`Cannot plan an encode for duration ${durationSec}`);
  }
  const totalKbps = Math.floor((targetSizeMb * 8_192) / durationSec);
  const videoKbps = Math.min(
    ENCODING.maxVideoKbps,
    Math.max(ENCODING.minVideoKbps, totalKbps - ENCODING.audioKbps),
  );
  return { videoKbps, bufsizeKbps: videoKbps * 2, audioKbps: ENCODING.audioKbps, crf: ENCODING.crf };
}

export function buildEncodeArgs(plan: CompositionPlan, enc: EncodingPlan, outputPath: string): string {
  const inputs = plan.inputs
    .map(input => [...input.options, '-i', quotePath(input.path)].join(' '))
    .join(' ');

  return [
    inputs,
    `-filter_complex ${quotePath(plan.filterGraph)}`,
    '-map "[v]" -map "[a]"',
    `-t ${formatSeconds(plan.durationSec)}`,
    `-c:v libx264 -profile:v high -preset ${ENCODING.preset} -crf ${enc.crf}`,
    `-maxrate ${enc.videoKbps}k -bufsize ${enc.bufsizeKbps}k`,
    `-pix_fmt yuv420p -r ${ENCODING.fps} -g ${ENCODING.gopFrames}`,
    `-c:a aac -b:a ${enc.audioKbps}k -ar 44100`,
    '-movflags +faststart',
    quotePath(outputPath),
  ].join(' ');
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function encodeShort(
  media: Pick<MediaToolkit, 'run'>,
  plan: CompositionPlan,
  req: EncodeRequest,
): Promise<OutputVideo> {
  fs.mkdirSync(req.outputDir, { recursive: true });
  const stem = outputStem(req.title, req.now ?? new Date());
  const partialPath = path.join(req.outputDir, `${stem}.${randomBytes(4).toString('hex')}.partial.mp4`);

  const enc = planEncoding(plan.durationSec, req.targetSizeMb);
  logger.info('Encoder: encoding short', { partialPath, durationSec: plan.durationSec, ...enc });

  let finalPath: string;
  try {
    await media.run(buildEncodeArgs(plan, enc, partialPath), 'encode');
    if (!fs.existsSync(partialPath)) {
      throw new EncodeError('FFmpeg reported success but wrote no output');
    }
    finalPath = claimOutputPath(partialPath, req.outputDir, stem);
  } catch (err) {
    fs.rmSync(partialPath, { force: true });
    throw wrapStageError(err, EncodeError, 'Encode failed');
  }

  const sizeBytes = fs.statSync(finalPath).size;
  logger.info('Encoder: output written', {
    path: finalPath,
    sizeMb: Number((sizeBytes / 1_048_576).toFixed(2)),
  });
  return { path: finalPath, durationSec: plan.durationSec, sizeBytes };
}
