/**
 * Clip selector: chooses the background video (and optional music bed) for a
 * run and draws the window of the source that ends up on screen.
 *
 * When repeat avoidance is on, assets recorded in the run history are skipped
 * until the whole library has been used, then the history is reset.
 */
import * as fs from 'fs';
import * as path from 'path';
import { MUSIC_EXTENSIONS, SOURCE_VIDEO_EXTENSIONS } from '../config.js';
import { SourceError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { pickOne, type RandomSource } from '../utils/random.js';
import { loadHistory, resetCategory, type HistoryCategory } from './history.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface VideoSource {
  path: string;
  /** File name, used as the run-history key */
  name: string;
}

export interface ClipWindow {
  /** Seconds into the source */
  start: number;
  duration: number;
}

export interface RepeatPolicy {
  avoidRepeats: boolean;
  historyFile: string;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function listByExtension(dir: string, extensions: readonly string[]): string[] {
  return fs
    .readdirSync(dir)
    .filter(f => extensions.includes(path.extname(f).toLowerCase()))
    .sort();
}

function chooseName(
  names: string[],
  category: HistoryCategory,
  policy: RepeatPolicy,
  random: RandomSource,
): string {
  if (!policy.avoidRepeats) return pickOne(names, random);

  const used = new Set(loadHistory(policy.historyFile)[category]);
  let candidates = names.filter(n => !used.has(n));
  if (candidates.length === 0) {
    logger.info('ClipSelector: every asset used — resetting history', { category });
    resetCategory(policy.historyFile, category);
    candidates = names;
  }
  logger.debug('ClipSelector: repeat avoidance', { category, unused: candidates.length, used: used.size });
  return pickOne(candidates, random);
}

// ── Public API ─────────────────────────────────────────────────────────────────

/** Video files in the input directory, sorted by name. */
export function listSourceVideos(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    throw new SourceError(`Background video folder not found: ${dir}`);
  }
  const videos = listByExtension(dir, SOURCE_VIDEO_EXTENSIONS);
  if (videos.length === 0) {
    throw new SourceError(`No background videos found in ${dir}`);
  }
  return videos;
}

export function pickSourceVideo(
  dir: string,
  policy: RepeatPolicy,
  random: RandomSource,
): VideoSource {
  const videos = listSourceVideos(dir);
  const name = chooseName(videos, 'videos', policy, random);
  logger.info('ClipSelector: background video selected', { name, available: videos.length });
  return { path: path.join(dir, name), name };
}

/** A music bed from the music directory, or undefined when none is available. */
export function pickBackgroundMusic(
  dir: string | undefined,
  policy: RepeatPolicy,
  random: RandomSource,
): VideoSource | undefined {
  if (!dir) return undefined;
  if (!fs.existsSync(dir)) {
    logger.warn('ClipSelector: music folder not found — continuing without music', { dir });
    return undefined;
  }
  const tracks = listByExtension(dir, MUSIC_EXTENSIONS);
  if (tracks.length === 0) {
    logger.warn('ClipSelector: no music files found — continuing without music', { dir });
    return undefined;
  }
  const name = chooseName(tracks, 'music', policy, random);
  logger.info('ClipSelector: background music selected', { name });
  return { path: path.join(dir, name), name };
}

/**
 * Draw a window of `desiredDuration` seconds uniformly from a source of
 * `sourceDuration` seconds. The start is floored to whole milliseconds.
 */
export function selectClipWindow(
  sourceDuration: number,
  desiredDuration: number,
  random: RandomSource,
): ClipWindow {
  if (!Number.isFinite(sourceDuration) || sourceDuration <= 0) {
    throw new SourceError(`Invalid source duration: ${sourceDuration}`);
  }
  if (!Number.isFinite(desiredDuration) || desiredDuration <= 0) {
    throw new SourceError(`Invalid clip duration: ${desiredDuration}`);
  }
  if (sourceDuration < desiredDuration) {
    throw new SourceError(
      `insufficient source: ${sourceDuration.toFixed(2)}s available, ${desiredDuration.toFixed(2)}s needed`,
    );
  }

  const maxStart = sourceDuration - desiredDuration;
  const start = Math.min(Math.floor(random() * maxStart * 1_000) / 1_000, maxStart);
  return { start, duration: desiredDuration };
}
