/**
 * Uploader: posts the finished short to every enabled platform.
 *
 * With no targets enabled this is a no-op that prints the output path and
 * suggested captions for manual posting. Each target is retried on its own;
 * failures are collected and raised as one UploadError once every target was
 * attempted. The output video is never deleted.
 */
import * as fs from 'fs';
import { THUMBNAIL_OFFSET_SECONDS, UPLOAD_RETRY } from '../config.js';
import type { MediaToolkit } from '../media/ffmpeg.js';
import { UploadError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { OutputVideo } from './encoder.js';
import { markUsed, type HistoryCategory } from './history.js';
import type { Script } from './scriptwriter.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PublishRequest {
  videoPath: string;
  coverPath: string;
  script: Script;
}

export interface PublishReceipt {
  target: string;
  id: string;
  url?: string;
}

export interface PublishTarget {
  readonly name: string;
  publish(req: PublishRequest): Promise<PublishReceipt>;
}

export interface UsedAsset {
  category: HistoryCategory;
  name: string;
}

export interface PublishOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  /** Assets recorded in the run history after a successful upload */
  history?: { file: string; assets: UsedAsset[] };
}

// ── Helpers ───────────────────────────────────────────────────────────────────

const CAPTION_SUFFIX = ' #viral #fy #reels';
const MAX_CAPTION_LENGTH = 2_200;

/** Reel caption: title, blank line, hashtags. */
export function buildCaption(script: Pick<Script, 'title' | 'hashtags'>): string {
  return `${script.title}\n\n${script.hashtags.trim()}${CAPTION_SUFFIX}`.slice(0, MAX_CAPTION_LENGTH);
}

/** Cover frame at 4 s, or halfway through shorter videos. */
export function thumbnailOffset(durationSec: number): number {
  return Math.min(THUMBNAIL_OFFSET_SECONDS, durationSec / 2);
}

async function extractCover(
  media: Pick<MediaToolkit, 'extractThumbnail'>,
  video: OutputVideo,
): Promise<string> {
  const coverPath = video.path.replace(/\.mp4$/, '.jpg');
  try {
    await media.extractThumbnail(video.path, thumbnailOffset(video.durationSec), coverPath);
  } catch (err) {
    throw new UploadError(`Could not extract cover frame: ${errorMessage(err)}`, err);
  }
  return coverPath;
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function publishShort(
  media: Pick<MediaToolkit, 'extractThumbnail'>,
  targets: PublishTarget[],
  video: OutputVideo,
  script: Script,
  opts: PublishOptions,
): Promise<PublishReceipt[]> {
  if (targets.length === 0) {
    logger.info('Publisher: auto-upload disabled — post manually', {
      video: video.path,
      caption: buildCaption(script),
    });
    return [];
  }

  if (!fs.existsSync(video.path)) {
    throw new UploadError(`Output video is missing: ${video.path}`);
  }
  const coverPath = await extractCover(media, video);
  const req: PublishRequest = { videoPath: video.path, coverPath, script };

  const receipts: PublishReceipt[] = [];
  const failures: string[] = [];

  for (const target of targets) {
    try {
      const receipt = await withRetry(() => target.publish(req), {
        maxAttempts:   opts.maxAttempts,
        baseDelayMs:   opts.baseDelayMs ?? UPLOAD_RETRY.baseDelayMs,
        backoffFactor: UPLOAD_RETRY.backoffFactor,
        label:         `${target.name} upload`,
        onRetry:       (attempt) => logger.info('Publisher: retrying upload', { target: target.name, attempt }),
      });
      receipts.push(receipt);
    } catch (err) {
      logger.error('Publisher: upload failed', { target: target.name, error: errorMessage(err) });
      failures.push(`${target.name}: ${errorMessage(err)}`);
    }
  }

  if (receipts.length > 0 && opts.history) {
    for (const asset of opts.history.assets) {
      markUsed(opts.history.file, asset.category, asset.name);
    }
  }

  if (failures.length > 0) {
    throw new UploadError(`Upload failed (${failures.join('; ')}); video kept at ${video.path}`);
  }

  logger.info('Publisher: all uploads complete', { targets: receipts.map(r => r.target) });
  return receipts;
}
