/**
 * Run history: background videos and music already published, so auto-upload
 * runs rotate through the library instead of repeating assets.
 *
 * Stored as a small JSON file next to the config. A missing or unreadable file
 * is treated as an empty history.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

const HistorySchema = z.object({
  videos: z.array(z.string()).default([]),
  music:  z.array(z.string()).default([]),
});

export type RunHistory = z.infer<typeof HistorySchema>;
export type HistoryCategory = keyof RunHistory;

export function emptyHistory(): RunHistory {
  return { videos: [], music: [] };
}

export function loadHistory(filePath: string): RunHistory {
  if (!fs.existsSync(filePath)) return emptyHistory();
  try {
    const parsed = HistorySchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
    if (parsed.success) return parsed.data;
    logger.warn('History: unexpected file shape — starting fresh', { filePath });
  } catch (err) {
    logger.warn('History: could not read file — starting fresh', { filePath, err });
  }
  return emptyHistory();
}

export function saveHistory(filePath: string, history: RunHistory): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(history, null, 2) + '\n', 'utf-8');
}

/** Record an asset as used. No-op when it is already listed. */
export function markUsed(filePath: string, category: HistoryCategory, item: string): void {
  const history = loadHistory(filePath);
  if (history[category].includes(item)) return;
  history[category].push(item);
  saveHistory(filePath, history);
  logger.info('History: marked as used', { category, item });
}

/** Forget every entry of a category once the whole library has been used. */
export function resetCategory(filePath: string, category: HistoryCategory): void {
  const history = loadHistory(filePath);
  history[category] = [];
  saveHistory(filePath, history);
  logger.info('History: category reset', { category });
}
