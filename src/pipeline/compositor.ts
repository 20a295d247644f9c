/**
 * Compositor: plans how the background clip, narration, captions and
 * optional music combine into one vertical short.
 *
 * Produces a CompositionPlan (FFmpeg inputs plus a filter graph) that the
 * encoder renders in a single pass. Timeline policy:
 *   output duration = narration duration ÷ playback rate
 *   narration ≤ clip → the clip is trimmed to the narration
 *   narration > clip → the clip is looped ceil(narration / clip) − 1 extra times, then trimmed
 */
import * as fs from 'fs';
import * as path from 'path';
import { MUSIC_FADE, OUTPUT_FRAME, type SubtitleStyleName } from '../config.js';
import type { MediaToolkit, VideoMetadata } from '../media/ffmpeg.js';
import { buildCaptionEvents, renderAss } from '../media/subtitles.js';
import { EncodeError, SourceError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ClipWindow, VideoSource } from './clip-selector.js';
import type { AudioTrack } from './voice.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface CropRect {
  width: number;
  height: number;
  x: number;
  y: number;
}

export interface Timeline {
  /** Extra plays of the clip after the first */
  loops: number;
  outputDuration: number;
}

export interface FfmpegInput {
  path: string;
  /** Input options placed before `-i` */
  options: string[];
}

export interface CompositionPlan {
  /** 0: background clip, 1: narration, 2: music (optional) */
  inputs: FfmpegInput[];
  filterGraph: string;
  durationSec: number;
  subtitlePath: string;
  captionCount: number;
}

export interface FilterGraphOptions {
  crop: CropRect;
  playbackRate: number;
  subtitlePath: string;
  /** Present when a music bed is mixed in as input 2 */
  music?: { volume: number };
  durationSec: number;
}

export interface ComposeRequest {
  source: VideoSource;
  sourceMeta: VideoMetadata;
  window: ClipWindow;
  audio: AudioTrack;
  music?: VideoSource;
  musicVolume: number;
  subtitleStyle: SubtitleStyleName;
  playbackRate: number;
  tempDir: string;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

const even = (n: number) => Math.floor(n / 2) * 2;

const MIN_CROP_SIDE = 2;

function formatRate(rate: number): string {
  return String(Number(rate.toFixed(4)));
}

/**
 * Escape a file path for use as a filter option value. Two levels apply: the
 * option parser (`:` `'` `\`) and the graph parser (`,` `;` `[` `]`).
 */
export function escapeFilterPath(p: string): string {
  return p
    .replace(/\\/g, '/')
    .replace(/'/g, "\\\\\\'")
    .replace(/:/g, '\\\\:')
    .replace(/([,;[\]])/g, '\\$1');
}

// ── Public API ─────────────────────────────────────────────────────────────────

/** Largest centered 9:16 region of a `width`×`height` frame, even-sized. */
export function computeVerticalCrop(width: number, height: number): CropRect {
  if (!(width > 0) || !(height > 0)) {
    throw new EncodeError(`Invalid source frame size: ${width}x${height}`);
  }

  // Wider than 9:16 → crop the sides, otherwise crop top and bottom
  const crop: CropRect = width * 16 > height * 9
    ? { width: even((height * 9) / 16), height: even(height), x: 0, y: 0 }
    : { width: even(width), height: even((width * 16) / 9), x: 0, y: 0 };
  crop.x = Math.floor((width - crop.width) / 2);
  crop.y = Math.floor((height - crop.height) / 2);

  if (crop.width < MIN_CROP_SIDE || crop.height < MIN_CROP_SIDE) {
    throw new SourceError(`Source frame ${width}x${height} is too small for a vertical crop`);
  }
  return crop;
}

export function planTimeline(window: ClipWindow, audioDuration: number, playbackRate: number): Timeline {
  if (!(audioDuration > 0)) {
    throw new EncodeError(`Invalid narration duration: ${audioDuration}`);
  }
  if (!(playbackRate > 0)) {
    throw new EncodeError(`Invalid playback rate: ${playbackRate}`);
  }
  const loops = audioDuration <= window.duration ? 0 : Math.ceil(audioDuration / window.duration) - 1;
  return { loops, outputDuration: audioDuration / playbackRate };
}

export function buildFilterGraph(opts: FilterGraphOptions): string {
  const { crop, playbackRate, subtitlePath, music, durationSec } = opts;
  const speedUp = playbackRate !== 1;

  const video = [
    `crop=${crop.width}:${crop.height}:${crop.x}:${crop.y}`,
    `scale=${OUTPUT_FRAME.width}:${OUTPUT_FRAME.height}:flags=lanczos`,
    'setsar=1',
    ...(speedUp ? [`setpts=PTS/${formatRate(playbackRate)}`] : []),
    `subtitles=filename=${escapeFilterPath(subtitlePath)}`,
  ].join(',');

  const narration = speedUp ? `atempo=${formatRate(playbackRate)}` : 'anull';

  if (!music) {
    return `[0:v]${video}[v];[1:a]${narration}[a]`;
  }

  const fadeOutStart = Math.max(0, durationSec - MUSIC_FADE.outSeconds).toFixed(3);
  const bed = [
    `volume=${music.volume}`,
    `afade=t=in:st=0:d=${MUSIC_FADE.inSeconds}`,
    `afade=t=out:st=${fadeOutStart}:d=${MUSIC_FADE.outSeconds}`,
  ].join(',');

  return [
    `[0:v]${video}[v]`,
    `[1:a]${narration}[narr]`,
    `[2:a]${bed}[bgm]`,
    '[narr][bgm]amix=inputs=2:duration=first:dropout_transition=0[a]',
  ].join(';');
}

/**
 * Cut the selected window to a temp clip, write the caption file and return
 * the plan the encoder renders.
 */
export async function composeShort(
  media: Pick<MediaToolkit, 'cutClip'>,
  req: ComposeRequest,
): Promise<CompositionPlan> {
  const timeline = planTimeline(req.window, req.audio.durationSec, req.playbackRate);
  logger.info('Compositor: planning composition', {
    source: req.source.name,
    window: req.window,
    narrationSec: req.audio.durationSec,
    ...timeline,
  });

  const clipPath = path.join(req.tempDir, 'clip.mp4');
  try {
    await media.cutClip(req.source.path, req.window, clipPath);
  } catch (err) {
    throw new EncodeError(`Could not cut background clip: ${errorMessage(err)}`, err);
  }

  const events = buildCaptionEvents(req.audio.words, req.subtitleStyle, req.playbackRate);
  const subtitlePath = path.join(req.tempDir, 'captions.ass');
  fs.writeFileSync(subtitlePath, renderAss(events, req.subtitleStyle), 'utf-8');
  if (events.length === 0) {
    logger.warn('Compositor: no caption events — video will have no subtitles');
  }

  const crop = computeVerticalCrop(req.sourceMeta.width, req.sourceMeta.height);
  const inputs: FfmpegInput[] = [
    { path: clipPath, options: timeline.loops > 0 ? ['-stream_loop', String(timeline.loops)] : [] },
    { path: req.audio.path, options: [] },
  ];
  if (req.music) {
    inputs.push({ path: req.music.path, options: ['-stream_loop', '-1'] });
  }

  const filterGraph = buildFilterGraph({
    crop,
    playbackRate: req.playbackRate,
    subtitlePath,
    music: req.music ? { volume: req.musicVolume } : undefined,
    durationSec: timeline.outputDuration,
  });

  logger.debug('Compositor: filter graph', { filterGraph });
  return {
    inputs,
    filterGraph,
    durationSec: timeline.outputDuration,
    subtitlePath,
    captionCount: events.length,
  };
}
