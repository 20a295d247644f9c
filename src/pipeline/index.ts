/**
 * Pipeline orchestrator: runs every stage of one short, in order.
 *
 * Local prerequisites (ffmpeg, a background video large enough to crop and
 * long enough for the configured clip) are checked before any paid API is called. Intermediates
 * live in a per-run temp directory that is always removed.
 */
import * as fs from 'fs';
import * as path from 'path';
import type { ShortsConfig } from '../config.js';
import { createClaudeGenerator, type TextGenerator } from '../ai/claude.js';
import { createOpenAiSpeech, type SpeechClient } from '../ai/openai.js';
import { ffmpegToolkit, type MediaToolkit, type VideoMetadata } from '../media/ffmpeg.js';
import { createInstagramTarget } from '../platforms/instagram.js';
import { createYouTubeTarget } from '../platforms/youtube.js';
import { EncodeError, SourceError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { RandomSource } from '../utils/random.js';
import {
  pickBackgroundMusic,
  pickSourceVideo,
  selectClipWindow,
  type ClipWindow,
  type VideoSource,
} from './clip-selector.js';
import { composeShort, computeVerticalCrop } from './compositor.js';
import { encodeShort, type OutputVideo } from './encoder.js';
import { publishShort, type PublishReceipt, type PublishTarget, type UsedAsset } from './publisher.js';
import { generateScript, type Script } from './scriptwriter.js';
import { synthesizeVoice, type AudioTrack } from './voice.js';

// ── Types ─────────────────────────────────────────────────────────────────────

/** Every external collaborator of a run; tests pass in-process fakes. */
export interface PipelineServices {
  text: TextGenerator;
  speech: SpeechClient;
  media: MediaToolkit;
  /** Enabled upload targets; empty when auto-upload is off */
  publishers: PublishTarget[];
}

export interface RunOptions {
  /** Empty or absent → random topic */
  topic?: string;
  random: RandomSource;
  /** Parent of the per-run temp directory */
  tempRoot: string;
  now?: Date;
  /** Overrides the upload backoff base delay */
  uploadDelayMs?: number;
}

export interface RunResult {
  script: Script;
  audio: AudioTrack;
  source: VideoSource;
  music?: VideoSource;
  window: ClipWindow;
  output: OutputVideo;
  uploads: PublishReceipt[];
}

// ── Services ──────────────────────────────────────────────────────────────────

export function createServices(config: ShortsConfig): PipelineServices {
  const publishers: PublishTarget[] = [];
  if (config.upload.auto_upload) publishers.push(createInstagramTarget(config.upload));
  if (config.youtube.auto_upload) publishers.push(createYouTubeTarget(config.youtube));

  return {
    text:   createClaudeGenerator(config.generation),
    speech: createOpenAiSpeech(config.voice),
    media:  ffmpegToolkit,
    publishers,
  };
}

// ── Run ───────────────────────────────────────────────────────────────────────

export async function runPipeline(
  config: ShortsConfig,
  services: PipelineServices,
  opts: RunOptions,
): Promise<RunResult> {
  const { media } = services;
  const { random } = opts;
  logger.info('Pipeline: starting run', { topic: opts.topic || '(random)', uploads: services.publishers.length });

  // ── Pre-flight ──
  if (!media.isAvailable()) {
    throw new EncodeError('ffmpeg was not found on PATH');
  }

  const policy = { avoidRepeats: services.publishers.length > 0, historyFile: config.history.file };
  const source = pickSourceVideo(config.video.input_dir, policy, random);

  let sourceMeta: VideoMetadata;
  try {
    sourceMeta = await media.probeVideo(source.path);
  } catch (err) {
    throw new SourceError(`Could not read background video ${source.name}: ${errorMessage(err)}`, err);
  }
  computeVerticalCrop(sourceMeta.width, sourceMeta.height);

  // A fixed clip length can be checked (and drawn) before anything is paid for
  const clipSeconds = config.video.clip_seconds;
  let window = clipSeconds === undefined ? undefined : selectClipWindow(sourceMeta.duration, clipSeconds, random);

  const music = pickBackgroundMusic(config.video.music_dir, policy, random);

  fs.mkdirSync(opts.tempRoot, { recursive: true });
  const tempDir = fs.mkdtempSync(path.join(opts.tempRoot, `run_${Date.now()}_`));
  logger.debug('Pipeline: temp directory created', { tempDir });

  try {
    const script = await generateScript(services.text, {
      topic:       opts.topic,
      contentType: config.generation.content_type,
      random,
    });

    const audio = await synthesizeVoice(services.speech, media, script.story, {
      voice:     config.voice.voice,
      alignment: config.voice.alignment,
      title:     script.title,
      tempDir,
      random,
    });

    window ??= selectClipWindow(sourceMeta.duration, audio.durationSec, random);
    logger.info('Pipeline: clip window selected', { source: source.name, ...window });

    const plan = await composeShort(media, {
      source,
      sourceMeta,
      window,
      audio,
      music,
      musicVolume:   config.video.music_volume,
      subtitleStyle: config.video.subtitle_style,
      playbackRate:  config.video.playback_rate,
      tempDir,
    });

    const output = await encodeShort(media, plan, {
      title:        script.title,
      outputDir:    config.video.output_dir,
      targetSizeMb: config.video.target_size_mb,
      now:          opts.now,
    });

    const assets: UsedAsset[] = [{ category: 'videos', name: source.name }];
    if (music) assets.push({ category: 'music', name: music.name });

    const uploads = await publishShort(media, services.publishers, output, script, {
      maxAttempts: config.upload.max_attempts,
      baseDelayMs: opts.uploadDelayMs,
      history:     { file: config.history.file, assets },
    });

    logger.info('Pipeline: run complete', { output: output.path, uploads: uploads.length });
    return { script, audio, source, music, window, output, uploads };
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
}
