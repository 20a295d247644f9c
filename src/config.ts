import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { ConfigurationError, errorMessage } from './utils/errors.js';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Location of the JSON settings file
  CONFIG_PATH:  z.string().min(1).default('config.json'),

  // Scratch space for per-run intermediates
  TEMP_DIR:     z.string().min(1).default(path.join(os.tmpdir(), 'shortsmith')),

  // Fixes every random draw of a run (topic, hook, voice, source, clip window)
  RANDOM_SEED:  z.coerce.number().int().optional(),

  // Logging
  LOG_LEVEL:    z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:   z.enum(['text', 'json']).default('text'),
});

const parsedEnv = EnvSchema.safeParse(process.env);
if (!parsedEnv.success) {
  const invalid = parsedEnv.error.issues.map(i => i.path.join('.')).join(', ');
  throw new ConfigurationError(`Invalid environment variables: ${invalid}`);
}

export const env = parsedEnv.data;

// ── Config file schema ────────────────────────────────────────────────────────

export const SPEECH_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export type SpeechVoice = typeof SPEECH_VOICES[number];

export const CONTENT_TYPES = ['story', 'facts'] as const;
export type ContentType = typeof CONTENT_TYPES[number];

export const SUBTITLE_STYLES = ['single_word', 'three_words_highlight'] as const;
export type SubtitleStyleName = typeof SUBTITLE_STYLES[number];

const GenerationSchema = z.object({
  api_key:      z.string().min(1),
  model:        z.string().min(1).default('claude-sonnet-4-6'),
  content_type: z.enum(CONTENT_TYPES).default('story'),
  max_tokens:   z.number().int().positive().default(1_000),
});

const VoiceSchema = z.object({
  api_key:   z.string().min(1),
  model:     z.string().min(1).default('tts-1'),
  voice:     z.enum(SPEECH_VOICES).optional(),
  alignment: z.enum(['transcribe', 'estimate']).default('transcribe'),
});

const VideoSchema = z.object({
  input_dir:      z.string().min(1).default('background_videos'),
  output_dir:     z.string().min(1).default('output'),
  music_dir:      z.string().min(1).optional(),
  music_volume:   z.number().min(0).max(1).default(0.4),
  clip_seconds:   z.number().positive().optional(),
  subtitle_style: z.enum(SUBTITLE_STYLES).default('three_words_highlight'),
  playback_rate:  z.number().min(0.5).max(2).default(1),
  target_size_mb: z.number().positive().default(40),
});

const UploadSchema = z.object({
  username:     z.string().default(''),
  password:     z.string().default(''),
  auto_upload:  z.boolean().default(false),
  session_file: z.string().min(1).default('instagram_session.json'),
  max_attempts: z.number().int().min(1).default(3),
});

const YouTubeSchema = z.object({
  auto_upload:         z.boolean().default(false),
  client_secrets_file: z.string().min(1).default('client_secret.json'),
  token_file:          z.string().min(1).default('youtube_token.json'),
  privacy_status:      z.enum(['public', 'unlisted', 'private']).default('public'),
});

const HistorySchema = z.object({
  file: z.string().min(1).default('used_content.json'),
});

const ConfigSchema = z
  .object({
    generation: GenerationSchema,
    voice:      VoiceSchema,
    video:      VideoSchema.default({}),
    upload:     UploadSchema.default({}),
    youtube:    YouTubeSchema.default({}),
    history:    HistorySchema.default({}),
  })
  .superRefine((cfg, ctx) => {
    if (!cfg.upload.auto_upload) return;
    if (!cfg.upload.username) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['upload', 'username'], message: 'required when auto_upload is on' });
    }
    if (!cfg.upload.password) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['upload', 'password'], message: 'required when auto_upload is on' });
    }
  });

export type ShortsConfig = z.infer<typeof ConfigSchema>;

/**
 * Validate an already-decoded settings object.
 * Throws ConfigurationError naming every missing or invalid key.
 */
export function parseConfig(raw: unknown): ShortsConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new ConfigurationError(`Missing or invalid configuration keys: ${invalid}`);
  }
  return parsed.data;
}

/** Read and validate the JSON settings file. */
export function loadConfig(filePath: string = env.CONFIG_PATH): ShortsConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Configuration file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Configuration file ${filePath} is not valid JSON: ${errorMessage(err)}`, err);
  }

  return parseConfig(raw);
}

// ── Bundled data ──────────────────────────────────────────────────────────────

// src/config.ts under tsx, dist/src/config.js after `npm run build`
const DATA_DIR_CANDIDATES = ['../data/', '../../data/'] as const;

/** The bundled data folder as seen from the module at `moduleUrl`. */
export function resolveDataDir(moduleUrl: string | URL): string {
  for (const relative of DATA_DIR_CANDIDATES) {
    const dir = fileURLToPath(new URL(relative, moduleUrl));
    if (fs.existsSync(path.join(dir, 'hooks.json'))) return dir;
  }
  throw new ConfigurationError(`Bundled data folder not found relative to ${fileURLToPath(moduleUrl)}`);
}

export const DATA_DIR = resolveDataDir(import.meta.url);

// ── Media ─────────────────────────────────────────────────────────────────────

export const OUTPUT_FRAME = {
  width:  1080,
  height: 1920,
} as const;

export const SOURCE_VIDEO_EXTENSIONS = ['.mp4', '.mov', '.avi', '.mkv', '.webm'] as const;
export const MUSIC_EXTENSIONS = ['.mp3', '.wav', '.m4a', '.aac', '.ogg'] as const;

export const ENCODING = {
  crf:          19,
  preset:       'medium',
  audioKbps:    160,
  minVideoKbps: 1_500,
  maxVideoKbps: 8_000,
  fps:          30,
  gopFrames:    60,   // 2 s at 30 fps
} as const;

export const MUSIC_FADE = {
  inSeconds:  2,
  outSeconds: 3,
} as const;

// Thumbnail is taken at this offset, or halfway through shorter videos
export const THUMBNAIL_OFFSET_SECONDS = 4;

// TTS output smaller than this is treated as a failed synthesis
export const MIN_AUDIO_BYTES = 1_000;

// ── Retry Policy ──────────────────────────────────────────────────────────────

export const UPLOAD_RETRY = {
  baseDelayMs:   5_000,
  backoffFactor: 2,
} as const;
