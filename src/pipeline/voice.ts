/**
 * Voice synthesizer: turns the script into a narration track with word
 * timings precise enough to drive caption placement.
 *
 * The TTS file is loudness-normalized before use; if that fails the raw file
 * is kept. Timings come from transcribing the rendered audio; when that is
 * disabled or fails they are estimated from word lengths.
 */
import * as fs from 'fs';
import * as path from 'path';
import { MIN_AUDIO_BYTES, type ShortsConfig, type SpeechVoice } from '../config.js';
import type { SpeechClient, WordTiming } from '../ai/openai.js';
import type { MediaToolkit } from '../media/ffmpeg.js';
import { SynthesisError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { RandomSource } from '../utils/random.js';
import { cleanNarration, detectNarratorGender, estimateWordTimings, isSpeakable, pickVoice } from './narration.js';

export interface AudioTrack {
  path: string;
  durationSec: number;
  voice: SpeechVoice;
  /** Text actually sent to the TTS engine */
  text: string;
  words: WordTiming[];
}

export interface VoiceOptions {
  /** Fixed voice; chosen from the narrator's gender when absent */
  voice?: SpeechVoice;
  alignment: ShortsConfig['voice']['alignment'];
  /** Used with the narration for gender detection */
  title?: string;
  tempDir: string;
  random: RandomSource;
}

/** Path of the levelled narration, or `rawPath` when normalization fails. */
export async function normalizeNarration(
  media: Pick<MediaToolkit, 'normalizeAudio'>,
  rawPath: string,
  tempDir: string,
): Promise<string> {
  const normalizedPath = path.join(tempDir, 'narration.normalized.mp3');
  try {
    await media.normalizeAudio(rawPath, normalizedPath);
  } catch (err) {
    logger.warn('Voice: normalization failed, keeping raw narration', { error: errorMessage(err) });
    fs.rmSync(normalizedPath, { force: true });
    return rawPath;
  }
  if (!fs.existsSync(normalizedPath) || fs.statSync(normalizedPath).size < MIN_AUDIO_BYTES) {
    logger.warn('Voice: normalization wrote no usable audio, keeping raw narration', { normalizedPath });
    return rawPath;
  }
  return normalizedPath;
}

async function alignWords(
  speech: SpeechClient,
  audioPath: string,
  text: string,
  durationSec: number,
  alignment: VoiceOptions['alignment'],
): Promise<WordTiming[]> {
  if (alignment === 'estimate') return estimateWordTimings(text, durationSec);

  try {
    const words = await speech.transcribeWords(audioPath);
    if (words.length > 0) return words;
    logger.warn('Voice: transcription returned no words — estimating timings');
  } catch (err) {
    logger.warn('Voice: transcription failed — estimating timings', { error: errorMessage(err) });
  }
  return estimateWordTimings(text, durationSec);
}

export async function synthesizeVoice(
  speech: SpeechClient,
  media: Pick<MediaToolkit, 'probeDuration' | 'normalizeAudio'>,
  narration: string,
  opts: VoiceOptions,
): Promise<AudioTrack> {
  const text = cleanNarration(narration);
  if (!isSpeakable(text)) {
    throw new SynthesisError('Narration is empty after cleanup');
  }

  const voice = opts.voice ?? pickVoice(detectNarratorGender(text, opts.title), opts.random);
  const rawPath = path.join(opts.tempDir, 'narration.mp3');
  logger.info('Voice: synthesizing narration', { voice, chars: text.length });

  try {
    await speech.synthesize(text, voice, rawPath);
  } catch (err) {
    throw new SynthesisError(`TTS request failed: ${errorMessage(err)}`, err);
  }

  const size = fs.existsSync(rawPath) ? fs.statSync(rawPath).size : 0;
  if (size < MIN_AUDIO_BYTES) {
    throw new SynthesisError(`TTS produced no usable audio (${size} bytes)`);
  }

  const audioPath = await normalizeNarration(media, rawPath, opts.tempDir);

  let durationSec: number;
  try {
    durationSec = await media.probeDuration(audioPath);
  } catch (err) {
    throw new SynthesisError(`Could not read narration duration: ${errorMessage(err)}`, err);
  }

  const words = await alignWords(speech, audioPath, text, durationSec, opts.alignment);
  logger.info('Voice: narration ready', { durationSec, words: words.length });

  return { path: audioPath, durationSec, voice, text, words };
}
