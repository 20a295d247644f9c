/**
 * Speech client: OpenAI TTS for narration, Whisper transcription for
 * word-level timings. Used only by pipeline/voice.ts.
 */
import * as fs from 'fs';
import OpenAI from 'openai';
import { z } from 'zod';
import type { ShortsConfig, SpeechVoice } from '../config.js';
import { logger } from '../utils/logger.js';

export interface WordTiming {
  word: string;
  /** Seconds from the start of the narration */
  start: number;
  end: number;
}

export interface SpeechClient {
  /** Render `text` with `voice` and write an MP3 to outputPath. */
  synthesize(text: string, voice: SpeechVoice, outputPath: string): Promise<void>;
  /** Word-level timings of a narration file. */
  transcribeWords(audioPath: string): Promise<WordTiming[]>;
}

const TRANSCRIPTION_MODEL = 'whisper-1';

const VerboseTranscriptionSchema = z.object({
  words: z
    .array(z.object({ word: z.string(), start: z.number(), end: z.number() }))
    .optional(),
});

export function createOpenAiSpeech(settings: ShortsConfig['voice']): SpeechClient {
  const openai = new OpenAI({ apiKey: settings.api_key });

  return {
    async synthesize(text, voice, outputPath) {
      logger.debug('openai.synthesize', { model: settings.model, voice, chars: text.length });
      const res = await openai.audio.speech.create({
        model: settings.model,
        voice,
        input: text,
        response_format: 'mp3',
      });
      fs.writeFileSync(outputPath, Buffer.from(await res.arrayBuffer()));
    },

    async transcribeWords(audioPath) {
      logger.debug('openai.transcribeWords', { audioPath });
      const res: unknown = await openai.audio.transcriptions.create({
        file: fs.createReadStream(audioPath),
        model: TRANSCRIPTION_MODEL,
        response_format: 'verbose_json',
        timestamp_granularities: ['word'],
      });

      const parsed = VerboseTranscriptionSchema.safeParse(res);
      if (!parsed.success) {
        throw new Error('Transcription response did not contain word timings');
      }
      return (parsed.data.words ?? []).map(w => ({ word: w.word, start: w.start, end: w.end }));
    },
  };
}
