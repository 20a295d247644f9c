/**
 * Narration text preparation: cleanup before TTS, narrator-gender detection
 * for voice choice, and word-timing estimation when no transcription is used.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DATA_DIR, SPEECH_VOICES, type SpeechVoice } from '../config.js';
import type { WordTiming } from '../ai/openai.js';
import { logger } from '../utils/logger.js';
import { pickOne, type RandomSource } from '../utils/random.js';

export type NarratorGender = 'male' | 'female';

const CuesSchema = z.object({
  male:   z.array(z.string()).min(1),
  female: z.array(z.string()).min(1),
  voices: z.object({
    male:   z.array(z.enum(SPEECH_VOICES)).min(1),
    female: z.array(z.enum(SPEECH_VOICES)).min(1),
  }),
});

type NarratorCues = z.infer<typeof CuesSchema>;

let cues: NarratorCues | undefined;

function loadCues(): NarratorCues {
  cues ??= CuesSchema.parse(JSON.parse(fs.readFileSync(path.join(DATA_DIR, 'narrator-cues.json'), 'utf-8')));
  return cues;
}

// Below this length a full cleanup is assumed to have eaten the actual story
const MIN_CLEAN_LENGTH = 10;

// Letters and digits of any script; punctuation alone is not speakable
const SPEAKABLE = /[\p{L}\p{N}]/u;

/** True when `text` has at least one letter or digit to read aloud. */
export function isSpeakable(text: string): boolean {
  return SPEAKABLE.test(text);
}

function minimalClean(text: string): string {
  return text
    .replace(/[^\p{L}\p{M}\p{N}_\s.,!?;:'-]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Strip everything a TTS engine should not read aloud: stage directions,
 * speaker labels, bracketed notes and URLs. Age/gender markers such as
 * "(32M)" are kept.
 */
export function cleanNarration(text: string): string {
  const cleaned = text
    .replace(/\*[\p{L}\p{M}\p{N}_\s]+\*/gu, '')
    .replace(/\((?!\d+[MFmf]\))[^)]+\)/g, '')
    .replace(/\[[^\]]+\]/g, '')
    .replace(/VOICEOVER:|NARRATOR:|SCENE:/gi, '')
    .replace(/https?:\/\/\S+/g, '')
    .replace(/[^\p{L}\p{M}\p{N}_\s.,!?;:'()-]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();

  if (cleaned.length < MIN_CLEAN_LENGTH) {
    logger.debug('Narration: cleaned text too short — using minimal cleanup');
    return minimalClean(text);
  }
  return cleaned;
}

/** Guess the narrator's gender from first-person cues; ties default to male. */
export function detectNarratorGender(text: string, title = ''): NarratorGender {
  const { male, female } = loadCues();
  const haystack = `${title} ${text}`.toLowerCase();
  const score = (patterns: string[]) => patterns.filter(p => new RegExp(p).test(haystack)).length;

  const maleScore = score(male);
  const femaleScore = score(female);
  logger.debug('Narration: gender cues', { maleScore, femaleScore });
  return femaleScore > maleScore ? 'female' : 'male';
}

export function pickVoice(gender: NarratorGender, random: RandomSource): SpeechVoice {
  return pickOne(loadCues().voices[gender], random);
}

/**
 * Spread `durationSec` across the words of `text`, each word weighted by its
 * length plus one for the following gap.
 */
export function estimateWordTimings(text: string, durationSec: number): WordTiming[] {
  const words = text.split(/\s+/).filter(w => w.length > 0);
  const total = words.reduce((sum, w) => sum + w.length + 1, 0);
  if (total === 0) return [];

  let elapsed = 0;
  return words.map(word => {
    const start = (durationSec * elapsed) / total;
    elapsed += word.length + 1;
    return { word, start, end: (durationSec * elapsed) / total };
  });
}
