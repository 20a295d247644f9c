import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { estimateWordTimings } from '../../src/pipeline/narration.js';
import { synthesizeVoice, type VoiceOptions } from '../../src/pipeline/voice.js';
import { SynthesisError } from '../../src/utils/errors.js';
import { constantRandom, fakeMedia, fakeSpeech, makeTempDir, removeDir } from '../helpers.js';

const STORY = 'My husband left me on a Tuesday. As a mother of two I had to start over.';

describe('synthesizeVoice', () => {
  let tempDir: string;
  let opts: VoiceOptions;

  beforeEach(() => {
    tempDir = makeTempDir();
    opts = { alignment: 'transcribe', tempDir, random: constantRandom(0) };
  });
  afterEach(() => removeDir(tempDir));

  it('renders narration with transcribed word timings', async () => {
    const words = [{ word: 'My', start: 0, end: 0.3 }, { word: 'husband', start: 0.3, end: 0.8 }];
    const speech = fakeSpeech(words);
    const track = await synthesizeVoice(speech, fakeMedia({ audioDuration: 12.5 }), STORY, opts);

    expect(track).toEqual({
      path:        path.join(tempDir, 'narration.normalized.mp3'),
      durationSec: 12.5,
      voice:       'nova',
      text:        STORY,
      words,
    });
    expect(speech.synthesize).toHaveBeenCalledWith(STORY, 'nova', path.join(tempDir, 'narration.mp3'));
  });

  it('levels the TTS file before probing it', async () => {
    const media = fakeMedia({ audioDuration: 9 });
    await synthesizeVoice(fakeSpeech(), media, STORY, opts);

    expect(media.normalizeAudio).toHaveBeenCalledWith(
      path.join(tempDir, 'narration.mp3'),
      path.join(tempDir, 'narration.normalized.mp3'),
    );
    expect(media.probeDuration).toHaveBeenCalledWith(path.join(tempDir, 'narration.normalized.mp3'));
  });

  it('keeps the raw narration when normalization fails', async () => {
    const media = fakeMedia();
    media.normalizeAudio.mockRejectedValue(new Error('FFmpeg normalizeAudio failed: Invalid argument'));
    const speech = fakeSpeech();

    const track = await synthesizeVoice(speech, media, STORY, opts);
    expect(track.path).toBe(path.join(tempDir, 'narration.mp3'));
    expect(media.probeDuration).toHaveBeenCalledWith(path.join(tempDir, 'narration.mp3'));
    expect(speech.transcribeWords).toHaveBeenCalledWith(path.join(tempDir, 'narration.mp3'));
  });

  it('keeps the raw narration when normalization writes nothing usable', async () => {
    const media = fakeMedia();
    media.normalizeAudio.mockImplementation(async (_input, output) => {
      fs.writeFileSync(output, 'x');
    });

    const track = await synthesizeVoice(fakeSpeech(), media, STORY, opts);
    expect(track.path).toBe(path.join(tempDir, 'narration.mp3'));
  });

  it('uses the configured voice', async () => {
    const track = await synthesizeVoice(fakeSpeech(), fakeMedia(), STORY, { ...opts, voice: 'onyx' });
    expect(track.voice).toBe('onyx');
  });

  it('estimates timings without calling transcription', async () => {
    const speech = fakeSpeech();
    const track = await synthesizeVoice(speech, fakeMedia({ audioDuration: 8 }), STORY, { ...opts, alignment: 'estimate' });
    expect(speech.transcribeWords).not.toHaveBeenCalled();
    expect(track.words).toEqual(estimateWordTimings(STORY, 8));
  });

  it('falls back to estimated timings when transcription fails', async () => {
    const speech = fakeSpeech();
    speech.transcribeWords.mockRejectedValue(new Error('503'));
    const track = await synthesizeVoice(speech, fakeMedia({ audioDuration: 8 }), STORY, opts);
    expect(track.words).toEqual(estimateWordTimings(STORY, 8));
  });

  it('falls back to estimated timings when transcription finds no words', async () => {
    const track = await synthesizeVoice(fakeSpeech([]), fakeMedia({ audioDuration: 8 }), STORY, opts);
    expect(track.words).toHaveLength(17);
  });

  it('rejects narration that is empty after cleanup', async () => {
    const speech = fakeSpeech();
    await expect(synthesizeVoice(speech, fakeMedia(), '   ', opts)).rejects.toThrow('Narration is empty after cleanup');
    expect(speech.synthesize).not.toHaveBeenCalled();
  });

  it('rejects narration left with only punctuation', async () => {
    const speech = fakeSpeech();
    await expect(synthesizeVoice(speech, fakeMedia(), '...!!!', opts)).rejects.toThrow(SynthesisError);
    expect(speech.synthesize).not.toHaveBeenCalled();
  });

  it('sends non-Latin narration to TTS unchanged', async () => {
    const story = 'Это была очень странная ночь.';
    const speech = fakeSpeech();
    const track = await synthesizeVoice(speech, fakeMedia(), story, { ...opts, voice: 'onyx' });
    expect(track.text).toBe(story);
    expect(speech.synthesize).toHaveBeenCalledWith(story, 'onyx', path.join(tempDir, 'narration.mp3'));
  });

  it('rejects a near-empty audio file', async () => {
    await expect(synthesizeVoice(fakeSpeech(undefined, 10), fakeMedia(), STORY, opts))
      .rejects.toThrow('TTS produced no usable audio (10 bytes)');
  });

  it('wraps TTS failures', async () => {
    const speech = fakeSpeech();
    speech.synthesize.mockRejectedValue(new Error('invalid api key'));
    const promise = synthesizeVoice(speech, fakeMedia(), STORY, opts);
    await expect(promise).rejects.toThrow(SynthesisError);
    await expect(promise).rejects.toThrow('TTS request failed: invalid api key');
  });

  it('wraps probe failures', async () => {
    const media = fakeMedia();
    media.probeDuration.mockRejectedValue(new Error('moov atom not found'));
    await expect(synthesizeVoice(fakeSpeech(), media, STORY, opts))
      .rejects.toThrow('Could not read narration duration: moov atom not found');
  });
});
