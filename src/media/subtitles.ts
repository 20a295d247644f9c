/**
 * ASS caption rendering for burned-in subtitles.
 *
 * Two looks are supported:
 *   single_word              one uppercase word at a time with a short grow-in
 *   three_words_highlight    groups of three words, the spoken word in yellow
 *
 * Timings come from the narration's word timings and are divided by the
 * playback rate so captions stay in sync when the video is sped up.
 */
import { OUTPUT_FRAME, type SubtitleStyleName } from '../config.js';
import type { WordTiming } from '../ai/openai.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface CaptionEvent {
  /** Seconds */
  start: number;
  end: number;
  /** ASS text, override tags included */
  text: string;
}

interface AssStyle {
  fontName: string;
  fontSize: number;
  outline: number;
  shadow: number;
  marginV: number;
}

// ── Constants ─────────────────────────────────────────────────────────────────

const STYLES: Record<SubtitleStyleName, AssStyle> = {
  single_word:           { fontName: 'Cooper Black', fontSize: 96, outline: 4, shadow: 2, marginV: 420 },
  three_words_highlight: { fontName: 'Cooper Black', fontSize: 84, outline: 5, shadow: 2, marginV: 420 },
};

// ASS colours are &HAABBGGRR
const HIGHLIGHT = '{\\c&H00FFFF&\\3c&H000000&}';
const PLAIN     = '{\\c&HFFFFFF&\\3c&H000000&}';

// Grow from 92% to full size over the first 200 ms of each word
const GROW_IN = '{\\fscx92\\fscy92\\t(0,200,2,\\fscx100\\fscy100)}';

const GROUP_SIZE = 3;

// ── Helpers ───────────────────────────────────────────────────────────────────

/** H:MM:SS.cc as used in ASS dialogue lines. */
export function formatAssTime(seconds: number): string {
  const totalCs = Math.max(0, Math.round(seconds * 100));
  const h = Math.floor(totalCs / 360_000);
  const m = Math.floor((totalCs % 360_000) / 6_000);
  const s = Math.floor((totalCs % 6_000) / 100);
  const cs = totalCs % 100;
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${h}:${pad(m)}:${pad(s)}.${pad(cs)}`;
}

/** Uppercase a spoken word and drop characters that ASS treats as markup. */
export function captionWord(word: string): string {
  return word.replace(/[{}\\]/g, '').trim().toUpperCase();
}

function scaled(words: WordTiming[], playbackRate: number): WordTiming[] {
  return words
    .map(w => ({ word: captionWord(w.word), start: w.start / playbackRate, end: w.end / playbackRate }))
    .filter(w => w.word.length > 0);
}

// ── Public API ─────────────────────────────────────────────────────────────────

export function buildCaptionEvents(
  words: WordTiming[],
  style: SubtitleStyleName,
  playbackRate = 1,
): CaptionEvent[] {
  const timed = scaled(words, playbackRate);

  if (style === 'single_word') {
    return timed.map(w => ({ start: w.start, end: w.end, text: `${GROW_IN}${w.word}` }));
  }

  const events: CaptionEvent[] = [];
  for (let i = 0; i < timed.length; i += GROUP_SIZE) {
    const group = timed.slice(i, i + GROUP_SIZE);
    const last = group[group.length - 1];
    if (!last) continue;

    group.forEach((current, idx) => {
      const text = group
        .map((w, j) => `${j === idx ? HIGHLIGHT : PLAIN}${w.word}`)
        .join(' ');
      // The highlight holds until the next word of the group starts
      const next = group[idx + 1];
      events.push({ start: current.start, end: next ? next.start : last.end, text });
    });
  }
  return events;
}

/** Render a complete .ass document sized for the vertical output frame. */
export function renderAss(events: CaptionEvent[], style: SubtitleStyleName): string {
  const s = STYLES[style];
  const lines = [
    '[Script Info]',
    'ScriptType: v4.00+',
    `PlayResX: ${OUTPUT_FRAME.width}`,
    `PlayResY: ${OUTPUT_FRAME.height}`,
    'WrapStyle: 0',
    'ScaledBorderAndShadow: yes',
    '',
    '[V4+ Styles]',
    'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, ' +
      'Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, ' +
      'Shadow, Alignment, MarginL, MarginR, MarginV, Encoding',
    `Style: Default,${s.fontName},${s.fontSize},&H00FFFFFF,&H000000FF,&H00000000,&H80000000,` +
      `-1,0,0,0,100,100,0,0,1,${s.outline},${s.shadow},2,60,60,${s.marginV},1`,
    '',
    '[Events]',
    'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text',
    ...events.map(e => `Dialogue: 0,${formatAssTime(e.start)},${formatAssTime(e.end)},Default,,0,0,0,,${e.text}`),
  ];
  return lines.join('\n') + '\n';
}
