/**
 * Random source shared by every draw of a run. Passing a seed makes the whole
 * run reproducible; without one Math.random is used.
 */

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export function createRandom(seed?: number): RandomSource {
  if (seed === undefined) return Math.random;

  // mulberry32
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  };
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) throw new RangeError('pickOne: cannot pick from an empty list');
  return item;
}
