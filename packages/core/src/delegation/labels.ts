import { randomInt } from 'node:crypto';

export const LETTERS = 'abcdefghijklmnopqrstuvwxyz';

/** Returns a uniformly distributed integer in [0, max) */
export type RandomSource = (max: number) => number;

let fallbackCounter = 0;

/**
 * Seed from wall-clock time and pid, for hosts where crypto is unavailable.
 * The counter keeps consecutive draws within the same millisecond apart.
 */
export function clockRandomSource(max: number): number {
  const seed = Date.now() + process.pid + fallbackCounter++;
  return seed % max;
}

/** crypto.randomInt; pass clockRandomSource explicitly to use the clock seed instead */
export function defaultRandomSource(): RandomSource {
  return (max) => randomInt(max);
}

/**
 * Draw one lowercase letter. With `excluding`, redraw until the letter differs;
 * each draw succeeds with probability 25/26, so the loop has no bound.
 */
export function generateLabel(excluding?: string, random: RandomSource = defaultRandomSource()): string {
  for (;;) {
    const label = LETTERS.charAt(random(LETTERS.length));
    if (label && label !== excluding) return label;
  }
}
