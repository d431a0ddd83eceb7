/**
 * Seeded randomness for round assembly.
 *
 * A round must come out the same for the same source post, so every choice
 * the assembler makes is drawn from one of these generators instead of
 * Math.random.
 */

export type Rng = () => number;

/** FNV-1a hash of a string, as an unsigned 32-bit seed */
export function seedFromString(str: string): number {
  let h = 2166136261;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/** xorshift32; returns floats in [0, 1) */
export function createRng(seed: number | string): Rng {
  let x = (typeof seed === 'string' ? seedFromString(seed) : seed >>> 0) || 123456789;
  return () => {
    x ^= x << 13;
    x >>>= 0;
    x ^= x >>> 17;
    x ^= x << 5;
    x >>>= 0;
    return x / 4294967296;
  };
}

/** Integer in [min, max], both inclusive */
export function randomInt(rng: Rng, min: number, max: number): number {
  if (max <= min) return min;
  return min + Math.floor(rng() * (max - min + 1));
}

export function pick<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[Math.floor(rng() * items.length)];
}

export function shuffle<T>(rng: Rng, items: readonly T[]): T[] {
  const a = items.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}
