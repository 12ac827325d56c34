// Seeded PRNG (Mulberry32) — the engine's only source of randomness.
// The generator state is a single uint32 stored in GameState.rngState, so a
// restored game continues the exact sequence it would have produced.

import type { PRNG } from '@/engine/types';

/** FNV-1a over the string's UTF-16 code units; used to seed from a game id. */
export function hashSeed(seed: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

function advance(state: number): { value: number; state: number } {
  const nextState = (state + 0x6d2b79f5) >>> 0;
  let t = nextState;
  t = Math.imul(t ^ (t >>> 15), t | 1) >>> 0;
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  t = (t ^ (t >>> 14)) >>> 0;
  return { value: t / 0x100000000, state: nextState };
}

export function createPRNG(state: number): PRNG {
  let current = state >>> 0;

  return {
    next(): number {
      const step = advance(current);
      current = step.state;
      return step.value;
    },

    // Inclusive on both ends
    nextInt(min: number, max: number): number {
      return min + Math.floor(this.next() * (max - min + 1));
    },

    get state(): number {
      return current;
    },
  };
}

export function pickOne<T>(items: readonly T[], prng: PRNG): T | undefined {
  if (items.length === 0) return undefined;
  return items[prng.nextInt(0, items.length - 1)];
}
