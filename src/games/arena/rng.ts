/**
 * Deterministic random source for wall layout and power-up drops.
 *
 * xorshift32 over a single non-zero word; the full period covers all
 * 2^32 - 1 non-zero states. Each draw yields the low 16 bits.
 */

export interface ArenaRng {
  /** Next 16-bit value (0..65535). */
  next: () => number;
  /** Current 32-bit state. */
  readonly state: number;
}

/** Bits always set in a seed so the state can never start at zero. */
const SEED_MASK = 0x40;

export function normalizeSeed(seed: number): number {
  return ((Math.trunc(seed) | SEED_MASK) >>> 0);
}

export function createRng(seed: number): ArenaRng {
  let state = normalizeSeed(seed);

  return {
    next: () => {
      state ^= state >>> 17;
      state ^= state << 15;
      state ^= state >>> 23;
      state >>>= 0;
      return state & 0xffff;
    },
    get state() {
      return state;
    },
  };
}
