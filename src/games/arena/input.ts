/**
 * Pad bitmasks and the shared keyboard layout.
 *
 * Raw terminal input only reports key presses, so a key stays held until
 * KEY_HOLD_MS passes without a repeat.
 */

// ============================================================================
// Pad bits
// ============================================================================

export const PAD_UP = 1 << 0;
export const PAD_DOWN = 1 << 1;
export const PAD_LEFT = 1 << 2;
export const PAD_RIGHT = 1 << 3;
export const PAD_ACTION = 1 << 4;
export const PAD_START = 1 << 5;
export const PAD_SELECT = 1 << 6;
export const PAD_RESET = 1 << 7;

export const PAD_NONE = 0;

export type PlayerSlot = 0 | 1;

export interface KeyBinding {
  player: PlayerSlot;
  bit: number;
}

/** DOM key names to pad bits. Letters are matched lower-case. */
export const KEY_BINDINGS: Readonly<Record<string, KeyBinding>> = {
  w: { player: 0, bit: PAD_UP },
  s: { player: 0, bit: PAD_DOWN },
  a: { player: 0, bit: PAD_LEFT },
  d: { player: 0, bit: PAD_RIGHT },
  ' ': { player: 0, bit: PAD_ACTION },
  Escape: { player: 0, bit: PAD_START },
  Tab: { player: 0, bit: PAD_SELECT },
  x: { player: 0, bit: PAD_RESET },

  ArrowUp: { player: 1, bit: PAD_UP },
  ArrowDown: { player: 1, bit: PAD_DOWN },
  ArrowLeft: { player: 1, bit: PAD_LEFT },
  ArrowRight: { player: 1, bit: PAD_RIGHT },
  Enter: { player: 1, bit: PAD_ACTION },
  Backspace: { player: 1, bit: PAD_START },
  '\\': { player: 1, bit: PAD_SELECT },
  '0': { player: 1, bit: PAD_RESET },
};

export const KEY_HOLD_MS = 150;

export function lookupKey(key: string): KeyBinding | undefined {
  const normalized = key.length === 1 ? key.toLowerCase() : key;
  return Object.prototype.hasOwnProperty.call(KEY_BINDINGS, normalized) ? KEY_BINDINGS[normalized] : undefined;
}

// ============================================================================
// Held-key tracking
// ============================================================================

export interface PadTracker {
  /** Record a key press at time `now` (ms). Returns the binding, if any. */
  press: (key: string, now: number) => KeyBinding | undefined;
  /** Pad bits for a player at time `now`. */
  read: (player: PlayerSlot, now: number) => number;
  /** Drop held state, e.g. after a screen change. */
  clear: () => void;
}

export function createPadTracker(holdMs: number = KEY_HOLD_MS): PadTracker {
  const lastSeen = new Map<string, { binding: KeyBinding; at: number }>();

  return {
    press: (key, now) => {
      const binding = lookupKey(key);
      if (binding) {
        lastSeen.set(`${binding.player}:${binding.bit}`, { binding, at: now });
      }
      return binding;
    },
    read: (player, now) => {
      let pad = PAD_NONE;
      for (const { binding, at } of lastSeen.values()) {
        if (binding.player === player && now - at < holdMs) {
          pad |= binding.bit;
        }
      }
      return pad;
    },
    clear: () => {
      lastSeen.clear();
    },
  };
}

/** Bits set in `pad` that were not set in `previous`. */
export function padEdges(pad: number, previous: number): number {
  return pad & ~previous;
}
