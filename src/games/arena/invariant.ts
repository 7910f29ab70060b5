/**
 * Internal invariant checks for the arena simulation.
 *
 * Every fixed-size structure (grid planes, bomb slots, chain queue) is guarded
 * here. A failed check means the simulation itself is defective; callers never
 * catch these inside a frame.
 */

export class InvariantError extends Error {
  readonly condition: string;

  constructor(condition: string) {
    super(`Invariant violated: ${condition}`);
    this.name = 'InvariantError';
    this.condition = condition;
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

/**
 * Check that `index` addresses an element of a structure with `length` slots.
 */
export function checkIndex(index: number, length: number, what: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new InvariantError(`${what} index ${index} out of bounds (0..${length - 1})`);
  }
}
