import { describe, it, expect } from 'vitest';
import { createRng, normalizeSeed } from './rng';

describe('normalizeSeed', () => {
  it('never yields a zero state', () => {
    expect(normalizeSeed(0)).toBe(0x40);
    expect(normalizeSeed(0x40)).toBe(0x40);
  });

  it('keeps the seed as an unsigned 32-bit word', () => {
    expect(normalizeSeed(-1)).toBe(0xffffffff);
    expect(normalizeSeed(3.9)).toBe(0x43);
  });
});

describe('createRng', () => {
  it('follows the xorshift sequence from the minimal seed', () => {
    const rng = createRng(0);
    expect(rng.next()).toBe(64);
    expect(rng.state).toBe(2097216);
    expect(rng.next()).toBe(80);
    expect(rng.state).toBe(524368);
    expect(rng.next()).toBe(84);
  });

  it('returns 16-bit values', () => {
    const rng = createRng(12345);
    expect([rng.next(), rng.next(), rng.next()]).toEqual([45129, 15579, 7747]);
    for (let i = 0; i < 1000; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(0xffff);
    }
  });

  it('is deterministic for equal seeds', () => {
    const a = createRng(987654);
    const b = createRng(987654);
    for (let i = 0; i < 50; i++) {
      expect(a.next()).toBe(b.next());
    }
    expect(a.state).toBe(b.state);
    expect(a.state).not.toBe(0);
  });
});
