import { describe, it, expect, expectTypeOf, vi, beforeEach } from 'vitest';
import type { Terminal } from '@xterm/xterm';
import {
  type GameTerminal,
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCurrentThemeColor,
  getTheme,
  getVerticalAnchor,
  isInAlternateBuffer,
  isTerminalValid,
  setTheme,
} from './utils';

function fakeTerminal(element: unknown = {}) {
  const writes: string[] = [];
  const terminal: GameTerminal = {
    write: (data: string) => { writes.push(data); },
    cols: 80,
    rows: 24,
    element,
    onKey: () => ({ dispose: () => {} }),
  };
  return { terminal, writes };
}

describe('GameTerminal', () => {
  it('accepts an xterm.js Terminal', () => {
    expectTypeOf<Terminal>().toMatchTypeOf<GameTerminal>();
  });
});

describe('theme', () => {
  beforeEach(() => {
    setTheme('classic');
  });

  it('switches the accent color', () => {
    expect(getCurrentThemeColor()).toBe('\x1b[96m');
    setTheme('amber');
    expect(getTheme()).toBe('amber');
  });
});

describe('alternate buffer', () => {
  it('enters once and exits once', () => {
    const { terminal, writes } = fakeTerminal();
    expect(enterAlternateBuffer(terminal, 'test')).toBe(true);
    expect(isInAlternateBuffer(terminal)).toBe(true);
    expect(exitAlternateBuffer(terminal, 'test')).toBe(true);
    expect(isInAlternateBuffer(terminal)).toBe(false);
    expect(writes).toEqual(['\x1b[?1049h', '\x1b[?25l', '\x1b[2J\x1b[H', '\x1b[?1049l', '\x1b[?25h']);
  });

  it('treats a disposed terminal as invalid', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { terminal, writes } = fakeTerminal(null);
    expect(isTerminalValid(terminal)).toBe(false);
    expect(enterAlternateBuffer(terminal, 'test')).toBe(false);
    expect(writes).toEqual([]);
    warn.mockRestore();
  });
});

describe('getVerticalAnchor', () => {
  it('centers content between header and footer', () => {
    expect(getVerticalAnchor(30, 15, { headerRows: 1, footerRows: 1 })).toBe(8);
  });

  it('clamps to the first row when content does not fit', () => {
    expect(getVerticalAnchor(10, 20, { headerRows: 1 })).toBe(1);
  });
});
