import { describe, it, expect, beforeEach } from 'vitest';
import {
  navigateMenu,
  renderSimpleMenu,
  type SimpleMenuItem,
} from './menu';
import { setTheme } from '../utils';

describe('navigateMenu', () => {
  describe('movement', () => {
    it('moves up', () => {
      const result = navigateMenu(2, 5, 'up');
      expect(result.newSelection).toBe(1);
      expect(result.confirmed).toBe(false);
    });

    it('moves down', () => {
      const result = navigateMenu(2, 5, 'down');
      expect(result.newSelection).toBe(3);
      expect(result.confirmed).toBe(false);
    });
  });

  describe('wrapping behavior', () => {
    it('wraps up from first item to last', () => {
      expect(navigateMenu(0, 3, 'up').newSelection).toBe(2);
    });

    it('wraps down from last item to first', () => {
      expect(navigateMenu(2, 3, 'down').newSelection).toBe(0);
    });
  });

  describe('confirmation', () => {
    it('confirms without changing the selection', () => {
      const result = navigateMenu(1, 3, 'confirm');
      expect(result.confirmed).toBe(true);
      expect(result.newSelection).toBe(1);
    });
  });

  it('leaves the selection alone without a move', () => {
    expect(navigateMenu(1, 3, 'none')).toEqual({ newSelection: 1, confirmed: false });
  });

  it('stays at zero on an empty menu', () => {
    expect(navigateMenu(0, 0, 'down')).toEqual({ newSelection: 0, confirmed: false });
  });
});

describe('renderSimpleMenu', () => {
  beforeEach(() => {
    setTheme('classic');
  });

  it('highlights the selection and centres every line', () => {
    const items: SimpleMenuItem[] = [
      { label: 'RESUME', shortcut: 'START' },
      { label: 'OPTIONS' },
    ];
    const output = renderSimpleMenu(items, 0, { centerX: 20, startY: 5 });
    expect(output).toBe(
      '\x1b[5;11H\x1b[1;93m► RESUME [START] ◄\x1b[0m' +
      '\x1b[6;15H\x1b[2m\x1b[96m  OPTIONS  \x1b[0m'
    );
  });

  it('can hide shortcuts', () => {
    const output = renderSimpleMenu([{ label: 'GO', shortcut: 'G' }], 0, {
      centerX: 10,
      startY: 1,
      showShortcuts: false,
    });
    expect(output).toBe('\x1b[1;7H\x1b[1;93m► GO ◄\x1b[0m');
  });
});
