/**
 * Shared Menu System
 *
 * Index-based menu navigation and rendering. Callers translate their own
 * input (keys or pad bits) into menu moves, so two players can drive the
 * same menu with different keys.
 */

import { getCurrentThemeColor } from '../utils';

export interface SimpleMenuItem {
  label: string;
  /** Key hint shown next to the label, e.g. 'ESC' */
  shortcut?: string;
}

export type MenuMove = 'up' | 'down' | 'confirm' | 'none';

/**
 * Apply one move to a menu selection. Up and down wrap around.
 */
export function navigateMenu(
  currentSelection: number,
  itemCount: number,
  move: MenuMove
): { newSelection: number; confirmed: boolean } {
  if (itemCount === 0) return { newSelection: 0, confirmed: false };

  switch (move) {
    case 'up':
      return { newSelection: (currentSelection - 1 + itemCount) % itemCount, confirmed: false };
    case 'down':
      return { newSelection: (currentSelection + 1) % itemCount, confirmed: false };
    case 'confirm':
      return { newSelection: currentSelection, confirmed: true };
    case 'none':
      return { newSelection: currentSelection, confirmed: false };
  }
}

/**
 * Render a simple menu (index-based, no callbacks)
 * Returns ANSI escape sequence string
 */
export function renderSimpleMenu(
  items: readonly SimpleMenuItem[],
  selection: number,
  options: {
    centerX: number;
    startY: number;
    showShortcuts?: boolean;
  }
): string {
  const themeColor = getCurrentThemeColor();
  const { centerX, startY, showShortcuts = true } = options;

  let output = '';

  items.forEach((item, i) => {
    const isSelected = i === selection;

    let displayText = item.label;
    if (showShortcuts && item.shortcut) {
      displayText += ` [${item.shortcut}]`;
    }

    const text = isSelected ? `► ${displayText} ◄` : `  ${displayText}  `;
    const style = isSelected ? '\x1b[1;93m' : `\x1b[2m${themeColor}`;

    const itemX = Math.max(1, centerX - Math.floor(text.length / 2));
    output += `\x1b[${startY + i};${itemX}H${style}${text}\x1b[0m`;
  });

  return output;
}
