/**
 * Terminal color themes
 *
 * Each theme is a set of ANSI escape codes for the arena, its sprites and
 * the surrounding text.
 */

/**
 * Available theme identifiers
 */
export type ThemeName = 'classic' | 'amber' | 'ice' | 'mono';

/**
 * ANSI color set for one theme
 */
export interface ArenaPalette {
  /** Display name */
  name: string;
  /** Titles, menus and hints */
  accent: string;
  /** Indestructible walls */
  solid: string;
  /** Destructible walls */
  bricked: string;
  /** Walls that are burning down */
  burning: string;
  /** Explosion flames */
  flame: string;
  bombP1: string;
  bombP2: string;
  powerUp: string;
  player1: string;
  player2: string;
}

/**
 * All theme definitions
 */
export const themes: Record<ThemeName, ArenaPalette> = {
  classic: {
    name: 'Classic',
    accent: '\x1b[96m',
    solid: '\x1b[38;5;245m',
    bricked: '\x1b[38;5;130m',
    burning: '\x1b[38;5;208m',
    flame: '\x1b[1;93m',
    bombP1: '\x1b[1;97m',
    bombP2: '\x1b[1;91m',
    powerUp: '\x1b[1;92m',
    player1: '\x1b[1;96m',
    player2: '\x1b[1;95m',
  },
  amber: {
    name: 'Amber',
    accent: '\x1b[38;5;214m',
    solid: '\x1b[38;5;136m',
    bricked: '\x1b[38;5;94m',
    burning: '\x1b[38;5;202m',
    flame: '\x1b[1;38;5;226m',
    bombP1: '\x1b[1;38;5;230m',
    bombP2: '\x1b[1;38;5;166m',
    powerUp: '\x1b[1;38;5;220m',
    player1: '\x1b[1;38;5;229m',
    player2: '\x1b[1;38;5;208m',
  },
  ice: {
    name: 'Ice',
    accent: '\x1b[38;5;159m',
    solid: '\x1b[38;5;67m',
    bricked: '\x1b[38;5;110m',
    burning: '\x1b[38;5;195m',
    flame: '\x1b[1;97m',
    bombP1: '\x1b[1;38;5;123m',
    bombP2: '\x1b[1;38;5;213m',
    powerUp: '\x1b[1;38;5;121m',
    player1: '\x1b[1;38;5;51m',
    player2: '\x1b[1;38;5;219m',
  },
  mono: {
    name: 'Mono',
    accent: '\x1b[97m',
    solid: '\x1b[37m',
    bricked: '\x1b[2;37m',
    burning: '\x1b[90m',
    flame: '\x1b[1;97m',
    bombP1: '\x1b[1;97m',
    bombP2: '\x1b[1;97m',
    powerUp: '\x1b[4;97m',
    player1: '\x1b[1;97m',
    player2: '\x1b[1;7;97m',
  },
};

export const DEFAULT_THEME: ThemeName = 'classic';

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get the palette of a theme
 */
export function getPalette(name: ThemeName): ArenaPalette {
  return themes[name];
}

/**
 * Get the accent escape code of a theme
 */
export function getAnsiColor(name: ThemeName): string {
  return themes[name].accent;
}

const THEME_NAMES: readonly ThemeName[] = ['classic', 'amber', 'ice', 'mono'];

/**
 * Get all available theme names
 */
export function getThemeNames(): ThemeName[] {
  return [...THEME_NAMES];
}

/**
 * Check if a string is a valid theme name
 */
export function isValidThemeName(value: string): value is ThemeName {
  return THEME_NAMES.some(name => name === value);
}
