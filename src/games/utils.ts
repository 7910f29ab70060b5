/**
 * Shared utilities for games
 *
 * Terminal typing, theme selection and alternate buffer handling. The theme
 * must be configured by the consuming application via setTheme().
 */

import {
  type ArenaPalette,
  type ThemeName,
  DEFAULT_THEME,
  getAnsiColor,
  getPalette,
} from '../themes';

// ============================================================================
// Terminal
// ============================================================================

/**
 * The part of a key event the games read. A DOM KeyboardEvent satisfies it.
 */
export interface KeyInput {
  key: string;
  preventDefault?: () => void;
  stopPropagation?: () => void;
}

export interface TerminalKeyEvent {
  key: string;
  domEvent: KeyInput;
}

export interface Disposable {
  dispose(): void;
}

/**
 * Minimal terminal surface the games draw on. An xterm.js Terminal fits it,
 * and so does the Node adapter in cli.ts.
 */
export interface GameTerminal {
  write(data: string): void;
  readonly cols: number;
  readonly rows: number;
  /** Null once an xterm.js terminal has been disposed. */
  readonly element?: unknown;
  onKey(listener: (event: TerminalKeyEvent) => void): Disposable;
}

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme - configured by the consuming application
 */
let currentTheme: ThemeName = DEFAULT_THEME;

/**
 * Set the current theme
 */
export function setTheme(name: ThemeName): void {
  currentTheme = name;
}

/**
 * Get the current theme
 */
export function getTheme(): ThemeName {
  return currentTheme;
}

/**
 * Get current theme accent color code
 */
export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

export function getCurrentPalette(): ArenaPalette {
  return getPalette(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * This prevents double-entry/exit issues and provides debugging info.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Check if a terminal is valid and can accept writes
 */
export function isTerminalValid(terminal: GameTerminal | null | undefined): terminal is GameTerminal {
  if (!terminal) return false;
  try {
    return terminal.element !== null;
  } catch {
    return false;
  }
}

/**
 * Enter alternate screen buffer with state tracking.
 * Safe to call multiple times - will log warning but not double-enter.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if buffer was entered, false if already in buffer or terminal invalid
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!isTerminalValid(terminal)) {
    console.warn(`[AlternateBuffer] Cannot enter: terminal invalid (reason: ${reason})`);
    return false;
  }

  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 * Safe to call multiple times - will log warning but not double-exit.
 *
 * @returns true if buffer was exited, false if not in buffer or terminal invalid
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!isTerminalValid(terminal)) {
    console.warn(`[AlternateBuffer] Cannot exit: terminal invalid (reason: ${reason})`);
    return false;
  }

  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

/**
 * Check if terminal is currently in alternate buffer
 */
export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Layout Utilities
// ============================================================================

interface VerticalAnchorOptions {
  headerRows?: number;
  footerRows?: number;
  minTop?: number;
}

/**
 * Compute a vertically-centered top row for content while reserving header/footer space.
 */
export function getVerticalAnchor(
  terminalRows: number,
  contentRows: number,
  options: VerticalAnchorOptions = {}
): number {
  const headerRows = options.headerRows ?? 0;
  const footerRows = options.footerRows ?? 0;
  const minTop = Math.max(1, options.minTop ?? 1);

  const availableRows = terminalRows - headerRows - footerRows;
  const centeredTop = headerRows + Math.floor((availableRows - contentRows) / 2) + 1;

  return Math.max(minTop, centeredTop);
}

export type { ThemeName, ArenaPalette } from '../themes';
