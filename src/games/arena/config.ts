/**
 * Round configuration and the options screen model.
 *
 * Values are validated where they are produced (options screen, CLI flags,
 * setup prompts); the simulation trusts whatever it is handed.
 */

import {
  DEF_DROP_RATE,
  DEF_MAX_BOMBS,
  DEF_MAX_RANGE,
  DEF_MAX_TIME,
  MAX_BOMBS,
  MAX_RANGE,
} from './constants';

// ============================================================================
// Types
// ============================================================================

export interface ArenaConfig {
  /** Round length in seconds. */
  maxTime: number;
  /** Chance in percent that a burnt wall leaves a power-up. */
  dropRate: number;
  /** Bomb capacity reachable through power-ups. */
  maxBombs: number;
  /** Explosion range reachable through power-ups. */
  maxRange: number;
}

export type ArenaOption = 'time' | 'dropRate' | 'bombs' | 'range';

export interface OptionSpec {
  key: keyof ArenaConfig;
  label: string;
  unit: string;
  min: number;
  max: number;
  step: number;
  defaultValue: number;
}

// ============================================================================
// Option table
// ============================================================================

export const OPTIONS: readonly ArenaOption[] = ['time', 'dropRate', 'bombs', 'range'];

export const OPTION_SPECS: Record<ArenaOption, OptionSpec> = {
  time: { key: 'maxTime', label: 'TIME', unit: 's', min: 60, max: 990, step: 10, defaultValue: DEF_MAX_TIME },
  dropRate: { key: 'dropRate', label: 'DROP RATE', unit: '%', min: 0, max: 100, step: 5, defaultValue: DEF_DROP_RATE },
  bombs: { key: 'maxBombs', label: 'BOMBS', unit: '', min: 1, max: MAX_BOMBS, step: 1, defaultValue: DEF_MAX_BOMBS },
  range: { key: 'maxRange', label: 'RANGE', unit: '', min: 1, max: MAX_RANGE, step: 1, defaultValue: DEF_MAX_RANGE },
};

/** Cursor movement on the options screen. The list does not wrap. */
export const OPTION_BELOW: Record<ArenaOption, ArenaOption> = {
  time: 'dropRate',
  dropRate: 'bombs',
  bombs: 'range',
  range: 'range',
};

export const OPTION_ABOVE: Record<ArenaOption, ArenaOption> = {
  time: 'time',
  dropRate: 'time',
  bombs: 'dropRate',
  range: 'bombs',
};

export const DEFAULT_CONFIG: Readonly<ArenaConfig> = {
  maxTime: DEF_MAX_TIME,
  dropRate: DEF_DROP_RATE,
  maxBombs: DEF_MAX_BOMBS,
  maxRange: DEF_MAX_RANGE,
};

// ============================================================================
// Operations
// ============================================================================

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Step one option up or down, staying inside its bounds.
 */
export function adjustOption(config: ArenaConfig, option: ArenaOption, direction: 1 | -1): ArenaConfig {
  const spec = OPTION_SPECS[option];
  const next = clamp(config[spec.key] + direction * spec.step, spec.min, spec.max);
  return { ...config, [spec.key]: next };
}

export function resetOption(config: ArenaConfig, option: ArenaOption): ArenaConfig {
  const spec = OPTION_SPECS[option];
  return { ...config, [spec.key]: spec.defaultValue };
}

function normalizeValue(raw: unknown, spec: OptionSpec): number {
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return spec.defaultValue;
  }
  const stepped = Math.floor(value / spec.step) * spec.step;
  return clamp(stepped, spec.min, spec.max);
}

/**
 * Turn loosely typed settings (CLI flags, prompt answers) into a valid
 * configuration. Missing or non-numeric values take the default; others are
 * rounded down to the option's step and clamped.
 */
export function normalizeConfig(input: Partial<Record<keyof ArenaConfig, unknown>> = {}): ArenaConfig {
  return {
    maxTime: normalizeValue(input.maxTime, OPTION_SPECS.time),
    dropRate: normalizeValue(input.dropRate, OPTION_SPECS.dropRate),
    maxBombs: normalizeValue(input.maxBombs, OPTION_SPECS.bombs),
    maxRange: normalizeValue(input.maxRange, OPTION_SPECS.range),
  };
}

/** Drop rate percent scaled to a byte threshold. */
export function dropRate255(dropRate: number): number {
  return Math.floor((dropRate * 255) / 100);
}

export function formatOption(config: ArenaConfig, option: ArenaOption): string {
  const spec = OPTION_SPECS[option];
  return `${config[spec.key]}${spec.unit}`;
}
