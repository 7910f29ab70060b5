/**
 * Command line parsing for the blast-arena binary.
 *
 * Kept free of process access so it can be tested; cli.ts acts on the result.
 */

import { type ArenaConfig, normalizeConfig } from './games/arena/config';
import type { VideoStandard } from './games/arena/constants';
import { DEFAULT_THEME, type ThemeName, getThemeNames, isValidThemeName } from './themes';

export interface PlayArgs {
  kind: 'play';
  config: ArenaConfig;
  videoStandard: VideoStandard;
  theme: ThemeName;
  seed?: number;
  warnings: string[];
}

export type CliArgs =
  | PlayArgs
  | { kind: 'help' }
  | { kind: 'setup' }
  | { kind: 'error'; message: string };

const NUMBER_FLAGS: ReadonlyArray<[flag: string, key: keyof ArenaConfig]> = [
  ['--time', 'maxTime'],
  ['--drop-rate', 'dropRate'],
  ['--bombs', 'maxBombs'],
  ['--range', 'maxRange'],
];

class ArgError extends Error {}

/**
 * Remove `flag <value>` from args and return the value, or undefined when the
 * flag is absent.
 */
function takeValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ArgError(`Missing value for ${flag}`);
  }
  args.splice(idx, 2);
  return value;
}

function takeSwitch(args: string[], flag: string): boolean {
  const idx = args.indexOf(flag);
  if (idx === -1) return false;
  args.splice(idx, 1);
  return true;
}

function parseNumber(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ArgError(`Invalid value for ${flag}: ${value}`);
  }
  return parsed;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args = [...argv];

  if (args.includes('--help') || args.includes('-h')) {
    return { kind: 'help' };
  }
  if (args[0] === 'setup') {
    return { kind: 'setup' };
  }

  try {
    const settings: Partial<Record<keyof ArenaConfig, number>> = {};
    for (const [flag, key] of NUMBER_FLAGS) {
      const value = takeValue(args, flag);
      if (value !== undefined) settings[key] = parseNumber(flag, value);
    }

    const seedValue = takeValue(args, '--seed');
    const seed = seedValue === undefined ? undefined : parseNumber('--seed', seedValue);

    const warnings: string[] = [];
    let theme: ThemeName = DEFAULT_THEME;
    const themeValue = takeValue(args, '--theme');
    if (themeValue !== undefined) {
      if (isValidThemeName(themeValue)) {
        theme = themeValue;
      } else {
        warnings.push(`Unknown theme "${themeValue}", using ${DEFAULT_THEME}. Available: ${getThemeNames().join(', ')}`);
      }
    }

    const videoStandard: VideoStandard = takeSwitch(args, '--pal') ? 'pal' : 'ntsc';

    if (args.length > 0) {
      throw new ArgError(`Unknown argument: ${args[0]}`);
    }

    return {
      kind: 'play',
      config: normalizeConfig(settings),
      videoStandard,
      theme,
      ...(seed === undefined ? {} : { seed }),
      warnings,
    };
  } catch (error) {
    if (error instanceof ArgError) {
      return { kind: 'error', message: error.message };
    }
    throw error;
  }
}
