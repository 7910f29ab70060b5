/**
 * `blast-arena setup` — interactive round setup
 *
 * Asks for the four round settings, the theme and the frame rate with clack
 * prompts, then hands the answers back to the CLI to launch the game.
 */

import * as p from '@clack/prompts';
import type { PlayArgs } from './args';
import { type ArenaConfig, type ArenaOption, DEFAULT_CONFIG, OPTIONS, OPTION_SPECS, normalizeConfig } from './games/arena/config';
import type { VideoStandard } from './games/arena/constants';
import { DEFAULT_THEME, type ThemeName, getThemeNames } from './themes';

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Prompt validator for one option: returns the message to show, or undefined
 * when the answer is acceptable.
 */
export function validateOption(option: ArenaOption): (value: string | undefined) => string | undefined {
  const spec = OPTION_SPECS[option];
  return (value) => {
    if (!value || value.trim() === '') return `${spec.label} is required`;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) return 'Enter a number';
    if (parsed < spec.min || parsed > spec.max) {
      return `Must be between ${spec.min} and ${spec.max}`;
    }
    return undefined;
  };
}

function promptMessage(option: ArenaOption): string {
  const spec = OPTION_SPECS[option];
  const step = spec.step > 1 ? `, steps of ${spec.step}` : '';
  return `${spec.label} (${spec.min}-${spec.max}${spec.unit}${step})`;
}

// ---------------------------------------------------------------------------
// Wizard
// ---------------------------------------------------------------------------

function cancelled(): null {
  p.cancel('Cancelled.');
  return null;
}

/**
 * Run the wizard. Resolves to the launch settings, or null when the user
 * cancels a prompt.
 */
export async function runSetup(defaults: ArenaConfig = DEFAULT_CONFIG): Promise<PlayArgs | null> {
  p.intro('blast-arena');

  const answers: Partial<Record<keyof ArenaConfig, string>> = {};
  for (const option of OPTIONS) {
    const spec = OPTION_SPECS[option];
    const answer = await p.text({
      message: promptMessage(option),
      initialValue: String(defaults[spec.key]),
      validate: validateOption(option),
    });
    if (p.isCancel(answer)) return cancelled();
    answers[spec.key] = answer;
  }

  const theme = await p.select<ThemeName>({
    message: 'Theme',
    initialValue: DEFAULT_THEME,
    options: getThemeNames().map(name => ({ value: name, label: name })),
  });
  if (p.isCancel(theme)) return cancelled();

  const videoStandard = await p.select<VideoStandard>({
    message: 'Frame rate',
    initialValue: 'ntsc',
    options: [
      { value: 'ntsc', label: '60 Hz', hint: 'NTSC' },
      { value: 'pal', label: '50 Hz', hint: 'PAL' },
    ],
  });
  if (p.isCancel(videoStandard)) return cancelled();

  const config = normalizeConfig(answers);
  for (const option of OPTIONS) {
    const spec = OPTION_SPECS[option];
    if (Number(answers[spec.key]) !== config[spec.key]) {
      p.log.warn(`[Setup] ${spec.label} rounded to ${config[spec.key]}${spec.unit}`);
    }
  }

  p.outro(`Starting: ${config.maxTime}s, ${config.dropRate}% drops, ${config.maxBombs} bombs, range ${config.maxRange}`);
  return { kind: 'play', config, videoStandard, theme, warnings: [] };
}
