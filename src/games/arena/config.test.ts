import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONFIG,
  OPTION_ABOVE,
  OPTION_BELOW,
  type ArenaConfig,
  adjustOption,
  dropRate255,
  formatOption,
  normalizeConfig,
  resetOption,
} from './config';

describe('adjustOption', () => {
  it('steps each option by its own increment', () => {
    let config: ArenaConfig = { ...DEFAULT_CONFIG };
    config = adjustOption(config, 'time', 1);
    config = adjustOption(config, 'dropRate', -1);
    config = adjustOption(config, 'bombs', 1);
    config = adjustOption(config, 'range', -1);
    expect(config).toEqual({ maxTime: 190, dropRate: 30, maxBombs: 6, maxRange: 8 });
  });

  it('stops at the bounds', () => {
    const low: ArenaConfig = { maxTime: 60, dropRate: 0, maxBombs: 1, maxRange: 1 };
    expect(adjustOption(low, 'time', -1).maxTime).toBe(60);
    expect(adjustOption(low, 'dropRate', -1).dropRate).toBe(0);
    expect(adjustOption(low, 'bombs', -1).maxBombs).toBe(1);
    expect(adjustOption(low, 'range', -1).maxRange).toBe(1);

    const high: ArenaConfig = { maxTime: 990, dropRate: 100, maxBombs: 9, maxRange: 9 };
    expect(adjustOption(high, 'time', 1).maxTime).toBe(990);
    expect(adjustOption(high, 'dropRate', 1).dropRate).toBe(100);
    expect(adjustOption(high, 'bombs', 1).maxBombs).toBe(9);
    expect(adjustOption(high, 'range', 1).maxRange).toBe(9);
  });

  it('leaves the input untouched', () => {
    const config: ArenaConfig = { ...DEFAULT_CONFIG };
    adjustOption(config, 'time', 1);
    expect(config.maxTime).toBe(180);
  });
});

describe('resetOption', () => {
  it('restores only the selected option', () => {
    const config: ArenaConfig = { maxTime: 300, dropRate: 80, maxBombs: 2, maxRange: 3 };
    expect(resetOption(config, 'dropRate')).toEqual({ maxTime: 300, dropRate: 35, maxBombs: 2, maxRange: 3 });
  });
});

describe('option cursor', () => {
  it('moves without wrapping', () => {
    expect(OPTION_BELOW.time).toBe('dropRate');
    expect(OPTION_BELOW.range).toBe('range');
    expect(OPTION_ABOVE.time).toBe('time');
    expect(OPTION_ABOVE.range).toBe('bombs');
  });
});

describe('normalizeConfig', () => {
  it('fills defaults for missing or non-numeric values', () => {
    expect(normalizeConfig()).toEqual(DEFAULT_CONFIG);
    expect(normalizeConfig({ maxTime: 'soon', dropRate: Number.NaN })).toEqual(DEFAULT_CONFIG);
  });

  it('accepts numeric strings, rounds down to the step and clamps', () => {
    expect(normalizeConfig({ maxTime: '245', dropRate: 47, maxBombs: 12, maxRange: '0' })).toEqual({
      maxTime: 240,
      dropRate: 45,
      maxBombs: 9,
      maxRange: 1,
    });
  });
});

describe('dropRate255', () => {
  it('scales percent to a byte threshold', () => {
    expect(dropRate255(0)).toBe(0);
    expect(dropRate255(35)).toBe(89);
    expect(dropRate255(100)).toBe(255);
  });
});

describe('formatOption', () => {
  it('appends the unit', () => {
    expect(formatOption(DEFAULT_CONFIG, 'time')).toBe('180s');
    expect(formatOption(DEFAULT_CONFIG, 'dropRate')).toBe('35%');
    expect(formatOption(DEFAULT_CONFIG, 'bombs')).toBe('5');
  });
});
