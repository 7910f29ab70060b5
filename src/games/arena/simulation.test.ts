import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from './config';
import { type SimulationContext, WINNER_DRAW, WINNER_NONE, WINNER_P1, WINNER_P2, consumeRefresh, createSimulation, getSpritePose, runTicks, stepFrame } from './simulation';
import { cellType, clearCell, forEachCell, rawAt, setCell } from './fieldGrid';
import { FIELD_EXPL_MID } from './constants';
import { PAD_ACTION, PAD_NONE, PAD_RIGHT } from './input';

/** A round with every bricked wall removed. */
function openArena(seed = 1): SimulationContext {
  const ctx = createSimulation({ ...DEFAULT_CONFIG }, { seed });
  forEachCell(cell => {
    if (cellType(ctx.grid, cell) === 'bricked') clearCell(ctx.grid, cell);
  });
  return ctx;
}

describe('createSimulation', () => {
  it('builds the same arena for the same seed', () => {
    const a = createSimulation(DEFAULT_CONFIG, { seed: 99 });
    const b = createSimulation(DEFAULT_CONFIG, { seed: 99 });
    expect(Array.from(a.grid.low)).toEqual(Array.from(b.grid.low));
    expect(a.rng.state).toBe(b.rng.state);
  });

  it('starts both players in their corners', () => {
    const ctx = createSimulation(DEFAULT_CONFIG, { seed: 3 });
    expect(getSpritePose(ctx, 0)).toEqual({ x: 16, y: 32, frame: 0, flipX: false });
    expect(getSpritePose(ctx, 1)).toEqual({ x: 208, y: 192, frame: 0, flipX: false });
    expect(ctx.timeRemaining).toBe(180);
    expect(ctx.winner).toBe(WINNER_NONE);
  });
});

describe('stepFrame', () => {
  it('ticks every sixth frame on NTSC and every fifth on PAL', () => {
    const ntsc = createSimulation(DEFAULT_CONFIG, { seed: 5 });
    const pal = createSimulation(DEFAULT_CONFIG, { seed: 5, videoStandard: 'pal' });
    const ntscTicks: boolean[] = [];
    const palTicks: boolean[] = [];
    for (let i = 0; i < 6; i++) {
      ntscTicks.push(stepFrame(ntsc, PAD_NONE, PAD_NONE).ticked);
      palTicks.push(stepFrame(pal, PAD_NONE, PAD_NONE).ticked);
    }
    expect(ntscTicks).toEqual([false, false, false, false, false, true]);
    expect(palTicks).toEqual([false, false, false, false, true, false]);
  });

  it('counts the clock down once per ten ticks', () => {
    const ctx = createSimulation(DEFAULT_CONFIG, { seed: 5 });
    consumeRefresh(ctx);
    runTicks(ctx, 9);
    expect(ctx.timeRemaining).toBe(180);
    runTicks(ctx, 1);
    expect(ctx.timeRemaining).toBe(179);
    expect(consumeRefresh(ctx).hud).toBe(true);
  });

  it('reports and clears refresh flags', () => {
    const ctx = openArena();
    expect(consumeRefresh(ctx)).toEqual({ low: true, high: true, sprites: true, hud: true });
    expect(consumeRefresh(ctx)).toEqual({ low: false, high: false, sprites: false, hud: false });

    stepFrame(ctx, PAD_RIGHT, PAD_NONE);
    expect(consumeRefresh(ctx)).toEqual({ low: false, high: false, sprites: true, hud: false });
  });
});

describe('round scenarios', () => {
  it('player 1 bomb with range 2 in an open corner', () => {
    const ctx = openArena();
    const p1 = ctx.players[0];
    p1.range = 2;

    stepFrame(ctx, PAD_ACTION, PAD_NONE);
    expect(p1.bombs).toBe(0);
    expect(cellType(ctx.grid, { x: 2, y: 4 })).toBe('bombP1');

    const before = runTicks(ctx, 34);
    expect(before.detonations).toBe(0);
    expect(before.winner).toBe(WINNER_NONE);
    expect(cellType(ctx.grid, { x: 2, y: 4 })).toBe('bombP1');

    const report = runTicks(ctx, 1);
    expect(report.detonations).toBe(1);
    expect(p1.bombs).toBe(1);

    expect(rawAt(ctx.grid, { x: 2, y: 4 })).toBe(0x20);
    expect(rawAt(ctx.grid, { x: 4, y: 4 })).toBe(0x40);
    expect(rawAt(ctx.grid, { x: 6, y: 4 })).toBe(0x60);
    expect(rawAt(ctx.grid, { x: 2, y: 6 })).toBe(0x80);
    expect(rawAt(ctx.grid, { x: 2, y: 8 })).toBe(0xa0);
    expect(cellType(ctx.grid, { x: 0, y: 4 })).toBe('solid');
    expect(cellType(ctx.grid, { x: 2, y: 2 })).toBe('solid');
    expect(cellType(ctx.grid, { x: 8, y: 4 })).toBe('empty');
    expect(cellType(ctx.grid, { x: 2, y: 10 })).toBe('empty');

    // player 1 never left the blast centre
    expect(report.winner).toBe(WINNER_P2);
  });

  it('ends in a draw when the clock runs out', () => {
    const ctx = createSimulation({ ...DEFAULT_CONFIG, maxTime: 180 }, { seed: 11 });

    expect(runTicks(ctx, 1799).winner).toBe(WINNER_NONE);
    expect(ctx.timeRemaining).toBe(1);

    expect(runTicks(ctx, 1).winner).toBe(WINNER_DRAW);
    expect(ctx.ticks).toBe(1800);
    expect(ctx.timeRemaining).toBe(0);

    expect(stepFrame(ctx, PAD_RIGHT, PAD_RIGHT)).toEqual({ ticked: false, detonations: 0, winner: WINNER_DRAW });
    expect(ctx.ticks).toBe(1800);
    expect(ctx.players[0].x).toBe(16);
  });

  it('chains a neighbouring bomb before its own timer', () => {
    const ctx = openArena();
    const p1 = ctx.players[0];
    p1.bombs = 2;
    p1.maxBombs = 2;

    stepFrame(ctx, PAD_ACTION, PAD_NONE);
    for (let i = 0; i < 16; i++) {
      stepFrame(ctx, PAD_RIGHT, PAD_NONE);
    }
    expect(p1.x).toBe(32);

    stepFrame(ctx, PAD_ACTION, PAD_NONE);
    expect(cellType(ctx.grid, { x: 4, y: 4 })).toBe('bombP1');
    expect(p1.bombList[0].ttl).toBe(32);
    expect(p1.bombList[1].ttl).toBe(35);

    expect(runTicks(ctx, 31).detonations).toBe(0);
    expect(p1.bombList[1].ttl).toBe(4);

    const report = runTicks(ctx, 1);
    expect(report.detonations).toBe(2);
    expect(p1.bombList[1].ttl).toBe(0);
    expect(p1.bombs).toBe(2);
    expect(rawAt(ctx.grid, { x: 4, y: 4 })).toBe(0x20);
    expect(report.winner).toBe(WINNER_P2);
  });
});

describe('flame hits', () => {
  it('awards the round to P1 when only P2 stands in flame', () => {
    const ctx = openArena();
    setCell(ctx.grid, { x: 26, y: 24 }, FIELD_EXPL_MID);
    expect(stepFrame(ctx, PAD_NONE, PAD_NONE).winner).toBe(WINNER_P1);
  });

  it('is a draw when both players stand in flame in the same frame', () => {
    const ctx = openArena();
    setCell(ctx.grid, { x: 2, y: 4 }, FIELD_EXPL_MID);
    setCell(ctx.grid, { x: 26, y: 24 }, FIELD_EXPL_MID);
    expect(stepFrame(ctx, PAD_NONE, PAD_NONE).winner).toBe(WINNER_DRAW);
  });
});
