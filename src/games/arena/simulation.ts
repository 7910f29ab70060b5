/**
 * Arena Simulation — Pure Round Logic
 *
 * One SimulationContext owns everything a round mutates. stepFrame runs one
 * video frame: the timer tick phase when it is due, then both players, then
 * the winner check. Nothing here touches a terminal or a clock.
 */

import { buildArena } from './arena';
import { type ArenaConfig, dropRate255 } from './config';
import {
  FRAMES_PER_TICK,
  TICKS_PER_SECOND,
  type VideoStandard,
} from './constants';
import { advanceBombs, advanceTiles, type BlastState, rollPowerUp } from './explosion';
import { consumeGridDirty } from './fieldGrid';
import { PAD_NONE } from './input';
import {
  type Player,
  type SpritePose,
  createPlayer,
  getSpritePose as poseOf,
  handlePlayer,
  tickBoost,
  tickWalkCycle,
} from './player';
import { type ArenaRng, createRng } from './rng';

// ============================================================================
// Types
// ============================================================================

export const WINNER_NONE = 0;
export const WINNER_P1 = 1;
export const WINNER_P2 = 2;
export const WINNER_DRAW = 3;

/** Bit set: player 1, player 2, or both for a draw. */
export type Winner = typeof WINNER_NONE | typeof WINNER_P1 | typeof WINNER_P2 | typeof WINNER_DRAW;

export interface SimulationOptions {
  /** Round seed; defaults to the current time. */
  seed?: number;
  videoStandard?: VideoStandard;
}

export interface SimulationContext extends BlastState {
  config: Readonly<ArenaConfig>;
  rng: ArenaRng;
  videoStandard: VideoStandard;
  framesPerTick: number;
  framesUntilTick: number;
  /** Ticks until the clock drops a second. */
  untilSecond: number;
  /** Seconds left in the round. */
  timeRemaining: number;
  ticks: number;
  winner: Winner;
  dropThreshold: number;
  spritesDirty: boolean;
  hudDirty: boolean;
}

export interface FrameReport {
  ticked: boolean;
  /** Bombs that went off this frame, chains included. */
  detonations: number;
  winner: Winner;
}

export interface RefreshFlags {
  low: boolean;
  high: boolean;
  sprites: boolean;
  hud: boolean;
}

// ============================================================================
// Creation
// ============================================================================

export function createSimulation(config: ArenaConfig, options: SimulationOptions = {}): SimulationContext {
  const videoStandard = options.videoStandard ?? 'ntsc';
  const rng = createRng(options.seed ?? Date.now());
  const grid = buildArena(rng);

  return {
    grid,
    players: [createPlayer(0), createPlayer(1)],
    chain: [],
    config: { ...config },
    rng,
    videoStandard,
    framesPerTick: FRAMES_PER_TICK[videoStandard],
    framesUntilTick: FRAMES_PER_TICK[videoStandard],
    untilSecond: TICKS_PER_SECOND,
    timeRemaining: config.maxTime,
    ticks: 0,
    winner: WINNER_NONE,
    dropThreshold: dropRate255(config.dropRate),
    spritesDirty: true,
    hudDirty: true,
  };
}

// ============================================================================
// Timer tick
// ============================================================================

function tickClock(ctx: SimulationContext): void {
  ctx.untilSecond--;
  if (ctx.untilSecond > 0) return;

  ctx.untilSecond = TICKS_PER_SECOND;
  ctx.timeRemaining--;
  ctx.hudDirty = true;
  if (ctx.timeRemaining <= 0) {
    ctx.timeRemaining = 0;
    ctx.winner = WINNER_DRAW;
  }
}

/**
 * Everything driven by the 10 Hz timer: clock, boosts, walk cycles, tile
 * decay, bomb timers and chains. Returns the detonation count.
 */
export function advanceTimers(ctx: SimulationContext): number {
  ctx.ticks++;
  tickClock(ctx);

  for (const player of ctx.players) {
    tickBoost(player);
  }
  for (const player of ctx.players) {
    if (tickWalkCycle(player)) ctx.spritesDirty = true;
  }

  const { rng, config, dropThreshold } = ctx;
  advanceTiles(ctx.grid, () => rollPowerUp(rng, config.dropRate, dropThreshold));

  return advanceBombs(ctx);
}

// ============================================================================
// Frame
// ============================================================================

function markWinner(current: Winner, scorer: typeof WINNER_P1 | typeof WINNER_P2): Winner {
  if (current === WINNER_NONE || current === scorer) return scorer;
  return WINNER_DRAW;
}

function runPlayer(ctx: SimulationContext, player: Player, pad: number): void {
  const result = handlePlayer(ctx.grid, player, pad, ctx.config);
  if (result.spriteDirty) ctx.spritesDirty = true;
  if (result.hudDirty) ctx.hudDirty = true;
  if (result.burned) {
    ctx.winner = markWinner(ctx.winner, player.slot === 0 ? WINNER_P2 : WINNER_P1);
  }
}

/**
 * Run one frame with both players' pads. Once a winner is decided further
 * frames change nothing.
 */
export function stepFrame(ctx: SimulationContext, pad1: number, pad2: number): FrameReport {
  if (ctx.winner !== WINNER_NONE) {
    return { ticked: false, detonations: 0, winner: ctx.winner };
  }

  let ticked = false;
  let detonations = 0;

  ctx.framesUntilTick--;
  if (ctx.framesUntilTick === 0) {
    ctx.framesUntilTick = ctx.framesPerTick;
    ticked = true;
    detonations = advanceTimers(ctx);
  }

  runPlayer(ctx, ctx.players[0], pad1);
  runPlayer(ctx, ctx.players[1], pad2);

  return { ticked, detonations, winner: ctx.winner };
}

/**
 * Step frames with fixed pads until `ticks` timer ticks have passed or the
 * round is decided. Detonations are summed over all frames.
 */
export function runTicks(
  ctx: SimulationContext,
  ticks: number,
  pad1: number = PAD_NONE,
  pad2: number = PAD_NONE,
): FrameReport {
  let remaining = ticks;
  let detonations = 0;
  let last: FrameReport = { ticked: false, detonations: 0, winner: ctx.winner };

  while (remaining > 0 && ctx.winner === WINNER_NONE) {
    last = stepFrame(ctx, pad1, pad2);
    detonations += last.detonations;
    if (last.ticked) remaining--;
  }

  return { ticked: last.ticked, detonations, winner: ctx.winner };
}

// ============================================================================
// Outputs
// ============================================================================

export function getSpritePose(ctx: SimulationContext, slot: 0 | 1): SpritePose {
  return poseOf(ctx.players[slot]);
}

/**
 * Read and reset every refresh flag.
 */
export function consumeRefresh(ctx: SimulationContext): RefreshFlags {
  const grid = consumeGridDirty(ctx.grid);
  const flags: RefreshFlags = { ...grid, sprites: ctx.spritesDirty, hud: ctx.hudDirty };
  ctx.spritesDirty = false;
  ctx.hudDirty = false;
  return flags;
}
