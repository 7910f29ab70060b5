/**
 * Bomb timers, explosion propagation, chain reactions and tile decay.
 *
 * Bombs reached by an explosion are not detonated recursively. Their timer is
 * zeroed and they are queued; the queue is drained after both players' bomb
 * lists have been scanned, and bombs queued while draining run in the same
 * pass.
 */

import {
  ATTR_FLIP_X,
  ATTR_FLIP_Y,
  BOMB_ANIMATION,
  CHAIN_CAPACITY,
  CELL_TILES,
  DEFAULT_ATTR,
  EXPLOSION_FRAMES,
  FIELD_BRICKED,
  FIELD_EXPL_END_X,
  FIELD_EXPL_END_Y,
  FIELD_EXPL_MID,
  FIELD_EXPL_PART_X,
  FIELD_EXPL_PART_Y,
  FIELD_PU_BOMB,
  FIELD_PU_RANGE,
  FIELD_PU_SPEED,
  tileAttr,
} from './constants';
import {
  type Cell,
  type DropRoller,
  type FieldGrid,
  animAt,
  cellType,
  clearCell,
  forEachCell,
  sameCell,
  setCell,
  setCellAttr,
  setCellFlippedX,
  setCellFlippedY,
  startAnimation,
  tickCell,
} from './fieldGrid';
import type { PlayerSlot } from './input';
import { checkIndex, invariant } from './invariant';
import { type Player, bombBase } from './player';
import type { ArenaRng } from './rng';

// ============================================================================
// Types
// ============================================================================

/** A bomb reached by an explosion, waiting in the chain queue. */
export interface TriggeredBomb {
  owner: PlayerSlot;
  slot: number;
  range: number;
}

/** The parts of the simulation an explosion touches. */
export interface BlastState {
  grid: FieldGrid;
  players: readonly [Player, Player];
  chain: TriggeredBomb[];
}

interface Arm {
  dx: number;
  dy: number;
  attr: number;
  part: number;
  end: number;
}

/** Left, right, up, down. */
const ARMS: readonly Arm[] = [
  { dx: -CELL_TILES, dy: 0, attr: tileAttr(0, 1, 1, 3), part: FIELD_EXPL_PART_X, end: FIELD_EXPL_END_X },
  { dx: CELL_TILES, dy: 0, attr: tileAttr(0, 0, 1, 3), part: FIELD_EXPL_PART_X, end: FIELD_EXPL_END_X },
  { dx: 0, dy: -CELL_TILES, attr: tileAttr(1, 0, 1, 3), part: FIELD_EXPL_PART_Y, end: FIELD_EXPL_END_Y },
  { dx: 0, dy: CELL_TILES, attr: tileAttr(0, 0, 1, 3), part: FIELD_EXPL_PART_Y, end: FIELD_EXPL_END_Y },
];

// ============================================================================
// Power-up drops
// ============================================================================

/**
 * Roll for a power-up where a burnt wall was. Bits 0-7 of the draw decide
 * whether anything drops, bits 8-10 pick the kind (4/8 bomb, 3/8 range,
 * 1/8 speed).
 */
export function rollPowerUp(rng: ArenaRng, dropRate: number, threshold: number): number | null {
  const draw = rng.next();
  if (dropRate === 0 || (draw & 0xff) > threshold) {
    return null;
  }
  const kind = (draw & 0x0700) >> 8;
  if (kind <= 3) return FIELD_PU_BOMB;
  if (kind <= 6) return FIELD_PU_RANGE;
  return FIELD_PU_SPEED;
}

/**
 * Advance every animated cell by one tick, column by column.
 */
export function advanceTiles(grid: FieldGrid, rollDrop: DropRoller): void {
  forEachCell(cell => tickCell(grid, cell, rollDrop));
}

// ============================================================================
// Propagation
// ============================================================================

/**
 * Queue the live bomb of `owner` sitting on `cell`, if there is one.
 */
function triggerBomb(state: BlastState, owner: PlayerSlot, cell: Cell): void {
  const player = state.players[owner];
  const slot = player.bombList.findIndex(b => b.ttl > 0 && sameCell(b.cell, cell));
  if (slot === -1) return;

  invariant(state.chain.length < CHAIN_CAPACITY, 'chain queue overflow');
  player.bombList[slot].ttl = 0;
  state.chain.push({ owner, slot, range: player.range });
}

/**
 * Apply an explosion arm to one cell. Returns false where the arm stops.
 */
function burnCell(state: BlastState, cell: Cell, arm: Arm, last: boolean): boolean {
  const { grid } = state;

  switch (cellType(grid, cell)) {
    case 'empty': {
      startAnimation(grid, cell, EXPLOSION_FRAMES);
      setCellAttr(grid, cell, arm.attr);
      const base = last ? arm.end : arm.part;
      if (arm.attr & ATTR_FLIP_Y) {
        setCellFlippedY(grid, cell, base);
      } else if (arm.attr & ATTR_FLIP_X) {
        setCellFlippedX(grid, cell, base);
      } else {
        setCell(grid, cell, base);
      }
      return true;
    }
    case 'flame':
      // crossing another explosion: show a centre piece at the flame's current frame
      setCellAttr(grid, cell, DEFAULT_ATTR);
      setCell(grid, cell, FIELD_EXPL_MID + 2 * (EXPLOSION_FRAMES - animAt(grid, cell)));
      return true;
    case 'powerUpBomb':
    case 'powerUpRange':
    case 'powerUpSpeed':
      clearCell(grid, cell);
      return false;
    case 'bricked':
      if (animAt(grid, cell) === 0) {
        startAnimation(grid, cell, EXPLOSION_FRAMES);
        setCell(grid, cell, FIELD_BRICKED + 2);
      }
      return false;
    case 'bombP1':
      triggerBomb(state, 0, cell);
      return false;
    case 'bombP2':
      triggerBomb(state, 1, cell);
      return false;
    default:
      return false;
  }
}

/**
 * Detonate one bomb slot: the owner regains the bomb, the centre becomes an
 * explosion and four arms of `range` cells spread out.
 */
export function explodeBomb(state: BlastState, owner: PlayerSlot, slot: number, range: number): void {
  const player = state.players[owner];
  checkIndex(slot, player.bombList.length, 'bomb slot');
  const origin = player.bombList[slot].cell;

  player.bombs++;
  invariant(player.bombs <= player.maxBombs, `player ${owner + 1} bombs exceed max`);

  startAnimation(state.grid, origin, EXPLOSION_FRAMES);
  setCell(state.grid, origin, FIELD_EXPL_MID);

  for (const arm of ARMS) {
    for (let step = 1; step <= range; step++) {
      const cell = { x: origin.x + arm.dx * step, y: origin.y + arm.dy * step };
      if (!burnCell(state, cell, arm, step === range)) break;
    }
  }
}

// ============================================================================
// Bomb timers
// ============================================================================

/**
 * Count down one player's bombs. Live bombs toggle their fizz frame; expired
 * ones detonate with the owner's current range. Returns the detonation count.
 */
export function scanBombs(state: BlastState, owner: PlayerSlot): number {
  const player = state.players[owner];
  let detonations = 0;

  player.bombList.forEach((bomb, slot) => {
    if (bomb.ttl === 0) return;
    bomb.ttl--;
    if (bomb.ttl > 0) {
      bomb.ttlFrame--;
      if (bomb.ttlFrame === 0) {
        bomb.ttlFrame = BOMB_ANIMATION;
        bomb.curFrame ^= 1;
        setCell(state.grid, bomb.cell, bombBase(player) + 2 * bomb.curFrame);
      }
      return;
    }
    explodeBomb(state, owner, slot, player.range);
    detonations++;
  });

  return detonations;
}

/**
 * Detonate everything in the chain queue, including bombs queued while
 * draining. Returns the detonation count.
 */
export function resolveChains(state: BlastState): number {
  let i = 0;
  while (i < state.chain.length) {
    const { owner, slot, range } = state.chain[i];
    explodeBomb(state, owner, slot, range);
    i++;
  }
  return i;
}

/**
 * The bomb phase of a timer tick: reset the queue, scan player 1 then
 * player 2, then resolve chains.
 */
export function advanceBombs(state: BlastState): number {
  state.chain.length = 0;
  const direct = scanBombs(state, 0) + scanBombs(state, 1);
  return direct + resolveChains(state);
}
