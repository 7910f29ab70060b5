/**
 * Player state, movement and pickups.
 *
 * Positions are sprite pixels (upper left of the 16x16 sprite). Collision
 * samples the bounding box corners and maps them to logical cells.
 */

import {
  ACT_DOWN,
  ACT_SIDE,
  ACT_UP,
  BOMB_ANIMATION,
  BOMB_TTL,
  BOOTS_TTL,
  FIELD_BOMB_P1,
  FIELD_BOMB_P2,
  FIELD_EMPTY,
  MAX_BOMBS,
  P1_START,
  P2_START,
  PLAYER_ANIMATION,
  P_BOTTOM,
  P_LEFT,
  P_MID_X,
  P_MID_Y,
  P_RIGHT,
  P_TOP,
  WALK_FRAMES,
} from './constants';
import type { ArenaConfig } from './config';
import {
  type Cell,
  type FieldGrid,
  cellType,
  clearCell,
  rawAt,
  sameCell,
  setCell,
} from './fieldGrid';
import { PAD_ACTION, PAD_DOWN, PAD_LEFT, PAD_RIGHT, PAD_UP, type PlayerSlot } from './input';
import { checkIndex, invariant } from './invariant';

// ============================================================================
// Types
// ============================================================================

export interface BombSlot {
  /** Cell the bomb sits on. */
  cell: Cell;
  /** Ticks until detonation; 0 marks a free slot. */
  ttl: number;
  /** Fizz frame, 0 or 1. */
  curFrame: number;
  /** Ticks until the fizz frame toggles. */
  ttlFrame: number;
}

export interface Player {
  slot: PlayerSlot;
  x: number;
  y: number;
  bombs: number;
  maxBombs: number;
  range: number;
  /** Remaining speed boost ticks. */
  boost: number;
  firstFrame: number;
  curFrame: number;
  flipX: boolean;
  /** Index into MOVE_ANIMATION of the current facing. */
  moveAniIdx: number;
  moving: boolean;
  ttlFrame: number;
  bombList: BombSlot[];
  /** Bomb slot the player may still stand on, or null. */
  lastBombIdx: number | null;
}

export interface SpritePose {
  x: number;
  y: number;
  frame: number;
  flipX: boolean;
}

/** What one frame of player handling changed. */
export interface PlayerFrameResult {
  placedBomb: boolean;
  spriteDirty: boolean;
  hudDirty: boolean;
  /** The player touched a flame; the opponent scores. */
  burned: boolean;
}

interface MoveAnimation {
  firstFrame: number;
  flipX: boolean;
}

// ============================================================================
// Animation table
// ============================================================================

/** Indexed by ((dx + 1) << 2) + dy + 1. Slots 3 and 7 are unreachable. */
export const MOVE_ANIMATION: readonly MoveAnimation[] = [
  { firstFrame: ACT_UP, flipX: false }, // -1,-1
  { firstFrame: ACT_SIDE, flipX: true }, // -1, 0
  { firstFrame: ACT_DOWN, flipX: false }, // -1, 1
  { firstFrame: ACT_DOWN, flipX: false },
  { firstFrame: ACT_UP, flipX: false }, //  0,-1
  { firstFrame: ACT_DOWN, flipX: false }, //  0, 0
  { firstFrame: ACT_DOWN, flipX: false }, //  0, 1
  { firstFrame: ACT_DOWN, flipX: false },
  { firstFrame: ACT_UP, flipX: false }, //  1,-1
  { firstFrame: ACT_SIDE, flipX: false }, //  1, 0
  { firstFrame: ACT_DOWN, flipX: false }, //  1, 1
];

const IDLE_ANIMATION_INDEX = 5;

export function moveAnimationIndex(dx: number, dy: number): number {
  return ((dx + 1) << 2) + dy + 1;
}

// ============================================================================
// Creation
// ============================================================================

function createBombList(): BombSlot[] {
  return Array.from({ length: MAX_BOMBS }, () => ({
    cell: { x: 0, y: 0 },
    ttl: 0,
    curFrame: 0,
    ttlFrame: 0,
  }));
}

export function createPlayer(slot: PlayerSlot): Player {
  const start = slot === 0 ? P1_START : P2_START;
  return {
    slot,
    x: start.x,
    y: start.y,
    bombs: 1,
    maxBombs: 1,
    range: 1,
    boost: 0,
    firstFrame: ACT_DOWN,
    curFrame: ACT_DOWN,
    flipX: false,
    moveAniIdx: IDLE_ANIMATION_INDEX,
    moving: false,
    ttlFrame: PLAYER_ANIMATION,
    bombList: createBombList(),
    lastBombIdx: null,
  };
}

/** First tile sheet index of this player's bombs. */
export function bombBase(player: Player): number {
  return player.slot === 0 ? FIELD_BOMB_P1 : FIELD_BOMB_P2;
}

// ============================================================================
// Geometry
// ============================================================================

/** Logical cell coordinate containing pixel `px`. */
export function cellCoord(px: number): number {
  return (px >> 3) & ~1;
}

export function cellAtPixel(px: number, py: number): Cell {
  return { x: cellCoord(px), y: cellCoord(py) };
}

/** Pixel deltas for a pad; opposite directions cancel. */
export function padDeltas(pad: number): { dx: number; dy: number } {
  let dx = 0;
  let dy = 0;
  if (pad & PAD_LEFT) dx--;
  if (pad & PAD_RIGHT) dx++;
  if (pad & PAD_UP) dy--;
  if (pad & PAD_DOWN) dy++;
  return { dx, dy };
}

// ============================================================================
// Collision
// ============================================================================

/**
 * Whether `player` may occupy `cell`. Bombs block everyone except the owner
 * standing on the bomb it dropped last.
 */
export function canEnter(grid: FieldGrid, player: Player, cell: Cell): boolean {
  switch (cellType(grid, cell)) {
    case 'empty':
    case 'powerUpBomb':
    case 'powerUpRange':
    case 'powerUpSpeed':
    case 'flame':
      return true;
    case 'bombP1':
    case 'bombP2': {
      if (player.lastBombIdx === null) return false;
      const bomb = player.bombList[player.lastBombIdx];
      return bomb.ttl > 0 && sameCell(bomb.cell, cell);
    }
    default:
      return false;
  }
}

/**
 * Move one pixel along each axis, x first. An axis commits only when both
 * leading corners of the bounding box can enter their cells.
 */
export function movePlayer(grid: FieldGrid, player: Player, dx: number, dy: number): boolean {
  let moved = false;

  if (dx !== 0) {
    const nx = player.x + dx;
    const edge = cellCoord(nx + (dx > 0 ? P_RIGHT : P_LEFT));
    const top = cellCoord(player.y + P_TOP);
    const bottom = cellCoord(player.y + P_BOTTOM);
    const upper = canEnter(grid, player, { x: edge, y: top });
    if (upper && canEnter(grid, player, { x: edge, y: bottom })) {
      player.x = nx;
      moved = true;
    }
  }

  if (dy !== 0) {
    const ny = player.y + dy;
    const edge = cellCoord(ny + (dy > 0 ? P_BOTTOM : P_TOP));
    const left = cellCoord(player.x + P_LEFT);
    const right = cellCoord(player.x + P_RIGHT);
    const first = canEnter(grid, player, { x: left, y: edge });
    if (first && canEnter(grid, player, { x: right, y: edge })) {
      player.y = ny;
      moved = true;
    }
  }

  return moved;
}

// ============================================================================
// Bomb placement
// ============================================================================

/**
 * Drop a bomb on the cell under the sprite centre. Ignored without a bomb in
 * hand or when that cell is not empty.
 */
export function placeBomb(grid: FieldGrid, player: Player): boolean {
  if (player.bombs === 0) return false;

  const cell = cellAtPixel(player.x + P_MID_X, player.y + P_MID_Y);
  if (rawAt(grid, cell) !== FIELD_EMPTY) return false;

  const index = player.bombList.findIndex(b => b.ttl === 0);
  invariant(index !== -1, `player ${player.slot + 1} has no free bomb slot`);

  player.bombs--;
  invariant(player.bombs <= player.maxBombs, `player ${player.slot + 1} bombs exceed max`);
  setCell(grid, cell, bombBase(player));

  const slot = player.bombList[index];
  slot.cell = cell;
  slot.ttl = BOMB_TTL;
  slot.curFrame = 0;
  slot.ttlFrame = BOMB_ANIMATION;
  player.lastBombIdx = index;
  return true;
}

// ============================================================================
// Animation
// ============================================================================

/**
 * Update facing after a movement step. Returns whether the sprite changed.
 */
export function updateFacing(player: Player, dx: number, dy: number): boolean {
  if (player.moving) {
    if (dx !== 0 || dy !== 0) {
      const index = moveAnimationIndex(dx, dy);
      if (player.moveAniIdx !== index) {
        checkIndex(index, MOVE_ANIMATION.length, 'move animation');
        const ani = MOVE_ANIMATION[index];
        player.firstFrame = ani.firstFrame;
        player.curFrame = ani.firstFrame;
        player.flipX = ani.flipX;
        player.moveAniIdx = index;
        player.ttlFrame = PLAYER_ANIMATION;
        return true;
      }
      return false;
    }
    player.curFrame = player.firstFrame;
    player.moving = false;
    return true;
  }

  if (dx !== 0 || dy !== 0) {
    player.moving = true;
  }
  return false;
}

/**
 * Advance the walk cycle by one timer tick.
 */
export function tickWalkCycle(player: Player): boolean {
  if (!player.moving) return false;
  player.ttlFrame--;
  if (player.ttlFrame > 0) return false;

  player.ttlFrame = PLAYER_ANIMATION;
  player.curFrame++;
  if (player.curFrame - player.firstFrame >= WALK_FRAMES) {
    player.curFrame = player.firstFrame;
  }
  return true;
}

export function tickBoost(player: Player): void {
  if (player.boost > 0) player.boost--;
}

export function getSpritePose(player: Player): SpritePose {
  return { x: player.x, y: player.y, frame: player.curFrame, flipX: player.flipX };
}

// ============================================================================
// Last-bomb exemption
// ============================================================================

/**
 * Drop the exemption once the bounding box no longer covers the bomb's cell.
 */
export function clearExemption(player: Player): void {
  if (player.lastBombIdx === null) return;
  checkIndex(player.lastBombIdx, player.bombList.length, 'bomb slot');
  const { cell } = player.bombList[player.lastBombIdx];
  const x1 = cellCoord(player.x + P_LEFT);
  const x2 = cellCoord(player.x + P_RIGHT);
  const y1 = cellCoord(player.y + P_TOP);
  const y2 = cellCoord(player.y + P_BOTTOM);
  const covered = x1 <= cell.x && x2 >= cell.x && y1 <= cell.y && y2 >= cell.y;
  if (!covered) {
    player.lastBombIdx = null;
  }
}

// ============================================================================
// Pickups
// ============================================================================

export type PickupEffect = 'none' | 'consumed' | 'statChanged' | 'burned';

/**
 * Apply whatever lies under one corner of the bounding box. Power-ups are
 * consumed even when the stat is already at its cap.
 */
export function checkPickup(grid: FieldGrid, player: Player, cell: Cell, config: ArenaConfig): PickupEffect {
  switch (cellType(grid, cell)) {
    case 'powerUpBomb': {
      const raised = player.maxBombs < config.maxBombs;
      if (raised) {
        player.bombs++;
        player.maxBombs++;
        invariant(player.bombs <= player.maxBombs, `player ${player.slot + 1} bombs exceed max`);
      }
      clearCell(grid, cell);
      return raised ? 'statChanged' : 'consumed';
    }
    case 'powerUpRange': {
      const raised = player.range < config.maxRange;
      if (raised) player.range++;
      clearCell(grid, cell);
      return raised ? 'statChanged' : 'consumed';
    }
    case 'powerUpSpeed':
      player.boost = BOOTS_TTL;
      clearCell(grid, cell);
      return 'consumed';
    case 'flame':
      return 'burned';
    default:
      return 'none';
  }
}

/** Corner offsets sampled for pickups, in order. */
const PICKUP_CORNERS: readonly [number, number][] = [
  [P_LEFT, P_TOP],
  [P_RIGHT, P_TOP],
  [P_LEFT, P_BOTTOM],
  [P_RIGHT, P_BOTTOM],
];

export function checkPickups(grid: FieldGrid, player: Player, config: ArenaConfig): PickupEffect[] {
  return PICKUP_CORNERS.map(([ox, oy]) =>
    checkPickup(grid, player, cellAtPixel(player.x + ox, player.y + oy), config),
  );
}

// ============================================================================
// Per-frame handling
// ============================================================================

/**
 * One frame for one player: bomb drop, then one movement step (two while
 * boosted), each followed by facing, exemption and pickup checks.
 */
export function handlePlayer(grid: FieldGrid, player: Player, pad: number, config: ArenaConfig): PlayerFrameResult {
  const result: PlayerFrameResult = { placedBomb: false, spriteDirty: false, hudDirty: false, burned: false };

  if (pad & PAD_ACTION) {
    result.placedBomb = placeBomb(grid, player);
  }

  const steps = player.boost > 0 ? 2 : 1;
  for (let i = 0; i < steps; i++) {
    const { dx, dy } = padDeltas(pad);
    if (movePlayer(grid, player, dx, dy)) result.spriteDirty = true;
    if (updateFacing(player, dx, dy)) result.spriteDirty = true;
    if (player.moving) clearExemption(player);

    for (const effect of checkPickups(grid, player, config)) {
      if (effect === 'statChanged') result.hudDirty = true;
      if (effect === 'burned') result.burned = true;
    }
  }

  return result;
}
