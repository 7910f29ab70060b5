/**
 * Field Grid
 *
 * Tile storage for one arena screen. Two byte planes mirror what a tile map
 * renderer consumes (low = tile sheet index, high = attribute byte); two more
 * planes hold the per-cell animation frame count and its time to live.
 *
 * Game logic addresses logical cells (2x2 tile blocks) by their upper left
 * tile, which always has even coordinates. Every mutation writes all four
 * sub-tiles and raises the matching dirty flag.
 */

import tileTypes from './tileTypes.json';
import {
  CELL_TILES,
  DEFAULT_ATTR,
  EXPLOSION_ANIMATION,
  FIELD_BRICKED,
  FIELD_EMPTY,
  GRID_HEIGHT,
  GRID_WIDTH,
  SHEET_ROW,
} from './constants';
import { InvariantError, checkIndex, invariant } from './invariant';

// ============================================================================
// Types
// ============================================================================

export type FieldType =
  | 'empty'
  | 'bombP1'
  | 'bombP2'
  | 'powerUpBomb'
  | 'powerUpRange'
  | 'powerUpSpeed'
  | 'solid'
  | 'bricked'
  | 'flame';

export const FIELD_TYPES: readonly FieldType[] = [
  'empty',
  'bombP1',
  'bombP2',
  'powerUpBomb',
  'powerUpRange',
  'powerUpSpeed',
  'solid',
  'bricked',
  'flame',
];

/** Upper left tile of a logical cell. */
export interface Cell {
  x: number;
  y: number;
}

export interface FieldGrid {
  /** Tile sheet index per tile. */
  low: Uint8Array;
  /** Attribute byte per tile. */
  high: Uint8Array;
  /** Remaining animation frames, read at a cell's upper left tile. */
  anim: Uint8Array;
  /** Ticks until the next animation step, read at a cell's upper left tile. */
  ttl: Uint8Array;
  dirtyLow: boolean;
  dirtyHigh: boolean;
}

/** Replaces a finished burning wall: a tile sheet base index, or null for empty. */
export type DropRoller = () => number | null;

// ============================================================================
// Classification
// ============================================================================

function isFieldType(value: string): value is FieldType {
  return FIELD_TYPES.some(type => type === value);
}

function buildTypeMap(raw: readonly string[]): FieldType[] {
  return raw.map((name, index) => {
    if (!isFieldType(name)) {
      throw new InvariantError(`tileTypes.json entry ${index} has unknown type "${name}"`);
    }
    return name;
  });
}

/** Tile sheet index -> field type. Frame variants share one entry per type. */
const TYPE_MAP: readonly FieldType[] = buildTypeMap(tileTypes.rawTypes);

export function classify(raw: number): FieldType {
  checkIndex(raw, TYPE_MAP.length, 'tile type');
  return TYPE_MAP[raw];
}

export function isPowerUp(type: FieldType): boolean {
  return type === 'powerUpBomb' || type === 'powerUpRange' || type === 'powerUpSpeed';
}

// ============================================================================
// Addressing
// ============================================================================

const TILE_COUNT = GRID_WIDTH * GRID_HEIGHT;

export function tileIndex(x: number, y: number): number {
  invariant(x >= 0 && x < GRID_WIDTH && y >= 0 && y < GRID_HEIGHT, `tile (${x},${y}) outside grid`);
  return y * GRID_WIDTH + x;
}

/**
 * Tile index of a logical cell's upper left tile.
 */
export function cellIndex(cell: Cell): number {
  invariant(cell.x % CELL_TILES === 0 && cell.y % CELL_TILES === 0, `cell (${cell.x},${cell.y}) not aligned`);
  invariant(
    cell.x >= 0 && cell.x + 1 < GRID_WIDTH && cell.y >= 0 && cell.y + 1 < GRID_HEIGHT,
    `cell (${cell.x},${cell.y}) outside grid`,
  );
  return cell.y * GRID_WIDTH + cell.x;
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Visit every logical cell, column by column.
 */
export function forEachCell(visit: (cell: Cell) => void): void {
  for (let x = 0; x < GRID_WIDTH; x += CELL_TILES) {
    for (let y = 0; y < GRID_HEIGHT; y += CELL_TILES) {
      visit({ x, y });
    }
  }
}

// ============================================================================
// Creation
// ============================================================================

export function createFieldGrid(): FieldGrid {
  return {
    low: new Uint8Array(TILE_COUNT).fill(FIELD_EMPTY),
    high: new Uint8Array(TILE_COUNT).fill(DEFAULT_ATTR),
    anim: new Uint8Array(TILE_COUNT),
    ttl: new Uint8Array(TILE_COUNT),
    dirtyLow: true,
    dirtyHigh: true,
  };
}

// ============================================================================
// Reads
// ============================================================================

export function rawAt(grid: FieldGrid, cell: Cell): number {
  return grid.low[cellIndex(cell)];
}

export function cellType(grid: FieldGrid, cell: Cell): FieldType {
  return classify(rawAt(grid, cell));
}

export function animAt(grid: FieldGrid, cell: Cell): number {
  return grid.anim[cellIndex(cell)];
}

export function ttlAt(grid: FieldGrid, cell: Cell): number {
  return grid.ttl[cellIndex(cell)];
}

export function attrAt(grid: FieldGrid, cell: Cell): number {
  return grid.high[cellIndex(cell)];
}

// ============================================================================
// Block writes (all four sub-tiles at once)
// ============================================================================

function writeBlock(grid: FieldGrid, cell: Cell, tl: number, tr: number, bl: number, br: number): void {
  const i = cellIndex(cell);
  grid.low[i] = tl & 0xff;
  grid.low[i + 1] = tr & 0xff;
  grid.low[i + GRID_WIDTH] = bl & 0xff;
  grid.low[i + GRID_WIDTH + 1] = br & 0xff;
  grid.dirtyLow = true;
}

export function clearCell(grid: FieldGrid, cell: Cell): void {
  writeBlock(grid, cell, FIELD_EMPTY, FIELD_EMPTY, FIELD_EMPTY, FIELD_EMPTY);
}

export function setCell(grid: FieldGrid, cell: Cell, base: number): void {
  writeBlock(grid, cell, base, base + 1, base + SHEET_ROW, base + SHEET_ROW + 1);
}

/** Same block with its two columns swapped. */
export function setCellFlippedX(grid: FieldGrid, cell: Cell, base: number): void {
  writeBlock(grid, cell, base + 1, base, base + SHEET_ROW + 1, base + SHEET_ROW);
}

/** Same block with its two rows swapped. */
export function setCellFlippedY(grid: FieldGrid, cell: Cell, base: number): void {
  writeBlock(grid, cell, base + SHEET_ROW, base + SHEET_ROW + 1, base, base + 1);
}

export function nextCellFrame(grid: FieldGrid, cell: Cell): void {
  const i = cellIndex(cell);
  writeBlock(
    grid,
    cell,
    grid.low[i] + 2,
    grid.low[i + 1] + 2,
    grid.low[i + GRID_WIDTH] + 2,
    grid.low[i + GRID_WIDTH + 1] + 2,
  );
}

export function setCellAttr(grid: FieldGrid, cell: Cell, attr: number): void {
  const i = cellIndex(cell);
  grid.high[i] = attr;
  grid.high[i + 1] = attr;
  grid.high[i + GRID_WIDTH] = attr;
  grid.high[i + GRID_WIDTH + 1] = attr;
  grid.dirtyHigh = true;
}

/**
 * Arm a cell's frame countdown: `frames` steps, one every EXPLOSION_ANIMATION ticks.
 */
export function startAnimation(grid: FieldGrid, cell: Cell, frames: number): void {
  const i = cellIndex(cell);
  grid.anim[i] = frames;
  grid.ttl[i] = EXPLOSION_ANIMATION;
}

// ============================================================================
// Animation tick
// ============================================================================

/**
 * Advance one cell's animation by one timer tick.
 *
 * When the last frame ends a burning wall is handed to `rollDrop`, which picks
 * the power-up that replaces it (or null for an empty cell); anything else is
 * cleared. The attribute byte returns to its default either way.
 */
export function tickCell(grid: FieldGrid, cell: Cell, rollDrop: DropRoller): void {
  const i = cellIndex(cell);
  if (grid.ttl[i] === 0) return;

  grid.ttl[i]--;
  if (grid.ttl[i] !== 0) return;

  invariant(grid.anim[i] > 0, `cell (${cell.x},${cell.y}) has ttl without frames`);
  grid.anim[i]--;
  const raw = grid.low[i];

  if (grid.anim[i] > 0) {
    grid.ttl[i] = EXPLOSION_ANIMATION;
    if (raw === FIELD_BRICKED + 4) {
      // burning walls flicker between their two frames
      setCell(grid, cell, FIELD_BRICKED + 2);
    } else {
      nextCellFrame(grid, cell);
    }
    return;
  }

  if (raw === FIELD_BRICKED + 2 || raw === FIELD_BRICKED + 4) {
    const drop = rollDrop();
    if (drop === null) {
      clearCell(grid, cell);
    } else {
      setCell(grid, cell, drop);
    }
  } else {
    clearCell(grid, cell);
  }
  setCellAttr(grid, cell, DEFAULT_ATTR);
}

/**
 * Read and reset the dirty flags of both planes.
 */
export function consumeGridDirty(grid: FieldGrid): { low: boolean; high: boolean } {
  const result = { low: grid.dirtyLow, high: grid.dirtyHigh };
  grid.dirtyLow = false;
  grid.dirtyHigh = false;
  return result;
}
