/**
 * Arena Renderer
 *
 * Pure functions that turn simulation state into ANSI strings. One logical
 * cell is two terminal columns by one row; one column covers 8 pixels and
 * one row 16. The top logical row holds the HUD, so the field starts at
 * logical row 1.
 */

import type { ArenaPalette } from '../../themes';
import {
  ACT_SIDE,
  ACT_UP,
  CELL_TILES,
  FIELD_BRICKED,
  GRID_HEIGHT,
  GRID_WIDTH,
  P_MID_Y,
} from './constants';
import { type Cell, type FieldGrid, animAt, cellType, rawAt } from './fieldGrid';
import type { PlayerSlot } from './input';
import { type Player, type SpritePose, getSpritePose } from './player';
import type { SimulationContext } from './simulation';

// ============================================================================
// Layout
// ============================================================================

export const FIELD_COLS = GRID_WIDTH / CELL_TILES;
/** Logical rows below the HUD row. */
export const FIELD_ROWS = GRID_HEIGHT / CELL_TILES - 1;
export const SCREEN_WIDTH = FIELD_COLS * 2;
/** HUD line, a gap, then the field. */
export const SCREEN_HEIGHT = FIELD_ROWS + 2;

/** 1-based terminal position of the field's top left logical cell. */
export interface ScreenOrigin {
  left: number;
  top: number;
}

const RESET = '\x1b[0m';

// ============================================================================
// Cells
// ============================================================================

function flameGlyph(raw: number): string {
  const group = raw >> 4;
  if (group <= 0x3) return '╬╬';
  if (group <= 0x7) return '══';
  return '║║';
}

/**
 * Two-column glyph for one logical cell, colored from the palette.
 */
export function cellGlyph(grid: FieldGrid, cell: Cell, palette: ArenaPalette): string {
  const raw = rawAt(grid, cell);
  switch (cellType(grid, cell)) {
    case 'empty':
      return '  ';
    case 'solid':
      return `${palette.solid}██${RESET}`;
    case 'bricked':
      return raw === FIELD_BRICKED
        ? `${palette.bricked}▓▓${RESET}`
        : `${palette.burning}▒▒${RESET}`;
    case 'flame': {
      const fading = animAt(grid, cell) <= 1 ? '\x1b[2m' : '';
      return `${fading}${palette.flame}${flameGlyph(raw)}${RESET}`;
    }
    case 'bombP1':
    case 'bombP2': {
      const color = cellType(grid, cell) === 'bombP1' ? palette.bombP1 : palette.bombP2;
      return `${color}${raw & 0x02 ? '{}' : '()'}${RESET}`;
    }
    case 'powerUpBomb':
      return `${palette.powerUp}B+${RESET}`;
    case 'powerUpRange':
      return `${palette.powerUp}R+${RESET}`;
    case 'powerUpSpeed':
      return `${palette.powerUp}S+${RESET}`;
  }
}

/**
 * Every field row, each positioned with a cursor move.
 */
export function renderField(grid: FieldGrid, palette: ArenaPalette, origin: ScreenOrigin): string {
  let output = '';
  for (let row = 0; row < FIELD_ROWS; row++) {
    const y = (row + 1) * CELL_TILES;
    output += `\x1b[${origin.top + row};${origin.left}H`;
    for (let col = 0; col < FIELD_COLS; col++) {
      output += cellGlyph(grid, { x: col * CELL_TILES, y }, palette);
    }
  }
  return output;
}

// ============================================================================
// Sprites
// ============================================================================

/**
 * Player number followed by a facing arrow.
 */
export function spriteGlyph(slot: PlayerSlot, pose: SpritePose): string {
  let arrow = 'v';
  if (pose.frame >= ACT_SIDE) arrow = pose.flipX ? '<' : '>';
  else if (pose.frame >= ACT_UP) arrow = '^';
  return `${slot + 1}${arrow}`;
}

/**
 * Terminal position of a sprite: column by 8-pixel steps, row by the logical
 * row under the sprite's centre.
 */
export function spriteScreenPos(pose: SpritePose, origin: ScreenOrigin): { col: number; row: number } {
  return {
    col: origin.left + ((pose.x + 4) >> 3),
    row: origin.top + ((pose.y + P_MID_Y) >> 4) - 1,
  };
}

export function renderSprite(slot: PlayerSlot, pose: SpritePose, palette: ArenaPalette, origin: ScreenOrigin): string {
  const { col, row } = spriteScreenPos(pose, origin);
  const color = slot === 0 ? palette.player1 : palette.player2;
  return `\x1b[${row};${col}H${color}${spriteGlyph(slot, pose)}${RESET}`;
}

// ============================================================================
// HUD
// ============================================================================

export function formatClock(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  return `${minutes}:${rest.toString().padStart(2, '0')}`;
}

function playerHud(player: Player): string {
  const boost = player.boost > 0 ? ' »' : '';
  return `P${player.slot + 1} B${player.maxBombs} R${player.range}${boost}`;
}

/**
 * HUD parts: each player's bomb capacity, range and boost, and the clock.
 */
export function hudText(ctx: SimulationContext): { p1: string; clock: string; p2: string } {
  return {
    p1: playerHud(ctx.players[0]),
    clock: formatClock(ctx.timeRemaining),
    p2: playerHud(ctx.players[1]),
  };
}

export function renderHud(ctx: SimulationContext, palette: ArenaPalette, origin: ScreenOrigin): string {
  const { p1, clock, p2 } = hudText(ctx);
  const row = origin.top - 2;
  const clockCol = origin.left + Math.floor((SCREEN_WIDTH - clock.length) / 2);
  const p2Col = origin.left + SCREEN_WIDTH - p2.length;

  let output = `\x1b[${row};${origin.left}H\x1b[2K`;
  output += `\x1b[${row};${origin.left}H${palette.player1}${p1}${RESET}`;
  output += `\x1b[${row};${clockCol}H${palette.accent}${clock}${RESET}`;
  output += `\x1b[${row};${p2Col}H${palette.player2}${p2}${RESET}`;
  return output;
}

/**
 * Field, both sprites and the HUD in one string.
 */
export function renderArena(ctx: SimulationContext, palette: ArenaPalette, origin: ScreenOrigin): string {
  let output = renderHud(ctx, palette, origin);
  output += renderField(ctx.grid, palette, origin);
  for (const player of ctx.players) {
    output += renderSprite(player.slot, getSpritePose(player), palette, origin);
  }
  return output;
}
