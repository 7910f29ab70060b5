/**
 * Arena setup: static wall template and per-round wall density.
 */

import layout from './layout.json';
import { CELL_TILES, FIELD_BRICKED, FIELD_SOLID, GRID_HEIGHT, GRID_WIDTH } from './constants';
import {
  type Cell,
  type FieldGrid,
  clearCell,
  createFieldGrid,
  setCell,
} from './fieldGrid';
import { InvariantError } from './invariant';
import type { ArenaRng } from './rng';

// ============================================================================
// Template
// ============================================================================

export type TemplateKind = 'solid' | 'variable' | 'fixed' | 'empty' | 'outside';

export interface TemplateCell {
  cell: Cell;
  kind: TemplateKind;
}

const KIND_BY_CHAR: Partial<Record<string, TemplateKind>> = {
  '#': 'solid',
  '%': 'variable',
  '=': 'fixed',
  '.': 'empty',
  ' ': 'outside',
};

function parseTemplate(rows: readonly string[]): TemplateCell[] {
  const cellRows = GRID_HEIGHT / CELL_TILES;
  const cellCols = GRID_WIDTH / CELL_TILES;
  if (rows.length !== cellRows) {
    throw new InvariantError(`layout.json has ${rows.length} rows, expected ${cellRows}`);
  }

  const cells: TemplateCell[] = [];
  // column-major so variable walls draw from the generator in a stable order
  for (let col = 0; col < cellCols; col++) {
    for (let row = 0; row < cellRows; row++) {
      const line = rows[row];
      if (line.length !== cellCols) {
        throw new InvariantError(`layout.json row ${row} has ${line.length} cells, expected ${cellCols}`);
      }
      const kind = KIND_BY_CHAR[line[col]];
      if (kind === undefined) {
        throw new InvariantError(`layout.json row ${row} has unknown cell "${line[col]}"`);
      }
      cells.push({ cell: { x: col * CELL_TILES, y: row * CELL_TILES }, kind });
    }
  }
  return cells;
}

/** Template cells in column-major order. */
export const TEMPLATE: readonly TemplateCell[] = parseTemplate(layout.rows);

/** Variable walls in the order they draw from the generator. */
export const VARIABLE_WALLS: readonly Cell[] = TEMPLATE
  .filter(t => t.kind === 'variable')
  .map(t => t.cell);

// ============================================================================
// Round initialization
// ============================================================================

/**
 * Build a fresh grid from the template, then thin out the variable walls:
 * each one draws once and is cleared when the low three bits are 6 or 7.
 */
export function buildArena(rng: ArenaRng): FieldGrid {
  const grid = createFieldGrid();

  for (const { cell, kind } of TEMPLATE) {
    switch (kind) {
      case 'solid':
        setCell(grid, cell, FIELD_SOLID);
        break;
      case 'variable':
      case 'fixed':
        setCell(grid, cell, FIELD_BRICKED);
        break;
      default:
        clearCell(grid, cell);
        break;
    }
  }

  for (const cell of VARIABLE_WALLS) {
    if ((rng.next() & 7) >= 6) {
      clearCell(grid, cell);
    }
  }

  return grid;
}
