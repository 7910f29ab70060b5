/**
 * Arena constants: grid geometry, tile sheet indices and timing.
 *
 * All timers count timer ticks (1/10 s) unless the name says frames.
 */

// ============================================================================
// Grid geometry
// ============================================================================

/** Tile grid width (8px tiles). */
export const GRID_WIDTH = 30;
/** Tile grid height (8px tiles). Rows 0-1 are the heads-up display. */
export const GRID_HEIGHT = 28;
/** Pixels per tile edge. */
export const TILE_PIXELS = 8;
/** Tiles per logical cell edge. Logical cells start at even tile coordinates. */
export const CELL_TILES = 2;
/** Row stride of the tile sheet: the bottom row of a block sits 0x10 after the top row. */
export const SHEET_ROW = 0x10;

// ============================================================================
// Tile sheet indices (upper left tile of a 2x2 block)
// ============================================================================

export const FIELD_EMPTY = 0x00;
/** Player 1 bomb, frames 0x08 / 0x0A. */
export const FIELD_BOMB_P1 = 0x08;
/** Player 2 bomb, frames 0x0C / 0x0E. */
export const FIELD_BOMB_P2 = 0x0c;
export const FIELD_PU_BOMB = 0x28;
export const FIELD_PU_RANGE = 0x2a;
export const FIELD_PU_SPEED = 0x2c;
export const FIELD_SOLID = 0x68;
/** Bricked wall; 0x6C and 0x6E are the two burning frames. */
export const FIELD_BRICKED = 0x6a;
/** Explosion frames advance by 2 per step, 4 frames each. */
export const FIELD_EXPL_MID = 0x20;
export const FIELD_EXPL_PART_X = 0x40;
export const FIELD_EXPL_END_X = 0x60;
export const FIELD_EXPL_PART_Y = 0x80;
export const FIELD_EXPL_END_Y = 0xa0;

/** Number of frames an explosion or burning wall goes through. */
export const EXPLOSION_FRAMES = 4;

/**
 * Builds a tile attribute byte.
 */
export function tileAttr(flipY: 0 | 1, flipX: 0 | 1, priority: 0 | 1, palette: number): number {
  return ((flipY << 7) | (flipX << 6) | (priority << 5) | (palette << 2)) & 0xff;
}

export const ATTR_FLIP_Y = 0x80;
export const ATTR_FLIP_X = 0x40;
/** Attribute every field tile returns to once its animation ends. */
export const DEFAULT_ATTR = tileAttr(0, 0, 1, 3);

// ============================================================================
// Limits and defaults
// ============================================================================

/** Upper bound for the configured bomb count (and bomb slots per player). */
export const MAX_BOMBS = 9;
/** Upper bound for the configured explosion range. */
export const MAX_RANGE = 9;
/** Chain queue capacity: every bomb of both players at most once per tick. */
export const CHAIN_CAPACITY = MAX_BOMBS * 2;

export const DEF_MAX_TIME = 180;
export const DEF_DROP_RATE = 35;
export const DEF_MAX_BOMBS = 5;
export const DEF_MAX_RANGE = 9;

// ============================================================================
// Timing
// ============================================================================

export const BOMB_TTL = 35;
export const BOOTS_TTL = 150;
export const BOMB_ANIMATION = 2;
export const PLAYER_ANIMATION = 1;
export const EXPLOSION_ANIMATION = 1;
/** Timer ticks per second of the round clock. */
export const TICKS_PER_SECOND = 10;

export type VideoStandard = 'ntsc' | 'pal';

/** Frames per timer tick for each video standard. */
export const FRAMES_PER_TICK: Record<VideoStandard, number> = {
  ntsc: 6,
  pal: 5,
};

/** Frames per second for each video standard. */
export const FRAME_RATE: Record<VideoStandard, number> = {
  ntsc: 60,
  pal: 50,
};

// ============================================================================
// Player sprite
// ============================================================================

/** Bounding box of the 16x16 player sprite, relative to its upper left corner. */
export const P_LEFT = 4;
export const P_RIGHT = 12;
export const P_TOP = 9;
export const P_BOTTOM = 15;
export const P_MID_X = 7;
export const P_MID_Y = 12;

/** First walk frame for each facing. */
export const ACT_DOWN = 0;
export const ACT_UP = 3;
export const ACT_SIDE = 6;
/** Frames in one walk cycle. */
export const WALK_FRAMES = 3;

/** Spawn pixel positions. */
export const P1_START = { x: 2 * TILE_PIXELS, y: 4 * TILE_PIXELS } as const;
export const P2_START = { x: 26 * TILE_PIXELS, y: 24 * TILE_PIXELS } as const;
