import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from './config';
import { ACT_SIDE, BOMB_TTL, BOOTS_TTL, FIELD_PU_BOMB, FIELD_PU_RANGE, FIELD_PU_SPEED, FIELD_SOLID } from './constants';
import { cellType, createFieldGrid, rawAt, setCell } from './fieldGrid';
import { PAD_ACTION, PAD_LEFT, PAD_NONE, PAD_RIGHT } from './input';
import {
  canEnter,
  checkPickups,
  createPlayer,
  getSpritePose,
  handlePlayer,
  movePlayer,
  padDeltas,
  placeBomb,
  tickWalkCycle,
} from './player';

describe('placeBomb', () => {
  it('drops the owner bomb on the cell under the sprite centre', () => {
    const grid = createFieldGrid();
    const p1 = createPlayer(0);
    const p2 = createPlayer(1);

    expect(placeBomb(grid, p1)).toBe(true);
    expect(placeBomb(grid, p2)).toBe(true);

    expect(rawAt(grid, { x: 2, y: 4 })).toBe(0x08);
    expect(rawAt(grid, { x: 26, y: 24 })).toBe(0x0c);
    expect(p1.bombs).toBe(0);
    expect(p1.bombList[0]).toEqual({ cell: { x: 2, y: 4 }, ttl: BOMB_TTL, curFrame: 0, ttlFrame: 2 });
    expect(p1.lastBombIdx).toBe(0);
  });

  it('is ignored without bombs in hand', () => {
    const grid = createFieldGrid();
    const player = createPlayer(0);
    placeBomb(grid, player);
    player.x += 16;
    expect(placeBomb(grid, player)).toBe(false);
    expect(player.bombs).toBe(0);
    expect(rawAt(grid, { x: 4, y: 4 })).toBe(0x00);
  });

  it('is ignored on a non-empty centre cell', () => {
    const grid = createFieldGrid();
    const player = createPlayer(0);
    setCell(grid, { x: 2, y: 4 }, FIELD_PU_RANGE);
    expect(placeBomb(grid, player)).toBe(false);
    expect(player.bombs).toBe(1);
    expect(player.lastBombIdx).toBeNull();
  });

  it('uses the first free slot', () => {
    const grid = createFieldGrid();
    const player = createPlayer(0);
    player.bombs = 2;
    player.maxBombs = 2;
    player.bombList[0].ttl = 5;
    player.bombList[0].cell = { x: 10, y: 10 };
    placeBomb(grid, player);
    expect(player.lastBombIdx).toBe(1);
    expect(player.bombList[1].ttl).toBe(BOMB_TTL);
  });
});

describe('canEnter', () => {
  it('lets only the owner stand on its last bomb', () => {
    const grid = createFieldGrid();
    const p1 = createPlayer(0);
    const p2 = createPlayer(1);
    placeBomb(grid, p1);

    expect(canEnter(grid, p1, { x: 2, y: 4 })).toBe(true);
    expect(canEnter(grid, p2, { x: 2, y: 4 })).toBe(false);

    p1.lastBombIdx = null;
    expect(canEnter(grid, p1, { x: 2, y: 4 })).toBe(false);
  });

  it('blocks walls and allows power-ups', () => {
    const grid = createFieldGrid();
    const player = createPlayer(0);
    setCell(grid, { x: 4, y: 4 }, FIELD_SOLID);
    setCell(grid, { x: 6, y: 4 }, 0x6a);
    setCell(grid, { x: 8, y: 4 }, FIELD_PU_SPEED);
    setCell(grid, { x: 10, y: 4 }, 0x20);
    expect(canEnter(grid, player, { x: 4, y: 4 })).toBe(false);
    expect(canEnter(grid, player, { x: 6, y: 4 })).toBe(false);
    expect(canEnter(grid, player, { x: 8, y: 4 })).toBe(true);
    expect(canEnter(grid, player, { x: 10, y: 4 })).toBe(true);
  });
});

describe('movePlayer', () => {
  it('does not move an axis whose leading corners are blocked', () => {
    const grid = createFieldGrid();
    const player = createPlayer(0);
    setCell(grid, { x: 4, y: 4 }, FIELD_SOLID);
    player.x = 19;

    expect(movePlayer(grid, player, 1, 0)).toBe(false);
    expect(player.x).toBe(19);

    expect(movePlayer(grid, player, -1, 0)).toBe(true);
    expect(player.x).toBe(18);
  });

  it('needs both leading corners to pass', () => {
    const grid = createFieldGrid();
    const player = createPlayer(0);
    setCell(grid, { x: 4, y: 6 }, FIELD_SOLID);
    player.x = 19;
    player.y = 36;

    expect(movePlayer(grid, player, 1, 0)).toBe(false);
    expect(player.x).toBe(19);
  });

  it('resolves the axes independently', () => {
    const grid = createFieldGrid();
    const player = createPlayer(0);
    setCell(grid, { x: 4, y: 4 }, FIELD_SOLID);
    player.x = 19;

    expect(movePlayer(grid, player, 1, 1)).toBe(true);
    expect(player.x).toBe(19);
    expect(player.y).toBe(33);
  });
});

describe('padDeltas', () => {
  it('cancels opposite directions', () => {
    expect(padDeltas(PAD_LEFT | PAD_RIGHT)).toEqual({ dx: 0, dy: 0 });
    expect(padDeltas(PAD_RIGHT)).toEqual({ dx: 1, dy: 0 });
  });
});

describe('last-bomb exemption', () => {
  it('ends once the box leaves the bomb cell', () => {
    const grid = createFieldGrid();
    const player = createPlayer(0);
    handlePlayer(grid, player, PAD_ACTION, DEFAULT_CONFIG);
    expect(player.lastBombIdx).toBe(0);

    for (let i = 0; i < 11; i++) {
      handlePlayer(grid, player, PAD_RIGHT, DEFAULT_CONFIG);
    }
    expect(player.x).toBe(27);
    expect(player.lastBombIdx).toBe(0);

    handlePlayer(grid, player, PAD_RIGHT, DEFAULT_CONFIG);
    expect(player.x).toBe(28);
    expect(player.lastBombIdx).toBeNull();

    handlePlayer(grid, player, PAD_LEFT, DEFAULT_CONFIG);
    expect(player.x).toBe(28);
  });
});

describe('walk animation', () => {
  it('faces the movement direction and idles on stop', () => {
    const grid = createFieldGrid();
    const player = createPlayer(0);

    handlePlayer(grid, player, PAD_RIGHT, DEFAULT_CONFIG);
    expect(player.moving).toBe(true);
    expect(getSpritePose(player)).toEqual({ x: 17, y: 32, frame: 0, flipX: false });

    handlePlayer(grid, player, PAD_RIGHT, DEFAULT_CONFIG);
    expect(getSpritePose(player)).toEqual({ x: 18, y: 32, frame: ACT_SIDE, flipX: false });

    handlePlayer(grid, player, PAD_LEFT, DEFAULT_CONFIG);
    expect(getSpritePose(player)).toEqual({ x: 17, y: 32, frame: ACT_SIDE, flipX: true });

    expect(tickWalkCycle(player)).toBe(true);
    expect(player.curFrame).toBe(ACT_SIDE + 1);
    tickWalkCycle(player);
    tickWalkCycle(player);
    expect(player.curFrame).toBe(ACT_SIDE);

    tickWalkCycle(player);
    handlePlayer(grid, player, PAD_NONE, DEFAULT_CONFIG);
    expect(player.moving).toBe(false);
    expect(player.curFrame).toBe(ACT_SIDE);
    expect(tickWalkCycle(player)).toBe(false);
  });
});

describe('pickups', () => {
  it('raises bombs up to the configured maximum and consumes the tile', () => {
    const grid = createFieldGrid();
    const player = createPlayer(0);
    setCell(grid, { x: 2, y: 4 }, FIELD_PU_BOMB);

    expect(checkPickups(grid, player, DEFAULT_CONFIG)).toEqual(['statChanged', 'none', 'none', 'none']);
    expect(player.bombs).toBe(2);
    expect(player.maxBombs).toBe(2);
    expect(cellType(grid, { x: 2, y: 4 })).toBe('empty');
  });

  it('consumes power-ups even when capped', () => {
    const grid = createFieldGrid();
    const player = createPlayer(0);
    setCell(grid, { x: 2, y: 4 }, FIELD_PU_RANGE);
    const config = { ...DEFAULT_CONFIG, maxRange: 1 };

    expect(checkPickups(grid, player, config)[0]).toBe('consumed');
    expect(player.range).toBe(1);
    expect(cellType(grid, { x: 2, y: 4 })).toBe('empty');
  });

  it('doubles movement while boosted', () => {
    const grid = createFieldGrid();
    const player = createPlayer(0);
    setCell(grid, { x: 2, y: 4 }, FIELD_PU_SPEED);
    handlePlayer(grid, player, PAD_NONE, DEFAULT_CONFIG);
    expect(player.boost).toBe(BOOTS_TTL);

    handlePlayer(grid, player, PAD_RIGHT, DEFAULT_CONFIG);
    expect(player.x).toBe(18);
  });

  it('reports flames without touching them', () => {
    const grid = createFieldGrid();
    const player = createPlayer(1);
    setCell(grid, { x: 26, y: 24 }, 0x22);
    const result = handlePlayer(grid, player, PAD_NONE, DEFAULT_CONFIG);
    expect(result.burned).toBe(true);
    expect(rawAt(grid, { x: 26, y: 24 })).toBe(0x22);
  });
});
