/**
 * Blast Arena
 *
 * Two players, one keyboard. Drop bombs, burn walls, grab power-ups and
 * catch the other player in a blast before the clock runs out.
 *
 * Screen flow: title -> options -> game <-> pause -> winner -> options.
 */

import type { ThemeName } from '../../themes';
import {
  type GameTerminal,
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCurrentPalette,
  getCurrentThemeColor,
  getVerticalAnchor,
  isInAlternateBuffer,
  setTheme,
} from '../utils';
import { type MenuMove, type SimpleMenuItem, navigateMenu, renderSimpleMenu } from '../shared/menu';
import {
  applyShake,
  applySlide,
  createFlashState,
  createShakeState,
  createSlideState,
  isFlashVisible,
  isSliding,
  startSlide,
  triggerFlash,
  triggerShake,
  updateFlash,
} from '../shared/effects';
import {
  type ArenaConfig,
  type ArenaOption,
  OPTIONS,
  OPTION_ABOVE,
  OPTION_BELOW,
  OPTION_SPECS,
  adjustOption,
  formatOption,
  normalizeConfig,
  resetOption,
} from './config';
import { FRAME_RATE, type VideoStandard } from './constants';
import {
  PAD_ACTION,
  PAD_DOWN,
  PAD_LEFT,
  PAD_RESET,
  PAD_RIGHT,
  PAD_SELECT,
  PAD_START,
  PAD_UP,
  type PlayerSlot,
  createPadTracker,
  padEdges,
} from './input';
import { type ScreenOrigin, SCREEN_HEIGHT, SCREEN_WIDTH, renderArena } from './render';
import {
  type SimulationContext,
  type Winner,
  WINNER_DRAW,
  WINNER_NONE,
  WINNER_P1,
  consumeRefresh,
  createSimulation,
  stepFrame,
} from './simulation';

/**
 * Arena Game Controller
 */
export interface ArenaController {
  stop: () => void;
  isRunning: boolean;
}

export interface ArenaGameOptions {
  /** Starting settings; anything missing or out of range is normalized. */
  config?: Partial<ArenaConfig>;
  videoStandard?: VideoStandard;
  /** Seed of the first round; later rounds count up from it. Defaults to the clock. */
  seed?: number;
  theme?: ThemeName;
  /** Called after the player quits and the terminal is restored. */
  onQuit?: () => void;
  /** Called when a frame throws; the game has already stopped. */
  onError?: (error: unknown) => void;
}

type Screen = 'title' | 'options' | 'game' | 'pause' | 'winner';

// ============================================================================
// CONSTANTS
// ============================================================================

const MIN_COLS = SCREEN_WIDTH + 4;
const MIN_ROWS = SCREEN_HEIGHT + 4;
const SLIDE_FRAMES = 12;
const WINNER_FLASH_FRAMES = 90;

const TITLE = [
  '█▄▄ █   ▄▀█ █▀ ▀█▀   ▄▀█ █▀█ █▀▀ █▄ █ ▄▀█',
  '█▄█ █▄▄ █▀█ ▄█  █    █▀█ █▀▄ ██▄ █ ▀█ █▀█',
];

const CONTROLS = [
  'P1  WASD move   SPACE bomb   ESC start   TAB select',
  'P2  ARROWS move ENTER bomb   BKSP start  \\ select',
];

function pauseItems(owner: PlayerSlot): SimpleMenuItem[] {
  const items: SimpleMenuItem[] = [{ label: 'RESUME', shortcut: 'START' }];
  if (owner === 0) items.push({ label: 'OPTIONS', shortcut: 'SELECT' });
  return items;
}

function menuMove(edges: number): MenuMove {
  if (edges & PAD_UP) return 'up';
  if (edges & PAD_DOWN) return 'down';
  if (edges & PAD_ACTION) return 'confirm';
  return 'none';
}

function winnerMessage(winner: Winner): string {
  if (winner === WINNER_DRAW) return 'DRAW!';
  return winner === WINNER_P1 ? 'PLAYER 1 WINS!' : 'PLAYER 2 WINS!';
}

// ============================================================================
// MAIN GAME FUNCTION
// ============================================================================

export function runArenaGame(terminal: GameTerminal, options: ArenaGameOptions = {}): ArenaController {
  if (options.theme) setTheme(options.theme);

  const videoStandard = options.videoStandard ?? 'ntsc';
  const frameMs = Math.round(1000 / FRAME_RATE[videoStandard]);

  // -------------------------------------------------------------------------
  // STATE
  // -------------------------------------------------------------------------
  let running = true;
  let screen: Screen = 'title';
  let config = normalizeConfig(options.config);
  let optionCursor: ArenaOption = 'time';
  let ctx: SimulationContext | null = null;
  let roundsPlayed = 0;
  let pauseOwner: PlayerSlot = 0;
  let pauseSelection = 0;
  let previousPads: [number, number] = [0, 0];
  let redraw = true;

  const pads = createPadTracker();
  const shake = createShakeState();
  const slide = createSlideState();
  const winnerFlash = createFlashState();

  let frameInterval: ReturnType<typeof setInterval> | null = null;
  let keyListener: { dispose(): void } | null = null;

  // -------------------------------------------------------------------------
  // CONTROLLER
  // -------------------------------------------------------------------------
  const controller: ArenaController = {
    stop: () => {
      if (!running) return;
      running = false;
      if (frameInterval) clearInterval(frameInterval);
      frameInterval = null;
      keyListener?.dispose();
      keyListener = null;
      if (isInAlternateBuffer(terminal)) {
        exitAlternateBuffer(terminal, 'arena stopped');
      }
    },
    get isRunning() { return running; }
  };

  function quit() {
    controller.stop();
    options.onQuit?.();
  }

  function fail(error: unknown) {
    controller.stop();
    if (options.onError) {
      options.onError(error);
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[BlastArena] ${message}`);
  }

  // -------------------------------------------------------------------------
  // SCREEN FLOW
  // -------------------------------------------------------------------------

  function goTo(next: Screen) {
    if (next !== 'pause') {
      startSlide(slide, SLIDE_FRAMES, next === 'title' ? 'right' : 'left');
    }
    screen = next;
    redraw = true;
  }

  /** Forget held keys so the press that left a menu is not replayed as game input. */
  function releasePads() {
    pads.clear();
    previousPads = [0, 0];
  }

  function startRound() {
    const seed = options.seed === undefined ? Date.now() : options.seed + roundsPlayed;
    roundsPlayed++;
    ctx = createSimulation(config, { seed, videoStandard });
    releasePads();
    goTo('game');
  }

  function updateTitle(edges: number) {
    if (edges & (PAD_START | PAD_ACTION)) goTo('options');
  }

  function updateOptions(edges: number) {
    if (edges & PAD_UP) optionCursor = OPTION_ABOVE[optionCursor];
    if (edges & PAD_DOWN) optionCursor = OPTION_BELOW[optionCursor];
    if (edges & PAD_LEFT) config = adjustOption(config, optionCursor, -1);
    if (edges & PAD_RIGHT) config = adjustOption(config, optionCursor, 1);
    if (edges & PAD_SELECT) config = resetOption(config, optionCursor);
    if (edges & (PAD_START | PAD_ACTION)) {
      startRound();
      return;
    }
    if (edges & PAD_RESET) {
      goTo('title');
      return;
    }
    if (edges) redraw = true;
  }

  function updateGame(round: SimulationContext, pad1: number, pad2: number, edges: [number, number]) {
    for (const slot of [0, 1] as const) {
      if (edges[slot] & PAD_START) {
        pauseOwner = slot;
        pauseSelection = 0;
        goTo('pause');
        return;
      }
    }
    if ((edges[0] | edges[1]) & PAD_RESET) {
      goTo('title');
      return;
    }

    const report = stepFrame(round, pad1, pad2);
    if (report.detonations > 0) {
      triggerShake(shake, 6, Math.min(4, report.detonations));
      terminal.write('\x07');
    }
    if (report.winner !== WINNER_NONE) {
      triggerFlash(winnerFlash, WINNER_FLASH_FRAMES);
      goTo('winner');
    }
  }

  function resume() {
    releasePads();
    screen = 'game';
    redraw = true;
  }

  function updatePause(edges: [number, number]) {
    const own = edges[pauseOwner];
    if (own & PAD_START) {
      resume();
      return;
    }
    if (pauseOwner === 0 && (own & PAD_SELECT)) {
      goTo('options');
      return;
    }

    const items = pauseItems(pauseOwner);
    const { newSelection, confirmed } = navigateMenu(pauseSelection, items.length, menuMove(own));
    if (newSelection !== pauseSelection) {
      pauseSelection = newSelection;
      redraw = true;
    }
    if (confirmed) {
      if (pauseSelection === 0) resume();
      else goTo('options');
    }
  }

  function updateWinner(edges: number) {
    if (edges & (PAD_START | PAD_SELECT | PAD_ACTION)) goTo('options');
  }

  function update(pad1: number, pad2: number, edges: [number, number]) {
    switch (screen) {
      case 'title':
        updateTitle(edges[0] | edges[1]);
        break;
      case 'options':
        updateOptions(edges[0] | edges[1]);
        break;
      case 'game':
        if (ctx) updateGame(ctx, pad1, pad2, edges);
        break;
      case 'pause':
        updatePause(edges);
        break;
      case 'winner':
        updateWinner(edges[0] | edges[1]);
        break;
    }
  }

  // -------------------------------------------------------------------------
  // RENDERING
  // -------------------------------------------------------------------------

  function centered(row: number, text: string, style: string): string {
    const col = Math.max(1, Math.floor((terminal.cols - text.length) / 2) + 1);
    return `\x1b[${row};${col}H${style}${text}\x1b[0m`;
  }

  function renderTooSmall(): string {
    const cols = terminal.cols;
    const rows = terminal.rows;
    const themeColor = getCurrentThemeColor();
    const needWidth = cols < MIN_COLS;
    const needHeight = rows < MIN_ROWS;
    const hint = needWidth && needHeight ? 'Make pane larger'
      : needWidth ? 'Make pane wider →' : 'Make pane taller ↓';
    const centerY = Math.floor(rows / 2);
    let output = centered(centerY - 1, 'Terminal too small!', themeColor);
    output += centered(centerY + 1, `Need: ${MIN_COLS}×${MIN_ROWS}  Have: ${cols}×${rows}`, '\x1b[2m');
    output += centered(centerY + 3, hint, `\x1b[1m${themeColor}`);
    return output;
  }

  function renderTitle(top: number): string {
    const themeColor = getCurrentThemeColor();
    let output = '';
    TITLE.forEach((line, i) => {
      output += centered(top + i, line, `${themeColor}\x1b[1m`);
    });
    output += centered(top + 4, '[ PRESS START OR BOMB ]', `\x1b[5m${themeColor}`);
    CONTROLS.forEach((line, i) => {
      output += centered(top + 7 + i, line, `\x1b[2m${themeColor}`);
    });
    output += centered(top + 10, 'X / 0 back to title   Q quit', `\x1b[2m${themeColor}`);
    return output;
  }

  function renderOptions(top: number): string {
    const themeColor = getCurrentThemeColor();
    let output = centered(top, '══ OPTIONS ══', `\x1b[1m${themeColor}`);
    OPTIONS.forEach((option, i) => {
      const label = `${OPTION_SPECS[option].label.padEnd(10)}${formatOption(config, option).padStart(5)}`;
      const selected = option === optionCursor;
      const text = selected ? `► ${label} ◄` : `  ${label}  `;
      output += centered(top + 2 + i, text, selected ? '\x1b[1;93m' : `\x1b[2m${themeColor}`);
    });
    output += centered(top + 8, '↑↓ choose  ←→ change  SELECT reset', `\x1b[2m${themeColor}`);
    output += centered(top + 9, 'START play   RESET title   Q quit', `\x1b[2m${themeColor}`);
    return output;
  }

  function renderOverlay(round: SimulationContext, origin: ScreenOrigin): string {
    const themeColor = getCurrentThemeColor();
    const middle = origin.top + Math.floor(SCREEN_HEIGHT / 2) - 3;

    if (screen === 'pause') {
      let output = centered(middle, `══ PAUSED BY P${pauseOwner + 1} ══`, `\x1b[5m${themeColor}`);
      output += renderSimpleMenu(pauseItems(pauseOwner), pauseSelection, {
        centerX: Math.floor(terminal.cols / 2) + 1,
        startY: middle + 2,
      });
      return output;
    }

    if (screen === 'winner') {
      const message = winnerMessage(round.winner);
      const style = isFlashVisible(winnerFlash) ? '\x1b[1;7;93m' : '\x1b[1;93m';
      let output = centered(middle, ` ${message} `, style);
      output += centered(middle + 2, 'START continue   Q quit', `\x1b[2m${themeColor}`);
      return output;
    }

    return '';
  }

  function renderCurtain(offset: number): string {
    if (offset === 0) return '';
    const width = Math.min(terminal.cols, Math.abs(offset));
    const col = offset > 0 ? terminal.cols - width + 1 : 1;
    let output = '';
    for (let row = 1; row <= terminal.rows; row++) {
      output += `\x1b[${row};${col}H\x1b[2m${getCurrentThemeColor()}${'░'.repeat(width)}\x1b[0m`;
    }
    return output;
  }

  function render() {
    const cols = terminal.cols;
    const rows = terminal.rows;

    if (cols < MIN_COLS || rows < MIN_ROWS) {
      terminal.write('\x1b[2J\x1b[H' + renderTooSmall());
      return;
    }

    const inRound = screen === 'game' || screen === 'pause' || screen === 'winner';
    const refresh = inRound && ctx ? consumeRefresh(ctx) : null;
    const changed = refresh !== null && (refresh.low || refresh.high || refresh.sprites || refresh.hud);
    const flashing = updateFlash(winnerFlash);
    const animating = flashing || isSliding(slide) || shake.frames > 0;
    if (!redraw && !changed && !animating) return;
    redraw = false;

    const { offsetX, offsetY } = applyShake(shake);
    const top = getVerticalAnchor(rows, SCREEN_HEIGHT, { headerRows: 1, footerRows: 1 });
    let output = '\x1b[2J\x1b[H';

    if (inRound && ctx) {
      const origin: ScreenOrigin = {
        left: Math.max(1, Math.floor((cols - SCREEN_WIDTH) / 2) + 1 + offsetX),
        top: Math.max(3, top + 2 + offsetY),
      };
      output += renderArena(ctx, getCurrentPalette(), origin);
      output += renderOverlay(ctx, origin);
    } else if (screen === 'options') {
      output += renderOptions(top + 1);
    } else {
      output += renderTitle(top + 1);
    }

    output += renderCurtain(applySlide(slide, cols));
    terminal.write(output);
  }

  // -------------------------------------------------------------------------
  // GAME LOOP
  // -------------------------------------------------------------------------

  function frame() {
    if (!running) return;
    try {
      const now = Date.now();
      const pad1 = pads.read(0, now);
      const pad2 = pads.read(1, now);
      const edges: [number, number] = [padEdges(pad1, previousPads[0]), padEdges(pad2, previousPads[1])];
      previousPads = [pad1, pad2];

      update(pad1, pad2, edges);
      if (running) render();
    } catch (error) {
      fail(error);
    }
  }

  setTimeout(() => {
    if (!running) return;
    enterAlternateBuffer(terminal, 'arena');

    keyListener = terminal.onKey(({ domEvent }) => {
      if (!running) return;
      domEvent.preventDefault?.();
      domEvent.stopPropagation?.();

      const key = domEvent.key;
      if (key.toLowerCase() === 'q' && (screen === 'title' || screen === 'options' || screen === 'winner')) {
        quit();
        return;
      }
      pads.press(key, Date.now());
    });

    frameInterval = setInterval(frame, frameMs);
  }, 25);

  return controller;
}

export type { ArenaConfig, ArenaOption } from './config';
export type { SimulationContext, Winner } from './simulation';
