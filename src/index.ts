/**
 * blast-arena
 *
 * Two-player bomb arena for xterm.js and the CLI.
 *
 * Library usage (xterm.js):
 *   import { runArenaGame, setTheme } from 'blast-arena';
 *   setTheme('amber');
 *   const controller = runArenaGame(terminal, { config: { maxTime: 120 } });
 *
 * Headless usage (simulation only):
 *   const ctx = createSimulation(DEFAULT_CONFIG, { seed: 7 });
 *   stepFrame(ctx, PAD_RIGHT, PAD_NONE);
 *
 * CLI usage:
 *   npx blast-arena
 */

export * from './games';

// Simulation
export {
  createSimulation,
  stepFrame,
  runTicks,
  advanceTimers,
  getSpritePose,
  consumeRefresh,
  WINNER_NONE,
  WINNER_P1,
  WINNER_P2,
  WINNER_DRAW,
  type SimulationContext,
  type SimulationOptions,
  type FrameReport,
  type RefreshFlags,
  type Winner,
} from './games/arena/simulation';

// Settings
export {
  DEFAULT_CONFIG,
  OPTIONS,
  OPTION_SPECS,
  adjustOption,
  resetOption,
  normalizeConfig,
  formatOption,
  type ArenaConfig,
  type ArenaOption,
  type OptionSpec,
} from './games/arena/config';

// Input
export {
  PAD_UP,
  PAD_DOWN,
  PAD_LEFT,
  PAD_RIGHT,
  PAD_ACTION,
  PAD_START,
  PAD_SELECT,
  PAD_RESET,
  PAD_NONE,
  KEY_BINDINGS,
  lookupKey,
  createPadTracker,
  padEdges,
  type PlayerSlot,
  type PadTracker,
} from './games/arena/input';

export { FRAME_RATE, FRAMES_PER_TICK, type VideoStandard } from './games/arena/constants';
export { InvariantError } from './games/arena/invariant';
export { renderArena, type ScreenOrigin } from './games/arena/render';
export type { SpritePose } from './games/arena/player';

// Themes
export { getPalette, getThemeNames, isValidThemeName, DEFAULT_THEME } from './themes';
