/**
 * blast-arena games module
 *
 * Usage:
 * 1. Set the theme: setTheme('classic')
 * 2. Run the arena: runArenaGame(terminal)
 * 3. Stop it from the host: controller.stop()
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  getCurrentPalette,
  getVerticalAnchor,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  isTerminalValid,
} from './utils';

export type {
  ArenaPalette,
  Disposable,
  GameTerminal,
  KeyInput,
  TerminalKeyEvent,
  ThemeName,
} from './utils';

// Re-export menu utilities
export {
  navigateMenu,
  renderSimpleMenu,
  type MenuMove,
  type SimpleMenuItem,
} from './shared/menu';

// Re-export shared effects
export {
  createShakeState,
  triggerShake,
  applyShake,
  createFlashState,
  triggerFlash,
  updateFlash,
  isFlashVisible,
  createSlideState,
  startSlide,
  isSliding,
  applySlide,
  type ScreenShakeState,
  type FlashState,
  type SlideState,
  type SlideDirection,
} from './shared/effects';

// Arena
export { runArenaGame, type ArenaController, type ArenaGameOptions } from './arena';
