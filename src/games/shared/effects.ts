/**
 * Shared Visual Effects
 *
 * Screen shake, flash and slide transitions. All state is plain data that the
 * game updates once per rendered frame.
 */

// ============================================================================
// TYPES
// ============================================================================

export interface ScreenShakeState {
  frames: number;
  intensity: number;
}

export interface FlashState {
  frames: number;
}

export type SlideDirection = 'left' | 'right';

export interface SlideState {
  frames: number;
  total: number;
  direction: SlideDirection;
}

/** Source of values in [0, 1); Math.random unless a test supplies one. */
export type RandomSource = () => number;

// ============================================================================
// SCREEN SHAKE
// ============================================================================

/**
 * Create initial screen shake state.
 */
export function createShakeState(): ScreenShakeState {
  return { frames: 0, intensity: 0 };
}

/**
 * Trigger screen shake with duration and intensity.
 *
 * Intensity guide:
 * - 1: Single bomb
 * - 2: Chain of two or three
 * - 3-4: Big chain
 */
export function triggerShake(state: ScreenShakeState, frames: number, intensity: number): void {
  state.frames = frames;
  state.intensity = intensity;
}

/**
 * Apply screen shake offset to render position.
 * Call in render() to get adjusted x/y coordinates.
 */
export function applyShake(
  state: ScreenShakeState,
  random: RandomSource = Math.random,
): { offsetX: number; offsetY: number } {
  if (state.frames > 0) {
    state.frames--;
    return {
      offsetX: Math.floor((random() - 0.5) * state.intensity * 2),
      offsetY: Math.floor((random() - 0.5) * state.intensity),
    };
  }
  return { offsetX: 0, offsetY: 0 };
}

// ============================================================================
// FLASH EFFECTS
// ============================================================================

/**
 * Create initial flash state.
 */
export function createFlashState(): FlashState {
  return { frames: 0 };
}

/**
 * Trigger a flash effect for N frames.
 */
export function triggerFlash(state: FlashState, frames: number): void {
  state.frames = frames;
}

/**
 * Update flash state (decrement). Call once per frame.
 * Returns true if flash is currently active.
 */
export function updateFlash(state: FlashState): boolean {
  if (state.frames > 0) {
    state.frames--;
    return true;
  }
  return false;
}

/**
 * Check if flash should show on this frame (alternating visibility for strobe).
 */
export function isFlashVisible(state: FlashState): boolean {
  return state.frames > 0 && state.frames % 4 < 2;
}

// ============================================================================
// SLIDE TRANSITIONS
// ============================================================================

export function createSlideState(): SlideState {
  return { frames: 0, total: 0, direction: 'left' };
}

/**
 * Start sliding the next screen in from one side over `frames` frames.
 */
export function startSlide(state: SlideState, frames: number, direction: SlideDirection): void {
  state.frames = frames;
  state.total = frames;
  state.direction = direction;
}

export function isSliding(state: SlideState): boolean {
  return state.frames > 0;
}

/**
 * Column offset of the incoming screen for this frame, then advance. The
 * offset shrinks linearly from `width` to 0; 'left' enters from the right
 * edge, 'right' from the left edge.
 */
export function applySlide(state: SlideState, width: number): number {
  if (state.frames <= 0) return 0;
  const offset = Math.round((width * state.frames) / state.total);
  state.frames--;
  return state.direction === 'left' ? offset : -offset;
}
