import { clamp01 } from './color';
import { EASING_NAMES, EasingName } from './types';

/**
 * Shaping functions for the interpolation fraction between two keyframes.
 * Each maps [0, 1] onto [0, 1] with f(0) = 0 and f(1) = 1.
 */
export const EASING_FUNCTIONS: Record<EasingName, (t: number) => number> = {
  linear: (t) => t,
  ease_in: (t) => t * t,
  ease_out: (t) => 1 - (1 - t) * (1 - t),
  ease_in_out: (t) => t * t * (3 - 2 * t),
  sine: (t) => (1 - Math.cos(t * Math.PI)) / 2,
};

export function applyEasing(easing: EasingName, t: number): number {
  return clamp01(EASING_FUNCTIONS[easing](clamp01(t)));
}

export function isEasingName(value: unknown): value is EasingName {
  return EASING_NAMES.some((name) => name === value);
}
