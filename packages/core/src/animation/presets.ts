/**
 * Expand animation presets
 *
 * Named curves for the line-limit transition, and conversion to a CSS
 * `transition` value.
 */

import type { ExpandAnimation, ExpandAnimationPreset } from '../types/animation';
import { ConfigValidationError } from '../utils/errors';

export const EXPAND_ANIMATIONS: Readonly<Record<ExpandAnimationPreset, Readonly<ExpandAnimation>>> = {
  default: { durationMs: 350, easing: 'ease-in-out' },
  linear: { durationMs: 350, easing: 'linear' },
  easeIn: { durationMs: 350, easing: 'ease-in' },
  easeOut: { durationMs: 350, easing: 'ease-out' },
  easeInOut: { durationMs: 350, easing: 'ease-in-out' },
  // Overshoots slightly before settling
  spring: { durationMs: 500, easing: 'cubic-bezier(0.34, 1.56, 0.64, 1)' },
  none: { durationMs: 0, easing: 'linear' },
};

export function isExpandAnimationPreset(value: string): value is ExpandAnimationPreset {
  return Object.hasOwn(EXPAND_ANIMATIONS, value);
}

/**
 * Resolve a preset name or pass an explicit animation through (copied).
 *
 * @throws ConfigValidationError for an unknown preset name
 */
export function resolveExpandAnimation(animation: ExpandAnimationPreset | ExpandAnimation): ExpandAnimation {
  if (typeof animation === 'string') {
    const name: string = animation;
    if (!isExpandAnimationPreset(name)) {
      throw new ConfigValidationError([
        { path: '/expandAnimation', message: `Unknown animation preset "${name}"` },
      ]);
    }
    const preset = EXPAND_ANIMATIONS[name];
    return { durationMs: preset.durationMs, easing: preset.easing };
  }
  return { durationMs: animation.durationMs, easing: animation.easing };
}

/**
 * Build a CSS transition value for the given properties
 *
 * @example
 * ```ts
 * transitionFor({ durationMs: 350, easing: 'ease-in-out' }, ['max-height'])
 * // => 'max-height 350ms ease-in-out'
 * ```
 */
export function transitionFor(animation: ExpandAnimation, properties: readonly string[]): string {
  if (animation.durationMs <= 0 || properties.length === 0) {
    return 'none';
  }
  return properties.map((property) => `${property} ${animation.durationMs}ms ${animation.easing}`).join(', ');
}
