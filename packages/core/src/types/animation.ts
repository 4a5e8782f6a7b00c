/**
 * Transition applied to the line-limit change and the re-layout it causes.
 */
export interface ExpandAnimation {
  /** Duration in milliseconds (0 disables the transition) */
  durationMs: number;
  /** CSS easing function, e.g. `ease-in-out` or `cubic-bezier(...)` */
  easing: string;
}

export type ExpandAnimationPreset =
  | 'default'
  | 'linear'
  | 'easeIn'
  | 'easeOut'
  | 'easeInOut'
  | 'spring'
  | 'none';
