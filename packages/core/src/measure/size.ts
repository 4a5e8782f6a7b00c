import type { Size } from '../types/size';

/**
 * Compare two measured sizes axis by axis.
 *
 * Two independent layout passes can disagree by sub-pixel rounding, so each
 * axis may differ by up to `tolerance` px. A tolerance of 0 is exact equality.
 */
export function sizesEqual(a: Size, b: Size, tolerance = 0): boolean {
  return Math.abs(a.width - b.width) <= tolerance && Math.abs(a.height - b.height) <= tolerance;
}

/**
 * Exact equality, used to drop repeated identical measurements
 */
export function sameSize(a: Size, b: Size): boolean {
  return a.width === b.width && a.height === b.height;
}
