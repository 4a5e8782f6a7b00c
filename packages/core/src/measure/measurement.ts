/**
 * Measurement state
 *
 * Holds the three sizes reported by the layout passes and the derived
 * `isTruncated` flag. The flag is recomputed in the same update that changes
 * either the truncated or the intrinsic size, so it never lags a layout pass.
 */

import type { Size } from '../types/size';
import { ZERO_SIZE } from '../types/size';
import { sameSize, sizesEqual } from './size';

export interface MeasurementState {
  /** Size of the line-limited (hidden, always clamped) pass */
  truncatedSize: Size;
  /** Size of the unconstrained (hidden, never folded) pass */
  intrinsicSize: Size;
  /** Size of the button label on its own */
  moreTextSize: Size;
  isTruncated: boolean;
  /** Tolerance used for the truncated/intrinsic comparison */
  tolerance: number;
}

export type MeasurementPass = 'truncated' | 'intrinsic' | 'moreText';

export interface MeasurementAction {
  pass: MeasurementPass;
  size: Size;
}

export function createMeasurementState(tolerance = 0): MeasurementState {
  return {
    truncatedSize: ZERO_SIZE,
    intrinsicSize: ZERO_SIZE,
    moreTextSize: ZERO_SIZE,
    isTruncated: false,
    tolerance,
  };
}

export function computeIsTruncated(truncatedSize: Size, intrinsicSize: Size, tolerance: number): boolean {
  return !sizesEqual(truncatedSize, intrinsicSize, tolerance);
}

/**
 * Apply one measurement. Returns the same object when nothing changed, which
 * lets React bail out of the re-render.
 */
export function measurementReducer(state: MeasurementState, action: MeasurementAction): MeasurementState {
  const size: Size = { width: action.size.width, height: action.size.height };

  switch (action.pass) {
    case 'moreText':
      if (sameSize(state.moreTextSize, size)) return state;
      return { ...state, moreTextSize: size };

    case 'truncated': {
      if (sameSize(state.truncatedSize, size)) return state;
      return {
        ...state,
        truncatedSize: size,
        isTruncated: computeIsTruncated(size, state.intrinsicSize, state.tolerance),
      };
    }

    case 'intrinsic': {
      if (sameSize(state.intrinsicSize, size)) return state;
      return {
        ...state,
        intrinsicSize: size,
        isTruncated: computeIsTruncated(state.truncatedSize, size, state.tolerance),
      };
    }
  }
}
