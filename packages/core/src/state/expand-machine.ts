/**
 * Expand/collapse state machine
 *
 * collapsed --(moreButton | text, while truncated)--> expanded
 * expanded  --(text, when collapseEnabled)----------> collapsed
 *
 * Every other trigger leaves the state unchanged: a collapsed view whose text
 * fits ignores taps, and the invisible button is inert.
 */

import type { ExpandContext, ExpandState, ExpandTrigger } from '../types/expand';

export const INITIAL_EXPAND_STATE: ExpandState = 'collapsed';

/**
 * The button is visible only while collapsed and truncated
 */
export function shouldShowMoreButton(state: ExpandState, isTruncated: boolean): boolean {
  return state === 'collapsed' && isTruncated;
}

export function nextExpandState(
  state: ExpandState,
  trigger: ExpandTrigger,
  context: ExpandContext
): ExpandState {
  const buttonShown = shouldShowMoreButton(state, context.isTruncated);

  if (trigger === 'moreButton') {
    return buttonShown ? 'expanded' : state;
  }

  if (state === 'expanded' && context.collapseEnabled) {
    return 'collapsed';
  }
  return buttonShown ? 'expanded' : state;
}
