/**
 * Expand State Hook
 *
 * Binds the core expand/collapse state machine to React state.
 */

import {
  createLogger,
  INITIAL_EXPAND_STATE,
  nextExpandState,
  shouldShowMoreButton,
} from '@expandable-text/core';
import type { ExpandState, ExpandTrigger } from '@expandable-text/core/types';
import { useCallback, useState } from 'react';

const log = createLogger('ExpandableText');

export interface UseExpandStateOptions {
  /** Derived from the latest measurement */
  isTruncated: boolean;
  collapseEnabled: boolean;
  /** Called after a transition with the new expanded flag */
  onExpandedChange?: (expanded: boolean) => void;
}

export interface ExpandStateControls {
  state: ExpandState;
  isExpanded: boolean;
  showMoreButton: boolean;
  /** Apply a tap; returns whether the state changed */
  trigger: (trigger: ExpandTrigger) => boolean;
}

export function useExpandState({
  isTruncated,
  collapseEnabled,
  onExpandedChange,
}: UseExpandStateOptions): ExpandStateControls {
  const [state, setState] = useState<ExpandState>(INITIAL_EXPAND_STATE);

  const trigger = useCallback(
    (source: ExpandTrigger) => {
      const next = nextExpandState(state, source, { isTruncated, collapseEnabled });
      if (next === state) {
        return false;
      }
      log.debug('expand state changed', { from: state, to: next, trigger: source });
      setState(next);
      onExpandedChange?.(next === 'expanded');
      return true;
    },
    [state, isTruncated, collapseEnabled, onExpandedChange]
  );

  return {
    state,
    isExpanded: state === 'expanded',
    showMoreButton: shouldShowMoreButton(state, isTruncated),
    trigger,
  };
}
