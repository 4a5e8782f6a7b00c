/**
 * Expand/Collapse State Machine Tests
 */

import { describe, expect, it } from 'vitest';
import type { ExpandContext } from '../types/expand';
import { INITIAL_EXPAND_STATE, nextExpandState, shouldShowMoreButton } from './expand-machine';

const truncated: ExpandContext = { isTruncated: true, collapseEnabled: false };
const fits: ExpandContext = { isTruncated: false, collapseEnabled: false };

describe('shouldShowMoreButton', () => {
  it('should show the button only while collapsed and truncated', () => {
    expect(shouldShowMoreButton('collapsed', true)).toBe(true);
    expect(shouldShowMoreButton('collapsed', false)).toBe(false);
    expect(shouldShowMoreButton('expanded', true)).toBe(false);
    expect(shouldShowMoreButton('expanded', false)).toBe(false);
  });
});

describe('nextExpandState', () => {
  it('should start collapsed', () => {
    expect(INITIAL_EXPAND_STATE).toBe('collapsed');
  });

  it('should expand from the button when truncated', () => {
    expect(nextExpandState('collapsed', 'moreButton', truncated)).toBe('expanded');
  });

  it('should expand from a text tap when truncated', () => {
    expect(nextExpandState('collapsed', 'text', truncated)).toBe('expanded');
  });

  it('should ignore taps when the text fits', () => {
    expect(nextExpandState('collapsed', 'text', fits)).toBe('collapsed');
    expect(nextExpandState('collapsed', 'moreButton', fits)).toBe('collapsed');
  });

  it('should not collapse when collapse is disabled', () => {
    expect(nextExpandState('expanded', 'text', truncated)).toBe('expanded');
    expect(nextExpandState('expanded', 'text', fits)).toBe('expanded');
  });

  it('should collapse from a text tap when collapse is enabled', () => {
    expect(nextExpandState('expanded', 'text', { isTruncated: false, collapseEnabled: true })).toBe(
      'collapsed'
    );
  });

  it('should keep the hidden button inert while expanded', () => {
    expect(nextExpandState('expanded', 'moreButton', { isTruncated: true, collapseEnabled: true })).toBe(
      'expanded'
    );
  });

  it('should return to collapsed after expand then collapse', () => {
    const context: ExpandContext = { isTruncated: true, collapseEnabled: true };
    const expanded = nextExpandState(INITIAL_EXPAND_STATE, 'moreButton', context);
    const collapsed = nextExpandState(expanded, 'text', { ...context, isTruncated: false });

    expect(expanded).toBe('expanded');
    expect(collapsed).toBe(INITIAL_EXPAND_STATE);
  });
});
