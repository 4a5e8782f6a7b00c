// @vitest-environment jsdom

import { act, renderHook } from '@testing-library/react';
import { describe, expect, it, vi } from 'vitest';
import { type UseExpandStateOptions, useExpandState } from './useExpandState';

describe('useExpandState', () => {
  it('should start collapsed without a button when the text fits', () => {
    const { result } = renderHook(() => useExpandState({ isTruncated: false, collapseEnabled: false }));

    expect(result.current.state).toBe('collapsed');
    expect(result.current.showMoreButton).toBe(false);

    let changed = true;
    act(() => {
      changed = result.current.trigger('text');
    });

    expect(changed).toBe(false);
    expect(result.current.isExpanded).toBe(false);
  });

  it('should expand from the button when truncated', () => {
    const onExpandedChange = vi.fn();
    const { result } = renderHook(() =>
      useExpandState({ isTruncated: true, collapseEnabled: false, onExpandedChange })
    );

    expect(result.current.showMoreButton).toBe(true);

    act(() => {
      result.current.trigger('moreButton');
    });

    expect(result.current.isExpanded).toBe(true);
    expect(result.current.showMoreButton).toBe(false);
    expect(onExpandedChange).toHaveBeenCalledWith(true);
  });

  it('should collapse on a text tap only when enabled', () => {
    const onExpandedChange = vi.fn();
    const { result, rerender } = renderHook((props: UseExpandStateOptions) => useExpandState(props), {
      initialProps: { isTruncated: true, collapseEnabled: false, onExpandedChange },
    });

    act(() => {
      result.current.trigger('moreButton');
    });
    act(() => {
      result.current.trigger('text');
    });
    expect(result.current.state).toBe('expanded');

    rerender({ isTruncated: true, collapseEnabled: true, onExpandedChange });
    act(() => {
      result.current.trigger('text');
    });

    expect(result.current.state).toBe('collapsed');
    expect(result.current.showMoreButton).toBe(true);
    expect(onExpandedChange).toHaveBeenLastCalledWith(false);
  });
});
