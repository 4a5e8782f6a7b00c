/**
 * Element Size Hook
 *
 * Reports an element's border-box size after every commit (before paint) and
 * whenever a ResizeObserver sees it change. Returns a callback ref.
 */

import type { Size } from '@expandable-text/core/types';
import { useLayoutEffect, useRef, useState } from 'react';

export function readElementSize(element: Element): Size {
  const rect = element.getBoundingClientRect();
  return { width: rect.width, height: rect.height };
}

export function useElementSize<T extends Element>(onSize: (size: Size) => void): (element: T | null) => void {
  const [element, setElement] = useState<T | null>(null);

  // Latest callback without re-subscribing the observer
  const onSizeRef = useRef(onSize);
  onSizeRef.current = onSize;

  // No dependency list: line clamp and text changes need a fresh measurement
  // after every commit. Unchanged sizes are dropped by the reducer.
  useLayoutEffect(() => {
    if (element) {
      onSizeRef.current(readElementSize(element));
    }
  });

  useLayoutEffect(() => {
    if (!element || typeof ResizeObserver === 'undefined') {
      return;
    }
    const observer = new ResizeObserver(() => {
      onSizeRef.current(readElementSize(element));
    });
    observer.observe(element);
    return () => observer.disconnect();
  }, [element]);

  return setElement;
}
