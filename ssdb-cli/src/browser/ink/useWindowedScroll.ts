/**
 * Scroll offset for a list whose selection is owned elsewhere: the window
 * follows the selected row and otherwise stays put.
 */

import { useState, useEffect } from 'react';

/** Offset that keeps `index` inside a window of `viewportHeight` rows. */
export function ensureVisible(index: number, currentOffset: number, totalItems: number, viewportHeight: number): number {
  if (viewportHeight <= 0 || totalItems <= 0) return 0;
  let offset = currentOffset;
  if (index < offset) offset = index;
  if (index >= offset + viewportHeight) offset = index - viewportHeight + 1;
  const maxOffset = Math.max(0, totalItems - viewportHeight);
  return Math.max(0, Math.min(offset, maxOffset));
}

interface UseWindowedScrollOptions {
  /** -1 when nothing is selected. */
  selectedIndex: number;
  totalItems: number;
  viewportHeight: number;
}

export function useWindowedScroll({ selectedIndex, totalItems, viewportHeight }: UseWindowedScrollOptions): number {
  const [offset, setOffset] = useState(0);
  const next = ensureVisible(Math.max(0, selectedIndex), offset, totalItems, viewportHeight);

  useEffect(() => {
    if (next !== offset) setOffset(next);
  }, [next, offset]);

  return next;
}
