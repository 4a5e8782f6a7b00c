/**
 * Text normalization
 *
 * The text is always a plain string: it is trimmed once at construction and,
 * while the truncated view and its "more" button are shown, blank-line runs
 * can be folded so more content fits in the line limit.
 */

import type { ExpandableTextConfig } from '../types/config';

const BLANK_LINE_RUN = /\n\s*\n/g;

/**
 * Remove leading and trailing whitespace and newlines
 */
export function trimText(text: string): string {
  return text.trim();
}

/**
 * Replace every newline, whitespace-only gap, newline run with a single newline
 *
 * @example
 * ```ts
 * collapseBlankLines('a\n\n\nb\n  \nc') // => 'a\nb\nc'
 * ```
 */
export function collapseBlankLines(text: string): string {
  return text.replace(BLANK_LINE_RUN, '\n');
}

/**
 * Text to render for the current state
 *
 * @param showMoreButton - whether the view is collapsed and truncated
 */
export function displayText(
  config: Pick<ExpandableTextConfig, 'text' | 'trimMultipleNewlinesWhenTruncated'>,
  showMoreButton: boolean
): string {
  if (config.trimMultipleNewlinesWhenTruncated && showMoreButton) {
    return collapseBlankLines(config.text);
  }
  return config.text;
}
