/**
 * Truncation mask
 *
 * While the "more" button is shown, the trailing end of the last visible line
 * is masked out so the label sits flush against the text without covering
 * characters. The mask is two layers:
 *
 * 1. an opaque band covering everything above the last line
 * 2. the last line, opaque up to `moreTextSize.width` from the trailing edge
 *
 * The last-line band is one text line tall. Without a known line height it
 * falls back to the label height.
 *
 * Both the standard and the `-webkit-` prefixed properties are emitted.
 */

import type { Size } from '../types/size';

export interface TruncationMaskStyle {
  maskImage: string;
  maskSize: string;
  maskPosition: string;
  maskRepeat: string;
  WebkitMaskImage: string;
  WebkitMaskSize: string;
  WebkitMaskPosition: string;
  WebkitMaskRepeat: string;
}

export function truncationMaskStyle(moreTextSize: Size, lineHeight?: number): TruncationMaskStyle {
  const width = `${moreTextSize.width}px`;
  const height = `${lineHeight ?? moreTextSize.height}px`;

  const image = [
    'linear-gradient(#000, #000)',
    `linear-gradient(to left, transparent ${width}, #000 ${width})`,
  ].join(', ');
  const size = `100% calc(100% - ${height}), 100% ${height}`;
  const position = '0 0, 0 100%';
  const repeat = 'no-repeat, no-repeat';

  return {
    maskImage: image,
    maskSize: size,
    maskPosition: position,
    maskRepeat: repeat,
    WebkitMaskImage: image,
    WebkitMaskSize: size,
    WebkitMaskPosition: position,
    WebkitMaskRepeat: repeat,
  };
}
