/**
 * Default option values
 *
 * Colors and fonts have no defaults here: they resolve against the theme at
 * render time (see resolveExpandableTextStyle).
 */

import { EXPAND_ANIMATIONS } from '../animation/presets';
import type { ExpandableTextOptions } from '../types/config';

type DefaultedOption =
  | 'lineLimit'
  | 'moreButtonText'
  | 'expandAnimation'
  | 'collapseEnabled'
  | 'trimMultipleNewlinesWhenTruncated'
  | 'sizeTolerance';

export const DEFAULT_EXPANDABLE_TEXT_OPTIONS = {
  lineLimit: 3,
  moreButtonText: 'more',
  expandAnimation: EXPAND_ANIMATIONS.default,
  collapseEnabled: false,
  trimMultipleNewlinesWhenTruncated: true,
  /** Half a pixel absorbs rounding between two independent layout passes */
  sizeTolerance: 0.5,
} as const satisfies Required<Pick<ExpandableTextOptions, DefaultedOption>>;
