import type { ExpandAnimation } from './animation';
import type { TextFont } from './style';

/**
 * Options accepted when constructing an ExpandableText.
 *
 * Everything except the text is optional; see DEFAULT_EXPANDABLE_TEXT_OPTIONS.
 */
export interface ExpandableTextOptions {
  font?: TextFont;
  color?: string;
  /** Maximum number of lines shown while collapsed */
  lineLimit?: number;
  moreButtonText?: string;
  /** Falls back to `font` when unset */
  moreButtonFont?: TextFont;
  moreButtonColor?: string;
  /** Label color while the button is held down */
  moreButtonPressedColor?: string;
  expandAnimation?: ExpandAnimation;
  /** Tapping the expanded text collapses it again */
  collapseEnabled?: boolean;
  /** Collapse runs of blank lines while the truncated text and button are shown */
  trimMultipleNewlinesWhenTruncated?: boolean;
  /** Tolerance in px when comparing the truncated and intrinsic sizes */
  sizeTolerance?: number;
}

/**
 * Immutable, validated configuration of one ExpandableText instance.
 */
export interface ExpandableTextConfig {
  readonly text: string;
  readonly font?: TextFont;
  readonly color?: string;
  readonly lineLimit: number;
  readonly moreButtonText: string;
  readonly moreButtonFont?: TextFont;
  readonly moreButtonColor?: string;
  readonly moreButtonPressedColor?: string;
  readonly expandAnimation: ExpandAnimation;
  readonly collapseEnabled: boolean;
  readonly trimMultipleNewlinesWhenTruncated: boolean;
  readonly sizeTolerance: number;
}
