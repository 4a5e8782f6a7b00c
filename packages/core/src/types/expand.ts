export type ExpandState = 'collapsed' | 'expanded';

/**
 * What the user tapped: the "more" button, or anywhere in the text region.
 */
export type ExpandTrigger = 'moreButton' | 'text';

export interface ExpandContext {
  /** Whether the full text does not fit in the collapsed line limit */
  isTruncated: boolean;
  /** Whether tapping the expanded text collapses it again */
  collapseEnabled: boolean;
}
