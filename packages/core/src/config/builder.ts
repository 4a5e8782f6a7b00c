/**
 * Fluent builder
 *
 * Each method returns a new builder; a builder is never mutated, so partially
 * configured builders can be shared and branched.
 *
 * @example
 * ```ts
 * const config = expandableText('Lorem ipsum dolor sit amet...')
 *   .font({ size: 16 })
 *   .lineLimit(3)
 *   .moreButtonText('more')
 *   .moreButtonColor('#1677ff')
 *   .expandAnimation('easeOut')
 *   .trimMultipleNewlinesWhenTruncated(true)
 *   .build();
 * ```
 */

import { resolveExpandAnimation } from '../animation/presets';
import { trimText } from '../text/normalize';
import type { ExpandAnimation, ExpandAnimationPreset } from '../types/animation';
import type { ExpandableTextConfig, ExpandableTextOptions } from '../types/config';
import type { TextFont } from '../types/style';
import { createExpandableTextConfig } from './create';

export class ExpandableTextBuilder {
  private readonly text: string;
  private readonly options: Readonly<ExpandableTextOptions>;

  private constructor(text: string, options: Readonly<ExpandableTextOptions>) {
    this.text = text;
    this.options = options;
  }

  /**
   * Start a builder; the text is trimmed of leading/trailing whitespace and newlines
   */
  static create(text: string): ExpandableTextBuilder {
    return new ExpandableTextBuilder(trimText(text), {});
  }

  private with(patch: ExpandableTextOptions): ExpandableTextBuilder {
    return new ExpandableTextBuilder(this.text, { ...this.options, ...patch });
  }

  font(font: TextFont): ExpandableTextBuilder {
    return this.with({ font: { ...font } });
  }

  foregroundColor(color: string): ExpandableTextBuilder {
    return this.with({ color });
  }

  lineLimit(lineLimit: number): ExpandableTextBuilder {
    return this.with({ lineLimit });
  }

  moreButtonText(moreButtonText: string): ExpandableTextBuilder {
    return this.with({ moreButtonText });
  }

  moreButtonFont(font: TextFont): ExpandableTextBuilder {
    return this.with({ moreButtonFont: { ...font } });
  }

  moreButtonColor(color: string): ExpandableTextBuilder {
    return this.with({ moreButtonColor: color });
  }

  moreButtonPressedColor(color: string): ExpandableTextBuilder {
    return this.with({ moreButtonPressedColor: color });
  }

  expandAnimation(animation: ExpandAnimationPreset | ExpandAnimation): ExpandableTextBuilder {
    return this.with({ expandAnimation: resolveExpandAnimation(animation) });
  }

  enableCollapse(enabled = true): ExpandableTextBuilder {
    return this.with({ collapseEnabled: enabled });
  }

  trimMultipleNewlinesWhenTruncated(enabled = true): ExpandableTextBuilder {
    return this.with({ trimMultipleNewlinesWhenTruncated: enabled });
  }

  sizeTolerance(tolerance: number): ExpandableTextBuilder {
    return this.with({ sizeTolerance: tolerance });
  }

  /** Text as it will be displayed (already trimmed) */
  getText(): string {
    return this.text;
  }

  /**
   * Validate and freeze the configuration
   *
   * @throws ConfigValidationError if any option is out of range
   */
  build(): ExpandableTextConfig {
    return createExpandableTextConfig(this.text, this.options);
  }
}

export function expandableText(text: string): ExpandableTextBuilder {
  return ExpandableTextBuilder.create(text);
}
