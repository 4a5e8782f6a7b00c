/**
 * Configuration construction
 */

import { createLogger } from '../utils/logger';
import { ConfigValidationError } from '../utils/errors';
import { trimText } from '../text/normalize';
import type { ExpandableTextConfig, ExpandableTextOptions } from '../types/config';
import type { TextFont } from '../types/style';
import { DEFAULT_EXPANDABLE_TEXT_OPTIONS } from './constants';
import { validateExpandableTextConfig } from './schema';

const log = createLogger('ExpandableText');

type MutableConfig = { -readonly [K in keyof ExpandableTextConfig]: ExpandableTextConfig[K] };

/**
 * Merge options over the defaults, trim the text, validate, and freeze.
 *
 * @throws ConfigValidationError if any option is out of range
 *
 * @example
 * ```ts
 * createExpandableTextConfig('  hello\n\n', { lineLimit: 2 })
 * // => { text: 'hello', lineLimit: 2, moreButtonText: 'more', ... }
 * ```
 */
export function createExpandableTextConfig(
  text: string,
  options: ExpandableTextOptions = {}
): ExpandableTextConfig {
  const defaults = DEFAULT_EXPANDABLE_TEXT_OPTIONS;
  const animation = options.expandAnimation ?? defaults.expandAnimation;

  const config: MutableConfig = {
    text: trimText(text),
    lineLimit: options.lineLimit ?? defaults.lineLimit,
    moreButtonText: options.moreButtonText ?? defaults.moreButtonText,
    expandAnimation: Object.freeze({ durationMs: animation.durationMs, easing: animation.easing }),
    collapseEnabled: options.collapseEnabled ?? defaults.collapseEnabled,
    trimMultipleNewlinesWhenTruncated:
      options.trimMultipleNewlinesWhenTruncated ?? defaults.trimMultipleNewlinesWhenTruncated,
    sizeTolerance: options.sizeTolerance ?? defaults.sizeTolerance,
  };

  if (options.font !== undefined) config.font = freezeFont(options.font);
  if (options.color !== undefined) config.color = options.color;
  if (options.moreButtonFont !== undefined) config.moreButtonFont = freezeFont(options.moreButtonFont);
  if (options.moreButtonColor !== undefined) config.moreButtonColor = options.moreButtonColor;
  if (options.moreButtonPressedColor !== undefined) {
    config.moreButtonPressedColor = options.moreButtonPressedColor;
  }

  const issues = validateExpandableTextConfig(config);
  if (issues.length > 0) {
    const error = new ConfigValidationError(issues);
    log.warn(error.message);
    throw error;
  }

  return Object.freeze(config);
}

function freezeFont(font: TextFont): Readonly<TextFont> {
  return Object.freeze({ ...font });
}

/**
 * Stable identity for a configuration: equal configs produce equal keys.
 * The UI keys the view on it so any configuration change remounts it.
 */
export function configKey(config: ExpandableTextConfig): string {
  return JSON.stringify([
    config.text,
    config.font ?? null,
    config.color ?? null,
    config.lineLimit,
    config.moreButtonText,
    config.moreButtonFont ?? null,
    config.moreButtonColor ?? null,
    config.moreButtonPressedColor ?? null,
    config.expandAnimation,
    config.collapseEnabled,
    config.trimMultipleNewlinesWhenTruncated,
    config.sizeTolerance,
  ]);
}
