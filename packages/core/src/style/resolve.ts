/**
 * Style resolution
 *
 * Font and color options are optional overrides. They are resolved against
 * explicit defaults at render time instead of being inherited implicitly.
 */

import type { ExpandableTextConfig } from '../types/config';
import type { FontStyle, ResolvedExpandableTextStyle, StyleDefaults, TextFont } from '../types/style';

export function mergeFont(base: TextFont, override: TextFont | undefined): TextFont {
  if (!override) return { ...base };
  const merged: TextFont = { ...base };
  if (override.family !== undefined) merged.family = override.family;
  if (override.size !== undefined) merged.size = override.size;
  if (override.weight !== undefined) merged.weight = override.weight;
  if (override.style !== undefined) merged.style = override.style;
  if (override.lineHeight !== undefined) merged.lineHeight = override.lineHeight;
  return merged;
}

export function resolveExpandableTextStyle(
  config: Pick<
    ExpandableTextConfig,
    'font' | 'color' | 'moreButtonFont' | 'moreButtonColor' | 'moreButtonPressedColor'
  >,
  defaults: StyleDefaults
): ResolvedExpandableTextStyle {
  const resolved: ResolvedExpandableTextStyle = {
    textFont: mergeFont(defaults.font, config.font),
    textColor: config.color ?? defaults.textColor,
    // The button font falls back to the text font, not to the theme font alone
    buttonFont: mergeFont(defaults.font, config.moreButtonFont ?? config.font),
    buttonColor: config.moreButtonColor ?? defaults.accentColor,
  };
  if (config.moreButtonPressedColor !== undefined) {
    resolved.buttonPressedColor = config.moreButtonPressedColor;
  }
  return resolved;
}

/**
 * Map a TextFont to CSS font properties, leaving unset fields out
 */
export function fontToStyle(font: TextFont): FontStyle {
  const style: FontStyle = {};
  if (font.family !== undefined) style.fontFamily = font.family;
  if (font.size !== undefined) style.fontSize = font.size;
  if (font.weight !== undefined) style.fontWeight = font.weight;
  if (font.style !== undefined) style.fontStyle = font.style;
  if (font.lineHeight !== undefined) style.lineHeight = font.lineHeight;
  return style;
}

/**
 * Height of one text line in px, when both the size and the line-height
 * multiplier are known
 */
export function lineHeightPx(font: TextFont): number | undefined {
  if (font.size === undefined || font.lineHeight === undefined) return undefined;
  return font.size * font.lineHeight;
}
