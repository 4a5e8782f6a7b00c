/**
 * Font description for the text and the "more" button.
 *
 * Every field is optional; unset fields fall back to the theme font when the
 * style is resolved.
 */
export interface TextFont {
  /** CSS font-family list */
  family?: string;
  /** Font size in px */
  size?: number;
  /** CSS font-weight (numeric or keyword) */
  weight?: number | 'normal' | 'bold' | 'lighter' | 'bolder';
  style?: 'normal' | 'italic' | 'oblique';
  /** Unitless multiplier of the font size */
  lineHeight?: number;
}

/**
 * Explicit fallbacks the optional style overrides resolve against.
 * The UI builds these from the antd theme token.
 */
export interface StyleDefaults {
  font: TextFont;
  textColor: string;
  accentColor: string;
}

/**
 * Fully resolved style used for rendering.
 */
export interface ResolvedExpandableTextStyle {
  textFont: TextFont;
  textColor: string;
  buttonFont: TextFont;
  buttonColor: string;
  buttonPressedColor?: string;
}

/**
 * CSS font properties produced from a TextFont
 */
export interface FontStyle {
  fontFamily?: string;
  fontSize?: number;
  fontWeight?: number | string;
  fontStyle?: string;
  lineHeight?: number;
}
