import type { StyleDefaults } from '@expandable-text/core/types';
import { theme } from 'antd';
import { useMemo } from 'react';

type ThemeToken = ReturnType<typeof theme.useToken>['token'];

export type StyleDefaultsToken = Pick<
  ThemeToken,
  'fontFamily' | 'fontSize' | 'lineHeight' | 'colorText' | 'colorPrimary'
>;

/**
 * Explicit style fallbacks taken from the antd theme token
 */
export function styleDefaultsFromToken(token: StyleDefaultsToken): StyleDefaults {
  return {
    font: { family: token.fontFamily, size: token.fontSize, lineHeight: token.lineHeight },
    textColor: token.colorText,
    accentColor: token.colorPrimary,
  };
}

export function useThemeStyleDefaults(): StyleDefaults {
  const { token } = theme.useToken();
  const { fontFamily, fontSize, lineHeight, colorText, colorPrimary } = token;

  return useMemo(
    () => styleDefaultsFromToken({ fontFamily, fontSize, lineHeight, colorText, colorPrimary }),
    [fontFamily, fontSize, lineHeight, colorText, colorPrimary]
  );
}
