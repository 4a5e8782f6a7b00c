/**
 * @expandable-text/ui - React + Ant Design ExpandableText
 */

export * from './components/ExpandableText';
export * from './hooks/useElementSize';
export * from './hooks/useExpandState';
export * from './hooks/useThemeStyleDefaults';
export * from './utils/logging';
export { expandableText } from '@expandable-text/core';
