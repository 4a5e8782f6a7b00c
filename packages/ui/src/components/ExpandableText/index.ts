export * from './ExpandableText';
export * from './MoreButton';
