/**
 * ExpandableText Types
 *
 * Shared type definitions for the core logic and the UI package.
 */

export * from './animation';
export * from './config';
export * from './expand';
export * from './size';
export * from './style';
