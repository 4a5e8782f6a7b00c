/**
 * @expandable-text/core - Framework-neutral logic for ExpandableText
 *
 * Consolidates types, configuration, text normalization, measurement,
 * the expand/collapse state machine, logging and errors.
 */

export * from './animation/index';
export * from './config/index';
export * from './measure/index';
export * from './state/index';
export * from './style/index';
export * from './text/index';
export * from './types/index';
export * from './utils/errors';
export * from './utils/logger';
