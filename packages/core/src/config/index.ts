/**
 * ExpandableText Configuration Module
 *
 * Exports defaults, validation, construction and the fluent builder.
 */

export * from './builder';
export * from './constants';
export * from './create';
export * from './schema';
