/**
 * Validation schema for ExpandableText configuration
 */

import { type TSchema, Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { ValidationIssue } from '../utils/errors';

const NonEmptyString = () => Type.String({ minLength: 1 });

export const TextFontSchema = Type.Object(
  {
    family: Type.Optional(NonEmptyString()),
    size: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
    weight: Type.Optional(
      Type.Union([
        Type.Number({ minimum: 1, maximum: 1000 }),
        Type.Literal('normal'),
        Type.Literal('bold'),
        Type.Literal('lighter'),
        Type.Literal('bolder'),
      ])
    ),
    style: Type.Optional(
      Type.Union([Type.Literal('normal'), Type.Literal('italic'), Type.Literal('oblique')])
    ),
    lineHeight: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  },
  { additionalProperties: false }
);

export const ExpandAnimationSchema = Type.Object(
  {
    durationMs: Type.Number({ minimum: 0 }),
    easing: NonEmptyString(),
  },
  { additionalProperties: false }
);

export const ExpandableTextConfigSchema = Type.Object(
  {
    text: Type.String(),
    font: Type.Optional(TextFontSchema),
    color: Type.Optional(NonEmptyString()),
    lineLimit: Type.Integer({ minimum: 1 }),
    moreButtonText: Type.String(),
    moreButtonFont: Type.Optional(TextFontSchema),
    moreButtonColor: Type.Optional(NonEmptyString()),
    moreButtonPressedColor: Type.Optional(NonEmptyString()),
    expandAnimation: ExpandAnimationSchema,
    collapseEnabled: Type.Boolean(),
    trimMultipleNewlinesWhenTruncated: Type.Boolean(),
    sizeTolerance: Type.Number({ minimum: 0 }),
  },
  { additionalProperties: false }
);

/**
 * Collect validation issues for a value against a schema (empty when valid)
 */
export function collectIssues(schema: TSchema, value: unknown): ValidationIssue[] {
  return [...Value.Errors(schema, value)].map((error) => ({
    path: error.path,
    message: error.message,
  }));
}

export function validateExpandableTextConfig(value: unknown): ValidationIssue[] {
  return collectIssues(ExpandableTextConfigSchema, value);
}
