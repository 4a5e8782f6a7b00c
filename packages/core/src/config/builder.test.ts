/**
 * Fluent Builder Tests
 */

import { describe, expect, it, vi } from 'vitest';
import { ConfigValidationError } from '../utils/errors';
import { ExpandableTextBuilder, expandableText } from './builder';

describe('expandableText', () => {
  it('should trim the text at construction', () => {
    expect(expandableText('  hello\n\n').getText()).toBe('hello');
    expect(expandableText('  hello\n\n').build().text).toBe('hello');
  });

  it('should return a new builder from every method', () => {
    const base = expandableText('text');
    const limited = base.lineLimit(5);

    expect(limited).not.toBe(base);
    expect(limited).toBeInstanceOf(ExpandableTextBuilder);
    expect(base.build().lineLimit).toBe(3);
    expect(limited.build().lineLimit).toBe(5);
  });

  it('should chain every option', () => {
    const config = expandableText('Lorem ipsum')
      .font({ size: 16 })
      .foregroundColor('#222')
      .lineLimit(2)
      .moreButtonText('show more')
      .moreButtonFont({ size: 14, weight: 600 })
      .moreButtonColor('#1677ff')
      .moreButtonPressedColor('#0958d9')
      .expandAnimation('easeOut')
      .enableCollapse()
      .trimMultipleNewlinesWhenTruncated(false)
      .sizeTolerance(1)
      .build();

    expect(config).toEqual({
      text: 'Lorem ipsum',
      font: { size: 16 },
      color: '#222',
      lineLimit: 2,
      moreButtonText: 'show more',
      moreButtonFont: { size: 14, weight: 600 },
      moreButtonColor: '#1677ff',
      moreButtonPressedColor: '#0958d9',
      expandAnimation: { durationMs: 350, easing: 'ease-out' },
      collapseEnabled: true,
      trimMultipleNewlinesWhenTruncated: false,
      sizeTolerance: 1,
    });
  });

  it('should accept explicit animations', () => {
    const config = expandableText('text').expandAnimation({ durationMs: 120, easing: 'linear' }).build();
    expect(config.expandAnimation).toEqual({ durationMs: 120, easing: 'linear' });
  });

  it('should let a later call override an earlier one', () => {
    const config = expandableText('text').enableCollapse().enableCollapse(false).build();
    expect(config.collapseEnabled).toBe(false);
  });

  it('should validate on build', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const builder = expandableText('text').lineLimit(-1);

    expect(() => builder.build()).toThrow(ConfigValidationError);
  });
});
