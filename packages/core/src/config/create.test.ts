/**
 * Configuration Construction Tests
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigValidationError } from '../utils/errors';
import { configKey, createExpandableTextConfig } from './create';
import { validateExpandableTextConfig } from './schema';

function issuePaths(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error.issues.map((issue) => issue.path);
    }
    throw error;
  }
  return [];
}

describe('createExpandableTextConfig', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('should trim the text and apply defaults', () => {
    const config = createExpandableTextConfig('  hello\n\n');

    expect(config).toEqual({
      text: 'hello',
      lineLimit: 3,
      moreButtonText: 'more',
      expandAnimation: { durationMs: 350, easing: 'ease-in-out' },
      collapseEnabled: false,
      trimMultipleNewlinesWhenTruncated: true,
      sizeTolerance: 0.5,
    });
    expect('font' in config).toBe(false);
    expect('moreButtonPressedColor' in config).toBe(false);
  });

  it('should apply every option', () => {
    const config = createExpandableTextConfig('text', {
      font: { family: 'Georgia', size: 16 },
      color: '#333',
      lineLimit: 5,
      moreButtonText: 'read more',
      moreButtonFont: { weight: 'bold' },
      moreButtonColor: 'teal',
      moreButtonPressedColor: 'navy',
      expandAnimation: { durationMs: 200, easing: 'linear' },
      collapseEnabled: true,
      trimMultipleNewlinesWhenTruncated: false,
      sizeTolerance: 1,
    });

    expect(config).toEqual({
      text: 'text',
      font: { family: 'Georgia', size: 16 },
      color: '#333',
      lineLimit: 5,
      moreButtonText: 'read more',
      moreButtonFont: { weight: 'bold' },
      moreButtonColor: 'teal',
      moreButtonPressedColor: 'navy',
      expandAnimation: { durationMs: 200, easing: 'linear' },
      collapseEnabled: true,
      trimMultipleNewlinesWhenTruncated: false,
      sizeTolerance: 1,
    });
  });

  it('should freeze the config and copy nested objects', () => {
    const font = { size: 16 };
    const config = createExpandableTextConfig('text', { font });
    font.size = 30;

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.expandAnimation)).toBe(true);
    expect(config.font).toEqual({ size: 16 });
  });

  it('should reject a line limit below one', () => {
    expect(() => createExpandableTextConfig('text', { lineLimit: 0 })).toThrow(ConfigValidationError);
    expect(issuePaths(() => createExpandableTextConfig('text', { lineLimit: -2 }))).toContain('/lineLimit');
  });

  it('should reject a fractional line limit', () => {
    expect(issuePaths(() => createExpandableTextConfig('text', { lineLimit: 2.5 }))).toContain('/lineLimit');
  });

  it('should reject negative tolerance and durations', () => {
    expect(issuePaths(() => createExpandableTextConfig('text', { sizeTolerance: -1 }))).toContain(
      '/sizeTolerance'
    );
    expect(
      issuePaths(() =>
        createExpandableTextConfig('text', { expandAnimation: { durationMs: -5, easing: 'linear' } })
      )
    ).toContain('/expandAnimation/durationMs');
  });

  it('should reject an invalid font', () => {
    expect(issuePaths(() => createExpandableTextConfig('text', { font: { size: 0 } }))).toContain('/font/size');
  });

  it('should log the validation failure', () => {
    expect(() => createExpandableTextConfig('text', { lineLimit: 0 })).toThrow();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});

describe('validateExpandableTextConfig', () => {
  it('should return no issues for a valid config', () => {
    expect(validateExpandableTextConfig(createExpandableTextConfig('ok'))).toEqual([]);
  });

  it('should report unknown keys', () => {
    const issues = validateExpandableTextConfig({ ...createExpandableTextConfig('ok'), extra: true });
    expect(issues.length).toBeGreaterThan(0);
  });
});

describe('configKey', () => {
  it('should be equal for equal configs', () => {
    expect(configKey(createExpandableTextConfig(' a '))).toBe(configKey(createExpandableTextConfig('a')));
  });

  it('should change with any option', () => {
    const base = configKey(createExpandableTextConfig('a'));

    expect(configKey(createExpandableTextConfig('a', { lineLimit: 4 }))).not.toBe(base);
    expect(configKey(createExpandableTextConfig('a', { moreButtonColor: 'red' }))).not.toBe(base);
    expect(configKey(createExpandableTextConfig('b'))).not.toBe(base);
  });
});
