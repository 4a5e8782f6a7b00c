/**
 * ExpandableText - Line-limited text with an inline "more" control
 *
 * Features:
 * - Clamps the text to `lineLimit` lines and detects truncation by measuring
 *   an invisible clamped copy against an invisible unclamped one
 * - Masks the end of the last line and draws the "more" button there
 * - Expands in place on tap, animated; optionally collapses on tap
 * - Folds blank-line runs while truncated (configurable)
 *
 * Usage:
 * ```tsx
 * <ExpandableText text={description} lineLimit={3} moreButtonText="more" />
 *
 * <ExpandableText config={expandableText(description).lineLimit(3).enableCollapse().build()} />
 * ```
 */

import {
  configKey,
  createExpandableTextConfig,
  createLogger,
  createMeasurementState,
  displayText,
  fontToStyle,
  lineHeightPx,
  measurementReducer,
  resolveExpandAnimation,
  resolveExpandableTextStyle,
  transitionFor,
  truncationMaskStyle,
} from '@expandable-text/core';
import type {
  ExpandAnimation,
  ExpandAnimationPreset,
  ExpandableTextConfig,
  ExpandableTextOptions,
} from '@expandable-text/core/types';
import type React from 'react';
import { useEffect, useMemo, useReducer } from 'react';
import { useElementSize } from '../../hooks/useElementSize';
import { useExpandState } from '../../hooks/useExpandState';
import { useThemeStyleDefaults } from '../../hooks/useThemeStyleDefaults';
import { MoreButton } from './MoreButton';

const log = createLogger('ExpandableText');

interface ExpandableTextBaseProps {
  className?: string;
  style?: React.CSSProperties;
  /** Called after each expand/collapse transition */
  onExpandedChange?: (expanded: boolean) => void;
}

/**
 * Prebuilt configuration, e.g. from `expandableText(text)...build()`
 */
export interface ExpandableTextConfigProps extends ExpandableTextBaseProps {
  config: ExpandableTextConfig;
  text?: never;
}

/**
 * Inline options; validated on every render
 */
export interface ExpandableTextInlineProps
  extends ExpandableTextBaseProps,
    Omit<ExpandableTextOptions, 'expandAnimation'> {
  config?: never;
  /** Trimmed of leading/trailing whitespace and newlines */
  text: string;
  expandAnimation?: ExpandAnimationPreset | ExpandAnimation;
}

export type ExpandableTextProps = ExpandableTextConfigProps | ExpandableTextInlineProps;

function hasConfig(props: ExpandableTextProps): props is ExpandableTextConfigProps {
  return props.config !== undefined;
}

function configFromProps(props: ExpandableTextProps): ExpandableTextConfig {
  if (hasConfig(props)) {
    return props.config;
  }
  const { text, expandAnimation } = props;
  return createExpandableTextConfig(text, {
    font: props.font,
    color: props.color,
    lineLimit: props.lineLimit,
    moreButtonText: props.moreButtonText,
    moreButtonFont: props.moreButtonFont,
    moreButtonColor: props.moreButtonColor,
    moreButtonPressedColor: props.moreButtonPressedColor,
    expandAnimation: expandAnimation === undefined ? undefined : resolveExpandAnimation(expandAnimation),
    collapseEnabled: props.collapseEnabled,
    trimMultipleNewlinesWhenTruncated: props.trimMultipleNewlinesWhenTruncated,
    sizeTolerance: props.sizeTolerance,
  });
}

/**
 * ExpandableText
 *
 * The configuration is fixed per view instance: any change to it remounts
 * the view, which resets the expanded state and the measurements.
 *
 * @throws ConfigValidationError when inline options are invalid
 */
export const ExpandableText: React.FC<ExpandableTextProps> = (props) => {
  const config = configFromProps(props);

  return (
    <ExpandableTextView
      key={configKey(config)}
      config={config}
      className={props.className}
      style={props.style}
      onExpandedChange={props.onExpandedChange}
    />
  );
};

interface ExpandableTextViewProps extends ExpandableTextBaseProps {
  config: ExpandableTextConfig;
}

const ExpandableTextView: React.FC<ExpandableTextViewProps> = ({
  config,
  className,
  style,
  onExpandedChange,
}) => {
  const styleDefaults = useThemeStyleDefaults();
  const resolved = useMemo(
    () => resolveExpandableTextStyle(config, styleDefaults),
    [config, styleDefaults]
  );

  const [measurement, dispatch] = useReducer(
    measurementReducer,
    config.sizeTolerance,
    createMeasurementState
  );

  const { isExpanded, showMoreButton, trigger } = useExpandState({
    isTruncated: measurement.isTruncated,
    collapseEnabled: config.collapseEnabled,
    onExpandedChange,
  });

  const truncatedRef = useElementSize<HTMLDivElement>((size) => dispatch({ pass: 'truncated', size }));
  const intrinsicRef = useElementSize<HTMLDivElement>((size) => dispatch({ pass: 'intrinsic', size }));
  const moreTextRef = useElementSize<HTMLSpanElement>((size) => dispatch({ pass: 'moreText', size }));

  useEffect(() => {
    log.debug('truncation changed', {
      isTruncated: measurement.isTruncated,
      truncatedSize: measurement.truncatedSize,
      intrinsicSize: measurement.intrinsicSize,
    });
    // Logged on flips of the flag only, not on every size report
  }, [measurement.isTruncated]);

  // Both heights come from hidden passes that max-height never clips
  const maxHeight = isExpanded ? measurement.intrinsicSize.height : measurement.truncatedSize.height;

  const text = displayText(config, showMoreButton);
  const buttonFont = fontToStyle(resolved.buttonFont);
  const canTapText = showMoreButton || (isExpanded && config.collapseEnabled);

  const textStyle: React.CSSProperties = {
    ...fontToStyle(resolved.textFont),
    color: resolved.textColor,
    width: '100%',
    margin: 0,
    textAlign: 'left',
    whiteSpace: 'pre-wrap',
    overflowWrap: 'break-word',
  };

  const lineClampStyle: React.CSSProperties = {
    display: '-webkit-box',
    WebkitBoxOrient: 'vertical',
    WebkitLineClamp: config.lineLimit,
    overflow: 'hidden',
  };

  const hiddenStyle: React.CSSProperties = {
    position: 'absolute',
    top: 0,
    left: 0,
    visibility: 'hidden',
    pointerEvents: 'none',
  };

  return (
    <div
      className={className}
      data-expand-state={isExpanded ? 'expanded' : 'collapsed'}
      data-truncated={measurement.isTruncated}
      onClick={() => trigger('text')}
      style={{ position: 'relative', cursor: canTapText ? 'pointer' : undefined, ...style }}
    >
      {/* The only drawn copy of the text */}
      <div
        data-text
        data-line-limited={!isExpanded}
        style={{
          ...textStyle,
          ...lineClampStyle,
          WebkitLineClamp: isExpanded ? 'unset' : config.lineLimit,
          maxHeight: maxHeight > 0 ? maxHeight : undefined,
          transition: transitionFor(config.expandAnimation, ['max-height']),
          ...(showMoreButton
            ? truncationMaskStyle(measurement.moreTextSize, lineHeightPx(resolved.textFont))
            : undefined),
        }}
      >
        {text}
      </div>

      {/*
        Line-limited pass: the collapsed layout, folded whenever it is
        truncated, so it matches the drawn text while collapsed
      */}
      <div
        ref={truncatedRef}
        aria-hidden
        data-measure="truncated"
        data-line-limit={config.lineLimit}
        style={{ ...textStyle, ...lineClampStyle, ...hiddenStyle }}
      >
        {displayText(config, measurement.isTruncated)}
      </div>

      {/*
        Intrinsic pass: never folded, so the fold cannot change whether the
        text counts as truncated
      */}
      <div
        ref={intrinsicRef}
        aria-hidden
        data-measure="intrinsic"
        style={{ ...textStyle, ...hiddenStyle }}
      >
        {config.text}
      </div>

      {/* Button label alone, for the mask width */}
      <span
        ref={moreTextRef}
        aria-hidden
        data-measure="more-text"
        style={{ ...buttonFont, ...hiddenStyle, whiteSpace: 'nowrap' }}
      >
        {config.moreButtonText}
      </span>

      <MoreButton
        label={config.moreButtonText}
        visible={showMoreButton}
        font={buttonFont}
        color={resolved.buttonColor}
        pressedColor={resolved.buttonPressedColor}
        onPress={() => trigger('moreButton')}
        style={{
          position: 'absolute',
          right: 0,
          bottom: 0,
          transition: transitionFor(config.expandAnimation, ['opacity']),
        }}
      />
    </div>
  );
};
