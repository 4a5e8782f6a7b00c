import type { FontStyle } from '@expandable-text/core/types';
import { Button } from 'antd';
import type React from 'react';
import { useState } from 'react';

export interface MoreButtonProps {
  label: string;
  /**
   * Invisible buttons stay mounted (opacity 0) so layout does not jump, but
   * they take no pointer events, no focus, and ignore clicks.
   */
  visible: boolean;
  font: FontStyle;
  color: string;
  /** Label color while held down; unset keeps `color` */
  pressedColor?: string;
  onPress: () => void;
  style?: React.CSSProperties;
}

/**
 * MoreButton - inline "more" control drawn over the end of the last line
 *
 * Clicks do not bubble, so the surrounding text region does not see the
 * same tap twice.
 */
export const MoreButton: React.FC<MoreButtonProps> = ({
  label,
  visible,
  font,
  color,
  pressedColor,
  onPress,
  style,
}) => {
  const [isPressed, setIsPressed] = useState(false);

  const currentColor = visible && isPressed && pressedColor !== undefined ? pressedColor : color;

  const press = () => setIsPressed(true);
  const release = () => setIsPressed(false);

  return (
    <Button
      type="link"
      tabIndex={visible ? 0 : -1}
      aria-hidden={visible ? undefined : true}
      data-pressed={isPressed}
      onClick={(event) => {
        event.stopPropagation();
        if (visible) {
          onPress();
        }
      }}
      onMouseDown={press}
      onMouseUp={release}
      onMouseLeave={release}
      onTouchStart={press}
      onTouchEnd={release}
      onTouchCancel={release}
      style={{
        ...font,
        color: currentColor,
        opacity: visible ? 1 : 0,
        pointerEvents: visible ? 'auto' : 'none',
        height: 'auto',
        padding: 0,
        border: 'none',
        ...style,
      }}
    >
      {label}
    </Button>
  );
};
