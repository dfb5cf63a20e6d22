/**
 * controller/synthesis.ts
 *
 * Pure builders for the host events the controller forwards. Input
 * coordinates are physical screen pixels as reported by the server; the
 * events carry DIP coordinates, screen and widget-relative.
 */

import {
  EventModifier,
  HeldButton,
  MouseButton,
  Point,
  Rect,
  SyntheticKeyEvent,
  SyntheticMouseEvent,
  SyntheticWheelEvent
} from '../core/types';

export interface Placement {
  screen: Point;
  widget: Point;
}

/** Physical screen point → DIP screen point and position inside `bounds`. */
export function place(x: number, y: number, bounds: Rect, scaleFactor: number): Placement {
  const scale = scaleFactor > 0 ? scaleFactor : 1;
  const screen = { x: x / scale, y: y / scale };
  return {
    screen,
    widget: { x: screen.x - bounds.x, y: screen.y - bounds.y }
  };
}

export function heldBitFor(button: MouseButton): number {
  switch (button) {
    case 'left':   return HeldButton.Left;
    case 'middle': return HeldButton.Middle;
    case 'right':  return HeldButton.Right;
    default:       return 0;
  }
}

/**
 * mouseDown/mouseUp carry the bit of the button that changed; mouseMove
 * carries every held button so drags keep working.
 */
export function buildMouseEvent(
  type: SyntheticMouseEvent['type'],
  button: MouseButton,
  heldButtons: number,
  placement: Placement,
  timestamp: number
): SyntheticMouseEvent {
  const isMove = type === 'mouseMove';
  return {
    type,
    button: isMove ? 'none' : button,
    clickCount: isMove ? 0 : 1,
    heldButtons: isMove ? heldButtons : heldBitFor(button),
    modifiers: EventModifier.Injected,
    widget: placement.widget,
    screen: placement.screen,
    timestamp
  };
}

export function buildWheelEvent(
  delta: number,
  horizontal: boolean,
  scale: number,
  heldButtons: number,
  placement: Placement,
  timestamp: number
): SyntheticWheelEvent {
  const pixels = delta * scale;
  const tick = pixels === 0 ? 0 : pixels > 0 ? 1 : -1;
  return {
    type: 'wheel',
    deltaX: horizontal ? pixels : 0,
    deltaY: horizontal ? 0 : pixels,
    ticksX: horizontal ? tick : 0,
    ticksY: horizontal ? 0 : tick,
    phase: 'began',
    units: 'precisePixel',
    heldButtons,
    modifiers: EventModifier.Injected,
    widget: placement.widget,
    screen: placement.screen,
    timestamp
  };
}

export function buildKeyEvent(
  down: boolean,
  keyCode: number,
  modifiers: number,
  code: string | undefined,
  key: string | undefined,
  timestamp: number
): SyntheticKeyEvent {
  const event: SyntheticKeyEvent = {
    type: down ? 'rawKeyDown' : 'keyUp',
    keyCode,
    modifiers: modifiers | EventModifier.Injected,
    timestamp
  };
  if (code !== undefined) event.code = code;
  if (key !== undefined) event.key = key;
  return event;
}
