import { Bounds, Coordinates, ScreenSize } from "../types/uiElement.types";

export function centerOf(bounds: Bounds): Coordinates {
  return {
    x: Math.floor((bounds.left + bounds.right) / 2),
    y: Math.floor((bounds.top + bounds.bottom) / 2),
  };
}

export function widthOf(bounds: Bounds): number {
  return bounds.right - bounds.left;
}

export function heightOf(bounds: Bounds): number {
  return bounds.bottom - bounds.top;
}

/**
 * Converts an OCR-style `(left, top, width, height)` box to edge bounds.
 */
export function boundsFromBox(
  left: number,
  top: number,
  width: number,
  height: number,
): Bounds {
  return { left, top, right: left + width, bottom: top + height };
}

export function isWithinScreen(
  point: Coordinates,
  screen: ScreenSize,
  margin = 0,
): boolean {
  return (
    point.x >= margin &&
    point.y >= margin &&
    point.x <= screen.width - margin &&
    point.y <= screen.height - margin
  );
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}
