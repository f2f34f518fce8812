/**
 * Page geometry types
 * All coordinates are PDF points with the origin at the page's top-left corner.
 */

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * A matched span of text on one page
 */
export interface TextOccurrence {
  pageIndex: number;
  rect: Rect;
}

export function midY(rect: Rect): number {
  return (rect.y0 + rect.y1) / 2;
}

export function unionRect(a: Rect, b: Rect): Rect {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

/**
 * Round to a fixed number of decimal places
 */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
