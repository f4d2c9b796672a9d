/**
 * Axis-aligned rectangle helpers.
 *
 * Rects are values: every helper returns a new rect and never mutates its input.
 * (x, y) is the bottom-left corner in the Y-up coordinate system.
 */

import type { Axis, Rect, Side, Vector2 } from "./types.js";
import { vec2 } from "./math.js";

// =============================================================================
// Construction
// =============================================================================

export const rect = (x: number, y: number, width: number, height: number): Rect => ({
  x,
  y,
  width,
  height,
});

export const rectFromEdges = (left: number, bottom: number, right: number, top: number): Rect => ({
  x: left,
  y: bottom,
  width: right - left,
  height: top - bottom,
});

/**
 * Build a rect from a center point and half extents
 * (the shape Rapier cuboid colliders are described in).
 */
export const rectFromCenter = (center: Vector2, halfExtents: Vector2): Rect => ({
  x: center.x - halfExtents.x,
  y: center.y - halfExtents.y,
  width: halfExtents.x * 2,
  height: halfExtents.y * 2,
});

// =============================================================================
// Edges
// =============================================================================

export const rectLeft = (r: Rect): number => r.x;
export const rectRight = (r: Rect): number => r.x + r.width;
export const rectBottom = (r: Rect): number => r.y;
export const rectTop = (r: Rect): number => r.y + r.height;

export const rectCenter = (r: Rect): Vector2 => vec2(r.x + r.width / 2, r.y + r.height / 2);

/**
 * Coordinate of a face: x for left/right, y for top/bottom.
 */
export const sideEdge = (r: Rect, side: Side): number => {
  switch (side) {
    case "left":
      return rectLeft(r);
    case "right":
      return rectRight(r);
    case "bottom":
      return rectBottom(r);
    case "top":
      return rectTop(r);
  }
};

/** Lower edge along an axis (left or bottom) */
export const axisMin = (r: Rect, axis: Axis): number => (axis === "x" ? r.x : r.y);

/** Upper edge along an axis (right or top) */
export const axisMax = (r: Rect, axis: Axis): number =>
  axis === "x" ? r.x + r.width : r.y + r.height;

export const oppositeSide = (side: Side): Side => {
  switch (side) {
    case "left":
      return "right";
    case "right":
      return "left";
    case "bottom":
      return "top";
    case "top":
      return "bottom";
  }
};

// =============================================================================
// Transforms
// =============================================================================

export const translateRect = (r: Rect, delta: Vector2): Rect => ({
  ...r,
  x: r.x + delta.x,
  y: r.y + delta.y,
});

export const withX = (r: Rect, x: number): Rect => ({ ...r, x });
export const withY = (r: Rect, y: number): Rect => ({ ...r, y });

/**
 * Move a rect so that its lower edge on `axis` is at `value`.
 */
export const withAxisPosition = (r: Rect, axis: Axis, value: number): Rect =>
  axis === "x" ? withX(r, value) : withY(r, value);

/**
 * Smallest rect containing both inputs (the sweep of a straight move).
 */
export const unionRect = (a: Rect, b: Rect): Rect =>
  rectFromEdges(
    Math.min(rectLeft(a), rectLeft(b)),
    Math.min(rectBottom(a), rectBottom(b)),
    Math.max(rectRight(a), rectRight(b)),
    Math.max(rectTop(a), rectTop(b)),
  );

// =============================================================================
// Tests
// =============================================================================

/**
 * True when the open interiors overlap. Rects sharing only an edge do not.
 */
export const rectsOverlap = (a: Rect, b: Rect): boolean =>
  rectLeft(a) < rectRight(b) &&
  rectLeft(b) < rectRight(a) &&
  rectBottom(a) < rectTop(b) &&
  rectBottom(b) < rectTop(a);

/**
 * True when the rects overlap or share an edge or corner.
 */
export const rectsTouch = (a: Rect, b: Rect): boolean =>
  rectLeft(a) <= rectRight(b) &&
  rectLeft(b) <= rectRight(a) &&
  rectBottom(a) <= rectTop(b) &&
  rectBottom(b) <= rectTop(a);

export const rectEquals = (a: Rect, b: Rect): boolean =>
  a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;

export const isFiniteRect = (r: Rect): boolean =>
  Number.isFinite(r.x) &&
  Number.isFinite(r.y) &&
  Number.isFinite(r.width) &&
  Number.isFinite(r.height);
