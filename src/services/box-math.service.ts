import type { Rectangle, Size } from "../types/index.js";

function isPositiveSize(size: Size): boolean {
  return (
    Number.isFinite(size.width) &&
    Number.isFinite(size.height) &&
    size.width > 0 &&
    size.height > 0
  );
}

/**
 * Largest size with the aspect ratio of `content` that fits within `bounds`.
 * Degenerate inputs yield `bounds` floored to 1 on each axis.
 *
 * @params {Size} content: size whose aspect ratio is kept
 * @params {Size} bounds: bounding size
 * @returns {Size}
 */
export function scaleInside(content: Size, bounds: Size): Size {
  if (!isPositiveSize(content) || !isPositiveSize(bounds)) {
    return {
      width: Number.isFinite(bounds.width) ? Math.max(1, bounds.width) : 1,
      height: Number.isFinite(bounds.height) ? Math.max(1, bounds.height) : 1,
    };
  }

  const contentRatio = content.width / content.height;
  const boundsRatio = bounds.width / bounds.height;

  // Bounds are wider than the content, so height is the constraint
  if (boundsRatio > contentRatio) {
    return { width: contentRatio * bounds.height, height: bounds.height };
  }
  return { width: bounds.width, height: bounds.width / contentRatio };
}

/**
 * Rectangle of `inner` size centered within `outer`. Offsets go negative
 * when `inner` is the larger.
 *
 * @params {Size} inner: size to place
 * @params {Rectangle} outer: containing rectangle
 * @returns {Rectangle}
 */
export function centerInside(inner: Size, outer: Rectangle): Rectangle {
  return {
    x: outer.x + (outer.width - inner.width) / 2,
    y: outer.y + (outer.height - inner.height) / 2,
    width: inner.width,
    height: inner.height,
  };
}

export function fitsInside(a: Size, b: Size): boolean {
  return a.width <= b.width && a.height <= b.height;
}

/** Rounds each axis to the nearest integer, never below 1. */
export function roundSize(size: Size): Size {
  return {
    width: Math.max(1, Math.round(size.width)),
    height: Math.max(1, Math.round(size.height)),
  };
}

export function toRectangle(size: Size): Rectangle {
  return { x: 0, y: 0, width: size.width, height: size.height };
}
