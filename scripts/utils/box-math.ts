/**
 * Box math utility functions for confining and squaring bounding boxes
 */

import { InfeasibleSquareError, formatBox } from "./errors.js";

/**
 * Axis-aligned box in pixel coordinates (left, top, right, bottom).
 * Origin is the image's top-left corner.
 */
export interface Box {
  readonly xMin: number;
  readonly yMin: number;
  readonly xMax: number;
  readonly yMax: number;
}

/**
 * Valid coordinate range of an image: (0, 0, width, height)
 */
export type Bounds = Box;

export function boxWidth(box: Box): number {
  return box.xMax - box.xMin;
}

export function boxHeight(box: Box): number {
  return box.yMax - box.yMin;
}

/**
 * True when the box has zero (or negative) width or height
 */
export function isDegenerate(box: Box): boolean {
  return boxWidth(box) <= 0 || boxHeight(box) <= 0;
}

/**
 * Check if innerBox lies completely inside outerBox
 */
export function isInside(innerBox: Box, outerBox: Box): boolean {
  return (
    innerBox.xMin >= outerBox.xMin &&
    innerBox.yMin >= outerBox.yMin &&
    innerBox.xMax <= outerBox.xMax &&
    innerBox.yMax <= outerBox.yMax
  );
}

function assertValidBounds(bounds: Bounds): void {
  if (bounds.xMin > bounds.xMax || bounds.yMin > bounds.yMax) {
    throw new RangeError(`Invalid bounds ${formatBox(bounds)}`);
  }
}

function clamp(value: number, lower: number, upper: number): number {
  return Math.max(lower, Math.min(upper, value));
}

/**
 * Confine every coordinate of the box to the given bounds.
 *
 * Never fails. Boxes lying partly or wholly outside the bounds come back
 * with zero width or height, which callers have to check for.
 */
export function clampBox(box: Box, bounds: Bounds): Box {
  assertValidBounds(bounds);

  return {
    xMin: clamp(box.xMin, bounds.xMin, bounds.xMax),
    yMin: clamp(box.yMin, bounds.yMin, bounds.yMax),
    xMax: clamp(box.xMax, bounds.xMin, bounds.xMax),
    yMax: clamp(box.yMax, bounds.yMin, bounds.yMax),
  };
}

/**
 * Grow [lower, upper] by the given padding, then push it back inside
 * [boundMin, boundMax]. Lower edge first, then upper edge; a span too long
 * for the bounds still sticks out afterwards.
 */
function padSpan(
  lower: number,
  upper: number,
  padding: number,
  boundMin: number,
  boundMax: number,
): [number, number] {
  // odd differences put the extra pixel on the min side
  let start = lower - Math.ceil(padding);
  let end = upper + Math.floor(padding);

  if (start < boundMin) {
    end += boundMin - start;
    start = boundMin;
  }
  if (end > boundMax) {
    start -= end - boundMax;
    end = boundMax;
  }

  return [start, end];
}

/**
 * Pad the given box to a square shape.
 *
 * The shorter side grows to match the longer one. If the box resides near
 * the edge of the bounds, the padding is shifted inwards.
 *
 * @throws InfeasibleSquareError when the padded box cannot fit in the bounds
 */
export function padToSquare(box: Box, bounds: Bounds): Box {
  assertValidBounds(bounds);

  const width = boxWidth(box);
  const height = boxHeight(box);
  const padding = Math.abs(width - height) / 2;

  let padded: Box = box;
  if (width > height) {
    const [yMin, yMax] = padSpan(
      box.yMin,
      box.yMax,
      padding,
      bounds.yMin,
      bounds.yMax,
    );
    padded = { ...box, yMin, yMax };
  } else if (height > width) {
    const [xMin, xMax] = padSpan(
      box.xMin,
      box.xMax,
      padding,
      bounds.xMin,
      bounds.xMax,
    );
    padded = { ...box, xMin, xMax };
  }

  if (!isInside(padded, bounds)) {
    throw new InfeasibleSquareError(padded, box);
  }
  // only fractional coordinates can trip this
  if (boxWidth(padded) !== boxHeight(padded)) {
    throw new InfeasibleSquareError(padded, box, "Padded box is not square");
  }

  return padded;
}
