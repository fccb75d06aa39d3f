/**
 * Errors raised while turning labels into patches.
 *
 * All of them are recoverable: the label (or image) is skipped and
 * extraction carries on with the next one.
 */

import type { Box } from "./box-math.js";

export function formatBox(box: Box): string {
  return `[${box.xMin}, ${box.yMin}, ${box.xMax}, ${box.yMax}]`;
}

export class InfeasibleSquareError extends Error {
  readonly attempted: Box;
  readonly original: Box;

  constructor(
    attempted: Box,
    original: Box,
    reason: string = "Cannot fit padded box in image",
  ) {
    super(
      `${reason}, tried ${formatBox(attempted)} for input ${formatBox(original)}`,
    );
    this.name = "InfeasibleSquareError";
    this.attempted = attempted;
    this.original = original;
  }
}

export class DegenerateBoxError extends Error {
  readonly box: Box;

  constructor(box: Box) {
    super(`Box ${formatBox(box)} with zero area`);
    this.name = "DegenerateBoxError";
    this.box = box;
  }
}

export class LabelParseError extends Error {
  readonly line: string;
  readonly field: string | undefined;

  constructor(message: string, line: string, field?: string) {
    super(message);
    this.name = "LabelParseError";
    this.line = line;
    this.field = field;
  }
}

export class ImageReadError extends Error {
  readonly imagePath: string;

  constructor(imagePath: string, cause?: unknown) {
    const detail =
      cause === undefined
        ? "missing dimensions"
        : cause instanceof Error
          ? cause.message
          : String(cause);
    super(`Could not read image '${imagePath}': ${detail}`);
    this.name = "ImageReadError";
    this.imagePath = imagePath;
  }
}
