/**
 * KITTI object label parsing
 *
 * One object per line, space separated:
 *   class truncated occluded alpha x1 y1 x2 y2 h w l X Y Z rotation_y [score]
 */

import type { Box } from "./box-math.js";
import { LabelParseError } from "./errors.js";

export interface KittiLabel {
  /** 'Car', 'Van', 'Truck', 'Pedestrian', 'Person_sitting', 'Cyclist', 'Tram', 'Misc' or 'DontCare' */
  class: string;
  /** 0 (non-truncated) to 1 (truncated), truncated meaning the object leaves the image */
  truncated: number;
  /** 0 = fully visible, 1 = partly occluded, 2 = largely occluded, 3 = unknown */
  occluded: number;
  /** Observation angle, [-pi..pi] */
  alpha: number;
  /** 2D box in pixels, rounded to the nearest integer */
  bbox: Box;
  /** Height, width, length in meters */
  dimensions: [number, number, number];
  /** Location in camera coordinates, meters */
  location: [number, number, number];
  /** Rotation around the camera Y axis, [-pi..pi] */
  rotationY: number;
  /** Detection confidence, only present in result files */
  score?: number;
}

export type ParsedLabelLine =
  | { index: number; label: KittiLabel }
  | { index: number; error: LabelParseError };

const FIELD_NAMES = [
  "class",
  "truncated",
  "occluded",
  "alpha",
  "x1",
  "y1",
  "x2",
  "y2",
  "height",
  "width",
  "length",
  "X",
  "Y",
  "Z",
  "rotation_y",
] as const;

/**
 * Round half to even, so 2.5 -> 2 and 3.5 -> 4
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff < 0.5) return floor;
  if (diff > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Parse a single label line into a KittiLabel
 *
 * @throws LabelParseError on missing or non-numeric fields
 */
export function parseLabelLine(line: string): KittiLabel {
  const content = line.trim().split(/\s+/);

  if (content.length < FIELD_NAMES.length) {
    throw new LabelParseError(
      `Expected ${FIELD_NAMES.length} fields, found ${content.length}`,
      line,
    );
  }

  const numberAt = (index: number): number => {
    const raw = content[index] ?? "";
    const value = Number(raw);
    if (raw === "" || !Number.isFinite(value)) {
      const field = FIELD_NAMES[index] ?? "score";
      throw new LabelParseError(
        `Invalid value '${raw}' for field '${field}'`,
        line,
        field,
      );
    }
    return value;
  };

  const occluded = numberAt(2);
  if (!Number.isInteger(occluded)) {
    throw new LabelParseError(
      `Invalid value '${content[2]}' for field 'occluded'`,
      line,
      "occluded",
    );
  }

  const label: KittiLabel = {
    class: content[0] ?? "",
    truncated: numberAt(1),
    occluded,
    alpha: numberAt(3),
    bbox: {
      xMin: roundHalfEven(numberAt(4)),
      yMin: roundHalfEven(numberAt(5)),
      xMax: roundHalfEven(numberAt(6)),
      yMax: roundHalfEven(numberAt(7)),
    },
    dimensions: [numberAt(8), numberAt(9), numberAt(10)],
    location: [numberAt(11), numberAt(12), numberAt(13)],
    rotationY: numberAt(14),
  };

  if (content.length > FIELD_NAMES.length) {
    label.score = numberAt(FIELD_NAMES.length);
  }

  return label;
}

/**
 * Parse every non-blank line of a label file.
 * Line indices are zero-based and count blank lines too.
 */
export function parseLabelFile(text: string): ParsedLabelLine[] {
  const results: ParsedLabelLine[] = [];

  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") return;

    try {
      results.push({ index, label: parseLabelLine(line) });
    } catch (error) {
      if (!(error instanceof LabelParseError)) throw error;
      results.push({ index, error });
    }
  });

  return results;
}
