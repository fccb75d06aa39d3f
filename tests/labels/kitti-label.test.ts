import { describe, it, expect } from "vitest";
import {
  parseLabelFile,
  parseLabelLine,
  roundHalfEven,
} from "../../scripts/utils/kitti-label.js";
import { LabelParseError } from "../../scripts/utils/errors.js";

const CAR_LINE =
  "Car 0.00 0 -1.58 587.01 173.33 614.12 200.12 1.65 1.67 3.64 -0.65 1.71 46.70 -1.59";

describe("roundHalfEven", () => {
  it("rounds to the nearest integer", () => {
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
    expect(roundHalfEven(7)).toBe(7);
  });

  it("rounds halves to the even neighbour", () => {
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(-2.5)).toBe(-2);
    expect(roundHalfEven(-3.5)).toBe(-4);
  });
});

describe("parseLabelLine", () => {
  it("parses every field of a label line", () => {
    expect(parseLabelLine(CAR_LINE)).toEqual({
      class: "Car",
      truncated: 0,
      occluded: 0,
      alpha: -1.58,
      bbox: { xMin: 587, yMin: 173, xMax: 614, yMax: 200 },
      dimensions: [1.65, 1.67, 3.64],
      location: [-0.65, 1.71, 46.7],
      rotationY: -1.59,
    });
  });

  it("accepts a trailing detection score", () => {
    expect(parseLabelLine(`${CAR_LINE} 0.93`).score).toBe(0.93);
  });

  it("tolerates surrounding and repeated whitespace", () => {
    const label = parseLabelLine(`  ${CAR_LINE.replace(/ /g, "  ")}\r`);
    expect(label.class).toBe("Car");
    expect(label.bbox).toEqual({ xMin: 587, yMin: 173, xMax: 614, yMax: 200 });
  });

  it("rejects lines with missing fields", () => {
    expect(() => parseLabelLine("Car 0.00 0 -1.58 587.01")).toThrow(
      "Expected 15 fields, found 5",
    );
  });

  it("names the field holding a non-numeric value", () => {
    const line = CAR_LINE.replace("587.01", "left");
    let caught: unknown;
    try {
      parseLabelLine(line);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(LabelParseError);
    if (!(caught instanceof LabelParseError)) return;
    expect(caught.field).toBe("x1");
    expect(caught.line).toBe(line);
    expect(caught.message).toBe("Invalid value 'left' for field 'x1'");
  });

  it("requires an integer occlusion state", () => {
    expect(() => parseLabelLine(CAR_LINE.replace("0.00 0 ", "0.00 1.5 "))).toThrow(
      "Invalid value '1.5' for field 'occluded'",
    );
  });

  it("rejects a non-numeric score", () => {
    expect(() => parseLabelLine(`${CAR_LINE} high`)).toThrow(
      "Invalid value 'high' for field 'score'",
    );
  });
});

describe("parseLabelFile", () => {
  it("keeps line indices and isolates bad lines", () => {
    const text = [
      CAR_LINE,
      "",
      "not a label",
      "Pedestrian 0.00 1 0.21 10.4 20.5 30.5 80.6 1.80 0.60 0.80 1.00 1.50 10.00 0.10",
      "",
    ].join("\n");

    const entries = parseLabelFile(text);
    expect(entries.map((entry) => entry.index)).toEqual([0, 2, 3]);

    const [car, bad, pedestrian] = entries;
    expect(car && "label" in car ? car.label.class : undefined).toBe("Car");
    expect(bad && "error" in bad ? bad.error.message : undefined).toBe(
      "Expected 15 fields, found 3",
    );
    expect(
      pedestrian && "label" in pedestrian ? pedestrian.label.bbox : undefined,
    ).toEqual({ xMin: 10, yMin: 20, xMax: 30, yMax: 81 });
  });

  it("handles CRLF line endings", () => {
    const entries = parseLabelFile(`${CAR_LINE}\r\n${CAR_LINE}\r\n`);
    expect(entries).toHaveLength(2);
    expect(entries.every((entry) => "label" in entry)).toBe(true);
  });
});
