import { describe, it, expect } from "vitest";
import { parseArgs, UsageError } from "../../scripts/utils/cli-args.js";

describe("parseArgs", () => {
  it("parses short flags and falls back to the default patch size", () => {
    expect(parseArgs(["-i", "images", "-l", "labels", "-o", "out"], 32)).toEqual({
      help: false,
      imagePath: "images",
      labelPath: "labels",
      outputPath: "out",
      patchSize: 32,
      overwrite: false,
    });
  });

  it("parses long flags with inline values", () => {
    expect(
      parseArgs(
        [
          "--images=data/image_2",
          "--labels=data/label_2",
          "--output=dataset",
          "--patch-size=64",
          "--overwrite",
        ],
        32,
      ),
    ).toEqual({
      help: false,
      imagePath: "data/image_2",
      labelPath: "data/label_2",
      outputPath: "dataset",
      patchSize: 64,
      overwrite: true,
    });
  });

  it("accepts -ps with a separate value", () => {
    const parsed = parseArgs(["-i", "a", "-l", "b", "-o", "c", "-ps", "48"], 32);
    expect(parsed.help === false ? parsed.patchSize : undefined).toBe(48);
  });

  it("returns help when asked", () => {
    expect(parseArgs(["-i", "a", "--help"], 32)).toEqual({ help: true });
    expect(parseArgs(["-h"], 32)).toEqual({ help: true });
  });

  it("requires the three directories", () => {
    expect(() => parseArgs(["-i", "a", "-l", "b"], 32)).toThrow(
      "--images, --labels and --output are required",
    );
  });

  it("rejects invalid patch sizes", () => {
    expect(() =>
      parseArgs(["-i", "a", "-l", "b", "-o", "c", "-ps", "0"], 32),
    ).toThrow("Invalid patch size: 0");
    expect(() =>
      parseArgs(["-i", "a", "-l", "b", "-o", "c", "--patch-size=12.5"], 32),
    ).toThrow("Invalid patch size: 12.5");
  });

  it("rejects unknown options and missing values", () => {
    expect(() => parseArgs(["--bogus"], 32)).toThrow(UsageError);
    expect(() => parseArgs(["--bogus"], 32)).toThrow("Unknown option: --bogus");
    expect(() => parseArgs(["-i"], 32)).toThrow("Missing value for -i");
    expect(() => parseArgs(["--output="], 32)).toThrow(
      "Missing value for --output",
    );
  });
});
