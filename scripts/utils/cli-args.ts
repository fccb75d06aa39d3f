/**
 * Command-line arguments for extract-patches
 */

export const USAGE = `
Usage: npm run extract-patches -- [options]

Options:
  -i, --images DIR            Directory with input PNG images (searched recursively)
  -l, --labels DIR            Directory with one KITTI label file per image
  -o, --output DIR            Output directory for patches/ and labels/
  -ps, --patch-size N         Width and height of the resulting patches (default: PATCH_SIZE or 32)
  --overwrite                 Overwrite existing patches
  --help, -h                  Show this help message

Examples:
  npm run extract-patches -- -i data/image_2 -l data/label_2 -o dataset
  npm run extract-patches -- -i data/image_2 -l data/label_2 -o dataset -ps 64
  npm run extract-patches -- --images=data/image_2 --labels=data/label_2 --output=dataset --overwrite
`;

export interface ExtractPatchesArgs {
  imagePath: string;
  labelPath: string;
  outputPath: string;
  patchSize: number;
  overwrite: boolean;
}

export type ParsedArgs = { help: true } | ({ help: false } & ExtractPatchesArgs);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

type ValueKey = "imagePath" | "labelPath" | "outputPath" | "patchSize";

const FLAGS: Record<string, ValueKey> = {
  "-i": "imagePath",
  "--images": "imagePath",
  "-l": "labelPath",
  "--labels": "labelPath",
  "-o": "outputPath",
  "--output": "outputPath",
  "-ps": "patchSize",
  "--patch-size": "patchSize",
};

function parsePatchSize(raw: string): number {
  const size = Number(raw.trim());
  if (!Number.isInteger(size) || size <= 0) {
    throw new UsageError(`Invalid patch size: ${raw}`);
  }
  return size;
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseArgs(args: string[], defaultPatchSize: number): ParsedArgs {
  if (args.includes("--help") || args.includes("-h")) {
    return { help: true };
  }

  const values: Partial<Record<ValueKey, string>> = {};
  let overwrite = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    if (arg === "--overwrite") {
      overwrite = true;
      continue;
    }

    const [flag = "", inlineValue] = arg.split(/=(.*)/s, 2);
    const key = FLAGS[flag];
    if (!key) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    const value = inlineValue ?? args[i + 1];
    if (inlineValue === undefined) i++;
    if (!value?.trim()) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    values[key] = value.trim();
  }

  const { imagePath, labelPath, outputPath } = values;
  if (!imagePath || !labelPath || !outputPath) {
    throw new UsageError("--images, --labels and --output are required");
  }

  return {
    help: false,
    imagePath,
    labelPath,
    outputPath,
    patchSize:
      values.patchSize === undefined
        ? defaultPatchSize
        : parsePatchSize(values.patchSize),
    overwrite,
  };
}
