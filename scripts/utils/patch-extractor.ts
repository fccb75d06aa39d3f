/**
 * Patch extraction driver
 *
 * Turns every labeled box of an image into a square patch:
 *   clamp to image -> reject zero area -> pad to square -> crop + resize
 *
 * Patches land in <output>/patches/<stem>_<i>.png with the class name in
 * <output>/labels/<stem>_<i>.txt, where i is the label's line index.
 */

import fs from "fs-extra";
import { basename, join } from "path";
import { glob } from "glob";
import {
  clampBox,
  isDegenerate,
  padToSquare,
  type Box,
  type Bounds,
} from "./box-math.js";
import {
  DegenerateBoxError,
  InfeasibleSquareError,
  formatBox,
} from "./errors.js";
import { cropPatch, readImageBounds } from "./image-crop.js";
import { parseLabelFile } from "./kitti-label.js";
import { createLogger, type Logger } from "./logger.js";

export type SkipReason = "parse-error" | "degenerate" | "infeasible";

export interface SkippedLabel {
  index: number;
  reason: SkipReason;
  message: string;
}

export interface ImageResult {
  image: string;
  labels: number;
  written: number;
  existing: number;
  skipped: SkippedLabel[];
}

export interface FailedImage {
  image: string;
  message: string;
}

export interface ExtractionSummary {
  images: ImageResult[];
  failed: FailedImage[];
  written: number;
  existing: number;
  skipped: number;
}

export interface PatchOptions {
  outputPath: string;
  patchSize: number;
  overwrite?: boolean;
  logger?: Logger;
}

export interface ProcessImagesOptions extends PatchOptions {
  imagePath: string;
  labelPath: string;
}

/**
 * Name shared by an image and its label file: everything before the first dot
 */
export function fileStem(filePath: string): string {
  return basename(filePath).split(".")[0] ?? "";
}

/**
 * Square region to crop for a labeled box
 *
 * @throws DegenerateBoxError when nothing of the box is left inside the image
 * @throws InfeasibleSquareError when no square fits around the box
 */
export function boxToPatchRegion(box: Box, bounds: Bounds): Box {
  // some boxes extend past the image bounds
  const confined = clampBox(box, bounds);
  if (isDegenerate(confined)) {
    throw new DegenerateBoxError(confined);
  }
  return padToSquare(confined, bounds);
}

/**
 * Create output folders for patch and label data
 */
export async function createOutputFolders(outputPath: string): Promise<{
  patchDir: string;
  labelDir: string;
}> {
  const patchDir = join(outputPath, "patches");
  const labelDir = join(outputPath, "labels");
  await fs.ensureDir(patchDir);
  await fs.ensureDir(labelDir);
  return { patchDir, labelDir };
}

/**
 * Extract patches and class labels for every box in one image.
 *
 * The class file is written before its patch, and a pair only counts as
 * existing when both files are present.
 */
export async function extractPatchData(
  imagePath: string,
  labelPath: string,
  options: PatchOptions,
): Promise<ImageResult> {
  const logger = options.logger ?? createLogger();
  const stem = fileStem(imagePath);
  const { patchDir, labelDir } = await createOutputFolders(options.outputPath);

  const imageBuffer = await fs.readFile(imagePath);
  const bounds = await readImageBounds(imageBuffer, imagePath);
  const entries = parseLabelFile(await fs.readFile(labelPath, "utf-8"));

  const result: ImageResult = {
    image: imagePath,
    labels: entries.length,
    written: 0,
    existing: 0,
    skipped: [],
  };

  const skip = (index: number, reason: SkipReason, message: string) => {
    logger.warn(`${message} in image '${imagePath}' (label ${index})`);
    result.skipped.push({ index, reason, message });
  };

  for (const entry of entries) {
    const { index } = entry;
    if ("error" in entry) {
      skip(index, "parse-error", entry.error.message);
      continue;
    }

    let region: Box;
    try {
      region = boxToPatchRegion(entry.label.bbox, bounds);
    } catch (error) {
      if (error instanceof DegenerateBoxError) {
        skip(index, "degenerate", error.message);
        continue;
      }
      if (error instanceof InfeasibleSquareError) {
        skip(index, "infeasible", error.message);
        continue;
      }
      throw error;
    }

    const patchFile = join(patchDir, `${stem}_${index}.png`);
    const classFile = join(labelDir, `${stem}_${index}.txt`);

    if (
      !options.overwrite &&
      (await fs.pathExists(patchFile)) &&
      (await fs.pathExists(classFile))
    ) {
      logger.debug(`Skipped ${basename(patchFile)} (already exists)`);
      result.existing++;
      continue;
    }

    const patch = await cropPatch(imageBuffer, region, options.patchSize);
    await fs.writeFile(classFile, entry.label.class);
    await fs.writeFile(patchFile, patch);
    logger.debug(
      `${basename(patchFile)}: ${entry.label.class} ${formatBox(entry.label.bbox)} -> ${formatBox(region)}`,
    );
    result.written++;
  }

  return result;
}

/**
 * Extract patches from every PNG image below imagePath
 */
export async function processImages(
  options: ProcessImagesOptions,
): Promise<ExtractionSummary> {
  const logger = options.logger ?? createLogger();
  const summary: ExtractionSummary = {
    images: [],
    failed: [],
    written: 0,
    existing: 0,
    skipped: 0,
  };

  const imageFiles = (
    await glob("**/*.png", {
      cwd: options.imagePath,
      absolute: true,
      nodir: true,
    })
  ).sort();

  if (imageFiles.length === 0) {
    logger.warn(`No PNG images found in ${options.imagePath}`);
    return summary;
  }

  await createOutputFolders(options.outputPath);
  logger.info(`   ✓ Found ${imageFiles.length} image(s)\n`);

  for (let i = 0; i < imageFiles.length; i++) {
    const imageFile = imageFiles[i];
    if (!imageFile) continue;

    const labelFile = join(options.labelPath, `${fileStem(imageFile)}.txt`);
    logger.info(
      `   [${i + 1}/${imageFiles.length}] Processing ${basename(imageFile)}...`,
    );

    if (!(await fs.pathExists(labelFile))) {
      const message = `Missing label file ${labelFile}`;
      logger.error(`${message} for image '${imageFile}'`);
      summary.failed.push({ image: imageFile, message });
      continue;
    }

    try {
      const result = await extractPatchData(imageFile, labelFile, {
        ...options,
        logger,
      });
      summary.images.push(result);
      summary.written += result.written;
      summary.existing += result.existing;
      summary.skipped += result.skipped.length;
      logger.info(
        `      ✓ ${result.written} patch(es), ${result.skipped.length} skipped`,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Error in image '${imageFile}': ${message}`);
      summary.failed.push({ image: imageFile, message });
    }
  }

  return summary;
}
