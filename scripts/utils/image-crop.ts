/**
 * Image cropping utilities
 */

import sharp from "sharp";
import { boxHeight, boxWidth, type Box, type Bounds } from "./box-math.js";
import { ImageReadError } from "./errors.js";

export type ImageSource = string | Buffer;

function describeSource(image: ImageSource): string {
  return typeof image === "string" ? image : "<buffer>";
}

/**
 * Read image dimensions and return them as bounds (0, 0, width, height)
 */
export async function readImageBounds(
  image: ImageSource,
  name: string = describeSource(image),
): Promise<Bounds> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(image).metadata();
  } catch (error) {
    throw new ImageReadError(name, error);
  }

  if (!metadata.width || !metadata.height) {
    throw new ImageReadError(name);
  }

  return { xMin: 0, yMin: 0, xMax: metadata.width, yMax: metadata.height };
}

/**
 * Cut the box out of the image and resize it to patchSize x patchSize PNG
 */
export async function cropPatch(
  image: ImageSource,
  box: Box,
  patchSize: number,
): Promise<Buffer> {
  return await sharp(image)
    .extract({
      left: box.xMin,
      top: box.yMin,
      width: boxWidth(box),
      height: boxHeight(box),
    })
    .resize(patchSize, patchSize)
    .png()
    .toBuffer();
}
