#!/usr/bin/env node

/**
 * Extract square image patches from a labeled object detection dataset
 *
 * For every box in every label file:
 * 1. Confine the box to the image
 * 2. Pad it to a square, shifting the padding inwards near the edges
 * 3. Crop the square and resize it to the patch size
 * 4. Save the patch and its class label in separate directories
 *
 * Boxes that end up with zero area or that cannot be squared inside the
 * image are reported and skipped.
 */

import { resolve } from "path";
import {
  USAGE,
  UsageError,
  parseArgs,
  type ParsedArgs,
} from "./utils/cli-args.js";
import { env } from "./utils/env.js";
import { createLogger } from "./utils/logger.js";
import { processImages } from "./utils/patch-extractor.js";

/* ------- EXECUTION ------- */
void main();
/* ---------------------------- */

/**
 * Main execution
 */
async function main() {
  const logger = createLogger();

  try {
    let parsed: ParsedArgs;
    try {
      parsed = parseArgs(process.argv.slice(2), env.PATCH_SIZE);
    } catch (error) {
      if (!(error instanceof UsageError)) throw error;
      logger.error(error.message);
      console.log(USAGE);
      process.exit(1);
    }

    if (parsed.help) {
      console.log(USAGE);
      process.exit(0);
    }

    const imagePath = resolve(parsed.imagePath);
    const labelPath = resolve(parsed.labelPath);
    const outputPath = resolve(parsed.outputPath);

    logger.info("🖼️  Starting patch extraction...\n");
    logger.info(`📖 Images: ${imagePath}`);
    logger.info(`🏷️  Labels: ${labelPath}`);
    logger.info(`💾 Output: ${outputPath}`);
    logger.info(`📐 Patch size: ${parsed.patchSize}x${parsed.patchSize}`);
    logger.info(`🔄 Overwrite: ${parsed.overwrite ? "Yes" : "No"}\n`);

    const summary = await processImages({
      imagePath,
      labelPath,
      outputPath,
      patchSize: parsed.patchSize,
      overwrite: parsed.overwrite,
      logger,
    });

    // Summary
    logger.info("\n📊 Summary:");
    logger.info(`   Images processed: ${summary.images.length}`);
    logger.info(`   Images failed: ${summary.failed.length}`);
    logger.info(`   Patches written: ${summary.written}`);
    logger.info(`   Patches already present: ${summary.existing}`);
    logger.info(`   Labels skipped: ${summary.skipped}`);
    logger.info("\n✅ Extraction complete!");
  } catch (error) {
    logger.error(
      `Error: ${error instanceof Error ? error.message : String(error)}`,
    );
    process.exit(1);
  }
}
