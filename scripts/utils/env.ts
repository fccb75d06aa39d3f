import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

export const env = createEnv({
  server: {
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    PATCH_SIZE: z.coerce.number().int().positive().default(32),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});
