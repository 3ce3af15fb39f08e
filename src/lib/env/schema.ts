import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

// Unknown values from the host process fall back to defaults instead of failing import.
export const envSchema = v.object({
  NODE_ENV: v.fallback(
    v.optional(v.picklist(["development", "production", "test"]), "production"),
    "production",
  ),

  // Logging
  LOG_LEVEL: v.fallback(v.optional(v.pipe(v.string(), logLevelSchema)), undefined),
});

export type Env = v.InferOutput<typeof envSchema>;
