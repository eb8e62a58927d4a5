import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LIMITS } from "./extraction-constants.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  IDSCAN_MAX_LINES:        z.coerce.number().int().positive().default(LIMITS.DEFAULT_MAX_LINES),
  IDSCAN_LOG_LEVEL:        z.enum(LOG_LEVELS).default("warn"),
  IDSCAN_OCR_LANG:         z.string().min(1).default("eng"),
  IDSCAN_MIN_IMAGE_WIDTH:  z.coerce.number().int().positive().default(400),
  IDSCAN_MIN_IMAGE_HEIGHT: z.coerce.number().int().positive().default(250),
});

export interface IdscanConfig {
  maxLines:       number;
  logLevel:       LogLevel;
  ocrLang:        string;
  minImageWidth:  number;
  minImageHeight: number;
}

/**
 * Parse idscan settings from an environment map.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IdscanConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  const e = parsed.data;
  return {
    maxLines:       e.IDSCAN_MAX_LINES,
    logLevel:       e.IDSCAN_LOG_LEVEL,
    ocrLang:        e.IDSCAN_OCR_LANG,
    minImageWidth:  e.IDSCAN_MIN_IMAGE_WIDTH,
    minImageHeight: e.IDSCAN_MIN_IMAGE_HEIGHT,
  };
}

let cached: IdscanConfig | undefined;

/** Process-wide configuration, read from process.env on first use. */
export function getConfig(): IdscanConfig {
  cached ??= loadConfig();
  return cached;
}
