import { z } from "zod";
import { ValidationError } from "../downloader/shared/errors.js";

/**
 * Containers a download can end up in. "ts" skips the remux.
 */
export const CONTAINERS = ["mp4", "mkv", "mov", "ts"] as const;

export type Container = (typeof CONTAINERS)[number];

/**
 * Global application configuration schema.
 */
export const configSchema = z.object({
  outputDir: z.string().min(1).default("~/Downloads/dlive"),
  /** 1-based variant index used when --quality is not given */
  defaultQuality: z.number().int().min(1).default(1),
  concurrency: z.number().int().min(1).max(8).default(4),
  retryAttempts: z.number().int().min(1).max(10).default(5),
  timeoutMs: z.number().int().min(1000).max(300_000).default(20_000),
  container: z.enum(CONTAINERS).default("mp4"),
  allowInitOnlyPlaylist: z.boolean().default(true),
  ffmpegPath: z.string().min(1).default("ffmpeg"),
});

export type Config = z.infer<typeof configSchema>;

export type ConfigKey = keyof Config;

export const CONFIG_DEFAULTS: Config = configSchema.parse({});

export const CONFIG_KEYS = Object.keys(configSchema.shape);

export function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(configSchema.shape, key);
}

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

/**
 * Converts command-line text into the type a config key holds.
 * Range checks happen when the full config is validated.
 */
export function coerceConfigValue(key: ConfigKey, raw: string): string | number | boolean {
  const current = CONFIG_DEFAULTS[key];
  const text = raw.trim();

  if (typeof current === "boolean") {
    if (TRUE_VALUES.has(text.toLowerCase())) return true;
    if (FALSE_VALUES.has(text.toLowerCase())) return false;
    throw new ValidationError(`Invalid boolean for ${key}: ${raw}`);
  }

  if (typeof current === "number") {
    const value = Number(text);
    if (text === "" || !Number.isFinite(value)) {
      throw new ValidationError(`Invalid number for ${key}: ${raw}`);
    }
    return value;
  }

  return text;
}

/**
 * Validates a config object, reporting every problem at once.
 */
export function parseConfig(input: unknown, source = "configuration"): Config {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      `Invalid ${source}:\n${z.prettifyError(result.error)}`,
      z.prettifyError(result.error)
    );
  }
  return result.data;
}
