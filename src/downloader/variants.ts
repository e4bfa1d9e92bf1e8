/**
 * Variant selection and display helpers.
 */
import { ValidationError } from "./shared/errors.js";
import type { StreamVariant } from "./shared/types.js";

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

/**
 * Picks a variant by its 1-based index as shown to the user.
 */
export function selectVariant(variants: readonly StreamVariant[], index: number): StreamVariant {
  const variant = Number.isInteger(index) ? variants[index - 1] : undefined;
  if (!variant) {
    throw new ValidationError(
      `Quality index ${index} is out of range; choose 1-${variants.length}.`
    );
  }
  return variant;
}

/**
 * Formats a byte count with binary units and one decimal.
 *
 * @example
 * humanSize(1536) // => "1.5 KB"
 */
export function humanSize(bytes: number): string {
  let size = bytes;
  for (const [i, unit] of SIZE_UNITS.entries()) {
    if (size < 1024 || i === SIZE_UNITS.length - 1) {
      return `${size.toFixed(1)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}

/**
 * Formats seconds as HH:MM:SS.
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return [hours, minutes, seconds % 60].map((part) => String(part).padStart(2, "0")).join(":");
}

/**
 * One-line description of a variant, with a size estimate when both
 * bandwidth and duration are known.
 *
 * @example
 * formatVariant(variant, 3600) // => "720p (1280x720) @ 2500 kbps · ~1.0 GB"
 */
export function formatVariant(variant: StreamVariant, durationSeconds?: number): string {
  const resolution = variant.resolution ?? "?";
  const bitrate = variant.bandwidth ? ` @ ${Math.floor(variant.bandwidth / 1000)} kbps` : "";
  const size =
    variant.bandwidth && durationSeconds
      ? ` · ~${humanSize((variant.bandwidth * durationSeconds) / 8)}`
      : "";
  return `${variant.qualityLabel} (${resolution})${bitrate}${size}`;
}
