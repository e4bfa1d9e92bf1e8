/**
 * Output filename utilities.
 * Uses @sindresorhus/slugify for Unicode transliteration.
 */
import { basename, extname } from "node:path";
import slugifyLib from "@sindresorhus/slugify";
import type { Broadcast, StreamVariant } from "../downloader/shared/types.js";

/** Longest sanitized token, extension excluded */
export const MAX_TOKEN_LENGTH = 150;

/** Used when a token has no safe characters at all */
export const FALLBACK_TOKEN = "video";

/**
 * Reduces a string to letters, digits, ".", "_" and "-".
 * Case is kept, runs of other characters become a single "-".
 *
 * @example
 * sanitizeToken("My / Weird: Title?") // => "My-Weird-Title"
 * sanitizeToken("***")                // => "video"
 */
export function sanitizeToken(value: string): string {
  const slug = slugifyLib(value, {
    lowercase: false,
    decamelize: false,
    separator: "-",
    preserveCharacters: [".", "_"],
  })
    .substring(0, MAX_TOKEN_LENGTH)
    .replace(/^[-_]+|[-_]+$/g, "");

  return slug || FALLBACK_TOKEN;
}

/**
 * Normalizes an extension to ".ext" form.
 */
export function normalizeExtension(extension: string): string {
  return extension.startsWith(".") ? extension : `.${extension}`;
}

/**
 * Appends the extension when the name has none.
 *
 * @example
 * ensureExtension("clip", "mp4")     // => "clip.mp4"
 * ensureExtension("clip.mkv", "mp4") // => "clip.mkv"
 */
export function ensureExtension(name: string, extension: string): string {
  return extname(name) ? name : `${name}${normalizeExtension(extension)}`;
}

/**
 * Builds `{creator}_{title}_{quality}.{ext}` from sanitized tokens.
 */
export function buildOutputFilename(
  broadcast: Pick<Broadcast, "creatorName" | "title">,
  variant: Pick<StreamVariant, "qualityLabel" | "resolution">,
  extension: string
): string {
  const creator = sanitizeToken(broadcast.creatorName);
  const title = sanitizeToken(broadcast.title);
  const quality = sanitizeToken(variant.qualityLabel || variant.resolution || "variant");
  return `${creator}_${title}_${quality}${normalizeExtension(extension)}`;
}

/**
 * Resolves the final file name: the caller's name (directories stripped,
 * default extension appended when missing) or one built from the metadata.
 */
export function resolveOutputFilename(
  broadcast: Pick<Broadcast, "creatorName" | "title">,
  variant: Pick<StreamVariant, "qualityLabel" | "resolution">,
  extension: string,
  filename?: string
): string {
  const requested = filename ? basename(filename.trim()) : "";
  if (!requested || requested === "." || requested === "..") {
    return buildOutputFilename(broadcast, variant, extension);
  }
  return ensureExtension(requested, extension);
}
