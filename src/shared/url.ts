/**
 * URL utilities for DLive VOD links.
 */
import { ValidationError } from "../downloader/shared/errors.js";

/**
 * Extracts the permlink (last path segment) from a DLive VOD URL.
 * Input that is not a URL is taken to be a permlink already.
 *
 * @example
 * extractPermlink("https://dlive.tv/p/runner+abc123")
 * // => "runner+abc123"
 */
export function extractPermlink(urlOrPermlink: string): string {
  const input = urlOrPermlink.trim();

  if (!/^[a-z][a-z\d+.-]*:\/\//i.test(input)) {
    if (!input || input.includes("/")) {
      throw new ValidationError(`Could not extract a permlink from "${urlOrPermlink}"`);
    }
    return input;
  }

  let pathname: string;
  try {
    pathname = new URL(input).pathname;
  } catch {
    throw new ValidationError(`Invalid VOD URL: ${urlOrPermlink}`);
  }

  const permlink = pathname.replace(/\/+$/, "").split("/").pop() ?? "";
  if (!permlink) {
    throw new ValidationError(`Could not extract a permlink from "${urlOrPermlink}"`);
  }

  try {
    return decodeURIComponent(permlink);
  } catch {
    throw new ValidationError(`Invalid VOD URL: ${urlOrPermlink}`);
  }
}
