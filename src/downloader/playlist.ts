/**
 * M3U8 playlist parsing.
 * Pure functions: raw playlist text + base URL in, typed descriptors out.
 */
import { PlaylistError } from "./shared/errors.js";
import type { MediaPlaylist, StreamVariant } from "./shared/types.js";

const STREAM_INF_TAG = "#EXT-X-STREAM-INF";
const MAP_TAG = "#EXT-X-MAP";

// ============================================================================
// Attribute Lists
// ============================================================================

const ATTRIBUTE_PATTERN = /([A-Z0-9-]+)=("[^"]*"|[^,]*)/g;

/**
 * Parses the attribute list of a tag line into a key → value map.
 * Quoted values are unquoted; unknown keys are kept as they are.
 *
 * @example
 * parseAttributeList('#EXT-X-MAP:URI="init.mp4",BYTERANGE="720@0"').get("URI")
 * // => "init.mp4"
 */
export function parseAttributeList(line: string): Map<string, string> {
  const colon = line.indexOf(":");
  const list = colon === -1 ? "" : line.slice(colon + 1);
  const attributes = new Map<string, string>();

  for (const match of list.matchAll(ATTRIBUTE_PATTERN)) {
    const [, key, rawValue = ""] = match;
    if (!key) continue;
    const value =
      rawValue.length >= 2 && rawValue.startsWith('"') && rawValue.endsWith('"')
        ? rawValue.slice(1, -1)
        : rawValue.trim();
    attributes.set(key, value);
  }

  return attributes;
}

/**
 * Resolves a playlist URI against the playlist's own URL.
 */
export function resolvePlaylistUri(uri: string, baseUrl: string): string {
  try {
    return new URL(uri, baseUrl).href;
  } catch {
    throw new PlaylistError(`Cannot resolve playlist URI "${uri}" against ${baseUrl}`);
  }
}

function parseBandwidth(attributes: Map<string, string>): number | undefined {
  const raw = attributes.get("AVERAGE-BANDWIDTH") ?? attributes.get("BANDWIDTH");
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? Math.trunc(value) : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

// ============================================================================
// Master Playlist
// ============================================================================

/**
 * Parses an HLS master playlist into its quality variants, in source order.
 * Indices are 1-based and dense.
 */
export function parseMasterPlaylist(text: string, baseUrl: string): StreamVariant[] {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const variants: StreamVariant[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line?.startsWith(STREAM_INF_TAG)) continue;

    const uri = lines[i + 1];
    if (!uri || uri.startsWith("#")) {
      throw new PlaylistError(
        "Malformed master playlist: missing variant URL",
        "PARSE_ERROR",
        `Stream info line without URL: ${line.substring(0, 120)}`
      );
    }

    const attributes = parseAttributeList(line);
    const index = variants.length + 1;
    const resolution = nonEmpty(attributes.get("RESOLUTION"));
    const qualityLabel =
      nonEmpty(attributes.get("VIDEO")) ??
      nonEmpty(attributes.get("NAME")) ??
      resolution ??
      `Variant ${index}`;

    variants.push({
      index,
      playlistUrl: resolvePlaylistUri(uri, baseUrl),
      qualityLabel,
      resolution,
      bandwidth: parseBandwidth(attributes),
    });
  }

  if (variants.length === 0) {
    throw new PlaylistError("No variants found in master playlist.");
  }

  return variants;
}

// ============================================================================
// Media Playlist
// ============================================================================

/**
 * Parses an HLS media playlist into its init segment (if any) and ordered
 * segment URLs. Only the first #EXT-X-MAP is honoured.
 * An empty segment list is returned as-is; callers decide whether it is valid.
 */
export function parseMediaPlaylist(text: string, baseUrl: string): MediaPlaylist {
  let initUrl: string | undefined;
  const segmentUrls: string[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line.startsWith(MAP_TAG)) {
      const uri = nonEmpty(parseAttributeList(line).get("URI"));
      if (uri && initUrl === undefined) {
        initUrl = resolvePlaylistUri(uri, baseUrl);
      }
      continue;
    }

    if (line.startsWith("#")) continue;

    segmentUrls.push(resolvePlaylistUri(line, baseUrl));
  }

  return { initUrl, segmentUrls };
}

/**
 * Number of files a media playlist expands to (segments + init segment).
 */
export function countParts(playlist: MediaPlaylist): number {
  return playlist.segmentUrls.length + (playlist.initUrl ? 1 : 0);
}
