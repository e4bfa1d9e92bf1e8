/**
 * Segment pipeline: media playlist in, one playable file out.
 *
 * Parts are downloaded into a private scratch directory by a bounded
 * p-queue worker pool, concatenated in playlist order, and optionally
 * remuxed into the requested container. The scratch directory is removed
 * on every exit path.
 */
import { createReadStream } from "node:fs";
import { mkdtemp, open, rm, unlink } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import PQueue from "p-queue";
import type { HttpFetcher } from "../shared/http.js";
import { resolveOutputFilename } from "../shared/filename.js";
import { logger } from "../shared/logger.js";
import { countParts, parseMediaPlaylist } from "./playlist.js";
import { intermediatePath, needsRemux, type Remuxer } from "./remux.js";
import {
  DownloadFailedError,
  DownloaderError,
  errorMessage,
  PlaylistError,
} from "./shared/errors.js";
import type {
  Broadcast,
  DownloadResult,
  MediaPlaylist,
  ProgressCallback,
  StreamVariant,
} from "./shared/types.js";

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_CONTAINER = "mp4";
export const SCRATCH_PREFIX = "dlive-segments-";

export type PipelineState =
  | "Start"
  | "MasterFetched"
  | "VariantSelected"
  | "MediaPlaylistFetched"
  | "SegmentsDownloading"
  | "Merging"
  | "Concatenated"
  | "RemuxSkipped"
  | "RemuxSucceeded"
  | "RemuxFailedFallback"
  | "Done";

export interface PipelineRequest {
  broadcast: Broadcast;
  variant: StreamVariant;
  /** Must exist */
  outputDir: string;
  /** Caller-chosen file name; built from metadata when absent */
  filename?: string | undefined;
  /** Extension appended when the file name has none */
  container?: string | undefined;
  /** Parallel part downloads; 1 is strictly sequential */
  concurrency?: number | undefined;
  /** Accept playlists holding only an init segment */
  allowInitOnlyPlaylist?: boolean | undefined;
  /** Parent of the scratch directory (defaults to the OS temp dir) */
  scratchRoot?: string | undefined;
  onProgress?: ProgressCallback | undefined;
}

export interface PipelineDeps {
  fetcher: HttpFetcher;
  remuxer: Remuxer;
}

export type PipelineResult = DownloadResult;

interface Part {
  url: string;
  fileName: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Lists parts in playlist order, init segment first.
 */
export function planParts(playlist: MediaPlaylist): Part[] {
  const parts: Part[] = [];
  if (playlist.initUrl) {
    parts.push({ url: playlist.initUrl, fileName: "00000_init.mp4" });
  }
  for (const url of playlist.segmentUrls) {
    parts.push({ url, fileName: `${String(parts.length).padStart(5, "0")}.ts` });
  }
  return parts;
}

function assertDownloadable(playlist: MediaPlaylist, allowInitOnly: boolean): void {
  if (countParts(playlist) === 0) {
    throw new PlaylistError("Media playlist contains no segments.", "NO_SEGMENTS");
  }
  if (playlist.segmentUrls.length === 0 && !allowInitOnly) {
    throw new PlaylistError(
      "Media playlist contains an init segment but no media segments.",
      "NO_SEGMENTS"
    );
  }
}

/**
 * Appends the part files to `target` byte for byte, in order.
 */
async function concatenateParts(
  partPaths: readonly string[],
  target: string,
  onPart: (index: number) => void
): Promise<void> {
  const output = await open(target, "w");
  try {
    for (const [index, partPath] of partPaths.entries()) {
      for await (const chunk of createReadStream(partPath)) {
        await output.write(chunk);
      }
      onPart(index + 1);
    }
  } finally {
    await output.close();
  }
}

async function downloadParts(
  parts: readonly Part[],
  scratchDir: string,
  fetcher: HttpFetcher,
  concurrency: number,
  onProgress: ProgressCallback | undefined
): Promise<string[]> {
  const queue = new PQueue({ concurrency });
  const total = parts.length;
  let done = 0;

  const paths = parts.map((part) => join(scratchDir, part.fileName));
  const tasks = parts.map((part) =>
    queue.add(async () => {
      await fetcher.downloadToFile(part.url, join(scratchDir, part.fileName));
      done++;
      onProgress?.(done, total, "segments");
    })
  );

  try {
    await Promise.all(tasks);
  } catch (error) {
    // Drop queued parts and let in-flight ones settle before cleanup
    queue.clear();
    await queue.onIdle();
    throw error;
  }

  return paths;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Downloads every part of `request.variant`, concatenates and optionally
 * remuxes them.
 *
 * Remux problems are not errors: when ffmpeg is missing or fails, the
 * concatenated `.ts` file is returned and `remux` says why.
 */
export async function runSegmentPipeline(
  request: PipelineRequest,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const { broadcast, variant, onProgress } = request;
  const concurrency = Math.max(1, Math.floor(request.concurrency ?? DEFAULT_CONCURRENCY));
  let state: PipelineState = "Start";

  const enter = (next: PipelineState) => {
    state = next;
    logger.debug(`[pipeline] ${broadcast.permlink}: ${next}`);
  };

  const fileName = resolveOutputFilename(
    broadcast,
    variant,
    request.container ?? DEFAULT_CONTAINER,
    request.filename
  );
  const finalPath = join(request.outputDir, fileName);

  try {
    const playlist = parseMediaPlaylist(
      await deps.fetcher.fetchText(variant.playlistUrl),
      variant.playlistUrl
    );
    enter("MediaPlaylistFetched");

    assertDownloadable(playlist, request.allowInitOnlyPlaylist ?? true);

    const parts = planParts(playlist);
    const remux = needsRemux(finalPath, playlist.initUrl !== undefined);
    const concatTarget = remux ? intermediatePath(finalPath) : finalPath;

    const scratchDir = await mkdtemp(join(request.scratchRoot ?? tmpdir(), SCRATCH_PREFIX));
    try {
      enter("SegmentsDownloading");
      const partPaths = await downloadParts(
        parts,
        scratchDir,
        deps.fetcher,
        concurrency,
        onProgress
      );

      enter("Merging");
      try {
        await concatenateParts(partPaths, concatTarget, (index) =>
          onProgress?.(index, parts.length, "merge")
        );
      } catch (error) {
        await rm(concatTarget, { force: true }).catch((cleanupError: unknown) => {
          logger.debug(`Could not remove ${concatTarget}: ${errorMessage(cleanupError)}`);
        });
        throw error;
      }
      enter("Concatenated");
    } finally {
      await rm(scratchDir, { recursive: true, force: true });
    }

    if (!remux) {
      enter("RemuxSkipped");
      enter("Done");
      return { outputPath: finalPath, remux: "skipped", parts: parts.length };
    }

    onProgress?.(0, 1, "remux");
    const outcome = await deps.remuxer.remux(concatTarget, finalPath);

    if (outcome.status === "ok") {
      await unlink(concatTarget);
      onProgress?.(1, 1, "remux");
      enter("RemuxSucceeded");
      enter("Done");
      return { outputPath: finalPath, remux: "succeeded", parts: parts.length };
    }

    if (outcome.status === "unavailable") {
      logger.warn(`ffmpeg not found; keeping the transport stream at ${concatTarget}`);
    } else {
      await rm(finalPath, { force: true });
      logger.warn(
        `Remux failed (${outcome.message}); keeping the transport stream at ${concatTarget}`
      );
    }
    enter("RemuxFailedFallback");
    enter("Done");
    return {
      outputPath: concatTarget,
      remux: outcome.status === "unavailable" ? "unavailable" : "failed",
      parts: parts.length,
    };
  } catch (error) {
    if (error instanceof DownloaderError) {
      throw error;
    }
    throw new DownloadFailedError(`Download failed in state ${state}`, error);
  }
}
