/**
 * High-level facade for downloading DLive past broadcasts.
 * Owns one HTTP fetcher for its lifetime and wires it into the metadata
 * resolver and the segment pipeline.
 */
import { mkdir } from "node:fs/promises";
import { MetadataResolver } from "../api/metadataResolver.js";
import { GRAPHQL_ENDPOINT } from "../api/queries.js";
import { ResilientFetcher, type FetcherOptions, type HttpFetcher } from "../shared/http.js";
import { logger } from "../shared/logger.js";
import { extractPermlink } from "../shared/url.js";
import { parseMasterPlaylist } from "./playlist.js";
import { FfmpegRemuxer, type Remuxer } from "./remux.js";
import { runSegmentPipeline } from "./segmentPipeline.js";
import { DownloadFailedError, DownloaderError } from "./shared/errors.js";
import type { Broadcast, DownloadResult, ProgressCallback, StreamVariant } from "./shared/types.js";

// ============================================================================
// Types
// ============================================================================

export interface DLiveDownloaderOptions extends FetcherOptions {
  /** Replaces the default ResilientFetcher */
  fetcher?: HttpFetcher | undefined;
  /** Replaces the default ffmpeg remuxer */
  remuxer?: Remuxer | undefined;
  endpoint?: string | undefined;
  ffmpegPath?: string | undefined;
  concurrency?: number | undefined;
  /** Extension for generated file names (default "mp4") */
  container?: string | undefined;
  allowInitOnlyPlaylist?: boolean | undefined;
  scratchRoot?: string | undefined;
}

export interface DownloadVariantOptions {
  filename?: string | undefined;
  onProgress?: ProgressCallback | undefined;
  /** Overrides the instance-wide concurrency for this download */
  concurrency?: number | undefined;
}

// ============================================================================
// Facade
// ============================================================================

export class DLiveDownloader {
  private readonly fetcher: HttpFetcher;
  private readonly remuxer: Remuxer;
  private readonly resolver: MetadataResolver;

  constructor(private readonly options: DLiveDownloaderOptions = {}) {
    this.fetcher = options.fetcher ?? new ResilientFetcher(options);
    this.remuxer = options.remuxer ?? new FfmpegRemuxer(options.ffmpegPath);
    this.resolver = new MetadataResolver(this.fetcher, options.endpoint ?? GRAPHQL_ENDPOINT);
  }

  /**
   * Resolves a past broadcast by permlink.
   */
  fetchBroadcast(permlink: string): Promise<Broadcast> {
    return this.resolver.resolveBroadcast(permlink);
  }

  /**
   * Resolves a past broadcast from a VOD URL (or bare permlink).
   */
  fetchBroadcastByUrl(url: string): Promise<Broadcast> {
    return this.fetchBroadcast(extractPermlink(url));
  }

  /**
   * Fetches the master playlist and lists its variants in playlist order.
   */
  async listVariants(playbackUrl: string): Promise<StreamVariant[]> {
    const variants = parseMasterPlaylist(await this.fetcher.fetchText(playbackUrl), playbackUrl);
    logger.debug(`[pipeline] MasterFetched: ${variants.length} variant(s) at ${playbackUrl}`);
    return variants;
  }

  listRecentBroadcasts(channel: string, limit?: number): Promise<Broadcast[]> {
    return this.resolver.listRecentBroadcasts(channel, limit);
  }

  /**
   * Downloads one variant into `outputDir`, creating the directory if needed.
   *
   * Typed downloader errors propagate unchanged; anything else is wrapped
   * in a DownloadFailedError.
   */
  async downloadVariant(
    broadcast: Broadcast,
    variant: StreamVariant,
    outputDir: string,
    options: DownloadVariantOptions = {}
  ): Promise<DownloadResult> {
    logger.debug(`[pipeline] VariantSelected: ${variant.qualityLabel} (${variant.playlistUrl})`);

    try {
      await mkdir(outputDir, { recursive: true });

      return await runSegmentPipeline(
        {
          broadcast,
          variant,
          outputDir,
          filename: options.filename,
          onProgress: options.onProgress,
          container: this.options.container,
          concurrency: options.concurrency ?? this.options.concurrency,
          allowInitOnlyPlaylist: this.options.allowInitOnlyPlaylist,
          scratchRoot: this.options.scratchRoot,
        },
        { fetcher: this.fetcher, remuxer: this.remuxer }
      );
    } catch (error) {
      if (error instanceof DownloaderError) {
        throw error;
      }
      throw new DownloadFailedError(`Could not download "${broadcast.title}"`, error);
    }
  }
}
