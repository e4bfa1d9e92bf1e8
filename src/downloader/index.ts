/**
 * Public API of the DLive VOD downloader.
 */

// Facade
export {
  DLiveDownloader,
  type DLiveDownloaderOptions,
  type DownloadVariantOptions,
} from "./dliveDownloader.js";

// Pipeline
export {
  DEFAULT_CONCURRENCY,
  planParts,
  runSegmentPipeline,
  type PipelineDeps,
  type PipelineRequest,
  type PipelineResult,
  type PipelineState,
} from "./segmentPipeline.js";

// Playlists
export {
  countParts,
  parseAttributeList,
  parseMasterPlaylist,
  parseMediaPlaylist,
} from "./playlist.js";

// Remux
export {
  FfmpegRemuxer,
  intermediatePath,
  needsRemux,
  REMUX_EXTENSIONS,
  type RemuxOutcome,
  type Remuxer,
} from "./remux.js";

// Variants
export { formatDuration, formatVariant, humanSize, selectVariant } from "./variants.js";

// API
export { MetadataResolver } from "../api/metadataResolver.js";
export { GRAPHQL_ENDPOINT } from "../api/queries.js";

// Helpers
export { ProgressChannel, createProgressChannel } from "../shared/channel.js";
export { buildOutputFilename, ensureExtension, sanitizeToken } from "../shared/filename.js";
export { ResilientFetcher, type FetcherOptions, type HttpFetcher } from "../shared/http.js";
export { extractPermlink } from "../shared/url.js";

// Shared utilities & types
export * from "./shared/index.js";
