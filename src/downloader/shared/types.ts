/**
 * Shared types for the DLive VOD downloader.
 * Everything here is a plain, immutable value passed between the API,
 * the playlist parser and the segment pipeline.
 */

// ============================================================================
// Broadcast Types
// ============================================================================

/**
 * Metadata of a past broadcast, resolved once per download.
 */
export interface Broadcast {
  readonly id: string;
  /** Stable slug from the VOD URL, used as the GraphQL lookup key */
  readonly permlink: string;
  readonly title: string;
  readonly creatorName: string;
  /** Master playlist URL */
  readonly playbackUrl: string;
  /** Creation time in milliseconds since epoch */
  readonly createdAtMs?: number | undefined;
  readonly durationSeconds?: number | undefined;
}

// ============================================================================
// Playlist Types
// ============================================================================

/**
 * A quality variant listed in a master playlist.
 */
export interface StreamVariant {
  /** 1-based position in the master playlist (display only) */
  readonly index: number;
  /** Absolute URL of the variant's media playlist */
  readonly playlistUrl: string;
  /** Human-readable label (e.g., "720p") */
  readonly qualityLabel: string;
  /** e.g. "1280x720" */
  readonly resolution?: string | undefined;
  /** Bits per second */
  readonly bandwidth?: number | undefined;
}

/**
 * Ordered segment references of one media playlist.
 */
export interface MediaPlaylist {
  /** fMP4 initialization segment, written before every media part */
  readonly initUrl?: string | undefined;
  readonly segmentUrls: readonly string[];
}

// ============================================================================
// Progress Types
// ============================================================================

/**
 * Download stages, always reported in this order.
 */
export type DownloadStage = "segments" | "merge" | "remux";

export interface DownloadProgress {
  completed: number;
  total: number;
  stage: DownloadStage;
}

/**
 * Progress callback function type.
 * `completed === total` marks the end of a stage.
 */
export type ProgressCallback = (completed: number, total: number, stage: DownloadStage) => void;

// ============================================================================
// Result Types
// ============================================================================

/**
 * How the optional container remux ended.
 * "unavailable" and "failed" are degraded successes: the caller still gets
 * a playable transport stream.
 */
export type RemuxStatus = "skipped" | "succeeded" | "unavailable" | "failed";

export interface DownloadResult {
  outputPath: string;
  remux: RemuxStatus;
  /** Number of parts downloaded (segments + init segment) */
  parts: number;
}

// ============================================================================
// Common Error Codes
// ============================================================================

/**
 * Standard error codes attached to every downloader error.
 */
export type CommonErrorCode =
  // API errors
  | "API_ERROR"
  // Input errors
  | "INVALID_INPUT"
  // Network errors
  | "NETWORK_ERROR"
  | "FETCH_FAILED"
  // Playlist errors
  | "PARSE_ERROR"
  | "NO_SEGMENTS"
  // Other
  | "DOWNLOAD_FAILED";
