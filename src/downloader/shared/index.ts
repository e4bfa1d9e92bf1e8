/**
 * Shared types, errors and ffmpeg helpers for the downloader.
 */

// Types
export type {
  Broadcast,
  CommonErrorCode,
  DownloadProgress,
  DownloadResult,
  DownloadStage,
  MediaPlaylist,
  ProgressCallback,
  RemuxStatus,
  StreamVariant,
} from "./types.js";

// Errors
export {
  ApiError,
  DLiveAPIError,
  DownloadFailedError,
  DownloaderError,
  PlaylistError,
  TransportError,
  ValidationError,
  errorMessage,
  type ApiErrorReason,
} from "./errors.js";

// FFmpeg utilities
export { buildRemuxArgs, checkFfmpeg, remuxWithFfmpeg, type FfmpegRunResult } from "./ffmpeg.js";
