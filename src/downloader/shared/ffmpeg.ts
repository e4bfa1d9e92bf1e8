/**
 * FFmpeg utilities used by the remux step.
 */
import { execa } from "execa";

// ============================================================================
// FFmpeg Availability
// ============================================================================

/**
 * Checks if ffmpeg can be started.
 */
export async function checkFfmpeg(ffmpegPath = "ffmpeg"): Promise<boolean> {
  try {
    await execa(ffmpegPath, ["-version"]);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// FFmpeg Operations
// ============================================================================

export type FfmpegRunResult =
  | { success: true }
  | { success: false; exitCode?: number | undefined; error: string };

/**
 * Builds the argument list for a stream-copy remux.
 * `aac_adtstoasc` rewrites ADTS audio headers, which MP4-family containers reject.
 */
export function buildRemuxArgs(inputPath: string, outputPath: string): string[] {
  return [
    "-y",
    "-hide_banner",
    "-loglevel",
    "error",
    "-nostdin",
    "-i",
    inputPath,
    "-c",
    "copy",
    "-bsf:a",
    "aac_adtstoasc",
    outputPath,
  ];
}

function exitCodeOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "exitCode" in error) {
    return typeof error.exitCode === "number" ? error.exitCode : undefined;
  }
  return undefined;
}

/**
 * Copies the streams of `inputPath` into the container implied by
 * `outputPath`'s extension. No re-encoding.
 */
export async function remuxWithFfmpeg(
  inputPath: string,
  outputPath: string,
  ffmpegPath = "ffmpeg"
): Promise<FfmpegRunResult> {
  try {
    await execa(ffmpegPath, buildRemuxArgs(inputPath, outputPath));
    return { success: true };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, exitCode: exitCodeOf(error), error: `ffmpeg error: ${message}` };
  }
}
