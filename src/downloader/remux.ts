import { extname } from "node:path";
import { checkFfmpeg, remuxWithFfmpeg } from "./shared/ffmpeg.js";

/**
 * Containers that cannot hold raw MPEG-TS and need a remux.
 */
export const REMUX_EXTENSIONS: ReadonlySet<string> = new Set([".mp4", ".m4v", ".mov", ".mkv"]);

export type RemuxOutcome =
  | { status: "ok" }
  | { status: "unavailable" }
  | { status: "failed"; exitCode?: number | undefined; message: string };

/**
 * Converts a transport stream into another container.
 * Never throws for tool failures; the outcome says what happened.
 */
export interface Remuxer {
  remux(source: string, destination: string): Promise<RemuxOutcome>;
}

/**
 * Whether a concatenated download written to `outputPath` has to be remuxed.
 * fMP4 downloads (those with an init segment) are already in their container.
 */
export function needsRemux(outputPath: string, hasInitSegment: boolean): boolean {
  return !hasInitSegment && REMUX_EXTENSIONS.has(extname(outputPath).toLowerCase());
}

/**
 * Intermediate transport stream path: the final path with a `.ts` extension.
 */
export function intermediatePath(outputPath: string): string {
  const extension = extname(outputPath);
  return `${outputPath.slice(0, outputPath.length - extension.length)}.ts`;
}

/**
 * Remuxer backed by the ffmpeg executable.
 */
export class FfmpegRemuxer implements Remuxer {
  constructor(private readonly ffmpegPath = "ffmpeg") {}

  async remux(source: string, destination: string): Promise<RemuxOutcome> {
    if (!(await checkFfmpeg(this.ffmpegPath))) {
      return { status: "unavailable" };
    }

    const result = await remuxWithFfmpeg(source, destination, this.ffmpegPath);
    if (result.success) {
      return { status: "ok" };
    }
    return { status: "failed", exitCode: result.exitCode, message: result.error };
  }
}
