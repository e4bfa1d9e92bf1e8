import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { HttpFetcher } from "../shared/http.js";
import type { RemuxOutcome, Remuxer } from "./remux.js";
import { planParts, runSegmentPipeline, type PipelineRequest } from "./segmentPipeline.js";
import { DownloadFailedError, PlaylistError, TransportError } from "./shared/errors.js";
import type { Broadcast, DownloadStage, StreamVariant } from "./shared/types.js";

const BASE = "https://cdn.example.com/vod/720p/";

const broadcast: Broadcast = {
  id: "b1",
  permlink: "runner+abc",
  title: "Night run",
  creatorName: "Runner",
  playbackUrl: "https://cdn.example.com/vod/master.m3u8",
};

const variant: StreamVariant = {
  index: 1,
  playlistUrl: `${BASE}index.m3u8`,
  qualityLabel: "720p",
  resolution: "1280x720",
};

const TS_PLAYLIST = [
  "#EXTM3U",
  "#EXT-X-TARGETDURATION:6",
  "#EXTINF:6.0,",
  "seg0.ts",
  "#EXTINF:6.0,",
  "seg1.ts",
  "#EXTINF:6.0,",
  "seg2.ts",
  "#EXT-X-ENDLIST",
].join("\n");

const TS_CONTENT: Record<string, string> = {
  [`${BASE}seg0.ts`]: "AAA",
  [`${BASE}seg1.ts`]: "BBB",
  [`${BASE}seg2.ts`]: "CCC",
};

interface StubOptions {
  playlist: string;
  content: Record<string, string>;
  /** Per-URL delay before the file is written */
  delays?: Record<string, number>;
  failOn?: string;
  /** URL whose part is written as a directory, so reading it back fails */
  unreadable?: string;
}

function stubFetcher(options: StubOptions) {
  let inFlight = 0;
  let maxInFlight = 0;

  const downloadToFile = vi.fn(async (url: string, destination: string) => {
    inFlight++;
    maxInFlight = Math.max(maxInFlight, inFlight);
    try {
      const delay = options.delays?.[url] ?? 0;
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
      if (url === options.failOn) {
        throw new TransportError(`GET ${url} returned HTTP 404`, { url, statusCode: 404 });
      }
      if (url === options.unreadable) {
        await mkdir(destination);
        return;
      }
      const body = options.content[url];
      if (body === undefined) {
        throw new Error(`unexpected URL ${url}`);
      }
      await writeFile(destination, body);
    } finally {
      inFlight--;
    }
  });

  const fetcher = {
    fetchText: vi.fn(async () => options.playlist),
    fetchBinary: vi.fn(async () => Buffer.alloc(0)),
    postJson: vi.fn(async () => "{}"),
    downloadToFile,
  } satisfies HttpFetcher;

  return { fetcher, maxInFlight: () => maxInFlight };
}

function stubRemuxer(outcome: RemuxOutcome, writeTarget?: string) {
  return {
    remux: vi.fn(async (_source: string, destination: string) => {
      if (writeTarget !== undefined) {
        await writeFile(destination, writeTarget);
      }
      return outcome;
    }),
  };
}

describe("planParts", () => {
  it("puts the init segment first and numbers the rest", () => {
    const parts = planParts({
      initUrl: `${BASE}init.mp4`,
      segmentUrls: [`${BASE}a.m4s`, `${BASE}b.m4s`],
    });

    expect(parts).toEqual([
      { url: `${BASE}init.mp4`, fileName: "00000_init.mp4" },
      { url: `${BASE}a.m4s`, fileName: "00001.ts" },
      { url: `${BASE}b.m4s`, fileName: "00002.ts" },
    ]);
  });

  it("starts at zero without an init segment", () => {
    expect(planParts({ segmentUrls: [`${BASE}a.ts`] })).toEqual([
      { url: `${BASE}a.ts`, fileName: "00000.ts" },
    ]);
  });
});

describe("runSegmentPipeline", () => {
  let outputDir: string;
  let scratchRoot: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), "pipeline-out-"));
    scratchRoot = await mkdtemp(join(tmpdir(), "pipeline-scratch-"));
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(outputDir, { recursive: true, force: true });
    await rm(scratchRoot, { recursive: true, force: true });
  });

  function request(overrides: Partial<PipelineRequest> = {}): PipelineRequest {
    return { broadcast, variant, outputDir, scratchRoot, ...overrides };
  }

  it("concatenates segments byte for byte in playlist order", async () => {
    const { fetcher } = stubFetcher({ playlist: TS_PLAYLIST, content: TS_CONTENT });
    const remuxer = stubRemuxer({ status: "ok" });

    const result = await runSegmentPipeline(request({ filename: "clip.ts" }), {
      fetcher,
      remuxer,
    });

    expect(result).toEqual({
      outputPath: join(outputDir, "clip.ts"),
      remux: "skipped",
      parts: 3,
    });
    expect(await readFile(result.outputPath, "utf-8")).toBe("AAABBBCCC");
    expect(fetcher.fetchText).toHaveBeenCalledWith(`${BASE}index.m3u8`);
    expect(remuxer.remux).not.toHaveBeenCalled();
  });

  it("writes the init segment first and skips the remux for fMP4", async () => {
    const playlist = [
      "#EXTM3U",
      '#EXT-X-MAP:URI="init.mp4"',
      "#EXTINF:4.0,",
      "s1.m4s",
      "#EXTINF:4.0,",
      "s2.m4s",
    ].join("\n");
    const { fetcher } = stubFetcher({
      playlist,
      content: {
        [`${BASE}init.mp4`]: "INIT",
        [`${BASE}s1.m4s`]: "S1",
        [`${BASE}s2.m4s`]: "S2",
      },
    });
    const remuxer = stubRemuxer({ status: "ok" });

    const result = await runSegmentPipeline(request(), { fetcher, remuxer });

    expect(result).toEqual({
      outputPath: join(outputDir, "Runner_Night-run_720p.mp4"),
      remux: "skipped",
      parts: 3,
    });
    expect(await readFile(result.outputPath, "utf-8")).toBe("INITS1S2");
    expect(remuxer.remux).not.toHaveBeenCalled();
  });

  it("rejects a playlist without parts before downloading anything", async () => {
    const { fetcher } = stubFetcher({ playlist: "#EXTM3U\n#EXT-X-ENDLIST", content: {} });

    const error = await runSegmentPipeline(request(), {
      fetcher,
      remuxer: stubRemuxer({ status: "ok" }),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PlaylistError);
    expect(error).toMatchObject({ errorCode: "NO_SEGMENTS" });
    expect(fetcher.downloadToFile).not.toHaveBeenCalled();
    expect(await readdir(scratchRoot)).toEqual([]);
    expect(await readdir(outputDir)).toEqual([]);
  });

  describe("init-only playlists", () => {
    const playlist = '#EXTM3U\n#EXT-X-MAP:URI="init.mp4"\n#EXT-X-ENDLIST';
    const content = { [`${BASE}init.mp4`]: "INIT" };

    it("are downloaded by default", async () => {
      const { fetcher } = stubFetcher({ playlist, content });

      const result = await runSegmentPipeline(request({ filename: "only-init.mp4" }), {
        fetcher,
        remuxer: stubRemuxer({ status: "ok" }),
      });

      expect(result.parts).toBe(1);
      expect(result.remux).toBe("skipped");
      expect(await readFile(result.outputPath, "utf-8")).toBe("INIT");
    });

    it("are rejected when disallowed", async () => {
      const { fetcher } = stubFetcher({ playlist, content });

      await expect(
        runSegmentPipeline(request({ allowInitOnlyPlaylist: false }), {
          fetcher,
          remuxer: stubRemuxer({ status: "ok" }),
        })
      ).rejects.toThrow("Media playlist contains an init segment but no media segments.");
      expect(fetcher.downloadToFile).not.toHaveBeenCalled();
    });
  });

  it("remuxes into the container and removes the intermediate file", async () => {
    const { fetcher } = stubFetcher({ playlist: TS_PLAYLIST, content: TS_CONTENT });
    const remuxer = stubRemuxer({ status: "ok" }, "REMUXED");
    const events: [number, number, DownloadStage][] = [];

    const result = await runSegmentPipeline(
      request({ filename: "clip", onProgress: (...event) => events.push(event) }),
      { fetcher, remuxer }
    );

    expect(result).toEqual({
      outputPath: join(outputDir, "clip.mp4"),
      remux: "succeeded",
      parts: 3,
    });
    expect(remuxer.remux).toHaveBeenCalledWith(
      join(outputDir, "clip.ts"),
      join(outputDir, "clip.mp4")
    );
    expect(await readFile(result.outputPath, "utf-8")).toBe("REMUXED");
    expect(existsSync(join(outputDir, "clip.ts"))).toBe(false);
    expect(events.slice(-2)).toEqual([
      [0, 1, "remux"],
      [1, 1, "remux"],
    ]);
  });

  it("keeps the transport stream when ffmpeg is unavailable", async () => {
    const { fetcher } = stubFetcher({ playlist: TS_PLAYLIST, content: TS_CONTENT });

    const result = await runSegmentPipeline(request({ filename: "clip.mkv" }), {
      fetcher,
      remuxer: stubRemuxer({ status: "unavailable" }),
    });

    expect(result).toEqual({
      outputPath: join(outputDir, "clip.ts"),
      remux: "unavailable",
      parts: 3,
    });
    expect(await readFile(result.outputPath, "utf-8")).toBe("AAABBBCCC");
    expect(await readdir(scratchRoot)).toEqual([]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("falls back to the transport stream and removes a partial target when the remux fails", async () => {
    const { fetcher } = stubFetcher({ playlist: TS_PLAYLIST, content: TS_CONTENT });
    const remuxer = stubRemuxer({ status: "failed", exitCode: 1, message: "bad input" }, "PART");

    const result = await runSegmentPipeline(request({ filename: "clip.mp4" }), {
      fetcher,
      remuxer,
    });

    expect(result).toEqual({
      outputPath: join(outputDir, "clip.ts"),
      remux: "failed",
      parts: 3,
    });
    expect(existsSync(join(outputDir, "clip.mp4"))).toBe(false);
    expect(await readFile(result.outputPath, "utf-8")).toBe("AAABBBCCC");
  });

  it("reports monotonic progress with a constant total per stage", async () => {
    const { fetcher } = stubFetcher({
      playlist: TS_PLAYLIST,
      content: TS_CONTENT,
      delays: { [`${BASE}seg0.ts`]: 20 },
    });
    const events: [number, number, DownloadStage][] = [];

    await runSegmentPipeline(
      request({
        filename: "clip.ts",
        concurrency: 3,
        onProgress: (...event) => events.push(event),
      }),
      { fetcher, remuxer: stubRemuxer({ status: "ok" }) }
    );

    expect(events).toEqual([
      [1, 3, "segments"],
      [2, 3, "segments"],
      [3, 3, "segments"],
      [1, 3, "merge"],
      [2, 3, "merge"],
      [3, 3, "merge"],
    ]);
  });

  it("keeps playlist order when parts finish out of order", async () => {
    const { fetcher, maxInFlight } = stubFetcher({
      playlist: TS_PLAYLIST,
      content: TS_CONTENT,
      delays: { [`${BASE}seg0.ts`]: 30, [`${BASE}seg1.ts`]: 10 },
    });

    const result = await runSegmentPipeline(request({ filename: "clip.ts", concurrency: 2 }), {
      fetcher,
      remuxer: stubRemuxer({ status: "ok" }),
    });

    expect(await readFile(result.outputPath, "utf-8")).toBe("AAABBBCCC");
    expect(maxInFlight()).toBe(2);
  });

  it("downloads strictly one part at a time with concurrency 1", async () => {
    const { fetcher, maxInFlight } = stubFetcher({
      playlist: TS_PLAYLIST,
      content: TS_CONTENT,
      delays: { [`${BASE}seg0.ts`]: 10 },
    });

    await runSegmentPipeline(request({ filename: "clip.ts", concurrency: 1 }), {
      fetcher,
      remuxer: stubRemuxer({ status: "ok" }),
    });

    expect(maxInFlight()).toBe(1);
    expect(fetcher.downloadToFile.mock.calls.map(([url]) => url)).toEqual([
      `${BASE}seg0.ts`,
      `${BASE}seg1.ts`,
      `${BASE}seg2.ts`,
    ]);
  });

  describe("cleanup on failure", () => {
    it("stops downloading and removes scratch files when a part fails", async () => {
      const urls = ["a", "b", "c", "d", "e", "f"].map((name) => `${BASE}${name}.ts`);
      const failing = `${BASE}b.ts`;
      const { fetcher } = stubFetcher({
        playlist: ["#EXTM3U", ...urls].join("\n"),
        content: Object.fromEntries(urls.map((url) => [url, "X"])),
        failOn: failing,
      });

      const error = await runSegmentPipeline(request({ filename: "clip.ts", concurrency: 1 }), {
        fetcher,
        remuxer: stubRemuxer({ status: "ok" }),
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ url: failing, statusCode: 404 });
      // the queue may already have started the part after the failing one
      expect(fetcher.downloadToFile.mock.calls.length).toBeLessThanOrEqual(3);
      expect(await readdir(scratchRoot)).toEqual([]);
      expect(await readdir(outputDir)).toEqual([]);
    });

    it("waits for in-flight parts before removing the scratch directory", async () => {
      const { fetcher } = stubFetcher({
        playlist: TS_PLAYLIST,
        content: TS_CONTENT,
        failOn: `${BASE}seg1.ts`,
        delays: { [`${BASE}seg0.ts`]: 30 },
      });

      await expect(
        runSegmentPipeline(request({ filename: "clip.ts", concurrency: 2 }), {
          fetcher,
          remuxer: stubRemuxer({ status: "ok" }),
        })
      ).rejects.toBeInstanceOf(TransportError);

      expect(await readdir(scratchRoot)).toEqual([]);
    });

    it("passes playlist fetch failures through without a scratch directory", async () => {
      const { fetcher } = stubFetcher({ playlist: TS_PLAYLIST, content: TS_CONTENT });
      const failure = new TransportError("GET failed after 5 attempt(s): fetch failed", {
        url: variant.playlistUrl,
        attempts: 5,
      });
      fetcher.fetchText.mockRejectedValueOnce(failure);

      await expect(
        runSegmentPipeline(request(), { fetcher, remuxer: stubRemuxer({ status: "ok" }) })
      ).rejects.toBe(failure);
      expect(await readdir(scratchRoot)).toEqual([]);
    });

    it("removes the partial output when merging fails", async () => {
      const { fetcher } = stubFetcher({
        playlist: TS_PLAYLIST,
        content: TS_CONTENT,
        unreadable: `${BASE}seg2.ts`,
      });

      const error = await runSegmentPipeline(request({ filename: "clip.ts" }), {
        fetcher,
        remuxer: stubRemuxer({ status: "ok" }),
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadFailedError);
      expect(error).toMatchObject({
        message: expect.stringMatching(/^Download failed in state Merging: EISDIR: .*read/),
      });
      expect(await readdir(scratchRoot)).toEqual([]);
      expect(await readdir(outputDir)).toEqual([]);
    });

    it("reports the merge failure when the partial output cannot be removed", async () => {
      const { fetcher } = stubFetcher({ playlist: TS_PLAYLIST, content: TS_CONTENT });
      await mkdir(join(outputDir, "clip.ts"));

      const error = await runSegmentPipeline(request({ filename: "clip.ts" }), {
        fetcher,
        remuxer: stubRemuxer({ status: "ok" }),
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadFailedError);
      expect(error).toMatchObject({
        message: expect.stringMatching(/^Download failed in state Merging: EISDIR: .*open/),
      });
      expect(await readdir(scratchRoot)).toEqual([]);
      expect((await stat(join(outputDir, "clip.ts"))).isDirectory()).toBe(true);
    });

    it("annotates unexpected failures with the stage they happened in", async () => {
      const { fetcher } = stubFetcher({ playlist: TS_PLAYLIST, content: TS_CONTENT });
      const remuxer: Remuxer = {
        remux: vi.fn(async () => {
          throw new Error("boom");
        }),
      };

      const error = await runSegmentPipeline(request({ filename: "clip.mp4" }), {
        fetcher,
        remuxer,
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadFailedError);
      expect(error).toMatchObject({
        message: "Download failed in state Concatenated: boom",
        errorCode: "DOWNLOAD_FAILED",
      });
      expect(await readdir(scratchRoot)).toEqual([]);
    });
  });
});
