import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import {
  broadcastUrl,
  describeBroadcast,
  formatTimestamp,
  parseConcurrency,
  parsePositiveInt,
} from "./common.js";

describe("parsePositiveInt", () => {
  it("accepts positive integers", () => {
    expect(parsePositiveInt("3")).toBe(3);
  });

  it.each(["0", "-2", "1.5", "abc", ""])("rejects %j", (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe("parseConcurrency", () => {
  it("caps the worker count", () => {
    expect(parseConcurrency("8")).toBe(8);
    expect(() => parseConcurrency("9")).toThrow("Expected at most 8.");
  });
});

describe("formatTimestamp", () => {
  it("prints minutes in UTC", () => {
    expect(formatTimestamp(1_700_000_000_000)).toBe("2023-11-14 22:13 UTC");
  });
});

describe("describeBroadcast", () => {
  it("lists the known fields", () => {
    expect(
      describeBroadcast({
        id: "b1",
        permlink: "runner+abc",
        title: "Night run",
        creatorName: "Runner",
        playbackUrl: "https://cdn.example.com/vod/master.m3u8",
        createdAtMs: 1_700_000_000_000,
        durationSeconds: 3725,
      })
    ).toEqual([
      "Creator:  Runner",
      "Duration: 01:02:05",
      "Created:  2023-11-14 22:13 UTC",
      "URL:      https://dlive.tv/p/runner+abc",
    ]);
  });

  it("skips unknown duration and date", () => {
    expect(
      describeBroadcast({
        id: "b1",
        permlink: "runner+abc",
        title: "Night run",
        creatorName: "Runner",
        playbackUrl: "https://cdn.example.com/vod/master.m3u8",
      })
    ).toEqual(["Creator:  Runner", `URL:      ${broadcastUrl("runner+abc")}`]);
  });
});
