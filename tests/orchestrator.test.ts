import { existsSync } from "node:fs";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  type BatchOptions,
  describeOccurrence,
  runBatch,
  summarizeBatch,
} from "../src/core/orchestrator.js";
import { expandSchedule, type ShowRule } from "../src/core/schedule.js";
import { ArchiveSession } from "../src/core/session.js";
import { FakeMediaTool, probeByName } from "./helpers/fake-media-tool.js";
import { htmlResponse, installFakeArchive } from "./helpers/fake-archive.js";

const BASE = "https://archive.example.org/index.php";
const RULE: ShowRule = {
  start: "2024-01-08",
  end: "2024-01-15",
  weekday: 0,
  hours: [22, 23, 0],
};

let outputDir: string;

beforeEach(async () => {
  outputDir = await mkdtemp(path.join(os.tmpdir(), "archive-shows-batch-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(outputDir, { recursive: true, force: true });
});

function batch(tool: FakeMediaTool, extra: Partial<BatchOptions> = {}): BatchOptions {
  return {
    session: new ArchiveSession(),
    station: { callsign: "BSR", code: "3" },
    baseUrl: BASE,
    outputDir,
    tool,
    fetch: { retryDelayMs: 0 },
    ...extra,
  };
}

function failDays(days: string[]) {
  return (url: URL) =>
    days.includes(url.searchParams.get("d") ?? "")
      ? htmlResponse("", 500)
      : htmlResponse("<p>index</p>");
}

describe("runBatch", () => {
  it("merges the segments that made it when one hour fails", async () => {
    installFakeArchive({ index: failDays(["09"]) });
    const tool = new FakeMediaTool({ probe: probeByName(2) });
    const occurrences = expandSchedule([{ ...RULE, end: "2024-01-08" }]);

    const [result] = await runBatch(occurrences, batch(tool));

    expect(result.downloads.map((d) => d.success)).toEqual([true, true, false]);
    expect(result.downloads[2].errorKind).toBe("PrimingFailed");
    expect(tool.concatCalls[0].inputs.map((p) => path.basename(p))).toEqual([
      "BSR-24-01-08-22-00.mp3",
      "BSR-24-01-08-23-00.mp3",
    ]);
    expect(result.mergedOutputPath).toBe(path.join(outputDir, "2024-01-08.mp3"));
    expect(result.verified).toBe(true);
    expect(result.status).toBe("partial");
    expect(existsSync(path.join(outputDir, "tmp"))).toBe(false);
    expect(describeOccurrence(result)).toBe(
      "2024-01-08: 2/3 segments, missing 00:00 (PrimingFailed), merged (verified)",
    );
  });

  it("skips the merge for an airing with no segments and carries on", async () => {
    installFakeArchive({ index: failDays(["08", "09"]) });
    const tool = new FakeMediaTool({ probe: probeByName(3) });

    const results = await runBatch(expandSchedule([RULE]), batch(tool));

    expect(results.map((r) => [r.airDate, r.status])).toEqual([
      ["2024-01-08", "failed"],
      ["2024-01-15", "complete"],
    ]);
    expect(results[0].mergedOutputPath).toBeNull();
    expect(results[0].merge).toBeNull();
    expect(results[0].downloads.filter((d) => d.success)).toHaveLength(0);
    expect(tool.concatCalls).toHaveLength(1);
    expect(tool.concatCalls[0].outputPath).toBe(
      path.join(outputDir, "2024-01-15.mp3"),
    );
    expect(summarizeBatch(results)).toEqual({
      complete: 1,
      partial: 0,
      failed: 1,
      segmentsAttempted: 6,
      segmentsSucceeded: 3,
    });
  });

  it("carries on when an airing's segments cannot be saved", async () => {
    installFakeArchive();
    const tool = new FakeMediaTool({ probe: probeByName(3) });
    await mkdir(path.join(outputDir, "tmp"));
    await writeFile(path.join(outputDir, "tmp", "2024-01-08"), "in the way");

    const results = await runBatch(expandSchedule([RULE]), batch(tool));

    expect(results.map((r) => [r.airDate, r.status])).toEqual([
      ["2024-01-08", "failed"],
      ["2024-01-15", "complete"],
    ]);
    expect(results[0].downloads.map((d) => d.errorKind)).toEqual([
      "DecodeVerificationFailed",
      "DecodeVerificationFailed",
      "DecodeVerificationFailed",
    ]);
    expect(results[0].merge).toBeNull();
    expect(existsSync(path.join(outputDir, "2024-01-15.mp3"))).toBe(true);
  });

  it("retains everything when the merged file fails verification", async () => {
    installFakeArchive();
    const tool = new FakeMediaTool({ probe: probeByName(3, 0) });
    const occurrences = expandSchedule([{ ...RULE, end: "2024-01-08" }]);

    const [result] = await runBatch(occurrences, batch(tool));

    expect(result.verified).toBe(false);
    expect(result.status).toBe("partial");
    expect(existsSync(path.join(outputDir, "2024-01-08.mp3"))).toBe(true);
    for (const download of result.downloads) {
      expect(download.localPath && existsSync(download.localPath)).toBe(true);
    }
  });

  it("primes each day before fetching its media, in playback order", async () => {
    const log = installFakeArchive();
    const tool = new FakeMediaTool({ probe: probeByName(3) });
    const occurrences = expandSchedule([{ ...RULE, end: "2024-01-08" }]);

    await runBatch(occurrences, batch(tool));

    expect(
      log.map((r) =>
        r.kind === "index"
          ? `index d=${r.url.searchParams.get("d")}`
          : `media ${r.url.searchParams.get("f")}`,
      ),
    ).toEqual([
      "index d=08",
      "media BSR-24-01-08-22-00.mp3",
      "index d=08",
      "media BSR-24-01-08-23-00.mp3",
      "index d=09",
      "media BSR-24-01-09-00-00.mp3",
    ]);
  });

  it("resumes from the start date", async () => {
    installFakeArchive();
    const tool = new FakeMediaTool({ probe: probeByName(3) });
    const onOccurrence = vi.fn();

    const results = await runBatch(
      expandSchedule([RULE]),
      batch(tool, { startDate: "2024-01-15", onOccurrence }),
    );

    expect(results.map((r) => r.airDate)).toEqual(["2024-01-15"]);
    expect(onOccurrence).toHaveBeenCalledTimes(1);
  });
});
