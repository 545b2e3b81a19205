import path from "node:path";
import type { Station } from "./callsign.js";
import {
  type MergeResult,
  mergeSegments,
  removeIfEmpty,
} from "./concatenator.js";
import { buildOutputFileName } from "./filename.js";
import type { MediaTool } from "./media-tool.js";
import { applyResumeCutoff, type Occurrence } from "./schedule.js";
import {
  type DownloadResult,
  type FetchOptions,
  fetchSegment,
  PrimingLedger,
} from "./segment-fetcher.js";
import { type ArchiveSession, describeFailure } from "./session.js";
import type { IsoDate } from "./time.js";

export type OccurrenceStatus = "complete" | "partial" | "failed";

export interface OccurrenceResult {
  airDate: IsoDate;
  downloads: DownloadResult[];
  mergedOutputPath: string | null;
  verified: boolean;
  merge: MergeResult | null;
  status: OccurrenceStatus;
}

export interface BatchOptions {
  session: ArchiveSession;
  station: Station;
  baseUrl: string;
  outputDir: string;
  tool: MediaTool;
  startDate?: IsoDate;
  fetch?: Omit<FetchOptions, "baseUrl" | "tempDir" | "tool" | "ledger">;
  maxDurationSeconds?: number;
  onOccurrenceStart?: (occurrence: Occurrence) => void;
  onSegment?: (result: DownloadResult, done: number, total: number) => void;
  onOccurrence?: (result: OccurrenceResult) => void;
  onWarning?: (message: string) => void;
}

export function tempDirFor(outputDir: string, airDate: IsoDate): string {
  return path.join(outputDir, "tmp", airDate);
}

/**
 * Works through the airings one at a time. Within an airing the segments
 * are fetched in playback order, which is also the merge order.
 */
export async function runBatch(
  occurrences: readonly Occurrence[],
  options: BatchOptions,
): Promise<OccurrenceResult[]> {
  const ledger = new PrimingLedger();
  const results: OccurrenceResult[] = [];

  for (const occurrence of applyResumeCutoff(occurrences, options.startDate)) {
    options.onOccurrenceStart?.(occurrence);
    const tempDir = tempDirFor(options.outputDir, occurrence.airDate);
    const downloads: DownloadResult[] = [];

    for (const slot of occurrence.slots) {
      const result = await fetchSegment(
        options.session,
        { slot, station: options.station },
        {
          ...options.fetch,
          baseUrl: options.baseUrl,
          tempDir,
          tool: options.tool,
          ledger,
        },
      );
      downloads.push(result);
      options.onSegment?.(result, downloads.length, occurrence.slots.length);
    }

    const result = await finishOccurrence(occurrence.airDate, downloads, {
      ...options,
      tempDir,
    });
    results.push(result);
    options.onOccurrence?.(result);
  }

  const tmpRoot = path.join(options.outputDir, "tmp");
  try {
    await removeIfEmpty(tmpRoot);
  } catch (error) {
    options.onWarning?.(`could not remove ${tmpRoot}: ${describeFailure(error)}`);
  }
  return results;
}

async function finishOccurrence(
  airDate: IsoDate,
  downloads: DownloadResult[],
  options: BatchOptions & { tempDir: string },
): Promise<OccurrenceResult> {
  const succeeded = downloads.filter((d) => d.success);
  const paths = succeeded.flatMap((d) => (d.localPath ? [d.localPath] : []));
  if (paths.length === 0) {
    return {
      airDate,
      downloads,
      mergedOutputPath: null,
      verified: false,
      merge: null,
      status: "failed",
    };
  }

  const merge = await mergeSegments(
    options.tool,
    paths,
    path.join(options.outputDir, buildOutputFileName(airDate)),
    {
      maxDurationSeconds: options.maxDurationSeconds,
      expectedDurationSeconds: succeeded.reduce(
        (sum, d) => sum + (d.durationSeconds ?? 0),
        0,
      ),
      tempDir: options.tempDir,
    },
  );
  const complete = merge.verified && succeeded.length === downloads.length;
  return {
    airDate,
    downloads,
    mergedOutputPath: merge.success ? merge.outputPath : null,
    verified: merge.verified,
    merge,
    status: !merge.success ? "failed" : complete ? "complete" : "partial",
  };
}

export interface BatchSummary {
  complete: number;
  partial: number;
  failed: number;
  segmentsAttempted: number;
  segmentsSucceeded: number;
}

export function summarizeBatch(results: readonly OccurrenceResult[]): BatchSummary {
  const summary: BatchSummary = {
    complete: 0,
    partial: 0,
    failed: 0,
    segmentsAttempted: 0,
    segmentsSucceeded: 0,
  };
  for (const result of results) {
    summary[result.status] += 1;
    summary.segmentsAttempted += result.downloads.length;
    summary.segmentsSucceeded += result.downloads.filter((d) => d.success).length;
  }
  return summary;
}

/**
 * One line per airing, e.g.
 * `2024-01-08: 2/3 segments, missing 00:00 (PrimingFailed), merged (verified)`.
 */
export function describeOccurrence(result: OccurrenceResult): string {
  const ok = result.downloads.filter((d) => d.success).length;
  const parts = [`${result.airDate}: ${ok}/${result.downloads.length} segments`];
  const missing = result.downloads
    .filter((d) => !d.success)
    .map(
      (d) =>
        `${d.target.slot.hour.toString().padStart(2, "0")}:00 (${d.errorKind ?? "unknown"})`,
    );
  if (missing.length > 0) {
    parts.push(`missing ${missing.join(", ")}`);
  }
  if (!result.merge) {
    parts.push("not merged");
  } else if (!result.merge.success) {
    parts.push("merge failed");
  } else {
    parts.push(result.verified ? "merged (verified)" : "merged (unverified)");
  }
  return parts.join(", ");
}
