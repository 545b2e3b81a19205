import { mkdir, readdir, rm, rmdir } from "node:fs/promises";
import path from "node:path";
import type { ConcatResult, MediaTool } from "./media-tool.js";
import { describeFailure } from "./session.js";

export interface MergeOptions {
  /** ffmpeg `-t` cap on the merged output. */
  maxDurationSeconds?: number;
  /** Sum of the input durations, when known. */
  expectedDurationSeconds?: number;
  /** Removed after a verified merge if nothing else is left inside. */
  tempDir?: string;
}

export interface MergeResult {
  success: boolean;
  verified: boolean;
  outputPath: string;
  durationSeconds: number | null;
  message: string | null;
}

export const DEFAULT_MAX_DURATION_SECONDS = 9000;
// The merged file may come out slightly shorter than its parts.
const DURATION_TOLERANCE = 0.9;

/**
 * Joins the segments in the given order and verifies the result with a
 * separate probe. Segment files are only deleted once that probe passes.
 */
export async function mergeSegments(
  tool: MediaTool,
  segmentPaths: readonly string[],
  outputPath: string,
  options: MergeOptions = {},
): Promise<MergeResult> {
  const maxDurationSeconds =
    options.maxDurationSeconds ?? DEFAULT_MAX_DURATION_SECONDS;
  if (segmentPaths.length === 0) {
    return {
      success: false,
      verified: false,
      outputPath,
      durationSeconds: null,
      message: "nothing to merge",
    };
  }

  let concat: ConcatResult;
  try {
    await mkdir(path.dirname(outputPath), { recursive: true });
    concat = await tool.concat(segmentPaths, outputPath, {
      maxDurationSeconds,
    });
  } catch (error) {
    concat = { ok: false, stderr: describeFailure(error) };
  }
  if (!concat.ok) {
    return {
      success: false,
      verified: false,
      outputPath,
      durationSeconds: null,
      message: `merge failed: ${concat.stderr.trim() || "ffmpeg exited with an error"}`,
    };
  }

  const expected =
    options.expectedDurationSeconds !== undefined
      ? Math.min(options.expectedDurationSeconds, maxDurationSeconds)
      : undefined;
  let durationSeconds: number | null = null;
  let problem: string | null = null;
  try {
    const probe = await tool.probe(outputPath);
    durationSeconds = probe.durationSeconds;
    problem = checkMergedOutput(
      probe.durationSeconds,
      probe.audioStreams,
      expected,
    );
  } catch (error) {
    problem = `probe failed: ${describeFailure(error)}`;
  }

  if (problem !== null) {
    return {
      success: true,
      verified: false,
      outputPath,
      durationSeconds,
      message: `verification failed: ${problem}`,
    };
  }

  let message: string | null = null;
  try {
    await Promise.all(segmentPaths.map((p) => rm(p, { force: true })));
    if (options.tempDir) {
      await removeIfEmpty(options.tempDir);
    }
  } catch (error) {
    message = `segment cleanup failed: ${describeFailure(error)}`;
  }
  return {
    success: true,
    verified: true,
    outputPath,
    durationSeconds,
    message,
  };
}

export function checkMergedOutput(
  durationSeconds: number,
  audioStreams: number,
  expectedDurationSeconds?: number,
): string | null {
  if (audioStreams < 1) {
    return "no audio stream";
  }
  if (durationSeconds <= 0) {
    return "zero duration";
  }
  if (
    expectedDurationSeconds !== undefined &&
    durationSeconds < expectedDurationSeconds * DURATION_TOLERANCE
  ) {
    return `duration ${durationSeconds.toFixed(1)}s is short of the expected ${expectedDurationSeconds.toFixed(1)}s`;
  }
  return null;
}

export async function removeIfEmpty(dir: string): Promise<void> {
  const entries = await readdir(dir).catch((error: unknown) => {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  });
  if (entries !== null && entries.length === 0) {
    await rmdir(dir);
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}
