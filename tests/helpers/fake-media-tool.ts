import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type {
  ConcatResult,
  MediaTool,
  ProbeResult,
} from "../../src/core/media-tool.js";

export const MERGED_NAME = /^\d{4}-\d{2}-\d{2}\.mp3$/;

/**
 * In-process stand-in for ffmpeg/ffprobe. Concat really joins the input
 * bytes so tests can inspect the output file.
 */
export class FakeMediaTool implements MediaTool {
  readonly concatCalls: Array<{ inputs: string[]; outputPath: string }> = [];
  readonly probed: string[] = [];

  constructor(
    private readonly options: {
      probe?: (filePath: string) => ProbeResult | Promise<ProbeResult>;
      concatOk?: boolean;
    } = {},
  ) {}

  async probe(filePath: string): Promise<ProbeResult> {
    this.probed.push(filePath);
    if (this.options.probe) {
      return this.options.probe(filePath);
    }
    return { durationSeconds: 3600, audioStreams: 1 };
  }

  async concat(
    inputs: readonly string[],
    outputPath: string,
  ): Promise<ConcatResult> {
    this.concatCalls.push({ inputs: [...inputs], outputPath });
    if (this.options.concatOk === false) {
      return { ok: false, stderr: "Invalid data found when processing input\n" };
    }
    const parts = await Promise.all(inputs.map((input) => readFile(input)));
    await writeFile(outputPath, Buffer.concat(parts));
    return { ok: true, stderr: "" };
  }

  async checkAvailable(): Promise<boolean> {
    return true;
  }
}

/**
 * Merged outputs report the combined length of `segments` hours.
 */
export function probeByName(segments: number, audioStreams = 1) {
  return (filePath: string): ProbeResult =>
    MERGED_NAME.test(path.basename(filePath))
      ? { durationSeconds: 3600 * segments, audioStreams }
      : { durationSeconds: 3600, audioStreams: 1 };
}
