import { rm, writeFile } from "node:fs/promises";
import { execa } from "execa";
import { z } from "zod";

export interface ProbeResult {
  durationSeconds: number;
  audioStreams: number;
}

export interface ConcatResult {
  ok: boolean;
  stderr: string;
}

/**
 * External audio tooling. Production runs ffmpeg/ffprobe; tests swap in a
 * fake.
 */
export interface MediaTool {
  /** Rejects when the file cannot be read as media at all. */
  probe(filePath: string): Promise<ProbeResult>;
  concat(
    inputs: readonly string[],
    outputPath: string,
    options: { maxDurationSeconds: number },
  ): Promise<ConcatResult>;
  checkAvailable(): Promise<boolean>;
}

const FfprobeOutputSchema = z.object({
  format: z.object({ duration: z.string().optional() }).optional(),
  streams: z.array(z.object({ codec_type: z.string().optional() })).optional(),
});

export class FfmpegTool implements MediaTool {
  constructor(
    private readonly ffmpegPath = "ffmpeg",
    private readonly ffprobePath = "ffprobe",
  ) {}

  async probe(filePath: string): Promise<ProbeResult> {
    const { stdout } = await execa(this.ffprobePath, [
      "-v",
      "error",
      "-show_entries",
      "format=duration:stream=codec_type",
      "-of",
      "json",
      filePath,
    ]);
    return parseProbeOutput(stdout);
  }

  async concat(
    inputs: readonly string[],
    outputPath: string,
    options: { maxDurationSeconds: number },
  ): Promise<ConcatResult> {
    const listPath = `${outputPath}.concat.txt`;
    await writeFile(listPath, buildConcatList(inputs), "utf-8");
    try {
      const result = await execa(
        this.ffmpegPath,
        [
          "-hide_banner",
          "-loglevel",
          "error",
          "-y",
          "-f",
          "concat",
          "-safe",
          "0",
          "-i",
          listPath,
          "-t",
          String(options.maxDurationSeconds),
          "-c",
          "copy",
          outputPath,
        ],
        { reject: false },
      );
      return { ok: !result.failed, stderr: result.stderr };
    } finally {
      await rm(listPath, { force: true });
    }
  }

  async checkAvailable(): Promise<boolean> {
    const checks = await Promise.all(
      [this.ffmpegPath, this.ffprobePath].map((bin) =>
        execa(bin, ["-version"], { reject: false }),
      ),
    );
    return checks.every((result) => !result.failed);
  }
}

export function parseProbeOutput(stdout: string): ProbeResult {
  const json = FfprobeOutputSchema.parse(JSON.parse(stdout));
  const duration = Number.parseFloat(json.format?.duration ?? "");
  return {
    durationSeconds: Number.isNaN(duration) ? 0 : duration,
    audioStreams: (json.streams ?? []).filter((s) => s.codec_type === "audio")
      .length,
  };
}

/**
 * Input file for ffmpeg's concat demuxer, one `file '…'` line per input.
 */
export function buildConcatList(inputs: readonly string[]): string {
  return inputs
    .map((input) => `file '${input.replace(/'/g, "'\\''")}'`)
    .join("\n");
}
