import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";
import type { ShowRule } from "../core/schedule.js";
import { parseIsoDate } from "../core/time.js";

// Bare dates parse as strings under YAML 1.2 and as Date under 1.1.
const IsoDateSchema = z
  .union([z.string(), z.date()])
  .transform((value, ctx) => {
    const text =
      value instanceof Date ? value.toISOString().slice(0, 10) : value;
    try {
      return parseIsoDate(text);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }
  });

export const ShowRuleSchema = z
  .object({
    start: IsoDateSchema,
    end: IsoDateSchema,
    weekday: z.number().int().min(0).max(6).describe("0 = Monday … 6 = Sunday"),
    hours: z.array(z.number().int().min(0).max(23)),
  })
  // ISO dates order the same as strings.
  .refine((rule) => rule.start <= rule.end, {
    message: "start must not be after end",
  });

export const DownloadSettingsSchema = z.object({
  primeAttempts: z.number().int().positive().optional(),
  mediaAttempts: z.number().int().positive().optional(),
  retryDelayMs: z.number().nonnegative().optional(),
  primeTimeoutMs: z.number().positive().optional(),
  mediaTimeoutMs: z.number().positive().optional(),
  minSegmentBytes: z.number().int().nonnegative().optional(),
  maxDurationSeconds: z.number().positive().optional(),
  keepFailedSegments: z.boolean().optional(),
});

export const ConfigFileSchema = z.object({
  baseUrl: z.string().optional(),
  outputDir: z.string().optional(),
  username: z.string().optional(),
  callsign: z.string().optional(),
  callsignCode: z.union([z.string(), z.number()]).transform(String).optional(),
  schedules: z.array(ShowRuleSchema).default([]),
  download: DownloadSettingsSchema.default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type DownloadSettings = z.infer<typeof DownloadSettingsSchema>;

export async function loadConfig(filePath: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Cannot read config ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseConfig(raw, filePath);
}

export function parseConfig(raw: string, source = "config"): ConfigFile {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `${source} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`${source} is invalid: ${details}`);
  }
  return result.data;
}

export function toShowRules(config: ConfigFile): ShowRule[] {
  return config.schedules.map((rule) => ({
    start: rule.start,
    end: rule.end,
    weekday: rule.weekday,
    hours: [...rule.hours],
  }));
}
