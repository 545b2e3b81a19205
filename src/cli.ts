#!/usr/bin/env node
import { mkdir, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { parseArgs, USAGE, type CliArgs } from "./cli/args.js";
import { type ConfigFile, loadConfig, toShowRules } from "./cli/config.js";
import { Logger } from "./cli/logger.js";
import { DownloadProgress } from "./cli/progress.js";
import { ask, askSecret, choose } from "./cli/prompt.js";
import {
  DEFAULT_STATION_CODE,
  requireStation,
  resolveCallsign,
  type Station,
} from "./core/callsign.js";
import { ConfigError } from "./core/errors.js";
import { sanitizeCallsign } from "./core/filename.js";
import { normalizeBaseUrl } from "./core/link.js";
import { FfmpegTool } from "./core/media-tool.js";
import {
  describeOccurrence,
  runBatch,
  summarizeBatch,
} from "./core/orchestrator.js";
import { expandSchedule } from "./core/schedule.js";
import { resolveFetchSettings } from "./core/segment-fetcher.js";
import { type ArchiveSession, authenticate } from "./core/session.js";
import { todayIsoDate } from "./core/time.js";

const VERSION = "1.2.0";
const INDEX_DUMP_PATH = path.resolve(".cache", "index-page.html");

async function main(): Promise<void> {
  const logger = new Logger();
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }
  logger.banner("archive-shows", VERSION);

  const config = await loadConfig(path.resolve(args.configPath));
  const rules = toShowRules(config);
  if (rules.length === 0) {
    throw new ConfigError(
      `No show schedules configured; add a \`schedules\` list to ${args.configPath}.`,
    );
  }

  const env = process.env;
  const baseUrl = normalizeBaseUrl(
    args.baseUrl ??
      env.ARCHIVE_BASE_URL ??
      config.baseUrl ??
      (await ask("Archive base URL: ")),
  );
  const outputDir = path.resolve(
    expandHome(args.outputDir ?? config.outputDir ?? "downloads"),
  );
  const username =
    args.username ??
    env.ARCHIVE_USERNAME ??
    config.username ??
    (await ask("Username: "));
  const password =
    args.password ?? env.ARCHIVE_PASSWORD ?? (await askSecret("Password: "));
  const settings = resolveFetchSettings(config.download);

  const tool = new FfmpegTool();
  if (!(await tool.checkAvailable())) {
    throw new ConfigError("ffmpeg and ffprobe must be installed and on PATH.");
  }
  await mkdir(outputDir, { recursive: true });

  const session = await authenticate(baseUrl, username, password, {
    timeoutMs: settings.primeTimeoutMs,
  });
  logger.success("Logged in");

  const station = await pickStation(args, config, session, baseUrl, logger, {
    timeoutMs: settings.primeTimeoutMs,
  });
  const occurrences = expandSchedule(rules, args.startDate);
  if (occurrences.length === 0) {
    logger.warn("No airings fall on or after the start date; nothing to do.");
    return;
  }
  logger.info(
    `Station ${station.callsign} (c=${station.code}): ${occurrences.length} airings from ${occurrences[0].airDate} into ${outputDir}`,
  );

  let progress: DownloadProgress | null = null;
  let retries = 0;
  const results = await runBatch(occurrences, {
    session,
    station,
    baseUrl,
    outputDir,
    tool,
    fetch: {
      ...settings,
      onRetry: () => {
        retries += 1;
      },
    },
    maxDurationSeconds: config.download.maxDurationSeconds,
    onOccurrenceStart: (occurrence) => {
      retries = 0;
      progress = new DownloadProgress(occurrence.airDate);
      progress.update(0, occurrence.slots.length, "priming");
    },
    onSegment: (result, done, total) => {
      progress?.update(done, total, result.success ? "" : "segment failed");
    },
    onOccurrence: (result) => {
      progress?.stop();
      const notes = result.downloads.flatMap((d) => (d.message ? [d.message] : []));
      if (result.merge?.message) {
        notes.push(result.merge.message);
      }
      if (retries > 0) {
        notes.push(`${retries} request(s) retried`);
      }
      logger.airing(result.status, describeOccurrence(result), notes);
    },
    onWarning: (message) => logger.warn(message),
  });

  const summary = summarizeBatch(results);
  logger.info(
    `Completed. merged=${summary.complete} partial=${summary.partial} failed=${summary.failed} segments=${summary.segmentsSucceeded}/${summary.segmentsAttempted}`,
  );
  if (summary.partial + summary.failed > 0) {
    logger.warn(
      `Segments of incomplete airings were kept under ${path.join(outputDir, "tmp")}.`,
    );
    process.exitCode = 2;
  }
}

async function pickStation(
  args: CliArgs,
  config: ConfigFile,
  session: ArchiveSession,
  baseUrl: string,
  logger: Logger,
  options: { timeoutMs: number },
): Promise<Station> {
  const code = args.callsignCode ?? config.callsignCode ?? DEFAULT_STATION_CODE;
  const explicit = args.callsign ?? config.callsign;
  if (explicit) {
    const callsign = sanitizeCallsign(explicit);
    if (!callsign) {
      throw new ConfigError(`Invalid station callsign: ${explicit}`);
    }
    return { callsign, code };
  }

  logger.info("No station callsign given; detecting it from the archive index.");
  const outcome = await resolveCallsign(session, baseUrl, todayIsoDate(), {
    ...options,
    stationCode: code,
  });
  switch (outcome.kind) {
    case "resolved":
      logger.success(`Detected station callsign: ${describeStation(outcome.station)}`);
      return outcome.station;
    case "ambiguous": {
      logger.warn("Multiple station callsigns detected:");
      const picked = await choose(
        "Enter the number of the callsign to use: ",
        outcome.candidates,
        describeStation,
      );
      return picked ?? requireStation(outcome);
    }
    case "unresolved": {
      await mkdir(path.dirname(INDEX_DUMP_PATH), { recursive: true });
      await writeFile(INDEX_DUMP_PATH, outcome.markup, "utf-8");
      logger.warn(`Could not detect the station callsign (page saved to ${INDEX_DUMP_PATH}).`);
      logger.detail(`You can find it in your browser at: ${outcome.indexUrl}`);
      const typed = sanitizeCallsign(await ask("Station callsign: "));
      return typed ? { callsign: typed, code } : requireStation(outcome);
    }
  }
}

function describeStation(station: Station): string {
  return station.linkCode !== undefined
    ? `${station.callsign} (selector link c=${station.linkCode})`
    : station.callsign;
}

function expandHome(dir: string): string {
  return dir === "~" || dir.startsWith("~/")
    ? path.join(homedir(), dir.slice(1))
    : dir;
}

main().catch((err) => {
  const logger = new Logger();
  logger.error(formatError(err));
  process.exitCode = 1;
});

function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const parts: string[] = [`${error.name}: ${error.message}`];
  let current: unknown = error.cause;
  for (let guard = 0; current !== undefined && guard < 4; guard += 1) {
    if (!(current instanceof Error)) {
      parts.push(`cause=${String(current)}`);
      break;
    }
    parts.push(`cause=${current.message}`);
    if ("code" in current && typeof current.code === "string") {
      parts.push(`code=${current.code}`);
    }
    current = current.cause;
  }
  return parts.join(" | ");
}
