import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Station } from "./callsign.js";
import { HttpError, type SegmentErrorKind } from "./errors.js";
import { buildSegmentFileName } from "./filename.js";
import { retryOperation } from "./http.js";
import { buildIndexUrl, buildMediaReferer, buildMediaUrl } from "./link.js";
import type { MediaTool, ProbeResult } from "./media-tool.js";
import type { SegmentSlot } from "./schedule.js";
import { type ArchiveSession, describeFailure } from "./session.js";
import type { IsoDate } from "./time.js";

export interface SegmentTarget {
  slot: SegmentSlot;
  station: Station;
}

export interface SegmentUrls {
  fileName: string;
  indexUrl: string;
  mediaUrl: string;
  referer: string;
}

export function segmentUrls(baseUrl: string, target: SegmentTarget): SegmentUrls {
  const { slot, station } = target;
  const fileName = buildSegmentFileName(station.callsign, slot);
  return {
    fileName,
    indexUrl: buildIndexUrl(baseUrl, { code: station.code, date: slot.date }),
    mediaUrl: buildMediaUrl(baseUrl, fileName),
    referer: buildMediaReferer(baseUrl, station.code, slot),
  };
}

export type PrimingState = "unprimed" | "primed" | "fetched";

/**
 * Per-date record of the archive's priming precondition: media for a date
 * may only be fetched while that date is primed.
 */
export class PrimingLedger {
  private readonly states = new Map<IsoDate, PrimingState>();
  readonly history: Array<{ date: IsoDate; state: PrimingState }> = [];

  stateOf(date: IsoDate): PrimingState {
    return this.states.get(date) ?? "unprimed";
  }

  markPrimed(date: IsoDate): void {
    this.transition(date, "primed");
  }

  markFetched(date: IsoDate): void {
    if (this.stateOf(date) !== "primed") {
      throw new Error(`Media for ${date} fetched while ${this.stateOf(date)}`);
    }
    this.transition(date, "fetched");
  }

  private transition(date: IsoDate, state: PrimingState): void {
    this.states.set(date, state);
    this.history.push({ date, state });
  }
}

export interface DownloadResult {
  target: SegmentTarget;
  localPath: string | null;
  success: boolean;
  errorKind: SegmentErrorKind | null;
  message: string | null;
  durationSeconds: number | null;
}

export interface FetchSettings {
  primeAttempts: number;
  mediaAttempts: number;
  retryDelayMs: number;
  primeTimeoutMs: number;
  mediaTimeoutMs: number;
  /** Bodies smaller than this are what the archive sends for unprimed dates. */
  minSegmentBytes: number;
  keepFailedSegments: boolean;
}

export const DEFAULT_FETCH_SETTINGS: FetchSettings = {
  primeAttempts: 3,
  mediaAttempts: 3,
  retryDelayMs: 500,
  primeTimeoutMs: 30_000,
  mediaTimeoutMs: 60_000,
  minSegmentBytes: 1024,
  keepFailedSegments: true,
};

export interface FetchOptions extends Partial<FetchSettings> {
  baseUrl: string;
  tempDir: string;
  tool: MediaTool;
  ledger?: PrimingLedger;
  onRetry?: (stage: "prime" | "media", attempt: number, error: unknown) => void;
}

const AUDIO_CONTENT_TYPE = /^(audio\/|application\/octet-stream)/i;

/**
 * Primes the day's index page, downloads one hourly file and checks that
 * it decodes. Every failure comes back as a failed result.
 */
export async function fetchSegment(
  session: ArchiveSession,
  target: SegmentTarget,
  options: FetchOptions,
): Promise<DownloadResult> {
  const settings = resolveFetchSettings(options);
  const ledger = options.ledger ?? new PrimingLedger();
  const urls = segmentUrls(options.baseUrl, target);
  const date = target.slot.date;
  const fail = (
    errorKind: SegmentErrorKind,
    message: string,
    localPath: string | null = null,
  ): DownloadResult => ({
    target,
    localPath,
    success: false,
    errorKind,
    message,
    durationSeconds: null,
  });

  let bytes: Uint8Array | null = null;
  // One extra prime-and-fetch cycle when the first body looks unprimed.
  for (let cycle = 0; cycle < 2 && bytes === null; cycle += 1) {
    try {
      await primeIndex(session, urls.indexUrl, settings, options.onRetry);
    } catch (error) {
      return fail(
        "PrimingFailed",
        `priming ${urls.indexUrl} failed: ${describeFailure(error)}`,
      );
    }
    ledger.markPrimed(date);

    let body: Uint8Array;
    try {
      body = await downloadMedia(session, urls, settings, options.onRetry);
    } catch (error) {
      return fail("HttpError", `${urls.fileName}: ${describeFailure(error)}`);
    }
    ledger.markFetched(date);
    if (body.byteLength >= settings.minSegmentBytes) {
      bytes = body;
    }
  }
  if (bytes === null) {
    return fail(
      "EmptyResponse",
      `${urls.fileName} stayed under ${settings.minSegmentBytes} bytes after re-priming`,
    );
  }

  const localPath = path.join(options.tempDir, urls.fileName);
  try {
    await mkdir(options.tempDir, { recursive: true });
    await writeFile(localPath, bytes);
  } catch (error) {
    // A partial write may have left a file behind; it is never merged.
    return fail(
      "DecodeVerificationFailed",
      `${urls.fileName} could not be saved: ${describeFailure(error)}`,
    );
  }

  let probe: ProbeResult | null = null;
  let probeFailure = "no decodable audio";
  try {
    probe = await options.tool.probe(localPath);
  } catch (error) {
    probeFailure = describeFailure(error);
  }
  if (!probe || probe.durationSeconds <= 0 || probe.audioStreams < 1) {
    let kept = settings.keepFailedSegments;
    if (!kept) {
      try {
        await rm(localPath, { force: true });
      } catch (error) {
        kept = true;
        probeFailure += `; removing it failed: ${describeFailure(error)}`;
      }
    }
    return fail(
      "DecodeVerificationFailed",
      `${urls.fileName} failed verification: ${probeFailure}`,
      kept ? localPath : null,
    );
  }

  return {
    target,
    localPath,
    success: true,
    errorKind: null,
    message: null,
    durationSeconds: probe.durationSeconds,
  };
}

export function resolveFetchSettings(
  overrides: Partial<FetchSettings>,
): FetchSettings {
  const d = DEFAULT_FETCH_SETTINGS;
  return {
    primeAttempts: overrides.primeAttempts ?? d.primeAttempts,
    mediaAttempts: overrides.mediaAttempts ?? d.mediaAttempts,
    retryDelayMs: overrides.retryDelayMs ?? d.retryDelayMs,
    primeTimeoutMs: overrides.primeTimeoutMs ?? d.primeTimeoutMs,
    mediaTimeoutMs: overrides.mediaTimeoutMs ?? d.mediaTimeoutMs,
    minSegmentBytes: overrides.minSegmentBytes ?? d.minSegmentBytes,
    keepFailedSegments: overrides.keepFailedSegments ?? d.keepFailedSegments,
  };
}

async function primeIndex(
  session: ArchiveSession,
  indexUrl: string,
  settings: FetchSettings,
  onRetry: FetchOptions["onRetry"],
): Promise<void> {
  await retryOperation(
    async () => {
      const response = await session.get(indexUrl, {
        timeoutMs: settings.primeTimeoutMs,
      });
      // Only the side effect matters; the page itself is discarded.
      await response.body?.cancel();
      if (!response.ok) {
        throw new HttpError(
          `index page request failed: ${response.status}`,
          indexUrl,
          response.status,
        );
      }
    },
    {
      retries: Math.max(0, settings.primeAttempts - 1),
      delayMs: settings.retryDelayMs,
      onRetry: (error, attempt) => onRetry?.("prime", attempt, error),
    },
  );
}

async function downloadMedia(
  session: ArchiveSession,
  urls: SegmentUrls,
  settings: FetchSettings,
  onRetry: FetchOptions["onRetry"],
): Promise<Uint8Array> {
  return retryOperation(
    async () => {
      const response = await session.get(urls.mediaUrl, {
        headers: { Referer: urls.referer },
        timeoutMs: settings.mediaTimeoutMs,
      });
      if (!response.ok) {
        await response.body?.cancel();
        throw new HttpError(
          `media request failed: ${response.status}`,
          urls.mediaUrl,
          response.status,
        );
      }
      let body: Uint8Array;
      try {
        body = new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        throw new HttpError(
          `reading media body failed: ${describeFailure(error)}`,
          urls.mediaUrl,
          response.status,
          { cause: error },
        );
      }
      const contentType = response.headers.get("content-type") ?? "";
      // Blank unprimed replies carry no audio type; only judge real bodies.
      if (
        body.byteLength >= settings.minSegmentBytes &&
        contentType !== "" &&
        !AUDIO_CONTENT_TYPE.test(contentType)
      ) {
        throw new HttpError(
          `unexpected content type "${contentType}"`,
          urls.mediaUrl,
          response.status,
        );
      }
      return body;
    },
    {
      retries: Math.max(0, settings.mediaAttempts - 1),
      delayMs: settings.retryDelayMs,
      onRetry: (error, attempt) => onRetry?.("media", attempt, error),
    },
  );
}
