import { ConfigError } from "./errors.js";
import type { SegmentSlot } from "./schedule.js";
import { dateParts, type IsoDate, pad2 } from "./time.js";

const ENTRY_POINT = "index.php";

/**
 * Accepts what a user would paste (`archive.example.org/radio/`) and returns
 * the archive's `index.php` endpoint.
 */
export function normalizeBaseUrl(raw: string): string {
  let url = raw.trim();
  if (url === "") {
    throw new ConfigError("Archive base URL is empty.");
  }
  if (!/^https?:\/\//i.test(url)) {
    url = `https://${url}`;
  }
  if (!url.toLowerCase().endsWith(ENTRY_POINT)) {
    url = `${url.replace(/\/+$/, "")}/${ENTRY_POINT}`;
  }
  try {
    return new URL(url).toString();
  } catch {
    throw new ConfigError(`Archive base URL is not a valid URL: ${raw}`);
  }
}

export function buildLoginUrl(baseUrl: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set("pp", "1");
  return url.toString();
}

export function buildLandingUrl(baseUrl: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set("pc", "3");
  return url.toString();
}

/**
 * Day index page. Fetching it is what primes that day's media files.
 */
export function buildIndexUrl(
  baseUrl: string,
  input: { code: string; date: IsoDate },
): string {
  const { year, month, day } = dateParts(input.date);
  const url = new URL(baseUrl);
  url.searchParams.set("c", input.code);
  url.searchParams.set("d", pad2(day));
  url.searchParams.set("m", pad2(month));
  url.searchParams.set("y", String(year));
  return url.toString();
}

export function buildMediaReferer(
  baseUrl: string,
  code: string,
  slot: SegmentSlot,
): string {
  const url = new URL(buildIndexUrl(baseUrl, { code, date: slot.date }));
  url.searchParams.set("p", pad2(slot.hour));
  return url.toString();
}

export function buildMediaUrl(baseUrl: string, fileName: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set("f", fileName);
  url.searchParams.set("action", "10");
  return url.toString();
}

export function originOf(baseUrl: string): string {
  return new URL(baseUrl).origin;
}
