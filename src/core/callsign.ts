import * as cheerio from "cheerio";
import { CallsignUnresolvedError, HttpError } from "./errors.js";
import { sanitizeCallsign } from "./filename.js";
import { buildIndexUrl } from "./link.js";
import type { ArchiveSession } from "./session.js";
import type { IsoDate } from "./time.js";

export const DEFAULT_STATION_CODE = "0";

export interface Station {
  callsign: string;
  /** `c` value for priming and referer URLs. */
  code: string;
  /** `c` carried by the selector link the callsign came from; display only. */
  linkCode?: string;
}

export interface StationLink {
  callsign: string;
  linkCode: string;
}

export type CallsignOutcome =
  | { kind: "resolved"; station: Station }
  | { kind: "ambiguous"; candidates: Station[] }
  | { kind: "unresolved"; indexUrl: string; markup: string };

/**
 * Fetches one day's index page and works out which station the account
 * belongs to. Several candidates are handed back instead of guessed.
 */
export async function resolveCallsign(
  session: ArchiveSession,
  baseUrl: string,
  sampleDay: IsoDate,
  options: { timeoutMs?: number; stationCode?: string } = {},
): Promise<CallsignOutcome> {
  const indexUrl = buildIndexUrl(baseUrl, {
    code: DEFAULT_STATION_CODE,
    date: sampleDay,
  });
  const response = await session.get(indexUrl, {
    timeoutMs: options.timeoutMs,
  });
  if (!response.ok) {
    throw new HttpError(
      `index page request failed: ${response.status}`,
      indexUrl,
      response.status,
    );
  }
  return detectCallsign(await response.text(), indexUrl, options.stationCode);
}

/**
 * Every detected station is keyed by `stationCode`; a selector link's own
 * `c` only names which link matched.
 */
export function detectCallsign(
  markup: string,
  indexUrl: string,
  stationCode: string = DEFAULT_STATION_CODE,
): CallsignOutcome {
  const stations = findStationLinks(markup).map(
    (link): Station => ({ ...link, code: stationCode }),
  );
  if (stations.length === 1) {
    return { kind: "resolved", station: stations[0] };
  }
  if (stations.length > 1) {
    return { kind: "ambiguous", candidates: stations };
  }
  const fromTable = findGroupCallsign(markup);
  if (fromTable) {
    return {
      kind: "resolved",
      station: { callsign: fromTable, code: stationCode },
    };
  }
  return { kind: "unresolved", indexUrl, markup };
}

export function requireStation(outcome: CallsignOutcome): Station {
  switch (outcome.kind) {
    case "resolved":
      return outcome.station;
    case "ambiguous":
      throw new CallsignUnresolvedError(
        `Several stations found (${outcome.candidates
          .map((s) => s.callsign)
          .join(", ")}); pick one with --callsign.`,
      );
    case "unresolved":
      throw new CallsignUnresolvedError(
        "Could not detect the station callsign; pass it with --callsign.",
        outcome.indexUrl,
        outcome.markup,
      );
  }
}

/**
 * Station selector links look like
 * `index.php?d=08&m=01&y=2024&c=3` with the callsign as link text.
 */
export function findStationLinks(html: string): StationLink[] {
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  const stations: StationLink[] = [];

  $("a[href]").each((_, el) => {
    const linkCode = stationCodeFromHref($(el).attr("href"));
    if (linkCode === null) {
      return;
    }
    const callsign = sanitizeCallsign($(el).text());
    if (!callsign || seen.has(callsign)) {
      return;
    }
    seen.add(callsign);
    stations.push({ callsign, linkCode });
  });
  return stations;
}

/**
 * Reads the "Group" column of the first table's first data row.
 */
export function findGroupCallsign(html: string): string | null {
  const $ = cheerio.load(html);
  const table = $("table").first();
  if (table.length === 0) {
    return null;
  }

  let column = 0;
  const headerRow = table
    .find("tr")
    .filter((_, tr) => $(tr).find("th").length > 0)
    .first();
  headerRow.find("th, td").each((index, cell) => {
    if ($(cell).text().trim().toLowerCase() === "group") {
      column = index;
      return false;
    }
    return undefined;
  });

  const dataRow = table
    .find("tr")
    .filter(
      (_, tr) => $(tr).find("th").length === 0 && $(tr).find("td").length > 0,
    )
    .first();
  const cell = dataRow.find("td").eq(column);
  if (cell.length === 0) {
    return null;
  }
  return sanitizeCallsign(cell.text());
}

function stationCodeFromHref(href: string | undefined): string | null {
  if (!href) {
    return null;
  }
  let url: URL;
  try {
    url = new URL(href, "http://archive.invalid/");
  } catch {
    return null;
  }
  if (!url.pathname.toLowerCase().endsWith("index.php")) {
    return null;
  }
  const params = url.searchParams;
  const code = params.get("c");
  if (!code || !/^\d+$/.test(code)) {
    return null;
  }
  if (!params.has("d") || !params.has("m") || !params.has("y")) {
    return null;
  }
  return code;
}
