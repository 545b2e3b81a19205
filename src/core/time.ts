/**
 * Calendar date helpers. Dates travel as `YYYY-MM-DD` strings and all
 * arithmetic happens in UTC so the local zone never shifts a day.
 */
export type IsoDate = string;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 86_400_000;

export function parseIsoDate(text: string): IsoDate {
  const m = ISO_DATE.exec(text.trim());
  if (!m) {
    throw new RangeError(`Invalid date: ${text} (expected YYYY-MM-DD)`);
  }
  const [, y, mo, d] = m;
  const utc = new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d)));
  const normalized = formatUtc(utc);
  if (normalized !== `${y}-${mo}-${d}`) {
    throw new RangeError(`Invalid date: ${text} (no such calendar day)`);
  }
  return normalized;
}

export function dateParts(date: IsoDate): {
  year: number;
  month: number;
  day: number;
} {
  const utc = toUtc(date);
  return {
    year: utc.getUTCFullYear(),
    month: utc.getUTCMonth() + 1,
    day: utc.getUTCDate(),
  };
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return formatUtc(new Date(toUtc(date).getTime() + days * DAY_MS));
}

/**
 * 0 = Monday … 6 = Sunday.
 */
export function weekdayOf(date: IsoDate): number {
  return (toUtc(date).getUTCDay() + 6) % 7;
}

export function compareIsoDates(a: IsoDate, b: IsoDate): number {
  return toUtc(a).getTime() - toUtc(b).getTime();
}

export function todayIsoDate(now: Date = new Date()): IsoDate {
  const y = now.getFullYear().toString().padStart(4, "0");
  const m = (now.getMonth() + 1).toString().padStart(2, "0");
  const d = now.getDate().toString().padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

function toUtc(date: IsoDate): Date {
  const m = ISO_DATE.exec(date);
  if (!m) {
    throw new RangeError(`Invalid date: ${date} (expected YYYY-MM-DD)`);
  }
  return new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
}

function formatUtc(value: Date): IsoDate {
  const y = value.getUTCFullYear().toString().padStart(4, "0");
  return `${y}-${pad2(value.getUTCMonth() + 1)}-${pad2(value.getUTCDate())}`;
}
