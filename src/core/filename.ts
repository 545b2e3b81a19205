import type { SegmentSlot } from "./schedule.js";
import { dateParts, type IsoDate, pad2 } from "./time.js";

const CALLSIGN = /^[A-Z0-9]{2,12}$/;

/**
 * Remote name of one hourly file, e.g. `BSR-24-01-09-00-00.mp3`.
 */
export function buildSegmentFileName(callsign: string, slot: SegmentSlot): string {
  const { year, month, day } = dateParts(slot.date);
  const yy = pad2(year % 100);
  return `${callsign}-${yy}-${pad2(month)}-${pad2(day)}-${pad2(slot.hour)}-00.mp3`;
}

export function buildOutputFileName(airDate: IsoDate): string {
  return `${airDate}.mp3`;
}

/**
 * Returns the normalized callsign, or null when the value cannot be one.
 */
export function sanitizeCallsign(raw: string): string | null {
  const value = raw.trim().toUpperCase();
  return CALLSIGN.test(value) ? value : null;
}
