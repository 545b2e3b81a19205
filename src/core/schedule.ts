import {
  addDays,
  compareIsoDates,
  type IsoDate,
  weekdayOf,
} from "./time.js";

export interface ShowRule {
  start: IsoDate;
  end: IsoDate;
  /** 0 = Monday … 6 = Sunday */
  weekday: number;
  /** Playback order; hour 0 belongs to the following calendar day. */
  hours: number[];
}

export interface SegmentSlot {
  date: IsoDate;
  hour: number;
}

export interface Occurrence {
  airDate: IsoDate;
  slots: SegmentSlot[];
}

export function expandRule(rule: ShowRule): Occurrence[] {
  if (compareIsoDates(rule.start, rule.end) > 0) {
    throw new RangeError(`Rule starts after it ends: ${rule.start} > ${rule.end}`);
  }
  if (!Number.isInteger(rule.weekday) || rule.weekday < 0 || rule.weekday > 6) {
    throw new RangeError(`Weekday must be 0..6, got ${rule.weekday}`);
  }
  for (const hour of rule.hours) {
    if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
      throw new RangeError(`Hour must be 0..23, got ${hour}`);
    }
  }
  if (rule.hours.length === 0) {
    return [];
  }

  const occurrences: Occurrence[] = [];
  for (
    let cur = rule.start;
    compareIsoDates(cur, rule.end) <= 0;
    cur = addDays(cur, 1)
  ) {
    if (weekdayOf(cur) !== rule.weekday) {
      continue;
    }
    const airDate = cur;
    occurrences.push({
      airDate,
      slots: rule.hours.map((hour) => ({
        date: hour === 0 ? addDays(airDate, 1) : airDate,
        hour,
      })),
    });
  }
  return occurrences;
}

/**
 * Flattens all rules into one airing list ordered by air date. Rules that
 * land on the same date keep their configured order.
 */
export function expandSchedule(
  rules: readonly ShowRule[],
  resumeFrom?: IsoDate,
): Occurrence[] {
  const all = rules.flatMap((rule) => expandRule(rule));
  // Array.prototype.sort is stable, so rule order survives ties.
  all.sort((a, b) => compareIsoDates(a.airDate, b.airDate));
  return applyResumeCutoff(all, resumeFrom);
}

export function applyResumeCutoff(
  occurrences: readonly Occurrence[],
  cutoff?: IsoDate,
): Occurrence[] {
  if (!cutoff) {
    return [...occurrences];
  }
  return occurrences.filter((o) => compareIsoDates(o.airDate, cutoff) >= 0);
}
