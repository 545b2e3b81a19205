import { describe, expect, it } from "vitest";
import {
  applyResumeCutoff,
  expandRule,
  expandSchedule,
  type ShowRule,
} from "../src/core/schedule.js";
import { weekdayOf } from "../src/core/time.js";

const MONDAYS: ShowRule = {
  start: "2024-01-01",
  end: "2024-01-31",
  weekday: 0,
  hours: [22, 23, 0],
};

describe("expandRule", () => {
  it("rolls hour 0 over to the next calendar day", () => {
    const occurrences = expandRule(MONDAYS);
    const jan8 = occurrences.find((o) => o.airDate === "2024-01-08");
    expect(jan8?.slots).toEqual([
      { date: "2024-01-08", hour: 22 },
      { date: "2024-01-08", hour: 23 },
      { date: "2024-01-09", hour: 0 },
    ]);
  });

  it("keeps every air date inside the range and on the weekday", () => {
    const occurrences = expandRule(MONDAYS);
    expect(occurrences.map((o) => o.airDate)).toEqual([
      "2024-01-01",
      "2024-01-08",
      "2024-01-15",
      "2024-01-22",
      "2024-01-29",
    ]);
    for (const o of occurrences) {
      expect(weekdayOf(o.airDate)).toBe(0);
    }
  });

  it("includes a matching end date", () => {
    const occurrences = expandRule({
      start: "2024-01-02",
      end: "2024-01-08",
      weekday: 0,
      hours: [9],
    });
    expect(occurrences).toEqual([
      { airDate: "2024-01-08", slots: [{ date: "2024-01-08", hour: 9 }] },
    ]);
  });

  it("yields nothing for empty hours or a range without the weekday", () => {
    expect(expandRule({ ...MONDAYS, hours: [] })).toEqual([]);
    expect(
      expandRule({ start: "2024-01-02", end: "2024-01-05", weekday: 0, hours: [1] }),
    ).toEqual([]);
  });

  it("rejects inverted ranges and out-of-range values", () => {
    expect(() => expandRule({ ...MONDAYS, start: "2024-02-01" })).toThrow(
      RangeError,
    );
    expect(() => expandRule({ ...MONDAYS, weekday: 7 })).toThrow("Weekday");
    expect(() => expandRule({ ...MONDAYS, hours: [24] })).toThrow("Hour");
  });
});

describe("expandSchedule", () => {
  const WEDNESDAYS: ShowRule = {
    start: "2024-01-01",
    end: "2024-01-14",
    weekday: 2,
    hours: [20],
  };

  it("merges rules by air date", () => {
    const dates = expandSchedule([MONDAYS, WEDNESDAYS]).map((o) => o.airDate);
    expect(dates).toEqual([
      "2024-01-01",
      "2024-01-03",
      "2024-01-08",
      "2024-01-10",
      "2024-01-15",
      "2024-01-22",
      "2024-01-29",
    ]);
  });

  it("keeps rule order for airings on the same date", () => {
    const late = { start: "2024-01-01", end: "2024-01-07", weekday: 0, hours: [22] };
    const early = { ...late, hours: [10] };
    const occurrences = expandSchedule([late, early]);
    expect(occurrences.map((o) => o.slots[0].hour)).toEqual([22, 10]);
  });

  it("drops airings before the resume date", () => {
    const all = expandSchedule([MONDAYS, WEDNESDAYS]);
    const resumed = expandSchedule([MONDAYS, WEDNESDAYS], "2024-01-10");
    expect(resumed.map((o) => o.airDate)).toEqual([
      "2024-01-10",
      "2024-01-15",
      "2024-01-22",
      "2024-01-29",
    ]);
    expect(resumed).toEqual(all.filter((o) => o.airDate >= "2024-01-10"));
  });

  it("is deterministic", () => {
    expect(expandSchedule([MONDAYS, WEDNESDAYS], "2024-01-05")).toEqual(
      expandSchedule([MONDAYS, WEDNESDAYS], "2024-01-05"),
    );
  });
});

describe("applyResumeCutoff", () => {
  it("returns a copy when no cutoff is given", () => {
    const all = expandRule(MONDAYS);
    const copy = applyResumeCutoff(all);
    expect(copy).toEqual(all);
    expect(copy).not.toBe(all);
  });
});
