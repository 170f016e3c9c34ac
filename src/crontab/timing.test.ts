import { describe, it, expect } from "vitest";
import { formatTiming, nextFireTimes, normalizeTiming, toCronExpression, validateTiming } from "./timing.js";

describe("normalizeTiming", () => {
  it("defaults unspecified fields to every occurrence", () => {
    expect(normalizeTiming({ minute: "*/15" })).toEqual({
      kind: "fields",
      minute: "*/15",
      hour: "*",
      day: "*",
      month: "*",
      weekday: "*",
    });
  });

  it("trims fields and treats blank ones as unspecified", () => {
    const timing = normalizeTiming({ minute: " 06 ", hour: "" });
    expect(formatTiming(timing)).toBe("06 * * * *");
  });

  it("accepts special_time on its own", () => {
    expect(normalizeTiming({ special_time: "daily" })).toEqual({ kind: "special", special: "daily" });
  });

  it("rejects special_time combined with explicit fields", () => {
    expect(() => normalizeTiming({ special_time: "daily", hour: "3" })).toThrow(
      "special_time cannot be combined with hour",
    );
  });

  it("rejects unknown special_time", () => {
    expect(() => normalizeTiming({ special_time: "fortnightly" })).toThrow(/Unknown special_time "fortnightly"/);
  });

  it("rejects whitespace inside a field", () => {
    expect(() => normalizeTiming({ minute: "1 2" })).toThrow('minute must not contain whitespace: "1 2"');
  });
});

describe("formatTiming / toCronExpression", () => {
  it("formats special times with @", () => {
    expect(formatTiming({ kind: "special", special: "reboot" })).toBe("@reboot");
  });

  it("expands special times into five fields", () => {
    expect(toCronExpression({ kind: "special", special: "weekly" })).toBe("0 0 * * 0");
    expect(toCronExpression({ kind: "special", special: "reboot" })).toBeUndefined();
  });
});

describe("validateTiming", () => {
  it("accepts the shipped schedules", () => {
    for (const minute of ["30,04,19", "*/5", "*/15", "06", "23"]) {
      expect(validateTiming(normalizeTiming({ minute }))).toBeNull();
    }
  });

  it("reports an out-of-range minute", () => {
    expect(validateTiming(normalizeTiming({ minute: "75" }))).toEqual(expect.any(String));
  });

  it("accepts @reboot without consulting cron", () => {
    expect(validateTiming({ kind: "special", special: "reboot" })).toBeNull();
  });
});

describe("nextFireTimes", () => {
  const NOW = new Date("2026-01-05T10:07:00Z").getTime();

  it("fires */15 at minutes 0, 15, 30 and 45", () => {
    const runs = nextFireTimes(normalizeTiming({ minute: "*/15" }), NOW, 4, "UTC");
    expect(runs.map((ms) => new Date(ms).toISOString())).toEqual([
      "2026-01-05T10:15:00.000Z",
      "2026-01-05T10:30:00.000Z",
      "2026-01-05T10:45:00.000Z",
      "2026-01-05T11:00:00.000Z",
    ]);
  });

  it("fires a daily 23:23 job once per day", () => {
    const runs = nextFireTimes(normalizeTiming({ minute: "23", hour: "23" }), NOW, 2, "UTC");
    expect(runs.map((ms) => new Date(ms).toISOString())).toEqual([
      "2026-01-05T23:23:00.000Z",
      "2026-01-06T23:23:00.000Z",
    ]);
  });

  it("returns nothing for @reboot", () => {
    expect(nextFireTimes({ kind: "special", special: "reboot" }, NOW, 3, "UTC")).toEqual([]);
  });

  it("returns nothing for a zero count", () => {
    expect(nextFireTimes(normalizeTiming({}), NOW, 0, "UTC")).toEqual([]);
  });
});
