/**
 * Cron time specifications: normalisation, validation and fire-time preview.
 */

import { Cron } from "croner";
import { SPECIAL_TIMES, type CronTiming, type SpecialTime } from "./types.js";

/** Time fields as they appear in a playbook `cron` task. */
export type TimingFields = {
  minute?: string;
  hour?: string;
  day?: string;
  month?: string;
  weekday?: string;
  special_time?: string;
};

const FIELD_NAMES = ["minute", "hour", "day", "month", "weekday"] as const;

const SPECIAL_EXPANSIONS: Record<Exclude<SpecialTime, "reboot">, string> = {
  yearly: "0 0 1 1 *",
  annually: "0 0 1 1 *",
  monthly: "0 0 1 * *",
  weekly: "0 0 * * 0",
  daily: "0 0 * * *",
  hourly: "0 * * * *",
};

export function isSpecialTime(value: string): value is SpecialTime {
  return (SPECIAL_TIMES as readonly string[]).includes(value);
}

/**
 * Build a timing from declared fields. Unspecified fields mean "every".
 * Throws if `special_time` is combined with explicit fields or is unknown.
 */
export function normalizeTiming(fields: TimingFields): CronTiming {
  const special = fields.special_time?.trim();
  if (special) {
    const explicit = FIELD_NAMES.filter((f) => {
      const v = fields[f]?.trim();
      return v !== undefined && v !== "" && v !== "*";
    });
    if (explicit.length > 0) {
      throw new Error(`special_time cannot be combined with ${explicit.join(", ")}`);
    }
    if (!isSpecialTime(special)) {
      throw new Error(`Unknown special_time "${special}" (expected one of ${SPECIAL_TIMES.join(", ")})`);
    }
    return { kind: "special", special };
  }

  const value = (f: (typeof FIELD_NAMES)[number]): string => {
    const v = fields[f]?.trim() || "*";
    if (/\s/.test(v)) {
      throw new Error(`${f} must not contain whitespace: "${v}"`);
    }
    return v;
  };

  return {
    kind: "fields",
    minute: value("minute"),
    hour: value("hour"),
    day: value("day"),
    month: value("month"),
    weekday: value("weekday"),
  };
}

/**
 * Render the timing as it is written at the start of a crontab line.
 */
export function formatTiming(timing: CronTiming): string {
  if (timing.kind === "special") return `@${timing.special}`;
  return [timing.minute, timing.hour, timing.day, timing.month, timing.weekday].join(" ");
}

/**
 * Five-field expression equivalent to the timing, or undefined for @reboot.
 */
export function toCronExpression(timing: CronTiming): string | undefined {
  if (timing.kind === "fields") return formatTiming(timing);
  if (timing.special === "reboot") return undefined;
  return SPECIAL_EXPANSIONS[timing.special];
}

/**
 * Returns an error message if cron would not accept the timing, otherwise null.
 */
export function validateTiming(timing: CronTiming): string | null {
  const expr = toCronExpression(timing);
  if (expr === undefined) return null;
  try {
    new Cron(expr, { paused: true });
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

function resolveCronTimezone(tz?: string): string {
  const trimmed = typeof tz === "string" ? tz.trim() : "";
  if (trimmed) return trimmed;
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * The next `count` fire times strictly after `nowMs`.
 * @reboot never fires on a clock, so it yields an empty list.
 */
export function nextFireTimes(
  timing: CronTiming,
  nowMs: number,
  count: number,
  tz?: string,
): number[] {
  const expr = toCronExpression(timing);
  if (expr === undefined || count <= 0) return [];

  const cron = new Cron(expr, {
    timezone: resolveCronTimezone(tz),
    paused: true,
  });

  return cron
    .nextRuns(count, new Date(nowMs))
    .map((d) => d.getTime())
    .filter((ms) => Number.isFinite(ms) && ms > nowMs);
}
