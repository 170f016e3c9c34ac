export const SPECIAL_TIMES = [
  "reboot",
  "yearly",
  "annually",
  "monthly",
  "weekly",
  "daily",
  "hourly",
] as const;

export type SpecialTime = (typeof SPECIAL_TIMES)[number];

export type CronTiming =
  | { kind: "fields"; minute: string; hour: string; day: string; month: string; weekday: string }
  | { kind: "special"; special: SpecialTime };

export type CronEntry = {
  name: string;
  timing: CronTiming;
  job: string;
  /** Kept in the crontab as a commented-out line. */
  disabled: boolean;
};

export type CronVar = {
  name: string;
  value: string;
};

export type ChangeAction = "created" | "updated" | "removed" | "unchanged";

export type CrontabChange = {
  target: "cron" | "cronvar";
  name: string;
  user: string;
  action: ChangeAction;
  /** Rendered line(s) before the change, if the entry existed. */
  before?: string;
  after?: string;
};
