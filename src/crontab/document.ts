/**
 * In-memory model of one user's crontab.
 *
 * Managed jobs are identified by a marker comment on the line above them,
 * so they can be matched by name on the next run. Every other line
 * (hand-written jobs, comments, blank lines) is kept verbatim.
 */

import { formatTiming, isSpecialTime } from "./timing.js";
import type { ChangeAction, CronEntry, CronTiming, CronVar } from "./types.js";

export const MARKER_PREFIX = "#cron-provisioner: ";

type Line =
  | { kind: "job"; name: string; jobLine: string | undefined }
  | { kind: "var"; name: string; value: string; raw: string }
  | { kind: "other"; raw: string };

const VAR_RE = /^\s*([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*?)\s*$/;

function unquote(value: string): string {
  const m = value.match(/^"(.*)"$/) ?? value.match(/^'(.*)'$/);
  return m ? m[1] : value;
}

export function renderVar(v: CronVar): string {
  if (v.value !== "" && !/[\s"'#]/.test(v.value)) return `${v.name}=${v.value}`;
  if (v.value.includes('"')) return `${v.name}='${v.value}'`;
  return `${v.name}="${v.value}"`;
}

export function renderJobLine(entry: CronEntry): string {
  return `${entry.disabled ? "#" : ""}${formatTiming(entry.timing)} ${entry.job}`;
}

/**
 * Parse the line that follows a marker back into timing, command and
 * disabled flag. Returns undefined for lines that are not cron jobs.
 */
export function parseJobLine(line: string): Omit<CronEntry, "name"> | undefined {
  const disabled = line.startsWith("#");
  const body = (disabled ? line.slice(1) : line).trim();

  const special = body.match(/^@(\w+)\s+(.+)$/);
  if (special) {
    if (!isSpecialTime(special[1])) return undefined;
    return { timing: { kind: "special", special: special[1] }, job: special[2], disabled };
  }

  const fields = body.match(/^(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(.+)$/);
  if (!fields) return undefined;
  const timing: CronTiming = {
    kind: "fields",
    minute: fields[1],
    hour: fields[2],
    day: fields[3],
    month: fields[4],
    weekday: fields[5],
  };
  return { timing, job: fields[6], disabled };
}

function isCommandLine(line: Line): boolean {
  if (line.kind === "job") return true;
  if (line.kind === "var") return false;
  const trimmed = line.raw.trim();
  return trimmed !== "" && !trimmed.startsWith("#");
}

export class CrontabDocument {
  private lines: Line[];

  private constructor(lines: Line[]) {
    this.lines = lines;
  }

  static parse(text: string): CrontabDocument {
    const raw = text.split(/\r?\n/);
    if (raw.length > 0 && raw[raw.length - 1] === "") raw.pop();

    const lines: Line[] = [];
    for (let i = 0; i < raw.length; i++) {
      const line = raw[i];
      if (line.startsWith(MARKER_PREFIX)) {
        const name = line.slice(MARKER_PREFIX.length).trim();
        const next = raw[i + 1];
        if (next !== undefined && !next.startsWith(MARKER_PREFIX)) {
          lines.push({ kind: "job", name, jobLine: next });
          i++;
        } else {
          lines.push({ kind: "job", name, jobLine: undefined });
        }
        continue;
      }

      const v = line.startsWith("#") ? null : line.match(VAR_RE);
      if (v) {
        lines.push({ kind: "var", name: v[1], value: unquote(v[2]), raw: line });
        continue;
      }

      lines.push({ kind: "other", raw: line });
    }
    return new CrontabDocument(lines);
  }

  render(): string {
    const out: string[] = [];
    for (const line of this.lines) {
      if (line.kind === "job") {
        out.push(`${MARKER_PREFIX}${line.name}`);
        if (line.jobLine !== undefined) out.push(line.jobLine);
      } else {
        out.push(line.raw);
      }
    }
    return out.length > 0 ? `${out.join("\n")}\n` : "";
  }

  /** Names of managed jobs, in file order. */
  jobNames(): string[] {
    const names: string[] = [];
    for (const line of this.lines) {
      if (line.kind === "job" && !names.includes(line.name)) names.push(line.name);
    }
    return names;
  }

  getJobLine(name: string): string | undefined {
    for (const line of this.lines) {
      if (line.kind === "job" && line.name === name) return line.jobLine;
    }
    return undefined;
  }

  /** Managed jobs that parse as cron lines, including disabled ones. */
  entries(): CronEntry[] {
    const result: CronEntry[] = [];
    for (const line of this.lines) {
      if (line.kind !== "job" || line.jobLine === undefined) continue;
      const parsed = parseJobLine(line.jobLine);
      if (parsed) result.push({ name: line.name, ...parsed });
    }
    return result;
  }

  upsertJob(entry: CronEntry): ChangeAction {
    const jobLine = renderJobLine(entry);
    const idx = this.lines.findIndex((l) => l.kind === "job" && l.name === entry.name);

    if (idx === -1) {
      this.lines.push({ kind: "job", name: entry.name, jobLine });
      return "created";
    }

    const hadDuplicates = this.dropDuplicateJobs(entry.name, idx);
    const current = this.lines[idx];
    if (current.kind === "job" && current.jobLine === jobLine && !hadDuplicates) {
      return "unchanged";
    }
    this.lines[idx] = { kind: "job", name: entry.name, jobLine };
    return "updated";
  }

  removeJob(name: string): boolean {
    const before = this.lines.length;
    this.lines = this.lines.filter((l) => !(l.kind === "job" && l.name === name));
    return this.lines.length !== before;
  }

  getVar(name: string): string | undefined {
    for (const line of this.lines) {
      if (line.kind === "var" && line.name === name) return line.value;
    }
    return undefined;
  }

  upsertVar(v: CronVar): ChangeAction {
    const raw = renderVar(v);
    const idx = this.lines.findIndex((l) => l.kind === "var" && l.name === v.name);

    if (idx === -1) {
      // Variables only apply to the lines below them, so a new one goes
      // after the existing ones but never below the first job
      let lastVar = -1;
      let firstJob = -1;
      this.lines.forEach((l, i) => {
        if (l.kind === "var") lastVar = i;
        if (firstJob === -1 && isCommandLine(l)) firstJob = i;
      });
      const at = firstJob === -1 ? lastVar + 1 : Math.min(firstJob, lastVar + 1);
      this.lines.splice(at, 0, { kind: "var", name: v.name, value: v.value, raw });
      return "created";
    }

    const current = this.lines[idx];
    if (current.kind === "var" && current.value === v.value) return "unchanged";
    this.lines[idx] = { kind: "var", name: v.name, value: v.value, raw };
    return "updated";
  }

  removeVar(name: string): boolean {
    const before = this.lines.length;
    this.lines = this.lines.filter((l) => !(l.kind === "var" && l.name === name));
    return this.lines.length !== before;
  }

  private dropDuplicateJobs(name: string, keepIdx: number): boolean {
    let dropped = false;
    this.lines = this.lines.filter((l, i) => {
      if (i !== keepIdx && l.kind === "job" && l.name === name) {
        dropped = true;
        return false;
      }
      return true;
    });
    return dropped;
  }
}
