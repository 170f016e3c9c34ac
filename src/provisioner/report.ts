import { formatDiff } from "../crontab/diff.js";
import type { CrontabChange } from "../crontab/types.js";
import type { HostResult } from "./provisioner.js";

export function formatChange(host: string, change: CrontabChange): string {
  const status = change.action === "unchanged" ? "ok" : "changed";
  const action = change.action === "unchanged" ? "" : ` (${change.action})`;
  return `${status}: [${host}] ${change.target} "${change.name}" for ${change.user}${action}`;
}

/**
 * Per-change lines, then per-user diffs when requested.
 */
export function formatHostResult(result: HostResult, opts: { diff?: boolean } = {}): string[] {
  const out: string[] = [];
  for (const change of result.changes) {
    out.push(formatChange(result.host, change));
  }
  if (opts.diff) {
    for (const d of result.diffs) {
      out.push(formatDiff(d.lines, { before: `${result.host}:${d.user} (before)`, after: `${result.host}:${d.user} (after)` }));
    }
  }
  for (const file of result.backups) {
    out.push(`backup: [${result.host}] ${file}`);
  }
  if (result.error) {
    const label = result.status === "unreachable" ? "UNREACHABLE" : "FAILED";
    out.push(`${label}: [${result.host}] ${result.error}`);
  }
  return out;
}

export function formatRecap(results: HostResult[]): string {
  const width = Math.max(12, ...results.map((r) => r.host.length));
  const lines = ["RECAP"];
  for (const r of results) {
    const changed = r.changes.filter((c) => c.action !== "unchanged").length;
    const unreachable = r.status === "unreachable" ? 1 : 0;
    const failed = r.status === "failed" ? 1 : 0;
    lines.push(`${r.host.padEnd(width)} : ok=${r.changes.length} changed=${changed} unreachable=${unreachable} failed=${failed}`);
  }
  return lines.join("\n");
}

export function hasFailures(results: HostResult[]): boolean {
  return results.some((r) => r.status === "failed" || r.status === "unreachable");
}
