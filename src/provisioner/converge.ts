/**
 * Name-keyed convergence of one user's crontab toward the declared state.
 */

import { renderJobLine, renderVar, type CrontabDocument } from "../crontab/document.js";
import type { CrontabChange } from "../crontab/types.js";
import type { ResolvedPlay } from "../playbook/types.js";

export type ConvergeOptions = {
  /** Remove managed jobs whose names are no longer declared. */
  prune: boolean;
};

export function convergeUser(
  doc: CrontabDocument,
  user: string,
  play: ResolvedPlay,
  opts: ConvergeOptions,
): CrontabChange[] {
  const changes: CrontabChange[] = [];

  for (const decl of play.vars) {
    if (decl.user !== user) continue;
    if (decl.state === "present") {
      const { variable } = decl;
      const previous = doc.getVar(variable.name);
      const action = doc.upsertVar(variable);
      changes.push({
        target: "cronvar",
        name: variable.name,
        user,
        action,
        before: previous === undefined ? undefined : renderVar({ name: variable.name, value: previous }),
        after: renderVar(variable),
      });
    } else {
      const previous = doc.getVar(decl.name);
      const removed = doc.removeVar(decl.name);
      changes.push({
        target: "cronvar",
        name: decl.name,
        user,
        action: removed ? "removed" : "unchanged",
        before: previous === undefined ? undefined : renderVar({ name: decl.name, value: previous }),
      });
    }
  }

  const declared = new Set<string>();
  for (const decl of play.jobs) {
    if (decl.user !== user) continue;
    if (decl.state === "present") {
      const { entry } = decl;
      declared.add(entry.name);
      const previous = doc.getJobLine(entry.name);
      const action = doc.upsertJob(entry);
      changes.push({ target: "cron", name: entry.name, user, action, before: previous, after: renderJobLine(entry) });
    } else {
      declared.add(decl.name);
      const previous = doc.getJobLine(decl.name);
      const removed = doc.removeJob(decl.name);
      changes.push({ target: "cron", name: decl.name, user, action: removed ? "removed" : "unchanged", before: previous });
    }
  }

  if (opts.prune) {
    for (const name of doc.jobNames()) {
      if (declared.has(name)) continue;
      const previous = doc.getJobLine(name);
      doc.removeJob(name);
      changes.push({ target: "cron", name, user, action: "removed", before: previous });
    }
  }

  return changes;
}
