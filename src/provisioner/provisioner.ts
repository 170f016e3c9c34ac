/**
 * CronProvisioner — applies a resolved play to every selected host.
 * One pass, hosts in order; a failing host does not stop the others.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { config } from "../config.js";
import { CrontabDocument } from "../crontab/document.js";
import { diffLines, type DiffLine } from "../crontab/diff.js";
import type { CrontabChange } from "../crontab/types.js";
import { ProvisionError } from "../errors.js";
import { createBackend, type BackendFactory } from "../hosts/backend.js";
import { selectHosts, type HostTarget } from "../hosts/inventory.js";
import { usersOf } from "../playbook/resolve.js";
import type { InventoryFile, ResolvedPlay } from "../playbook/types.js";
import { convergeUser } from "./converge.js";

export type ApplyOptions = {
  /** Compute changes without writing anything. */
  check?: boolean;
  prune?: boolean;
  /** Narrow the play's hosts. */
  limit?: string;
};

export type HostStatus = "ok" | "changed" | "failed" | "unreachable";

export type HostResult = {
  host: string;
  status: HostStatus;
  changes: CrontabChange[];
  diffs: Array<{ user: string; lines: DiffLine[] }>;
  backups: string[];
  error?: string;
};

export type ProvisionerDeps = {
  createBackend?: BackendFactory;
  backupDir?: string;
};

function timestamp(): string {
  return new Date().toISOString().replace(/[:.]/g, "-");
}

export class CronProvisioner {
  private createBackend: BackendFactory;
  private backupDir: string;

  constructor(deps: ProvisionerDeps = {}) {
    this.createBackend = deps.createBackend ?? createBackend;
    this.backupDir = deps.backupDir ?? config.backupDir;
  }

  /**
   * Apply the play to every host its selector (and the limit) matches.
   */
  async apply(play: ResolvedPlay, inventory: InventoryFile, opts: ApplyOptions = {}): Promise<HostResult[]> {
    const targets = selectHosts(play.hosts, inventory, opts.limit);
    if (targets.length === 0) {
      console.warn(`[provision] No hosts selected by "${play.hosts}"${opts.limit ? ` with limit "${opts.limit}"` : ""}`);
    }

    const results: HostResult[] = [];
    for (const target of targets) {
      results.push(await this.applyToHost(target, play, opts));
    }
    return results;
  }

  async applyToHost(target: HostTarget, play: ResolvedPlay, opts: ApplyOptions = {}): Promise<HostResult> {
    const result: HostResult = { host: target.name, status: "ok", changes: [], diffs: [], backups: [] };
    const backend = this.createBackend(target);
    const prune = opts.prune ?? true;

    try {
      for (const user of usersOf(play)) {
        const before = (await backend.read(user)) ?? "";
        const doc = CrontabDocument.parse(before);
        const changes = convergeUser(doc, user, play, { prune });
        result.changes.push(...changes);

        const after = doc.render();
        if (after === CrontabDocument.parse(before).render()) continue;

        result.status = "changed";
        result.diffs.push({ user, lines: diffLines(before, after) });
        if (opts.check) continue;

        if (play.backup && before.trim()) {
          result.backups.push(await this.backup(target.name, user, before));
        }
        await backend.write(user, after);
        console.log(`[provision] ${target.name}: wrote crontab for ${user}`);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      result.status = err instanceof ProvisionError && err.kind === "unreachable" ? "unreachable" : "failed";
      result.error = message;
      console.error(`[provision] ${target.name}: ${message}`);
    }
    return result;
  }

  private async backup(host: string, user: string, content: string): Promise<string> {
    const file = path.join(this.backupDir, host, `${user}.${timestamp()}.crontab`);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content, { encoding: "utf-8", mode: 0o600 });
    return file;
  }
}
