import path from "node:path";
import os from "node:os";
import { config as loadEnv } from "dotenv";

loadEnv();

function expandHome(p: string): string {
  if (p.startsWith("~/") || p === "~") {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

function splitList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(/\s+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

export const config = {
  playbookPath: expandHome(process.env.CRON_PLAYBOOK?.trim() || "deploy/crontab.json"),
  inventoryPath: expandHome(process.env.CRON_INVENTORY?.trim() || "deploy/inventory.json"),

  // Empty = manage crontabs through the `crontab` command
  spoolDir: expandHome(process.env.CRON_SPOOL_DIR?.trim() || ""),
  backupDir: expandHome(process.env.CRON_BACKUP_DIR?.trim() || "") || path.join(os.homedir(), ".cron-provisioner", "backups"),

  sshCommand: process.env.SSH_COMMAND?.trim() || "ssh",
  sshOptions: splitList(process.env.SSH_OPTIONS),
  connectTimeoutSec: Number(process.env.SSH_CONNECT_TIMEOUT) || 10,
  crontabTimeoutMs: Number(process.env.CRONTAB_TIMEOUT_MS) || 60_000,

  defaultTimezone:
    process.env.DEFAULT_TIMEZONE?.trim() ||
    Intl.DateTimeFormat().resolvedOptions().timeZone,
} as const;

export type Config = typeof config;
