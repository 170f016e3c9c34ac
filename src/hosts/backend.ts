import { config } from "../config.js";
import { CommandCrontabBackend } from "./command-backend.js";
import { FileCrontabBackend } from "./file-backend.js";
import type { HostTarget } from "./inventory.js";

/**
 * Access to the crontabs of one host.
 */
export interface CrontabBackend {
  readonly host: string;
  /** Current crontab text, or null when the user has none. */
  read(user: string): Promise<string | null>;
  write(user: string, content: string): Promise<void>;
}

export type BackendFactory = (target: HostTarget) => CrontabBackend;

/**
 * Spool files when CRON_SPOOL_DIR is set (local hosts only), otherwise the
 * crontab command.
 */
export const createBackend: BackendFactory = (target) => {
  if (config.spoolDir && target.connection === "local") {
    return new FileCrontabBackend(target.name, config.spoolDir);
  }
  return new CommandCrontabBackend(target);
};
