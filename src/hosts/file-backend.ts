import fs from "node:fs";
import path from "node:path";
import type { CrontabBackend } from "./backend.js";

/**
 * Crontabs stored as one file per user in a spool directory
 * (e.g. /var/spool/cron/crontabs).
 */
export class FileCrontabBackend implements CrontabBackend {
  readonly host: string;
  private spoolDir: string;

  constructor(host: string, spoolDir: string) {
    this.host = host;
    this.spoolDir = spoolDir;
  }

  private pathFor(user: string): string {
    if (!user || user.includes("/") || user === "." || user === "..") {
      throw new Error(`Invalid crontab user: "${user}"`);
    }
    return path.join(this.spoolDir, user);
  }

  async read(user: string): Promise<string | null> {
    try {
      return await fs.promises.readFile(this.pathFor(user), "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        return null;
      }
      throw err;
    }
  }

  /**
   * Atomic write (temp + rename) so cron never sees a half-written file.
   */
  async write(user: string, content: string): Promise<void> {
    const target = this.pathFor(user);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    const tmp = `${target}.${process.pid}.${Math.random().toString(16).slice(2)}.tmp`;
    await fs.promises.writeFile(tmp, content, { encoding: "utf-8", mode: 0o600 });
    await fs.promises.rename(tmp, target);
  }
}
