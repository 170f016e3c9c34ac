import { spawn } from "node:child_process";
import os from "node:os";
import { config } from "../config.js";
import { ProvisionError } from "../errors.js";
import type { CrontabBackend } from "./backend.js";
import type { HostTarget } from "./inventory.js";
import { trackProcess, untrackProcess } from "./process-manager.js";

export type CrontabOp = "read" | "write";

export type CommandSpec = { command: string; args: string[] };

export type CommandResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type CommandRunner = (spec: CommandSpec, input: string | undefined, label: string) => Promise<CommandResult>;

const BECOME_DENIED_RE =
  /sudo: (a )?(terminal|password) is required|not in the sudoers|is not allowed to (run sudo|execute)|sudo: unknown user|crontab: user .* unknown|must be privileged/i;
const NO_CRONTAB_RE = /no crontab for/i;

export function shellQuote(arg: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

function currentUser(): string | undefined {
  try {
    return os.userInfo().username;
  } catch {
    return undefined;
  }
}

/**
 * Build the crontab invocation for a user, escalated with sudo and wrapped
 * in ssh for remote hosts.
 */
export function buildCrontabCommand(target: HostTarget, user: string, op: CrontabOp): CommandSpec {
  const crontab = ["crontab", op === "read" ? "-l" : "-"];
  const sameUser = target.connection === "local" ? user === currentUser() : user === target.login;
  const inner = sameUser ? crontab : ["sudo", "-n", "-u", user, ...crontab];

  if (target.connection === "local") {
    return { command: inner[0], args: inner.slice(1) };
  }

  return {
    command: config.sshCommand,
    args: [
      ...config.sshOptions,
      "-o", "BatchMode=yes",
      "-o", `ConnectTimeout=${config.connectTimeoutSec}`,
      ...(target.login ? ["-l", target.login] : []),
      target.address,
      "--",
      inner.map(shellQuote).join(" "),
    ],
  };
}

/**
 * Map a failed crontab invocation to the kind of failure the operator sees.
 */
export function classifyFailure(target: HostTarget, op: CrontabOp, result: CommandResult): ProvisionError {
  const stderr = result.stderr.trim();
  const base = { host: target.name, exitCode: result.exitCode, stderr };

  if (result.timedOut) {
    return new ProvisionError({
      ...base,
      kind: target.connection === "ssh" ? "unreachable" : "command_failed",
      message: `crontab ${op} timed out after ${Math.round(config.crontabTimeoutMs / 1000)}s`,
    });
  }
  if (target.connection === "ssh" && result.exitCode === 255) {
    return new ProvisionError({
      ...base,
      kind: "unreachable",
      message: `Failed to connect to ${target.address}: ${stderr || "ssh exited with 255"}`,
    });
  }
  if (BECOME_DENIED_RE.test(stderr)) {
    return new ProvisionError({ ...base, kind: "become_failed", message: `Privilege escalation failed: ${stderr}` });
  }
  return new ProvisionError({
    ...base,
    kind: "command_failed",
    message: `crontab ${op} exited with code ${result.exitCode}: ${stderr || "(no output)"}`,
  });
}

/**
 * Spawn a command, feed it `input`, and collect its output.
 */
export const runCommand: CommandRunner = (spec, input, label) => {
  return new Promise((resolve, reject) => {
    const proc = spawn(spec.command, spec.args, { stdio: ["pipe", "pipe", "pipe"] });
    const handle = trackProcess(proc, label);

    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGTERM");
    }, config.crontabTimeoutMs);

    proc.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString("utf-8");
    });
    proc.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString("utf-8");
    });

    proc.on("error", (err) => {
      clearTimeout(timer);
      untrackProcess(handle);
      reject(err);
    });

    proc.on("close", (code) => {
      clearTimeout(timer);
      untrackProcess(handle);
      resolve({ exitCode: code, stdout, stderr, timedOut });
    });

    // The child may exit before reading stdin (e.g. ssh failing to connect)
    proc.stdin.on("error", (err) => {
      console.warn(`[backend] ${label}: stdin closed early: ${err.message}`);
    });
    proc.stdin.end(input ?? "");
  });
};

export class CommandCrontabBackend implements CrontabBackend {
  readonly host: string;
  private target: HostTarget;
  private run: CommandRunner;

  constructor(target: HostTarget, run: CommandRunner = runCommand) {
    this.host = target.name;
    this.target = target;
    this.run = run;
  }

  private async exec(user: string, op: CrontabOp, input?: string): Promise<CommandResult> {
    const spec = buildCrontabCommand(this.target, user, op);
    try {
      return await this.run(spec, input, `${this.host}:${user}:${op}`);
    } catch (err) {
      throw new ProvisionError({
        kind: "command_failed",
        host: this.host,
        message: `Failed to run ${spec.command}: ${err instanceof Error ? err.message : String(err)}`,
      });
    }
  }

  async read(user: string): Promise<string | null> {
    const result = await this.exec(user, "read");
    if (result.exitCode === 0 && !result.timedOut) return result.stdout;
    if (!result.timedOut && NO_CRONTAB_RE.test(result.stderr)) return null;
    throw classifyFailure(this.target, "read", result);
  }

  async write(user: string, content: string): Promise<void> {
    const result = await this.exec(user, "write", content);
    if (result.exitCode === 0 && !result.timedOut) return;
    throw classifyFailure(this.target, "write", result);
  }
}
