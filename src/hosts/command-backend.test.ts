import { describe, it, expect, vi } from "vitest";

// Mock config before importing the module under test.
vi.mock("../config.js", () => ({
  config: {
    sshCommand: "ssh",
    sshOptions: ["-p", "2222"],
    connectTimeoutSec: 5,
    crontabTimeoutMs: 30_000,
  },
}));

import { buildCrontabCommand, classifyFailure, CommandCrontabBackend, shellQuote, type CommandResult } from "./command-backend.js";
import type { HostTarget } from "./inventory.js";

const remote: HostTarget = { name: "cron1", address: "10.0.0.9", connection: "ssh", login: "deploy" };
const local: HostTarget = { name: "localhost", address: "localhost", connection: "local" };

function result(partial: Partial<CommandResult>): CommandResult {
  return { exitCode: 0, stdout: "", stderr: "", timedOut: false, ...partial };
}

describe("shellQuote", () => {
  it("leaves safe words alone", () => {
    expect(shellQuote("crontab")).toBe("crontab");
    expect(shellQuote("-l")).toBe("-l");
  });

  it("single-quotes anything else", () => {
    expect(shellQuote("it's")).toBe(`'it'\\''s'`);
    expect(shellQuote("a b")).toBe("'a b'");
  });
});

describe("buildCrontabCommand", () => {
  it("escalates locally with sudo", () => {
    expect(buildCrontabCommand(local, "cron-test-user", "read")).toEqual({
      command: "sudo",
      args: ["-n", "-u", "cron-test-user", "crontab", "-l"],
    });
  });

  it("wraps the remote command in ssh", () => {
    expect(buildCrontabCommand(remote, "ynr", "write")).toEqual({
      command: "ssh",
      args: [
        "-p", "2222",
        "-o", "BatchMode=yes",
        "-o", "ConnectTimeout=5",
        "-l", "deploy",
        "10.0.0.9",
        "--",
        "sudo -n -u ynr crontab -",
      ],
    });
  });

  it("skips sudo when the login user owns the crontab", () => {
    const spec = buildCrontabCommand(remote, "deploy", "read");
    expect(spec.args[spec.args.length - 1]).toBe("crontab -l");
  });
});

describe("classifyFailure", () => {
  it("treats ssh exit 255 as unreachable", () => {
    const err = classifyFailure(remote, "read", result({ exitCode: 255, stderr: "ssh: connect to host 10.0.0.9 port 22: Connection refused\n" }));
    expect(err.kind).toBe("unreachable");
    expect(err.message).toBe("Failed to connect to 10.0.0.9: ssh: connect to host 10.0.0.9 port 22: Connection refused");
  });

  it("recognises sudo refusals", () => {
    const err = classifyFailure(local, "write", result({ exitCode: 1, stderr: "sudo: a password is required\n" }));
    expect(err.kind).toBe("become_failed");
    expect(err.message).toBe("Privilege escalation failed: sudo: a password is required");
  });

  it("falls back to command failure", () => {
    const err = classifyFailure(local, "write", result({ exitCode: 1, stderr: "" }));
    expect(err.kind).toBe("command_failed");
    expect(err.message).toBe("crontab write exited with code 1: (no output)");
  });

  it("reports a remote timeout as unreachable", () => {
    const err = classifyFailure(remote, "read", result({ exitCode: null, timedOut: true }));
    expect(err.kind).toBe("unreachable");
    expect(err.message).toBe("crontab read timed out after 30s");
  });
});

describe("CommandCrontabBackend", () => {
  it("returns stdout on success", async () => {
    const run = vi.fn().mockResolvedValue(result({ stdout: "MAILTO=x@example.org\n" }));
    const backend = new CommandCrontabBackend(remote, run);
    expect(await backend.read("ynr")).toBe("MAILTO=x@example.org\n");
    expect(run).toHaveBeenCalledWith(buildCrontabCommand(remote, "ynr", "read"), undefined, "cron1:ynr:read");
  });

  it("returns null when the user has no crontab", async () => {
    const run = vi.fn().mockResolvedValue(result({ exitCode: 1, stderr: "no crontab for ynr\n" }));
    const backend = new CommandCrontabBackend(remote, run);
    expect(await backend.read("ynr")).toBeNull();
  });

  it("pipes the new crontab to the write command", async () => {
    const run = vi.fn().mockResolvedValue(result({}));
    const backend = new CommandCrontabBackend(remote, run);
    await backend.write("ynr", "* * * * * run\n");
    expect(run).toHaveBeenCalledWith(buildCrontabCommand(remote, "ynr", "write"), "* * * * * run\n", "cron1:ynr:write");
  });

  it("throws a classified error when reading fails", async () => {
    const run = vi.fn().mockResolvedValue(result({ exitCode: 255, stderr: "Connection timed out" }));
    const backend = new CommandCrontabBackend(remote, run);
    await expect(backend.read("ynr")).rejects.toMatchObject({ name: "ProvisionError", kind: "unreachable", host: "cron1" });
  });

  it("turns spawn errors into command failures", async () => {
    const run = vi.fn().mockRejectedValue(new Error("spawn ssh ENOENT"));
    const backend = new CommandCrontabBackend(remote, run);
    await expect(backend.write("ynr", "")).rejects.toMatchObject({
      kind: "command_failed",
      message: "Failed to run ssh: spawn ssh ENOENT",
    });
  });
});
