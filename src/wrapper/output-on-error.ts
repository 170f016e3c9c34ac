/**
 * Run a command quietly: its output is held back and only replayed when it
 * fails, so cron mails the operator about failures and nothing else.
 */

import { spawn } from "node:child_process";
import os from "node:os";

export type OutputSink = { write(chunk: string | Uint8Array): unknown };

export type OutputOnErrorOptions = {
  stdout?: OutputSink;
  stderr?: OutputSink;
  env?: NodeJS.ProcessEnv;
};

const COMMAND_NOT_FOUND = 127;

function signalExitCode(signal: NodeJS.Signals): number {
  const num = Object.entries(os.constants.signals).find(([name]) => name === signal)?.[1];
  return 128 + (num ?? 0);
}

/**
 * Resolves with the exit code the wrapper should exit with.
 */
export function runOutputOnError(
  command: string,
  args: string[],
  opts: OutputOnErrorOptions = {},
): Promise<number> {
  const out = opts.stdout ?? process.stdout;
  const err = opts.stderr ?? process.stderr;

  return new Promise((resolve) => {
    const chunks: Array<{ stream: "stdout" | "stderr"; data: Buffer }> = [];
    let settled = false;

    const proc = spawn(command, args, {
      env: opts.env ?? process.env,
      stdio: ["inherit", "pipe", "pipe"],
    });

    proc.stdout.on("data", (data: Buffer) => chunks.push({ stream: "stdout", data }));
    proc.stderr.on("data", (data: Buffer) => chunks.push({ stream: "stderr", data }));

    proc.on("error", (e) => {
      if (settled) return;
      settled = true;
      err.write(`output-on-error: ${command}: ${e.message}\n`);
      resolve(COMMAND_NOT_FOUND);
    });

    proc.on("close", (code, signal) => {
      if (settled) return;
      settled = true;
      if (code === 0) {
        resolve(0);
        return;
      }

      for (const chunk of chunks) {
        (chunk.stream === "stdout" ? out : err).write(chunk.data);
      }
      if (signal) {
        err.write(`output-on-error: ${command} killed by ${signal}\n`);
        resolve(signalExitCode(signal));
        return;
      }
      resolve(code ?? 1);
    });
  });
}
