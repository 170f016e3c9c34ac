import type { ChildProcess } from "node:child_process";

/**
 * Tracks crontab/ssh child processes so an interrupted run can kill them.
 */

const runningProcesses = new Map<number, { proc: ChildProcess; label: string }>();
let nextId = 1;

/** Returns a handle for untrackProcess. */
export function trackProcess(proc: ChildProcess, label: string): number {
  const id = nextId++;
  runningProcesses.set(id, { proc, label });
  return id;
}

export function untrackProcess(id: number): void {
  runningProcesses.delete(id);
}

/**
 * Kill all running processes. Called when the run is interrupted.
 */
export function killAll(): number {
  let killed = 0;
  for (const [id, { proc }] of runningProcesses) {
    if (!proc.killed && proc.exitCode === null) {
      proc.kill("SIGTERM");
      killed++;
    }
    runningProcesses.delete(id);
  }
  return killed;
}

export function listRunning(): Array<{ label: string; pid?: number }> {
  const result: Array<{ label: string; pid?: number }> = [];
  for (const { proc, label } of runningProcesses.values()) {
    result.push({ label, pid: proc.pid });
  }
  return result;
}
