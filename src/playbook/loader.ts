/**
 * Playbook, vars and inventory loading. All three are JSON files; shapes
 * are checked by hand and reported as PlaybookError with the file name.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { PlaybookError } from "../errors.js";
import type {
  CronTaskSpec,
  CronVarTaskSpec,
  HostSpec,
  InventoryFile,
  PlaybookFile,
  PlaybookTask,
  TaskState,
  Vars,
} from "./types.js";

const TIMING_KEYS = ["minute", "hour", "day", "month", "weekday", "special_time"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(obj: Record<string, unknown>, key: string, where: string): string | undefined {
  const v = obj[key];
  if (v === undefined) return undefined;
  // Bare numbers are common for minute/hour fields
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  if (typeof v !== "string") throw new PlaybookError(`${where}.${key} must be a string`);
  return v;
}

function parseName(obj: Record<string, unknown>, where: string): string {
  const name = obj.name;
  if (typeof name !== "string" || name.trim() === "") {
    throw new PlaybookError(`${where}.name must be a non-empty string`);
  }
  if (/[\r\n]/.test(name)) {
    throw new PlaybookError(`${where}.name must be a single line`);
  }
  return name.trim();
}

function parseState(obj: Record<string, unknown>, where: string): TaskState | undefined {
  const state = obj.state;
  if (state === undefined) return undefined;
  if (state === "present" || state === "absent") return state;
  throw new PlaybookError(`${where}.state must be "present" or "absent"`);
}

function parseCronTask(raw: unknown, where: string): CronTaskSpec {
  if (!isRecord(raw)) throw new PlaybookError(`${where} must be an object`);

  const spec: CronTaskSpec = { name: parseName(raw, where) };
  for (const key of TIMING_KEYS) {
    const v = optionalString(raw, key, where);
    if (v !== undefined) spec[key] = v;
  }

  spec.state = parseState(raw, where);
  spec.user = optionalString(raw, "user", where);
  spec.job = optionalString(raw, "job", where);
  if ((spec.state ?? "present") === "present" && !spec.job?.trim()) {
    throw new PlaybookError(`${where}.job is required`);
  }
  if (spec.job !== undefined && /[\r\n]/.test(spec.job)) {
    throw new PlaybookError(`${where}.job must be a single line`);
  }

  if (raw.disabled !== undefined) {
    if (typeof raw.disabled !== "boolean") throw new PlaybookError(`${where}.disabled must be a boolean`);
    spec.disabled = raw.disabled;
  }
  return spec;
}

function parseCronVarTask(raw: unknown, where: string): CronVarTaskSpec {
  if (!isRecord(raw)) throw new PlaybookError(`${where} must be an object`);

  const name = parseName(raw, where);
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
    throw new PlaybookError(`${where}.name is not a valid variable name: "${name}"`);
  }
  const spec: CronVarTaskSpec = {
    name,
    value: optionalString(raw, "value", where),
    user: optionalString(raw, "user", where),
    state: parseState(raw, where),
  };
  if ((spec.state ?? "present") === "present" && spec.value === undefined) {
    throw new PlaybookError(`${where}.value is required`);
  }
  return spec;
}

function parseTask(raw: unknown, index: number): PlaybookTask {
  const where = `tasks[${index}]`;
  if (!isRecord(raw)) throw new PlaybookError(`${where} must be an object`);
  const label = optionalString(raw, "name", where);

  if (raw.cron !== undefined && raw.cronvar !== undefined) {
    throw new PlaybookError(`${where} declares both cron and cronvar`);
  }
  if (raw.cron !== undefined) {
    return { name: label, cron: parseCronTask(raw.cron, `${where}.cron`) };
  }
  if (raw.cronvar !== undefined) {
    return { name: label, cronvar: parseCronVarTask(raw.cronvar, `${where}.cronvar`) };
  }
  throw new PlaybookError(`${where} has no cron or cronvar action`);
}

function parseVars(raw: unknown, where: string): Vars {
  if (!isRecord(raw)) throw new PlaybookError(`${where} must be an object`);
  const vars: Vars = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
      throw new PlaybookError(`${where}.${key} must be a string, number or boolean`);
    }
    vars[key] = value;
  }
  return vars;
}

export function parsePlaybook(raw: unknown): PlaybookFile {
  if (!isRecord(raw)) throw new PlaybookError("playbook must be a JSON object");

  if (typeof raw.hosts !== "string" || raw.hosts.trim() === "") {
    throw new PlaybookError("hosts must be a non-empty string");
  }
  if (!Array.isArray(raw.tasks)) throw new PlaybookError("tasks must be an array");

  const playbook: PlaybookFile = {
    hosts: raw.hosts.trim(),
    tasks: raw.tasks.map((t, i) => parseTask(t, i)),
  };

  playbook.become_user = optionalString(raw, "become_user", "playbook");
  if (raw.vars !== undefined) playbook.vars = parseVars(raw.vars, "vars");
  if (raw.vars_files !== undefined) {
    if (!Array.isArray(raw.vars_files) || !raw.vars_files.every((f): f is string => typeof f === "string")) {
      throw new PlaybookError("vars_files must be an array of paths");
    }
    playbook.vars_files = raw.vars_files;
  }
  if (raw.backup !== undefined) {
    if (typeof raw.backup !== "boolean") throw new PlaybookError("backup must be a boolean");
    playbook.backup = raw.backup;
  }
  return playbook;
}

export function parseInventory(raw: unknown): InventoryFile {
  if (!isRecord(raw)) throw new PlaybookError("inventory must be a JSON object");

  const hosts: Record<string, HostSpec> = {};
  if (raw.hosts !== undefined) {
    if (!isRecord(raw.hosts)) throw new PlaybookError("hosts must be an object");
    for (const [name, spec] of Object.entries(raw.hosts)) {
      const where = `hosts.${name}`;
      if (spec === null) {
        hosts[name] = {};
        continue;
      }
      if (!isRecord(spec)) throw new PlaybookError(`${where} must be an object`);
      let connection: HostSpec["connection"];
      if (spec.connection === "local" || spec.connection === "ssh") {
        connection = spec.connection;
      } else if (spec.connection !== undefined) {
        throw new PlaybookError(`${where}.connection must be "local" or "ssh"`);
      }
      hosts[name] = {
        address: optionalString(spec, "address", where),
        connection,
        login: optionalString(spec, "login", where),
      };
    }
  }

  const groups: Record<string, string[]> = {};
  if (raw.groups !== undefined) {
    if (!isRecord(raw.groups)) throw new PlaybookError("groups must be an object");
    for (const [name, members] of Object.entries(raw.groups)) {
      if (!Array.isArray(members) || !members.every((m): m is string => typeof m === "string")) {
        throw new PlaybookError(`groups.${name} must be an array of host names`);
      }
      groups[name] = members;
    }
  }

  return { hosts, groups };
}

async function readJson(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new PlaybookError("file not found", { source: filePath });
    }
    throw err;
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new PlaybookError(err instanceof Error ? err.message : String(err), { source: filePath });
  }
}

function withSource<T>(filePath: string, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof PlaybookError && !err.source) {
      throw new PlaybookError(err.message, { source: filePath });
    }
    throw err;
  }
}

export async function loadVarsFile(filePath: string): Promise<Vars> {
  const raw = await readJson(filePath);
  return withSource(filePath, () => parseVars(raw, "vars"));
}

/**
 * Load a playbook and merge its variables: vars_files in order (relative to
 * the playbook), then inline vars.
 */
export async function loadPlaybook(filePath: string): Promise<{ playbook: PlaybookFile; vars: Vars }> {
  const raw = await readJson(filePath);
  const playbook = withSource(filePath, () => parsePlaybook(raw));

  const vars: Vars = {};
  for (const file of playbook.vars_files ?? []) {
    Object.assign(vars, await loadVarsFile(path.resolve(path.dirname(filePath), file)));
  }
  Object.assign(vars, playbook.vars ?? {});
  return { playbook, vars };
}

/**
 * Load the inventory. A missing file means only the implicit localhost.
 */
export async function loadInventory(filePath: string): Promise<InventoryFile> {
  try {
    await fs.access(filePath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return { hosts: { localhost: { connection: "local" } }, groups: {} };
    }
    throw err;
  }
  const raw = await readJson(filePath);
  return withSource(filePath, () => parseInventory(raw));
}
