import { normalizeTiming, validateTiming } from "../crontab/timing.js";
import type { CronTiming } from "../crontab/types.js";
import { PlaybookError } from "../errors.js";
import { renderTemplate } from "./template.js";
import type {
  CronTaskSpec,
  CronVarTaskSpec,
  JobDeclaration,
  PlaybookFile,
  ResolvedPlay,
  VarDeclaration,
  Vars,
} from "./types.js";

const DEFAULT_BECOME_USER = "root";

function render(value: string | undefined, vars: Vars): string | undefined {
  return value === undefined ? undefined : renderTemplate(value, vars);
}

/**
 * A rendered value ends up on one crontab line; a newline from a variable
 * would add lines the provisioner does not manage.
 */
function singleLine(value: string, field: string): string {
  if (/[\r\n]/.test(value)) {
    throw new PlaybookError(`${field} must be a single line after rendering`);
  }
  return value;
}

function renderName(template: string, vars: Vars): string {
  // Marker names are trimmed when read back, so match that here
  const name = singleLine(renderTemplate(template, vars), "name").trim();
  if (!name) throw new PlaybookError("name is empty after rendering");
  return name;
}

function resolveCron(spec: CronTaskSpec, vars: Vars, becomeUser: string): JobDeclaration {
  const name = renderName(spec.name, vars);
  const user = render(spec.user, vars) ?? becomeUser;

  if (spec.state === "absent") {
    return { state: "absent", user, name };
  }

  let timing: CronTiming;
  try {
    timing = normalizeTiming({
      minute: render(spec.minute, vars),
      hour: render(spec.hour, vars),
      day: render(spec.day, vars),
      month: render(spec.month, vars),
      weekday: render(spec.weekday, vars),
      special_time: render(spec.special_time, vars),
    });
  } catch (err) {
    if (err instanceof PlaybookError) throw err;
    throw new PlaybookError(err instanceof Error ? err.message : String(err));
  }

  const invalid = validateTiming(timing);
  if (invalid) {
    throw new PlaybookError(`invalid schedule for "${name}": ${invalid}`);
  }

  return {
    state: "present",
    user,
    entry: {
      name,
      timing,
      job: singleLine(renderTemplate(spec.job ?? "", vars), "job").trim(),
      disabled: spec.disabled ?? false,
    },
  };
}

function resolveCronVar(spec: CronVarTaskSpec, vars: Vars, becomeUser: string): VarDeclaration {
  const user = render(spec.user, vars) ?? becomeUser;
  if (spec.state === "absent") {
    return { state: "absent", user, name: spec.name };
  }
  return {
    state: "present",
    user,
    variable: { name: spec.name, value: singleLine(renderTemplate(spec.value ?? "", vars), "value") },
  };
}

function declarationName(d: JobDeclaration): string {
  return d.state === "present" ? d.entry.name : d.name;
}

function varName(d: VarDeclaration): string {
  return d.state === "present" ? d.variable.name : d.name;
}

/**
 * Render every task against the variables and collapse repeated names:
 * at most one declaration per (user, name) survives, the latest one.
 */
export function resolvePlay(playbook: PlaybookFile, vars: Vars): ResolvedPlay {
  const becomeUser = render(playbook.become_user, vars) ?? DEFAULT_BECOME_USER;
  const jobs = new Map<string, JobDeclaration>();
  const cronVars = new Map<string, VarDeclaration>();

  playbook.tasks.forEach((task, i) => {
    const where = `tasks[${i}]${task.name ? ` (${task.name})` : ""}`;
    try {
      if ("cron" in task) {
        const decl = resolveCron(task.cron, vars, becomeUser);
        const key = `${decl.user}\0${declarationName(decl)}`;
        if (jobs.has(key)) {
          console.warn(`[play] Duplicate cron name "${declarationName(decl)}" for ${decl.user}; ${where} wins`);
        }
        jobs.set(key, decl);
      } else {
        const decl = resolveCronVar(task.cronvar, vars, becomeUser);
        const key = `${decl.user}\0${varName(decl)}`;
        if (cronVars.has(key)) {
          console.warn(`[play] Duplicate cronvar "${varName(decl)}" for ${decl.user}; ${where} wins`);
        }
        cronVars.set(key, decl);
      }
    } catch (err) {
      if (err instanceof PlaybookError) {
        throw new PlaybookError(err.message, { source: where });
      }
      throw err;
    }
  });

  return {
    hosts: playbook.hosts,
    becomeUser,
    backup: playbook.backup ?? false,
    jobs: [...jobs.values()],
    vars: [...cronVars.values()],
  };
}

/** Users that have at least one declaration, in declaration order. */
export function usersOf(play: ResolvedPlay): string[] {
  const users: string[] = [];
  for (const d of [...play.vars, ...play.jobs]) {
    if (!users.includes(d.user)) users.push(d.user);
  }
  return users;
}
