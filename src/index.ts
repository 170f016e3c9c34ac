#!/usr/bin/env node
import { parseArgs } from "node:util";
import { config } from "./config.js";
import { formatTiming, nextFireTimes } from "./crontab/timing.js";
import { PlaybookError } from "./errors.js";
import { killAll, listRunning } from "./hosts/process-manager.js";
import { loadInventory, loadPlaybook } from "./playbook/loader.js";
import { resolvePlay } from "./playbook/resolve.js";
import type { ResolvedPlay } from "./playbook/types.js";
import { CronProvisioner } from "./provisioner/provisioner.js";
import { formatHostResult, formatRecap, hasFailures } from "./provisioner/report.js";

const COMMANDS = ["apply", "plan", "preview"] as const;
type Command = (typeof COMMANDS)[number];

const USAGE = `usage: cron-provisioner [apply|plan|preview] [playbook] [options]

  apply     converge crontabs to the playbook (default)
  plan      same as apply --check --diff
  preview   list the next fire times of every declared job

options:
  --check             report changes without writing
  --diff              show a line diff of each changed crontab
  --limit <hosts>     only run on hosts matching this selector
  --no-prune          keep managed jobs that are no longer declared
  --inventory <path>  inventory file (default ${config.inventoryPath})
  --count <n>         fire times per job for preview (default 5)`;

function isCommand(value: string | undefined): value is Command {
  return (COMMANDS as readonly string[]).includes(value ?? "");
}

function preview(play: ResolvedPlay, count: number): void {
  const now = Date.now();
  for (const decl of play.jobs) {
    if (decl.state !== "present") continue;
    const { entry } = decl;
    const header = `${entry.name} [${decl.user}] ${formatTiming(entry.timing)}`;
    if (entry.disabled) {
      console.log(`${header} (disabled)`);
      continue;
    }
    const runs = nextFireTimes(entry.timing, now, count, config.defaultTimezone);
    console.log(header);
    for (const ms of runs) {
      console.log(`  ${new Date(ms).toISOString()}`);
    }
    if (runs.length === 0) console.log("  (no scheduled fire times)");
  }
}

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      check: { type: "boolean" },
      diff: { type: "boolean" },
      limit: { type: "string" },
      "no-prune": { type: "boolean" },
      inventory: { type: "string" },
      count: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const [first, second] = positionals;
  const command: Command = isCommand(first) ? first : "apply";
  const playbookPath = (isCommand(first) ? second : first) ?? config.playbookPath;

  console.log(`[init] Playbook: ${playbookPath}`);
  const { playbook, vars } = await loadPlaybook(playbookPath);
  const play = resolvePlay(playbook, vars);
  console.log(`[init] ${play.jobs.length} jobs, ${play.vars.length} cron variables for ${play.becomeUser}@${play.hosts}`);

  if (command === "preview") {
    const count = Number(values.count) || 5;
    preview(play, count);
    return;
  }

  const check = command === "plan" || values.check === true;
  const diff = command === "plan" || values.diff === true;
  const inventoryPath = values.inventory ?? config.inventoryPath;
  const inventory = await loadInventory(inventoryPath);
  if (check) console.log("[init] Check mode: nothing will be written");

  process.on("SIGINT", () => {
    const running = listRunning();
    const killed = killAll();
    console.error(`\n[shutdown] Interrupted, killed ${killed} process(es)${running.length > 0 ? `: ${running.map((r) => r.label).join(", ")}` : ""}`);
    process.exit(130);
  });

  const provisioner = new CronProvisioner();
  const results = await provisioner.apply(play, inventory, {
    check,
    prune: values["no-prune"] !== true,
    limit: values.limit,
  });

  for (const result of results) {
    for (const line of formatHostResult(result, { diff })) {
      console.log(line);
    }
  }
  console.log(formatRecap(results));

  if (hasFailures(results)) {
    process.exitCode = 2;
  }
}

main().catch((err) => {
  if (err instanceof PlaybookError) {
    console.error(`[play] ${err.message}`);
    process.exit(2);
  }
  console.error("[fatal]", err);
  process.exit(1);
});
