import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import { CrontabDocument } from "../crontab/document.js";
import { nextFireTimes } from "../crontab/timing.js";
import { convergeUser } from "../provisioner/converge.js";
import { loadPlaybook } from "./loader.js";
import { resolvePlay } from "./resolve.js";

const PLAYBOOK = fileURLToPath(new URL("../../deploy/crontab.json", import.meta.url));

describe("deploy/crontab.json", () => {
  it("resolves to the production job set", async () => {
    const { playbook, vars } = await loadPlaybook(PLAYBOOK);
    const play = resolvePlay(playbook, vars);

    expect(play.hosts).toBe("prod_cron");
    expect(play.becomeUser).toBe("ynr");
    expect(play.jobs.map((j) => (j.state === "present" ? j.entry.name : j.name))).toEqual([
      "Detect faces",
      "Update parties from EC",
      "Look for recent changes in EE",
      "Check for current elections",
      "Update materialized view",
    ]);
  });

  it("renders the crontab the host ends up with", async () => {
    const { playbook, vars } = await loadPlaybook(PLAYBOOK);
    const play = resolvePlay(playbook, vars);
    const doc = CrontabDocument.parse("");
    convergeUser(doc, "ynr", play, { prune: true });

    expect(doc.render()).toBe(
      [
        "MAILTO=cron-alerts@example.org",
        "#cron-provisioner: Detect faces",
        "30,04,19 * * * * nice -n 19 ionice -c 3 output-on-error /var/www/ynr/env/bin/python /var/www/ynr/code/manage.py moderation_queue_detect_faces_in_queued_images",
        "#cron-provisioner: Update parties from EC",
        "06 02 * * * output-on-error /var/www/ynr/env/bin/python /var/www/ynr/code/manage.py parties_import_from_ec --post-to-slack",
        "#cron-provisioner: Look for recent changes in EE",
        "*/5 * * * * output-on-error /var/www/ynr/env/bin/python /var/www/ynr/code/manage.py uk_create_elections_from_every_election --recently-updated",
        "#cron-provisioner: Check for current elections",
        "23 23 * * * output-on-error /var/www/ynr/env/bin/python /var/www/ynr/code/manage.py uk_create_elections_from_every_election --check-current",
        "#cron-provisioner: Update materialized view",
        "*/15 * * * * output-on-error /var/www/ynr/env/bin/python /var/www/ynr/code/manage.py update_data_export_view",
        "",
      ].join("\n"),
    );
  });

  it("refreshes the export view every quarter hour", async () => {
    const { playbook, vars } = await loadPlaybook(PLAYBOOK);
    const view = resolvePlay(playbook, vars).jobs.find((j) => j.state === "present" && j.entry.name === "Update materialized view");
    if (view?.state !== "present") throw new Error("materialized view job missing");

    const from = new Date("2026-03-02T08:00:00Z").getTime();
    const minutes = nextFireTimes(view.entry.timing, from, 4, "UTC").map((ms) => new Date(ms).getUTCMinutes());
    expect(minutes).toEqual([15, 30, 45, 0]);
  });
});
