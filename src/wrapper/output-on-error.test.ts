import { describe, it, expect } from "vitest";
import { runOutputOnError, type OutputSink } from "./output-on-error.js";

function sink(): OutputSink & { text: () => string } {
  let buf = "";
  return {
    write(chunk: string | Uint8Array) {
      buf += typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf-8");
      return true;
    },
    text: () => buf,
  };
}

// The test runner's own node binary stands in for a management command.
const node = process.execPath;

describe("runOutputOnError", () => {
  it("stays silent when the command succeeds", async () => {
    const out = sink();
    const err = sink();
    const code = await runOutputOnError(node, ["-e", "console.log('imported 3 parties')"], { stdout: out, stderr: err });
    expect(code).toBe(0);
    expect(out.text()).toBe("");
    expect(err.text()).toBe("");
  });

  it("replays output and passes the exit code through on failure", async () => {
    const out = sink();
    const err = sink();
    const code = await runOutputOnError(
      node,
      ["-e", "console.log('starting'); console.error('boom'); process.exit(3)"],
      { stdout: out, stderr: err },
    );
    expect(code).toBe(3);
    expect(out.text()).toBe("starting\n");
    expect(err.text()).toBe("boom\n");
  });

  it("exits 127 when the command cannot be started", async () => {
    const err = sink();
    const code = await runOutputOnError("/nonexistent/manage.py", [], { stdout: sink(), stderr: err });
    expect(code).toBe(127);
    expect(err.text()).toMatch(/^output-on-error: \/nonexistent\/manage\.py: spawn \/nonexistent\/manage\.py ENOENT\n$/);
  });
});
