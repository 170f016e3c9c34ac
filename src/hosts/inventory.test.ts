import { describe, it, expect, vi, afterEach } from "vitest";
import { selectHosts } from "./inventory.js";
import type { InventoryFile } from "../playbook/types.js";

const inventory: InventoryFile = {
  hosts: {
    "cron1.example.org": { login: "deploy" },
    "web1.example.org": { address: "10.0.0.5" },
    localhost: {},
  },
  groups: {
    prod_cron: ["cron1.example.org"],
    web: ["web1.example.org", "web2.example.org"],
  },
};

describe("selectHosts", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("expands a group", () => {
    expect(selectHosts("prod_cron", inventory)).toEqual([
      { name: "cron1.example.org", address: "cron1.example.org", connection: "ssh", login: "deploy" },
    ]);
  });

  it("uses the inventory address and treats localhost as local", () => {
    expect(selectHosts("web1.example.org,localhost", inventory)).toEqual([
      { name: "web1.example.org", address: "10.0.0.5", connection: "ssh", login: undefined },
      { name: "localhost", address: "localhost", connection: "local", login: undefined },
    ]);
  });

  it("expands all without duplicates", () => {
    expect(selectHosts("all", inventory).map((h) => h.name)).toEqual([
      "cron1.example.org",
      "web1.example.org",
      "localhost",
      "web2.example.org",
    ]);
  });

  it("matches globs", () => {
    expect(selectHosts("web*", inventory).map((h) => h.name)).toEqual(["web1.example.org", "web2.example.org"]);
  });

  it("narrows by limit", () => {
    expect(selectHosts("web", inventory, "web2*").map((h) => h.name)).toEqual(["web2.example.org"]);
  });

  it("warns about patterns that match nothing", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(selectHosts("db", inventory)).toEqual([]);
    expect(warn).toHaveBeenCalledWith('[play] No hosts matched "db"');
  });
});
