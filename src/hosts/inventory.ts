import type { InventoryFile } from "../playbook/types.js";

export type HostTarget = {
  name: string;
  address: string;
  connection: "local" | "ssh";
  login?: string;
};

const LOCAL_NAMES = new Set(["localhost", "127.0.0.1", "::1"]);

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*").replace(/\?/g, ".");
  return new RegExp(`^${escaped}$`);
}

function allHostNames(inventory: InventoryFile): string[] {
  const names = new Set(Object.keys(inventory.hosts));
  for (const members of Object.values(inventory.groups)) {
    for (const m of members) names.add(m);
  }
  return [...names];
}

function expandPattern(pattern: string, inventory: InventoryFile): string[] {
  if (pattern === "all" || pattern === "*") return allHostNames(inventory);
  if (Object.hasOwn(inventory.groups, pattern)) return inventory.groups[pattern];
  if (pattern.includes("*") || pattern.includes("?")) {
    const re = globToRegExp(pattern);
    return allHostNames(inventory).filter((h) => re.test(h));
  }
  if (Object.hasOwn(inventory.hosts, pattern) || LOCAL_NAMES.has(pattern)) return [pattern];
  return [];
}

function expandSelector(selector: string, inventory: InventoryFile): string[] {
  const names: string[] = [];
  for (const pattern of selector.split(/[,:]/).map((s) => s.trim()).filter(Boolean)) {
    const matched = expandPattern(pattern, inventory);
    if (matched.length === 0) {
      console.warn(`[play] No hosts matched "${pattern}"`);
    }
    for (const name of matched) {
      if (!names.includes(name)) names.push(name);
    }
  }
  return names;
}

export function toTarget(name: string, inventory: InventoryFile): HostTarget {
  const spec = inventory.hosts[name] ?? {};
  return {
    name,
    address: spec.address ?? name,
    connection: spec.connection ?? (LOCAL_NAMES.has(name) ? "local" : "ssh"),
    login: spec.login,
  };
}

/**
 * Resolve a play's host selector (group, host, glob, `all`, or a comma
 * list of those), optionally narrowed by a --limit selector.
 */
export function selectHosts(selector: string, inventory: InventoryFile, limit?: string): HostTarget[] {
  let names = expandSelector(selector, inventory);
  if (limit?.trim()) {
    const allowed = new Set(expandSelector(limit, inventory));
    names = names.filter((n) => allowed.has(n));
  }
  return names.map((n) => toTarget(n, inventory));
}
