import { PlaybookError } from "../errors.js";
import type { Vars } from "./types.js";

const VAR_REF_RE = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;
const MAX_DEPTH = 10;

/**
 * Substitute `{{ name }}` references. Values may themselves reference other
 * variables. Unknown names and any other `{{ ... }}` expression are errors.
 */
export function renderTemplate(template: string, vars: Vars, depth = 0): string {
  if (depth > MAX_DEPTH) {
    throw new PlaybookError(`Template nesting too deep (recursive variable?) in "${template}"`);
  }

  const unsupported = template.replace(VAR_REF_RE, "").match(/\{\{.*?(\}\}|$)/);
  if (unsupported) {
    throw new PlaybookError(`Unsupported template expression: ${unsupported[0]}`);
  }

  return template.replace(VAR_REF_RE, (_match, name: string) => {
    if (!Object.hasOwn(vars, name)) {
      throw new PlaybookError(`'${name}' is undefined`);
    }
    const value = String(vars[name]);
    return value.includes("{{") ? renderTemplate(value, vars, depth + 1) : value;
  });
}
