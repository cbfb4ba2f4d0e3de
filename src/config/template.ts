import { ConfigError } from "../core/errors";
import { TemplateVars } from "./types";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local-time stamp in the `YYYYMMDD_HHMMSS` form used for run directories. */
export function stamp(now = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${date}_${time}`;
}

export function fillVars(template: string, vars: TemplateVars): string {
  let result = template;
  for (const [key, value] of Object.entries(vars)) {
    result = result.split(`{${key}}`).join(value);
  }
  return result;
}

export function parseVarAssignments(assignments: readonly string[]): TemplateVars {
  const vars: TemplateVars = {};
  for (const assignment of assignments) {
    const separator = assignment.indexOf("=");
    if (separator <= 0) {
      throw new ConfigError(`Invalid variable assignment "${assignment}", expected key=value`);
    }
    vars[assignment.slice(0, separator)] = assignment.slice(separator + 1);
  }
  return vars;
}
