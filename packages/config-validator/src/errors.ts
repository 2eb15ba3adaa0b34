import type { ZodIssue } from "zod";

export type ConfigErrorCode = "CONFIG_NOT_FOUND" | "CONFIG_PARSE" | "CONFIG_INVALID";

export type ConfigIssue = {
  path: string;
  message: string;
};

/**
 * Fatal configuration problem. Raised before any gauge is fetched; the run aborts.
 */
export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly source: string;
  public readonly issues: ConfigIssue[];

  constructor(code: ConfigErrorCode, source: string, issues: ConfigIssue[]) {
    super(`${code}: ${source}${issues.length ? ` (${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ")})` : ""}`);
    this.name = "ConfigError";
    this.code = code;
    this.source = source;
    this.issues = issues;
  }
}

export function issuesFromZod(issues: ReadonlyArray<ZodIssue>): ConfigIssue[] {
  return issues.map((i) => ({ path: i.path.join("."), message: i.message }));
}
