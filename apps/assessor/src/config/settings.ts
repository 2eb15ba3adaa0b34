import fs from "node:fs";
import path from "node:path";

import { isLogLevel, type LogLevel } from "../logger";
import { findUpward } from "../util";

export type AssessorSettings = {
  usgsBaseUrl: string;
  nwsBaseUrl: string;
  // Bound on every live-ingestion request; a slower upstream counts as a failure for that gauge.
  requestTimeoutMs: number;
  historyTimeoutMs: number;
  // api.weather.gov rejects requests without an identifying User-Agent.
  userAgent: string;
  logLevel: LogLevel;
};

export const DEFAULT_SETTINGS: AssessorSettings = {
  usgsBaseUrl: "https://waterservices.usgs.gov",
  nwsBaseUrl: "https://api.weather.gov",
  requestTimeoutMs: 10_000,
  historyTimeoutMs: 20_000,
  userAgent: "floodrisk/0.1 (gauge risk assessment)",
  logLevel: "info",
};

const ENV_LINE = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;

function unquote(v: string): string {
  const q = v[0];
  return v.length >= 2 && (q === '"' || q === "'") && v.endsWith(q) ? v.slice(1, -1) : v;
}

/** KEY=value pairs from `.env` text; comments and lines that are not assignments are ignored. */
export function parseDotEnv(text: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const line of text.split(/\r?\n/)) {
    const m = ENV_LINE.exec(line.trim());
    if (m) pairs.push([m[1], unquote(m[2])]);
  }
  return pairs;
}

/**
 * Fills `env` from a `.env` file. Variables already set in `env` keep their value.
 */
export function loadDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(fp)) return;
  for (const [key, value] of parseDotEnv(fs.readFileSync(fp, "utf8"))) {
    env[key] ??= value;
  }
}

function positiveInt(raw: string | undefined, name: string, fallback: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`invalid ${name}: ${raw}`);
  return n;
}

function baseUrl(raw: string | undefined, fallback: string): string {
  const v = raw?.trim() || fallback;
  return v.replace(/\/+$/, "");
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): AssessorSettings {
  const level = (env.LOGLEVEL ?? DEFAULT_SETTINGS.logLevel).toLowerCase();
  if (!isLogLevel(level)) throw new Error(`invalid LOGLEVEL: ${env.LOGLEVEL}`);

  return {
    usgsBaseUrl: baseUrl(env.FLOODRISK_USGS_BASE_URL, DEFAULT_SETTINGS.usgsBaseUrl),
    nwsBaseUrl: baseUrl(env.FLOODRISK_NWS_BASE_URL, DEFAULT_SETTINGS.nwsBaseUrl),
    requestTimeoutMs: positiveInt(env.FLOODRISK_REQUEST_TIMEOUT_MS, "FLOODRISK_REQUEST_TIMEOUT_MS", DEFAULT_SETTINGS.requestTimeoutMs),
    historyTimeoutMs: positiveInt(env.FLOODRISK_HISTORY_TIMEOUT_MS, "FLOODRISK_HISTORY_TIMEOUT_MS", DEFAULT_SETTINGS.historyTimeoutMs),
    userAgent: env.FLOODRISK_USER_AGENT?.trim() || DEFAULT_SETTINGS.userAgent,
    logLevel: level,
  };
}

/**
 * Loads the nearest `.env` at or above `startDir`, if there is one.
 */
export function loadEnv(startDir: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): void {
  const dir = findUpward(startDir, ".env");
  if (dir !== null) loadDotEnvFile(path.join(dir, ".env"), env);
}
