// floodrisk CLI commands. `cli.ts` wires process.argv/stdout/exit to `main`.

import path from "node:path";

import { loadGaugeConfigFile, loadThresholdsFile, DEFAULT_GAUGES_PATH, DEFAULT_THRESHOLDS_PATH } from "./config/loader";
import { loadSettings, type AssessorSettings } from "./config/settings";
import { createLogger, isLogLevel, type LogLevel, type Logger } from "./logger";
import { NwsForecastSource } from "./ingest/nws_forecast_source";
import { UsgsStageSource } from "./ingest/usgs_stage_source";
import { UsgsDailySource } from "./history/usgs_daily_source";
import { computeStatsForDirectory, fetchAllHistory, DEFAULT_HISTORY_DIR, DEFAULT_YEARS_BACK } from "./history/history_runner";
import { AssessmentPipelineV1 } from "./pipeline";
import { nowMs } from "./util";

export const COMMANDS = ["assess", "history-fetch", "history-stats"] as const;
export type CommandName = (typeof COMMANDS)[number];

export type CliArgs = {
  command: CommandName;
  gauges: string;
  thresholds: string;
  loglevel?: LogLevel;
  nowMs?: number;
  includeRaw: boolean;
  years: number;
  out: string;
  dir: string;
};

export type CliIo = {
  stdout: (text: string) => void;
  env?: NodeJS.ProcessEnv;
  // injected in tests; defaults to a stderr logger at the resolved level
  logger?: Logger;
};

function isCommand(x: string): x is CommandName {
  const known: ReadonlyArray<string> = COMMANDS;
  return known.includes(x);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const get = (k: string): string | undefined => {
    const idx = argv.indexOf(`--${k}`);
    if (idx === -1) return undefined;
    const v = argv[idx + 1];
    if (!v || v.startsWith("--")) throw new Error(`missing value for --${k}`);
    return v;
  };

  const first = argv[0];
  let command: CommandName = "assess";
  if (first !== undefined && !first.startsWith("--")) {
    if (!isCommand(first)) throw new Error(`unknown command: ${first} (expected one of ${COMMANDS.join(", ")})`);
    command = first;
  }

  const level = get("loglevel")?.toLowerCase();
  if (level !== undefined && !isLogLevel(level)) throw new Error(`invalid --loglevel: ${level}`);

  const nowRaw = get("now");
  let now: number | undefined;
  if (nowRaw !== undefined) {
    now = Date.parse(nowRaw);
    if (!Number.isFinite(now)) throw new Error(`invalid --now: ${nowRaw}`);
  }

  const yearsRaw = get("years");
  const years = yearsRaw === undefined ? DEFAULT_YEARS_BACK : Number(yearsRaw);
  if (!Number.isInteger(years) || years <= 0) throw new Error(`invalid --years: ${yearsRaw}`);

  return {
    command,
    gauges: get("gauges") ?? DEFAULT_GAUGES_PATH,
    thresholds: get("thresholds") ?? DEFAULT_THRESHOLDS_PATH,
    loglevel: level,
    nowMs: now,
    includeRaw: argv.includes("--include-raw"),
    years,
    out: get("out") ?? DEFAULT_HISTORY_DIR,
    dir: get("dir") ?? DEFAULT_HISTORY_DIR,
  };
}

async function runCommand(args: CliArgs, settings: AssessorSettings, logger: Logger): Promise<unknown> {
  const now = args.nowMs ?? nowMs();
  const usgs = { baseUrl: settings.usgsBaseUrl, userAgent: settings.userAgent };

  switch (args.command) {
    case "assess": {
      // both documents are validated before any request goes out
      const gauges = loadGaugeConfigFile(args.gauges).gauges;
      const thresholds = loadThresholdsFile(args.thresholds);
      const pipeline = new AssessmentPipelineV1(
        {
          stage: new UsgsStageSource({ ...usgs, timeoutMs: settings.requestTimeoutMs }, logger),
          forecast: new NwsForecastSource(
            { baseUrl: settings.nwsBaseUrl, timeoutMs: settings.requestTimeoutMs, userAgent: settings.userAgent },
            logger
          ),
        },
        logger
      );
      return pipeline.run({ gauges, thresholds, nowMs: now, options: { include_raw: args.includeRaw } });
    }
    case "history-fetch": {
      const gauges = loadGaugeConfigFile(args.gauges).gauges;
      const source = new UsgsDailySource({ ...usgs, timeoutMs: settings.historyTimeoutMs }, logger);
      return fetchAllHistory(source, gauges, { outDir: path.resolve(args.out), nowMs: now, yearsBack: args.years }, logger);
    }
    case "history-stats":
      return computeStatsForDirectory(path.resolve(args.dir), logger);
  }
}

/**
 * Runs one command and writes its JSON result to `io.stdout`. Configuration and
 * argument errors propagate to the caller.
 */
export async function main(argv: string[], io: CliIo): Promise<void> {
  const args = parseCliArgs(argv);
  const settings = loadSettings(io.env ?? process.env);
  const logger = io.logger ?? createLogger({ level: args.loglevel ?? settings.logLevel });

  const result = await runCommand(args, settings, logger);
  io.stdout(JSON.stringify(result, null, 2) + "\n");
}
