import fs from "node:fs";
import path from "node:path";

import type { GaugeV1, HistoricalStatsV1, IngestFailureV1 } from "@floodrisk/contracts";
import { ConfigError } from "@floodrisk/config-validator";
import { computeHistoricalStats } from "@floodrisk/risk-kernel";

import type { Logger } from "../logger";
import { errorMessage, isoDate } from "../util";
import { ArchiveFormatError, dailyCsvFileName, gaugeIdFromFileName, readDailyCsv, writeDailyCsv } from "./daily_csv";
import type { UsgsDailySource } from "./usgs_daily_source";

export const DEFAULT_HISTORY_DIR = path.join("data", "history");
export const DEFAULT_YEARS_BACK = 5;

const MS_PER_DAY = 86_400_000;

export type HistoryFetchEntry =
  | { ok: true; path: string; rows: number }
  | { ok: false; error: IngestFailureV1 }
  // fetched, but the archive file could not be written
  | { ok: false; path: string; error: string };

export type HistoryStatsEntry =
  | { ok: true; path: string; stats: HistoricalStatsV1 }
  | { ok: false; path: string; error: string };

/**
 * Fetches daily history for every gauge into `<outDir>/<id>_daily.csv`. A gauge whose
 * fetch or write fails gets an error entry; the others carry on.
 */
export async function fetchAllHistory(
  source: Pick<UsgsDailySource, "fetchDaily">,
  gauges: ReadonlyArray<GaugeV1>,
  opts: { outDir: string; nowMs: number; yearsBack?: number },
  logger: Logger
): Promise<Record<string, HistoryFetchEntry>> {
  const yearsBack = opts.yearsBack ?? DEFAULT_YEARS_BACK;
  const endDate = isoDate(opts.nowMs);
  const startDate = isoDate(opts.nowMs - yearsBack * 365 * MS_PER_DAY);

  const out: Record<string, HistoryFetchEntry> = {};
  for (const g of gauges) {
    const res = await source.fetchDaily(g.id, startDate, endDate);
    if (!res.ok) {
      out[g.id] = { ok: false, error: res.error };
      continue;
    }
    const fp = path.join(opts.outDir, dailyCsvFileName(g.id));
    try {
      writeDailyCsv(fp, res.value);
    } catch (e) {
      const message = errorMessage(e);
      logger.error({ gauge_id: g.id, path: fp }, `history write failed: ${message}`);
      out[g.id] = { ok: false, path: fp, error: message };
      continue;
    }
    logger.info({ gauge_id: g.id, path: fp, rows: res.value.length }, "history saved");
    out[g.id] = { ok: true, path: fp, rows: res.value.length };
  }
  return out;
}

/**
 * Stats for every `*_daily.csv` in `dir`, keyed by gauge id. A malformed file only
 * fails its own entry.
 */
export function computeStatsForDirectory(dir: string, logger: Logger): Record<string, HistoryStatsEntry> {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new ConfigError("CONFIG_NOT_FOUND", dir, [{ path: "", message: "history directory does not exist" }]);
  }

  const out: Record<string, HistoryStatsEntry> = {};
  for (const name of fs.readdirSync(dir).sort()) {
    const gaugeId = gaugeIdFromFileName(name);
    if (gaugeId === null) continue;
    const fp = path.join(dir, name);
    try {
      out[gaugeId] = { ok: true, path: fp, stats: computeHistoricalStats(readDailyCsv(fp)) };
    } catch (e) {
      if (!(e instanceof ArchiveFormatError)) throw e;
      logger.error({ gauge_id: gaugeId, path: fp }, e.message);
      out[gaugeId] = { ok: false, path: fp, error: e.message };
    }
  }
  return out;
}
