import type { DailyReadingV1, IngestResultV1 } from "@floodrisk/contracts";

import type { Logger } from "../logger";
import { httpJson } from "../http/http_json";
import { captureIngest } from "../ingest/ingest_error";
import { PARAM_DISCHARGE_CFS, PARAM_STAGE_FT, parseUsgsTimeSeries, type UsgsSeries } from "../ingest/usgs_series";
import type { UsgsSourceOptions } from "../ingest/usgs_stage_source";

export function usgsDvUrl(baseUrl: string, gaugeId: string, startDate: string, endDate: string): string {
  const qs = new URLSearchParams({
    format: "json",
    sites: gaugeId,
    startDT: startDate,
    endDT: endDate,
    parameterCd: `${PARAM_DISCHARGE_CFS},${PARAM_STAGE_FT}`,
  });
  return `${baseUrl}/nwis/dv/?${qs.toString()}`;
}

function maxOf(a: number | null, b: number): number {
  return a === null ? b : Math.max(a, b);
}

/**
 * One row per calendar day, stage and discharge side by side, ascending by date.
 * Several samples for the same day and parameter keep the largest.
 */
export function mergeDailySeries(series: ReadonlyArray<UsgsSeries>): DailyReadingV1[] {
  const byDate = new Map<string, DailyReadingV1>();
  for (const s of series) {
    if (s.param_code !== PARAM_STAGE_FT && s.param_code !== PARAM_DISCHARGE_CFS) continue;
    for (const sample of s.samples) {
      const date = sample.dateTime.slice(0, 10);
      const row = byDate.get(date) ?? { date, stage_ft: null, discharge_cfs: null };
      if (s.param_code === PARAM_STAGE_FT) row.stage_ft = maxOf(row.stage_ft, sample.value);
      else row.discharge_cfs = maxOf(row.discharge_cfs, sample.value);
      byDate.set(date, row);
    }
  }
  return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
}

/**
 * Daily mean stage/discharge from the USGS daily-values service.
 */
export class UsgsDailySource {
  private readonly log: Logger;

  constructor(private readonly opts: UsgsSourceOptions, logger: Logger) {
    this.log = logger.child({ component: "usgs_daily" });
  }

  async fetchDaily(gaugeId: string, startDate: string, endDate: string): Promise<IngestResultV1<DailyReadingV1[]>> {
    const log = this.log.child({ gauge_id: gaugeId });
    const url = usgsDvUrl(this.opts.baseUrl, gaugeId, startDate, endDate);

    return captureIngest(
      async () => {
        const headers: Record<string, string> = {};
        if (this.opts.userAgent) headers["User-Agent"] = this.opts.userAgent;
        const raw = await httpJson(url, { timeoutMs: this.opts.timeoutMs, headers, logger: log });
        const rows = mergeDailySeries(parseUsgsTimeSeries(raw, url));
        if (!rows.length) log.warn({ startDate, endDate }, "no daily rows parsed");
        else log.info({ rows: rows.length, startDate, endDate }, "daily history fetched");
        return { value: rows };
      },
      (err) => log.error({ kind: err.kind, status: err.status, url: err.url }, `history fetch failed: ${err.message}`)
    );
  }
}
