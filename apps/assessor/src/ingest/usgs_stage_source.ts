import type { IngestResultV1, StageObservationV1 } from "@floodrisk/contracts";

import type { Logger } from "../logger";
import { httpJson } from "../http/http_json";
import { captureIngest } from "./ingest_error";
import { PARAM_DISCHARGE_CFS, PARAM_STAGE_FT, isNewerSample, latestSample, parseUsgsTimeSeries, type UsgsSample } from "./usgs_series";

export type UsgsSourceOptions = {
  baseUrl: string;
  timeoutMs: number;
  userAgent?: string;
};

export function usgsIvUrl(baseUrl: string, gaugeId: string): string {
  const qs = new URLSearchParams({
    sites: gaugeId,
    parameterCd: `${PARAM_DISCHARGE_CFS},${PARAM_STAGE_FT}`,
    format: "json",
    siteStatus: "all",
  });
  return `${baseUrl}/nwis/iv/?${qs.toString()}`;
}

function laterOf(a: UsgsSample | null, b: UsgsSample | null): string | null {
  if (a && b) return a.ts >= b.ts ? a.dateTime : b.dateTime;
  return (a ?? b)?.dateTime ?? null;
}

/**
 * Latest river stage and discharge per gauge from the USGS instantaneous-values service.
 */
export class UsgsStageSource {
  private readonly log: Logger;

  constructor(private readonly opts: UsgsSourceOptions, logger: Logger) {
    this.log = logger.child({ component: "usgs_stage" });
  }

  async fetchLatest(gaugeId: string): Promise<IngestResultV1<StageObservationV1>> {
    const log = this.log.child({ gauge_id: gaugeId });
    const url = usgsIvUrl(this.opts.baseUrl, gaugeId);

    return captureIngest(
      async () => {
        const headers: Record<string, string> = {};
        if (this.opts.userAgent) headers["User-Agent"] = this.opts.userAgent;
        const raw = await httpJson(url, { timeoutMs: this.opts.timeoutMs, headers, logger: log });

        let stage: UsgsSample | null = null;
        let discharge: UsgsSample | null = null;
        // a site can report one parameter in several series (e.g. two sensors)
        for (const s of parseUsgsTimeSeries(raw, url)) {
          const latest = latestSample(s.samples);
          if (!latest) continue;
          if (s.param_code === PARAM_STAGE_FT && isNewerSample(latest, stage)) stage = latest;
          else if (s.param_code === PARAM_DISCHARGE_CFS && isNewerSample(latest, discharge)) discharge = latest;
        }

        const value: StageObservationV1 = {
          gauge_id: gaugeId,
          observed_at: laterOf(stage, discharge),
          stage_ft: stage?.value ?? null,
          stage_observed_at: stage?.dateTime ?? null,
          discharge_cfs: discharge?.value ?? null,
          discharge_observed_at: discharge?.dateTime ?? null,
        };

        if (value.stage_ft === null && value.discharge_cfs === null) {
          log.warn("no stage or discharge samples reported");
        } else {
          log.info({ stage_ft: value.stage_ft, discharge_cfs: value.discharge_cfs }, "stage fetched");
        }
        return { value, raw };
      },
      (err) => log.error({ kind: err.kind, status: err.status, url: err.url }, `stage fetch failed: ${err.message}`)
    );
  }
}
