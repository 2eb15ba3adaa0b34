// apps/assessor/src/pipeline.ts

import type {
  AssessmentRunV1,
  GaugeV1,
  IngestFailureV1,
  IngestResultV1,
  RainfallEstimateV1,
  StageObservationV1,
  ThresholdBandsV1,
} from "@floodrisk/contracts";
import { DEFAULT_HORIZON_HOURS, classifyAll, rainfallWindow } from "@floodrisk/risk-kernel";

import type { Logger } from "./logger";
import type { NwsForecastSource } from "./ingest/nws_forecast_source";
import type { UsgsStageSource } from "./ingest/usgs_stage_source";
import { newRunId, sha256Hex, stableStringify } from "./util";

export const PIPELINE_VERSION = "assessment_pipeline_v1";

export type AssessmentSources = {
  stage: Pick<UsgsStageSource, "fetchLatest">;
  forecast: Pick<NwsForecastSource, "fetchRainfall">;
};

export type AssessmentRunInput = {
  gauges: ReadonlyArray<GaugeV1>;
  thresholds: ThresholdBandsV1;
  nowMs: number;
  options?: {
    // keep upstream payloads on successful snapshots
    include_raw?: boolean;
    run_id?: string;
  };
};

function stripRaw<T>(r: IngestResultV1<T>, keep: boolean): IngestResultV1<T> {
  if (!r.ok || keep || r.raw === undefined) return r;
  return { ok: true, value: r.value };
}

export class AssessmentPipelineV1 {
  private readonly log: Logger;

  constructor(private readonly sources: AssessmentSources, logger: Logger) {
    this.log = logger.child({ component: "pipeline" });
  }

  private hashBundle(args: { gauges: ReadonlyArray<GaugeV1>; thresholds: ThresholdBandsV1; window: { start: string; end: string } }) {
    const input_bundle = {
      pipeline_version: PIPELINE_VERSION,
      horizon_hours: DEFAULT_HORIZON_HOURS,
      window: args.window,
      thresholds: args.thresholds,
      gauges: args.gauges.map((g) => ({ ...g })),
    };
    return `sha256:${sha256Hex(stableStringify(input_bundle))}`;
  }

  async run(input: AssessmentRunInput): Promise<AssessmentRunV1> {
    const includeRaw = input.options?.include_raw ?? false;
    const w = rainfallWindow(input.nowMs);
    const window = { start: new Date(w.startTs).toISOString(), end: new Date(w.endTs).toISOString() };

    const stage: Record<string, IngestResultV1<StageObservationV1>> = {};
    const rainfall: Record<string, IngestResultV1<RainfallEstimateV1>> = {};
    const errors: Record<string, IngestFailureV1[]> = {};

    this.log.info({ gauges: input.gauges.length, window }, "assessment started");

    for (const g of input.gauges) {
      const [s, r] = await Promise.all([
        this.sources.stage.fetchLatest(g.id),
        this.sources.forecast.fetchRainfall(g, input.nowMs),
      ]);
      stage[g.id] = stripRaw(s, includeRaw);
      rainfall[g.id] = stripRaw(r, includeRaw);

      const failures: IngestFailureV1[] = [];
      if (!s.ok) failures.push(s.error);
      if (!r.ok) failures.push(r.error);
      if (failures.length) errors[g.id] = failures;
    }

    const gauges = classifyAll(input.gauges, stage, rainfall, input.thresholds);
    for (const a of Object.values(gauges)) {
      this.log.info({ gauge_id: a.gauge_id, risk: a.risk, rain_risk: a.rain_risk, stage_risk: a.stage_risk }, "gauge classified");
    }

    const failed = Object.keys(errors).length;
    if (failed) this.log.warn({ failed_gauges: failed }, "assessment finished with ingestion failures");

    return {
      type: "flood_risk_run_v1",
      run_id: input.options?.run_id ?? newRunId(),
      generated_at: new Date(input.nowMs).toISOString(),
      window,
      determinism_hash: this.hashBundle({ gauges: input.gauges, thresholds: input.thresholds, window }),
      gauges: { ...gauges },
      stage,
      rainfall,
      errors,
    };
  }
}
