// Risk Kernel - pure classification entrypoint
//
// 1) Derive the rainfall sub-risk and the stage-ratio sub-risk independently.
// 2) Combine them by severity (UNKNOWN is the floor).
// 3) Return frozen RiskAssessmentV1 records.
//
// No IO. No clock. Ingestion failures arrive here as null inputs and surface as UNKNOWN.

import type {
  GaugeV1,
  IngestResultV1,
  RainfallEstimateV1,
  RiskAssessmentV1,
  StageObservationV1,
  ThresholdBandsV1,
} from "@floodrisk/contracts";
import { rainRisk, stageRatio, stageRisk } from "./risk/classifier";
import { combineRisk } from "./risk/levels";

export type GaugeRiskInput = {
  gauge_id: string;
  stage_ft: number | null;
  flood_stage_ft: number | null;
  rain_mm_72h: number | null;
};

/**
 * Classifies a single gauge into LOW/MEDIUM/HIGH/UNKNOWN.
 *
 * @returns A frozen assessment that echoes the raw inputs.
 */
export function classifyGauge(input: GaugeRiskInput, thresholds: ThresholdBandsV1): RiskAssessmentV1 {
  const rain = rainRisk(input.rain_mm_72h, thresholds.rainfall_mm_72h);
  const stage = stageRisk(input.stage_ft, input.flood_stage_ft, thresholds.river_stage_ratio);

  const assessment: RiskAssessmentV1 = {
    gauge_id: input.gauge_id,
    risk: combineRisk(rain, stage),
    rain_risk: rain,
    stage_risk: stage,
    stage_ratio: stageRatio(input.stage_ft, input.flood_stage_ft),
    inputs: Object.freeze({
      stage_ft: input.stage_ft,
      flood_stage_ft: input.flood_stage_ft,
      rain_mm_72h: input.rain_mm_72h,
    }),
  };
  return Object.freeze(assessment);
}

/**
 * Classifies every configured gauge. A gauge missing from either ingestion map, or whose
 * fetch failed, is still classified (with null inputs) so it never drops out of the result.
 */
export function classifyAll(
  gauges: ReadonlyArray<GaugeV1>,
  stage: Readonly<Record<string, IngestResultV1<StageObservationV1>>>,
  rainfall: Readonly<Record<string, IngestResultV1<RainfallEstimateV1>>>,
  thresholds: ThresholdBandsV1
): Readonly<Record<string, RiskAssessmentV1>> {
  const out: Record<string, RiskAssessmentV1> = {};
  for (const g of gauges) {
    const s = stage[g.id];
    const r = rainfall[g.id];
    out[g.id] = classifyGauge(
      {
        gauge_id: g.id,
        stage_ft: s?.ok ? s.value.stage_ft : null,
        flood_stage_ft: g.flood_stage_ft,
        rain_mm_72h: r?.ok ? r.value.rain_72h_mm : null,
      },
      thresholds
    );
  }
  return Object.freeze(out);
}
