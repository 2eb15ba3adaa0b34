import { z } from "zod";

// Severity order, least to most severe.
export const RISK_LEVELS = ["UNKNOWN", "LOW", "MEDIUM", "HIGH"] as const;

export const RiskLevelZ = z.enum(RISK_LEVELS);

export const RiskAssessmentV1Schema = z
  .object({
    gauge_id: z.string().min(1),
    risk: RiskLevelZ,
    rain_risk: RiskLevelZ,
    stage_risk: RiskLevelZ,
    stage_ratio: z.number().finite().nullable(),
    inputs: z
      .object({
        stage_ft: z.number().finite().nullable(),
        flood_stage_ft: z.number().finite().nullable(),
        rain_mm_72h: z.number().finite().nullable(),
      })
      .strict(),
  })
  .strict();

export type RiskLevel = z.infer<typeof RiskLevelZ>;
export type RiskAssessmentV1 = z.infer<typeof RiskAssessmentV1Schema>;
