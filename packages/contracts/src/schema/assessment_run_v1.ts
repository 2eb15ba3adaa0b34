import { z } from "zod";
import { RiskAssessmentV1Schema } from "./risk_assessment_v1";
import { StageObservationV1Schema } from "./stage_observation_v1";
import { RainfallEstimateV1Schema } from "./rainfall_estimate_v1";
import { IngestFailureV1Schema, ingestResultV1Schema } from "./ingest_result_v1";

export const AssessmentRunV1Schema = z
  .object({
    type: z.literal("flood_risk_run_v1"),
    run_id: z.string().min(1),
    generated_at: z.string().min(1),
    window: z.object({ start: z.string(), end: z.string() }).strict(),
    determinism_hash: z.string().regex(/^sha256:[0-9a-f]{64}$/),
    gauges: z.record(RiskAssessmentV1Schema),
    stage: z.record(ingestResultV1Schema(StageObservationV1Schema)),
    rainfall: z.record(ingestResultV1Schema(RainfallEstimateV1Schema)),
    errors: z.record(z.array(IngestFailureV1Schema)),
  })
  .strict()
  .superRefine((run, ctx) => {
    // every classified gauge carries both ingestion snapshots
    for (const id of Object.keys(run.gauges)) {
      if (!(id in run.stage)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `missing stage snapshot for ${id}`, path: ["stage", id] });
      }
      if (!(id in run.rainfall)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `missing rainfall snapshot for ${id}`, path: ["rainfall", id] });
      }
    }
  });

export type AssessmentRunV1 = z.infer<typeof AssessmentRunV1Schema>;

export function parseAssessmentRunV1(input: unknown): AssessmentRunV1 {
  return AssessmentRunV1Schema.parse(input);
}
