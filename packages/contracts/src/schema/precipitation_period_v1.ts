import { z } from "zod";

export const PrecipitationPeriodV1Schema = z.object({
  start_ts: z.number().finite(), // unix ms
  duration_hours: z.number().finite(),
  value_mm: z.number().finite(),
});

export const ProbabilityPeriodV1Schema = z.object({
  start_ts: z.number().finite(),
  duration_hours: z.number().finite(),
  probability_pct: z.number().finite().nullable(),
});

export type PrecipitationPeriodV1 = z.infer<typeof PrecipitationPeriodV1Schema>;
export type ProbabilityPeriodV1 = z.infer<typeof ProbabilityPeriodV1Schema>;
