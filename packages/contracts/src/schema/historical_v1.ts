import { z } from "zod";

export const DailyReadingV1Schema = z
  .object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    stage_ft: z.number().finite().nullable(),
    discharge_cfs: z.number().finite().nullable(),
  })
  .strict();

export const MonthlySummaryV1Schema = z
  .object({
    mean: z.number().nullable(),
    std: z.number().nullable(),
    median: z.number().nullable(),
  })
  .strict();

export const StagePercentilesV1Schema = z
  .object({
    p50: z.number(),
    p85: z.number(),
    p95: z.number(),
  })
  .strict();

// An empty archive yields {} (every key absent).
export const HistoricalStatsV1Schema = z
  .object({
    // keyed by calendar month "1".."12"
    monthly_stage: z.record(MonthlySummaryV1Schema).optional(),
    monthly_discharge: z.record(MonthlySummaryV1Schema).optional(),
    stage_percentiles: StagePercentilesV1Schema.partial().optional(),
  })
  .strict();

export type DailyReadingV1 = z.infer<typeof DailyReadingV1Schema>;
export type MonthlySummaryV1 = z.infer<typeof MonthlySummaryV1Schema>;
export type StagePercentilesV1 = z.infer<typeof StagePercentilesV1Schema>;
export type HistoricalStatsV1 = z.infer<typeof HistoricalStatsV1Schema>;
