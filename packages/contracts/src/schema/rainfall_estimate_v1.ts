import { z } from "zod";

export const ForecastGridRefV1Schema = z
  .object({
    grid_id: z.string().min(1),
    grid_x: z.number().int(),
    grid_y: z.number().int(),
    forecast_url: z.string().url(),
  })
  .strict();

export const RainfallEstimateV1Schema = z
  .object({
    gauge_id: z.string().min(1),
    rain_72h_mm: z.number().finite().nonnegative(),
    window: z.object({ start: z.string(), end: z.string() }).strict(),
    period_count: z.number().int().nonnegative(),
    periods_used: z.number().int().nonnegative(),
    // true when the forecast parsed to zero QPF periods; rain_72h_mm is then 0
    no_usable_periods: z.boolean(),
    // highest probabilityOfPrecipitation among periods overlapping the window
    max_probability_pct: z.number().finite().nullable(),
    grid: ForecastGridRefV1Schema,
  })
  .strict();

export type ForecastGridRefV1 = z.infer<typeof ForecastGridRefV1Schema>;
export type RainfallEstimateV1 = z.infer<typeof RainfallEstimateV1Schema>;
