import { z } from "zod";

/**
 * Latest stage/discharge reading for one gauge.
 *
 * Each parameter keeps its own timestamp; `observed_at` is the later of the two.
 * A parameter with no usable sample is null, which is not a failure.
 */
export const StageObservationV1Schema = z
  .object({
    gauge_id: z.string().min(1),
    observed_at: z.string().min(1).nullable(),
    stage_ft: z.number().finite().nullable(),
    stage_observed_at: z.string().min(1).nullable(),
    discharge_cfs: z.number().finite().nullable(),
    discharge_observed_at: z.string().min(1).nullable(),
  })
  .strict();

export type StageObservationV1 = z.infer<typeof StageObservationV1Schema>;
