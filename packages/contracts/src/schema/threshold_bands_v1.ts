import { z } from "zod";

export const HighBoundaryV1Z = z.enum(["exclusive", "inclusive"]);

export const BandTripletV1Schema = z
  .object({
    low: z.number().finite(),
    medium: z.number().finite(),
    high: z.number().finite(),
    // exclusive: HIGH needs value > high; inclusive: value >= high
    high_boundary: HighBoundaryV1Z.default("exclusive"),
  })
  .strict()
  .refine((b) => b.low <= b.medium && b.medium <= b.high, {
    message: "band cut points must ascend: low <= medium <= high",
  });

export const ThresholdBandsV1Schema = z
  .object({
    rainfall_mm_72h: BandTripletV1Schema,
    river_stage_ratio: BandTripletV1Schema,
  });

export type HighBoundaryV1 = z.infer<typeof HighBoundaryV1Z>;
export type BandTripletV1 = z.infer<typeof BandTripletV1Schema>;
export type ThresholdBandsV1 = z.infer<typeof ThresholdBandsV1Schema>;
