import { z } from "zod";

// USGS site numbers are at least 8 digits.
export const MIN_NUMERIC_GAUGE_ID_DIGITS = 8;

// YAML reads unquoted site numbers as integers and drops leading zeros
// (01646500 -> 1646500), so a short numeric id is refused. Ids are strings downstream.
const GaugeIdZ = z
  .union([z.string().trim().min(1), z.number().int().nonnegative()])
  .superRefine((v, ctx) => {
    if (typeof v === "number" && String(v).length < MIN_NUMERIC_GAUGE_ID_DIGITS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `numeric gauge id ${v} has fewer than ${MIN_NUMERIC_GAUGE_ID_DIGITS} digits; quote it to keep leading zeros`,
      });
    }
  })
  .transform((v) => String(v));

export const GaugeV1Schema = z
  .object({
    id: GaugeIdZ,
    name: z.string().min(1).optional(),
    latitude: z.number().min(-90).max(90).nullable().default(null),
    longitude: z.number().min(-180).max(180).nullable().default(null),
    flood_stage_ft: z.number().finite().nullable().default(null),
  });

export const GaugeConfigV1Schema = z
  .object({
    gauges: z.array(GaugeV1Schema),
  })
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    cfg.gauges.forEach((g, i) => {
      if (seen.has(g.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate gauge id: ${g.id}`,
          path: ["gauges", i, "id"],
        });
      }
      seen.add(g.id);
    });
  });

export type GaugeV1 = z.infer<typeof GaugeV1Schema>;
export type GaugeConfigV1 = z.infer<typeof GaugeConfigV1Schema>;
