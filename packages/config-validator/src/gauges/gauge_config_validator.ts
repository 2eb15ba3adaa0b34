import { GaugeConfigV1Schema, type GaugeConfigV1 } from "@floodrisk/contracts";
import { ConfigError, issuesFromZod } from "../errors";

/**
 * Admission check for the gauge list: `gauges` must be a list, every entry needs an id,
 * ids are unique. Coordinates and flood stage may be absent (they surface later as
 * per-gauge forecast failures or UNKNOWN stage risk).
 */
export function validateGaugeConfig(input: unknown, source = "gauge config"): GaugeConfigV1 {
  const parsed = GaugeConfigV1Schema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError("CONFIG_INVALID", source, issuesFromZod(parsed.error.issues));
  }
  return parsed.data;
}
