import { ThresholdBandsV1Schema, type ThresholdBandsV1 } from "@floodrisk/contracts";
import { ConfigError, issuesFromZod } from "../errors";

/**
 * Both bands are required and every cut point must be present: a missing key is a
 * configuration error, never a silent default. Only `high_boundary` has a default.
 */
export function validateThresholds(input: unknown, source = "thresholds"): ThresholdBandsV1 {
  const parsed = ThresholdBandsV1Schema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError("CONFIG_INVALID", source, issuesFromZod(parsed.error.issues));
  }
  return parsed.data;
}
