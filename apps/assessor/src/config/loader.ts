// File-backed config loading. Validation itself lives in @floodrisk/config-validator;
// this module only owns the disk read and the "file is missing" refusal.

import fs from "node:fs";
import path from "node:path";

import type { GaugeConfigV1, ThresholdBandsV1 } from "@floodrisk/contracts";
import { ConfigError, parseYamlDocument, validateGaugeConfig, validateThresholds } from "@floodrisk/config-validator";

export const DEFAULT_GAUGES_PATH = path.join("config", "gauges.yml");
export const DEFAULT_THRESHOLDS_PATH = path.join("config", "thresholds.yml");

function readYamlFile(p: string): Record<string, unknown> {
  const abs = path.resolve(p);
  if (!fs.existsSync(abs)) {
    throw new ConfigError("CONFIG_NOT_FOUND", p, [{ path: "", message: `no such file: ${abs}` }]);
  }
  return parseYamlDocument(fs.readFileSync(abs, "utf8"), p);
}

export function loadGaugeConfigFile(p: string): GaugeConfigV1 {
  return validateGaugeConfig(readYamlFile(p), p);
}

export function loadThresholdsFile(p: string): ThresholdBandsV1 {
  return validateThresholds(readYamlFile(p), p);
}
