import type { BandTripletV1, RiskLevel } from "@floodrisk/contracts";
import { classifyBand } from "./bands";

function isKnown(x: number | null | undefined): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

export function rainRisk(rainMm: number | null | undefined, band: BandTripletV1): RiskLevel {
  if (!isKnown(rainMm)) return "UNKNOWN";
  return classifyBand(rainMm, band);
}

/**
 * stage / flood stage, or null when either side is missing or flood stage is 0.
 */
export function stageRatio(stageFt: number | null | undefined, floodStageFt: number | null | undefined): number | null {
  if (!isKnown(stageFt) || !isKnown(floodStageFt) || floodStageFt === 0) return null;
  return stageFt / floodStageFt;
}

export function stageRisk(
  stageFt: number | null | undefined,
  floodStageFt: number | null | undefined,
  band: BandTripletV1
): RiskLevel {
  const ratio = stageRatio(stageFt, floodStageFt);
  if (ratio === null) return "UNKNOWN";
  return classifyBand(ratio, band);
}
