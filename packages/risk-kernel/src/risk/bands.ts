// Risk Kernel - band classification
//
// Shared by the rainfall and stage-ratio signals:
//   past high                 -> HIGH
//   value <= low              -> LOW
//   otherwise                 -> MEDIUM
//
// The high check runs first so a degenerate band (medium == high) still honours
// the boundary policy.
//
// "Past high" is an explicit policy on the band (high_boundary):
//   exclusive: value >  high
//   inclusive: value >= high

import type { BandTripletV1, RiskLevel } from "@floodrisk/contracts";

export function exceedsHigh(value: number, band: BandTripletV1): boolean {
  return band.high_boundary === "inclusive" ? value >= band.high : value > band.high;
}

export function classifyBand(value: number, band: BandTripletV1): RiskLevel {
  if (exceedsHigh(value, band)) return "HIGH";
  if (value <= band.low) return "LOW";
  return "MEDIUM";
}
