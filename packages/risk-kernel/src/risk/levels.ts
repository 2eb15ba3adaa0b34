import { RISK_LEVELS, type RiskLevel } from "@floodrisk/contracts";

/**
 * Severity rank: UNKNOWN(0) < LOW(1) < MEDIUM(2) < HIGH(3).
 */
export function riskRank(level: RiskLevel): number {
  return RISK_LEVELS.indexOf(level);
}

/**
 * The more severe of two sub-risks. UNKNOWN only wins when both sides are UNKNOWN.
 * Ties keep the first argument (the two are equal anyway).
 */
export function combineRisk(a: RiskLevel, b: RiskLevel): RiskLevel {
  return riskRank(b) > riskRank(a) ? b : a;
}
