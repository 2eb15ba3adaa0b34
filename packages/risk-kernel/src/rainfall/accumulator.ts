// Risk Kernel - rainfall accumulator
//
// Collapses irregular QPF periods into one total for the window [now, now + horizon).
// Each period's depth is assumed evenly spread over its duration, so a period that
// straddles a window edge contributes in proportion to the hours inside the window.
//
// No IO. "now" is always passed in.

import type { PrecipitationPeriodV1, ProbabilityPeriodV1 } from "@floodrisk/contracts";

export const DEFAULT_HORIZON_HOURS = 72;

const MS_PER_HOUR = 3_600_000;

export type RainfallWindow = { startTs: number; endTs: number };

export type RainfallAccumulation = {
  total_mm: number;
  // Periods that overlapped the window and were counted.
  periods_used: number;
};

export function rainfallWindow(nowMs: number, horizonHours: number = DEFAULT_HORIZON_HOURS): RainfallWindow {
  return { startTs: nowMs, endTs: nowMs + horizonHours * MS_PER_HOUR };
}

/**
 * Overlap of a period with the window, in hours. Zero or negative means no overlap.
 */
export function overlapHours(
  period: Pick<PrecipitationPeriodV1, "start_ts" | "duration_hours">,
  window: RainfallWindow
): number {
  const periodEnd = period.start_ts + period.duration_hours * MS_PER_HOUR;
  const start = Math.max(period.start_ts, window.startTs);
  const end = Math.min(periodEnd, window.endTs);
  return (end - start) / MS_PER_HOUR;
}

export function accumulateRainfall(
  periods: ReadonlyArray<PrecipitationPeriodV1>,
  nowMs: number,
  horizonHours: number = DEFAULT_HORIZON_HOURS
): RainfallAccumulation {
  const window = rainfallWindow(nowMs, horizonHours);

  let total = 0;
  let used = 0;
  for (const p of periods) {
    // zero-length periods carry no rate
    if (!(p.duration_hours > 0)) continue;
    if (!Number.isFinite(p.value_mm) || !Number.isFinite(p.start_ts)) continue;
    if (p.value_mm < 0) continue;

    const overlap = overlapHours(p, window);
    if (overlap <= 0) continue;

    total += p.value_mm * (overlap / p.duration_hours);
    used++;
  }

  return { total_mm: total, periods_used: used };
}

/**
 * Highest probability of precipitation among periods that overlap the window.
 */
export function maxProbabilityInWindow(
  periods: ReadonlyArray<ProbabilityPeriodV1>,
  nowMs: number,
  horizonHours: number = DEFAULT_HORIZON_HOURS
): number | null {
  const window = rainfallWindow(nowMs, horizonHours);
  let best: number | null = null;
  for (const p of periods) {
    if (p.probability_pct === null || !(p.duration_hours > 0)) continue;
    if (overlapHours(p, window) <= 0) continue;
    if (best === null || p.probability_pct > best) best = p.probability_pct;
  }
  return best;
}
