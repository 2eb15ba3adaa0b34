import type { DailyReadingV1, HistoricalStatsV1, MonthlySummaryV1 } from "@floodrisk/contracts";

function finiteOnly(xs: ReadonlyArray<number | null>): number[] {
  const out: number[] = [];
  for (const x of xs) if (typeof x === "number" && Number.isFinite(x)) out.push(x);
  return out;
}

function mean(xs: number[]): number | null {
  if (!xs.length) return null;
  let s = 0;
  for (const x of xs) s += x;
  return s / xs.length;
}

// Sample standard deviation (n - 1).
function sampleStd(xs: number[]): number | null {
  if (xs.length < 2) return null;
  const m = mean(xs) ?? 0;
  let ss = 0;
  for (const x of xs) ss += (x - m) * (x - m);
  return Math.sqrt(ss / (xs.length - 1));
}

/**
 * Quantile by linear interpolation between closest ranks, q in [0, 1].
 */
export function quantile(xs: ReadonlyArray<number>, q: number): number | null {
  if (!xs.length) return null;
  const sorted = [...xs].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

function summarize(values: ReadonlyArray<number | null>): MonthlySummaryV1 {
  const xs = finiteOnly(values);
  return { mean: mean(xs), std: sampleStd(xs), median: quantile(xs, 0.5) };
}

function monthOf(date: string): number {
  return Number(date.slice(5, 7));
}

/**
 * Per-calendar-month stage (and discharge) summaries plus global stage percentiles.
 * Months are taken from the calendar date as written, not shifted through a timezone.
 */
export function computeHistoricalStats(readings: ReadonlyArray<DailyReadingV1>): HistoricalStatsV1 {
  if (!readings.length) return {};

  const byMonth = new Map<number, DailyReadingV1[]>();
  for (const r of readings) {
    const m = monthOf(r.date);
    if (!(m >= 1 && m <= 12)) continue;
    const bucket = byMonth.get(m);
    if (bucket) bucket.push(r);
    else byMonth.set(m, [r]);
  }
  const months = [...byMonth.keys()].sort((a, b) => a - b);

  const monthly_stage: Record<string, MonthlySummaryV1> = {};
  for (const m of months) {
    monthly_stage[String(m)] = summarize((byMonth.get(m) ?? []).map((r) => r.stage_ft));
  }

  const stats: HistoricalStatsV1 = { monthly_stage, stage_percentiles: {} };

  if (readings.some((r) => r.discharge_cfs !== null)) {
    const monthly_discharge: Record<string, MonthlySummaryV1> = {};
    for (const m of months) {
      monthly_discharge[String(m)] = summarize((byMonth.get(m) ?? []).map((r) => r.discharge_cfs));
    }
    stats.monthly_discharge = monthly_discharge;
  }

  const stage = finiteOnly(readings.map((r) => r.stage_ft));
  const p50 = quantile(stage, 0.5);
  const p85 = quantile(stage, 0.85);
  const p95 = quantile(stage, 0.95);
  if (p50 !== null && p85 !== null && p95 !== null) {
    stats.stage_percentiles = { p50, p85, p95 };
  }

  return stats;
}
