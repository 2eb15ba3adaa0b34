// USGS Water Services JSON (WaterML-as-JSON) reader, shared by the instantaneous-values
// (nwis/iv) and daily-values (nwis/dv) clients.

import { IngestError } from "./ingest_error";
import { isObj, toFiniteNumber } from "../util";

export const PARAM_DISCHARGE_CFS = "00060";
export const PARAM_STAGE_FT = "00065";

export type UsgsSample = {
  dateTime: string;
  ts: number;
  value: number;
};

export type UsgsSeries = {
  param_code: string | null;
  samples: UsgsSample[];
};

function firstOf(x: unknown): unknown {
  return Array.isArray(x) && x.length ? x[0] : undefined;
}

function readSeries(series: unknown): UsgsSeries {
  if (!isObj(series)) return { param_code: null, samples: [] };

  const variable = isObj(series.variable) ? series.variable : {};
  const code = firstOf(variable.variableCode);
  const param_code = isObj(code) && typeof code.value === "string" ? code.value : null;
  const noData = toFiniteNumber(variable.noDataValue);

  const block = firstOf(series.values);
  const entries = isObj(block) && Array.isArray(block.value) ? block.value : [];

  const samples: UsgsSample[] = [];
  for (const e of entries) {
    if (!isObj(e) || typeof e.dateTime !== "string") continue;
    const value = toFiniteNumber(e.value);
    if (value === null) continue;
    if (noData !== null && value === noData) continue;
    const ts = Date.parse(e.dateTime);
    if (!Number.isFinite(ts)) continue;
    samples.push({ dateTime: e.dateTime, ts, value });
  }
  return { param_code, samples };
}

/**
 * Extracts `value.timeSeries[]`. Anything not shaped like that envelope is a
 * malformed payload; an empty list is valid (the site reported nothing).
 */
export function parseUsgsTimeSeries(payload: unknown, url?: string): UsgsSeries[] {
  const value = isObj(payload) ? payload.value : undefined;
  const timeSeries = isObj(value) ? value.timeSeries : undefined;
  if (!Array.isArray(timeSeries)) {
    throw new IngestError("malformed_payload", "expected value.timeSeries[] in USGS response", { url });
  }
  return timeSeries.map(readSeries);
}

/** Later timestamp wins; on equal timestamps the larger value does. */
export function isNewerSample(candidate: UsgsSample, current: UsgsSample | null): boolean {
  if (!current) return true;
  return candidate.ts > current.ts || (candidate.ts === current.ts && candidate.value > current.value);
}

/**
 * Most recent sample by timestamp, regardless of list order.
 */
export function latestSample(samples: ReadonlyArray<UsgsSample>): UsgsSample | null {
  let best: UsgsSample | null = null;
  for (const s of samples) {
    if (isNewerSample(s, best)) best = s;
  }
  return best;
}
