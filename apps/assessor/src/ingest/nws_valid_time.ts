// NWS gridpoint "validTime": "<ISO start>/<ISO-8601 duration>", e.g.
// "2024-02-10T00:00:00+00:00/PT6H" or "2024-02-10T06:00:00+00:00/P1DT6H".

export type ValidTime = {
  start_ts: number;
  duration_hours: number;
};

const DURATION_RE = /^P(?:(\d+(?:\.\d+)?)D)?(?:T(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?)?$/;
const HAS_OFFSET_RE = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Duration in hours, or null when the text is not a D/H/M duration ("P", "PT" and
 * week/month/year forms included).
 */
export function parseDurationHours(text: string): number | null {
  const m = DURATION_RE.exec(text.trim());
  if (!m) return null;
  const [, d, h, min] = m;
  if (d === undefined && h === undefined && min === undefined) return null;
  return Number(d ?? 0) * 24 + Number(h ?? 0) + Number(min ?? 0) / 60;
}

/**
 * A start without an offset is read as UTC.
 */
export function parseStartTs(text: string): number | null {
  const s = text.trim();
  if (!s) return null;
  const ts = Date.parse(HAS_OFFSET_RE.test(s) || !s.includes("T") ? s : `${s}Z`);
  return Number.isFinite(ts) ? ts : null;
}

export function parseValidTime(validTime: string): ValidTime | null {
  const parts = validTime.split("/");
  if (parts.length !== 2) return null;
  const start_ts = parseStartTs(parts[0]);
  const duration_hours = parseDurationHours(parts[1]);
  if (start_ts === null || duration_hours === null) return null;
  return { start_ts, duration_hours };
}
