import type {
  ForecastGridRefV1,
  GaugeV1,
  IngestResultV1,
  PrecipitationPeriodV1,
  ProbabilityPeriodV1,
  RainfallEstimateV1,
} from "@floodrisk/contracts";
import { DEFAULT_HORIZON_HOURS, accumulateRainfall, maxProbabilityInWindow, rainfallWindow } from "@floodrisk/risk-kernel";

import type { Logger } from "../logger";
import { httpJson } from "../http/http_json";
import { isObj, toFiniteNumber } from "../util";
import { IngestError, captureIngest } from "./ingest_error";
import { parseValidTime } from "./nws_valid_time";

export type NwsSourceOptions = {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  horizonHours?: number;
};

export type GridForecast = {
  qpf: PrecipitationPeriodV1[];
  pop: ProbabilityPeriodV1[];
  skipped: string[];
};

export function nwsPointsUrl(baseUrl: string, lat: number, lon: number): string {
  return `${baseUrl}/points/${lat.toFixed(4)},${lon.toFixed(4)}`;
}

/**
 * Reads gridId/gridX/gridY/forecastGridData from a /points response.
 */
export function parsePointMetadata(payload: unknown, url?: string): ForecastGridRefV1 {
  const props = isObj(payload) && isObj(payload.properties) ? payload.properties : {};
  const grid_id = typeof props.gridId === "string" && props.gridId ? props.gridId : null;
  const grid_x = toFiniteNumber(props.gridX);
  const grid_y = toFiniteNumber(props.gridY);
  const forecast_url = typeof props.forecastGridData === "string" && props.forecastGridData ? props.forecastGridData : null;

  if (grid_id === null || grid_x === null || grid_y === null || forecast_url === null) {
    throw new IngestError("incomplete_metadata", "point metadata lacks gridId/gridX/gridY/forecastGridData", { url });
  }
  return { grid_id, grid_x: Math.trunc(grid_x), grid_y: Math.trunc(grid_y), forecast_url };
}

function layerValues(props: Record<string, unknown>, key: string): unknown[] {
  const layer = props[key];
  return isObj(layer) && Array.isArray(layer.values) ? layer.values : [];
}

/**
 * QPF (mm per period) and PoP periods from a gridpoint forecast. Entries with an
 * unreadable validTime, no value, or a negative amount are collected in `skipped`.
 */
export function parseGridForecast(payload: unknown, url?: string): GridForecast {
  if (!isObj(payload) || !isObj(payload.properties)) {
    throw new IngestError("malformed_payload", "expected properties{} in gridpoint forecast", { url });
  }
  const props = payload.properties;
  const out: GridForecast = { qpf: [], pop: [], skipped: [] };

  for (const item of layerValues(props, "quantitativePrecipitation")) {
    if (!isObj(item) || typeof item.validTime !== "string") continue;
    const vt = parseValidTime(item.validTime);
    // kg/m^2 == mm of water
    const value_mm = toFiniteNumber(item.value);
    if (!vt || value_mm === null || value_mm < 0) {
      out.skipped.push(item.validTime);
      continue;
    }
    out.qpf.push({ start_ts: vt.start_ts, duration_hours: vt.duration_hours, value_mm });
  }

  for (const item of layerValues(props, "probabilityOfPrecipitation")) {
    if (!isObj(item) || typeof item.validTime !== "string") continue;
    const vt = parseValidTime(item.validTime);
    if (!vt) {
      out.skipped.push(item.validTime);
      continue;
    }
    out.pop.push({ start_ts: vt.start_ts, duration_hours: vt.duration_hours, probability_pct: toFiniteNumber(item.value) });
  }

  return out;
}

/**
 * Expected rainfall over the next 72 hours at a gauge's coordinates, from the NWS
 * gridpoint forecast. Two requests: /points to resolve the grid, then the grid data.
 */
export class NwsForecastSource {
  private readonly log: Logger;

  constructor(private readonly opts: NwsSourceOptions, logger: Logger) {
    this.log = logger.child({ component: "nws_forecast" });
  }

  async fetchRainfall(gauge: GaugeV1, nowMs: number): Promise<IngestResultV1<RainfallEstimateV1>> {
    const log = this.log.child({ gauge_id: gauge.id });
    const horizon = this.opts.horizonHours ?? DEFAULT_HORIZON_HOURS;
    const headers = { Accept: "application/geo+json", "User-Agent": this.opts.userAgent };

    return captureIngest(
      async () => {
        const { latitude: lat, longitude: lon } = gauge;
        if (lat === null || lon === null) {
          throw new IngestError("incomplete_metadata", "gauge has no latitude/longitude");
        }

        const pointsUrl = nwsPointsUrl(this.opts.baseUrl, lat, lon);
        const points = await httpJson(pointsUrl, { timeoutMs: this.opts.timeoutMs, headers, logger: log });
        const grid = parsePointMetadata(points, pointsUrl);

        const forecast = await httpJson(grid.forecast_url, { timeoutMs: this.opts.timeoutMs, headers, logger: log });
        const parsed = parseGridForecast(forecast, grid.forecast_url);
        for (const vt of parsed.skipped) log.debug({ validTime: vt }, "skipped forecast entry");

        const acc = accumulateRainfall(parsed.qpf, nowMs, horizon);
        const window = rainfallWindow(nowMs, horizon);
        const no_usable_periods = parsed.qpf.length === 0;
        if (no_usable_periods) log.warn({ url: grid.forecast_url }, "no QPF periods parsed from forecast");

        const value: RainfallEstimateV1 = {
          gauge_id: gauge.id,
          rain_72h_mm: acc.total_mm,
          window: { start: new Date(window.startTs).toISOString(), end: new Date(window.endTs).toISOString() },
          period_count: parsed.qpf.length,
          periods_used: acc.periods_used,
          no_usable_periods,
          max_probability_pct: maxProbabilityInWindow(parsed.pop, nowMs, horizon),
          grid,
        };
        log.info({ rain_72h_mm: Number(acc.total_mm.toFixed(2)) }, "rainfall estimated");
        return { value, raw: { points, forecast } };
      },
      (err) => log.error({ kind: err.kind, status: err.status, url: err.url }, `forecast fetch failed: ${err.message}`)
    );
  }
}
