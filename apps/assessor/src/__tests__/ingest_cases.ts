import assert from "node:assert";

import type { GaugeV1 } from "@floodrisk/contracts";

import { silentLogger } from "../logger";
import { NwsForecastSource } from "../ingest/nws_forecast_source";
import { UsgsStageSource } from "../ingest/usgs_stage_source";
import { startFakeUpstream } from "./fake_upstream";
import { GRID_COORDS, GRID_RAIN_72H_MM, NOW, OTHER_COORDS, startHydroUpstream } from "./hydro_upstream";

const log = silentLogger();

function gauge(id: string, coords: { latitude: number; longitude: number } | null): GaugeV1 {
  return {
    id,
    latitude: coords?.latitude ?? null,
    longitude: coords?.longitude ?? null,
    flood_stage_ft: 10,
  };
}

export async function runIngestCases(): Promise<void> {
  const up = await startHydroUpstream();
  try {
    const stage = new UsgsStageSource({ baseUrl: up.baseUrl, timeoutMs: 200, userAgent: "floodrisk-test" }, log);

    // --- stage: latest sample by timestamp, noDataValue skipped ---
    {
      const r = await stage.fetchLatest("11447650");
      assert.ok(r.ok);
      assert.deepEqual(r.value, {
        gauge_id: "11447650",
        observed_at: "2024-02-09T23:50:00.000-08:00",
        stage_ft: 8.1,
        stage_observed_at: "2024-02-09T23:45:00.000-08:00",
        discharge_cfs: 1520,
        discharge_observed_at: "2024-02-09T23:50:00.000-08:00",
      });
      assert.ok(r.raw !== undefined, "raw payload kept on the source result");
      assert.ok(
        up.hits.includes("/nwis/iv/?sites=11447650&parameterCd=00060%2C00065&format=json&siteStatus=all"),
        `iv request url, got ${up.hits.join(" | ")}`
      );
      console.log("[OK] stage latest sample");
    }

    // --- stage: same timestamp across series keeps the larger value, in either order ---
    {
      for (const id of ["TWIN", "TWINR"]) {
        const r = await stage.fetchLatest(id);
        assert.ok(r.ok, id);
        assert.equal(r.value.stage_ft, 4.4, `${id}: stage`);
        assert.equal(r.value.stage_observed_at, "2024-02-09T23:45:00.000-08:00");
      }
      console.log("[OK] stage tie across series");
    }

    // --- stage: no samples is not a failure ---
    {
      const r = await stage.fetchLatest("EMPTY");
      assert.ok(r.ok);
      assert.deepEqual(r.value, {
        gauge_id: "EMPTY",
        observed_at: null,
        stage_ft: null,
        stage_observed_at: null,
        discharge_cfs: null,
        discharge_observed_at: null,
      });
      console.log("[OK] stage empty series");
    }

    // --- stage: failure kinds ---
    {
      const cases: Array<[string, string, number | undefined]> = [
        ["B500", "http_status", 500],
        ["BADJSON", "invalid_json", 200],
        ["BROKEN", "malformed_payload", undefined],
        ["SLOW", "timeout", undefined],
      ];
      for (const [id, kind, status] of cases) {
        const r = await stage.fetchLatest(id);
        assert.ok(!r.ok, `${id}: expected failure`);
        assert.equal(r.error.kind, kind, `${id}: kind`);
        assert.equal(r.error.status, status, `${id}: status`);
        assert.ok(r.error.url?.includes(`sites=${id}`), `${id}: url echoed`);
        console.log(`[FAIL-AS-EXPECTED] ${id}: ${r.error.message}`);
      }
    }

    const forecast = new NwsForecastSource({ baseUrl: up.baseUrl, timeoutMs: 200, userAgent: "floodrisk-test" }, log);

    // --- forecast: 72h accumulation from the grid ---
    {
      const r = await forecast.fetchRainfall(gauge("F1", GRID_COORDS), NOW);
      assert.ok(r.ok);
      assert.deepEqual(r.value, {
        gauge_id: "F1",
        rain_72h_mm: GRID_RAIN_72H_MM,
        window: { start: "2024-02-10T00:00:00.000Z", end: "2024-02-13T00:00:00.000Z" },
        period_count: 5,
        periods_used: 4,
        no_usable_periods: false,
        max_probability_pct: 80,
        grid: { grid_id: "STO", grid_x: 41, grid_y: 68, forecast_url: `${up.baseUrl}/gridpoints/STO/41,68` },
      });
      assert.ok(up.hits.includes("/points/38.4560,-121.5010"), "points request url");
      console.log("[OK] forecast accumulation");
    }

    // --- forecast: metadata gaps ---
    {
      const noCoords = await forecast.fetchRainfall(gauge("F2", null), NOW);
      assert.ok(!noCoords.ok);
      assert.equal(noCoords.error.kind, "incomplete_metadata");

      const partialGrid = await forecast.fetchRainfall(gauge("F3", OTHER_COORDS), NOW);
      assert.ok(!partialGrid.ok);
      assert.equal(partialGrid.error.kind, "incomplete_metadata");
      assert.equal(partialGrid.error.url, `${up.baseUrl}/points/40.0000,-120.0000`);

      const unknownPoint = await forecast.fetchRainfall(gauge("F4", { latitude: 1, longitude: 2 }), NOW);
      assert.ok(!unknownPoint.ok);
      assert.equal(unknownPoint.error.kind, "http_status");
      assert.equal(unknownPoint.error.status, 404);
      console.log("[OK] forecast metadata failures");
    }
  } finally {
    await up.close();
  }

  // --- forecast: grid with no usable QPF periods ---
  const bare = await startFakeUpstream((app, ref) => {
    app.get("/points/:coords", async () => ({
      properties: { gridId: "MTR", gridX: 1, gridY: 2, forecastGridData: `${ref.baseUrl}/gridpoints/MTR/1,2` },
    }));
    app.get("/gridpoints/:office/:xy", async () => ({ properties: { quantitativePrecipitation: { values: [] } } }));
  });
  try {
    const forecast = new NwsForecastSource({ baseUrl: bare.baseUrl, timeoutMs: 1000, userAgent: "floodrisk-test" }, log);
    const r = await forecast.fetchRainfall(gauge("F5", GRID_COORDS), NOW);
    assert.ok(r.ok);
    assert.equal(r.value.rain_72h_mm, 0);
    assert.equal(r.value.no_usable_periods, true);
    assert.equal(r.value.period_count, 0);
    assert.equal(r.value.max_probability_pct, null);
    console.log("[OK] forecast without QPF periods");
  } finally {
    await bare.close();
  }

  // --- network failure: nothing listening ---
  {
    const gone = await startFakeUpstream(() => undefined);
    await gone.close();
    const stage = new UsgsStageSource({ baseUrl: gone.baseUrl, timeoutMs: 1000 }, log);
    const r = await stage.fetchLatest("G1");
    assert.ok(!r.ok);
    assert.equal(r.error.kind, "network");
    console.log(`[FAIL-AS-EXPECTED] closed port: ${r.error.message}`);
  }
}
