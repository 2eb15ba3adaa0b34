import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { ConfigError } from "@floodrisk/config-validator";

import { silentLogger } from "../logger";
import { UsgsDailySource } from "../history/usgs_daily_source";
import { computeStatsForDirectory, fetchAllHistory } from "../history/history_runner";
import { formatDailyCsv, parseDailyCsv, readDailyCsv, ArchiveFormatError } from "../history/daily_csv";
import { NOW, startHydroUpstream } from "./hydro_upstream";

function approx(actual: number | null | undefined, expected: number, label: string): void {
  assert.ok(typeof actual === "number", `${label}: expected a number, got ${String(actual)}`);
  assert.ok(Math.abs(actual - expected) < 1e-9, `${label}: expected ${expected}, got ${actual}`);
}

export function runCsvCases(): void {
  const text = formatDailyCsv([
    { date: "2024-01-05", stage_ft: 2, discharge_cfs: 100 },
    { date: "2024-01-06", stage_ft: 4, discharge_cfs: null },
  ]);
  assert.equal(text, "date,stage_ft,discharge_cfs\n2024-01-05,2,100\n2024-01-06,4,\n");
  assert.deepEqual(parseDailyCsv(text, "a.csv"), [
    { date: "2024-01-05", stage_ft: 2, discharge_cfs: 100 },
    { date: "2024-01-06", stage_ft: 4, discharge_cfs: null },
  ]);

  // archives written with a timestamp column are cut to the day
  assert.deepEqual(parseDailyCsv("timestamp,stage_ft,discharge_cfs\r\n2024-03-01 00:00:00,1.5,\r\n", "b.csv"), [
    { date: "2024-03-01", stage_ft: 1.5, discharge_cfs: null },
  ]);

  assert.throws(() => parseDailyCsv("", "c.csv"), ArchiveFormatError);
  assert.throws(() => parseDailyCsv("day,stage\n", "d.csv"), /d\.csv: unexpected header/);
  assert.throws(() => parseDailyCsv("date,stage_ft,discharge_cfs\n2024-01-01,abc,\n", "e.csv"), /e\.csv: line 2: not a number: abc/);
  assert.throws(() => parseDailyCsv("date,stage_ft,discharge_cfs\nyesterday,1,\n", "f.csv"), /f\.csv: line 2: bad date/);
  console.log("[OK] daily csv");
}

export async function runHistoryCases(): Promise<void> {
  const log = silentLogger();
  const tmp = fs.mkdtempSync(path.join(os.tmpdir(), "floodrisk-history-"));
  const up = await startHydroUpstream();
  try {
    const source = new UsgsDailySource({ baseUrl: up.baseUrl, timeoutMs: 1000 }, log);
    const gauges = [
      { id: "G1", latitude: null, longitude: null, flood_stage_ft: null },
      { id: "G3", latitude: null, longitude: null, flood_stage_ft: null },
    ];

    const res = await fetchAllHistory(source, gauges, { outDir: tmp, nowMs: NOW, yearsBack: 1 }, log);

    assert.deepEqual(res.G1, { ok: true, path: path.join(tmp, "G1_daily.csv"), rows: 3 });
    const g3 = res.G3;
    assert.ok(!g3.ok && !("path" in g3));
    assert.equal(g3.error.kind, "http_status");
    assert.equal(fs.existsSync(path.join(tmp, "G3_daily.csv")), false);
    assert.ok(
      up.hits.includes("/nwis/dv/?format=json&sites=G1&startDT=2023-02-10&endDT=2024-02-10&parameterCd=00060%2C00065"),
      `dv request url, got ${up.hits.join(" | ")}`
    );

    // stage and discharge for the same day share a row
    assert.deepEqual(readDailyCsv(path.join(tmp, "G1_daily.csv")), [
      { date: "2024-01-05", stage_ft: 2, discharge_cfs: 100 },
      { date: "2024-01-06", stage_ft: 4, discharge_cfs: null },
      { date: "2024-02-01", stage_ft: 3, discharge_cfs: null },
    ]);
    console.log("[OK] history fetch");

    fs.writeFileSync(path.join(tmp, "X9_daily.csv"), "date,stage_ft,discharge_cfs\n2024-01-01,abc,\n");
    fs.writeFileSync(path.join(tmp, "notes.txt"), "not an archive\n");

    const stats = computeStatsForDirectory(tmp, log);
    assert.deepEqual(Object.keys(stats).sort(), ["G1", "X9"]);

    const s1 = stats.G1;
    assert.ok(s1.ok);
    const jan = s1.stats.monthly_stage?.["1"];
    assert.equal(jan?.mean, 3);
    approx(jan?.std, Math.SQRT2, "jan std");
    assert.equal(jan?.median, 3);
    assert.deepEqual(s1.stats.monthly_stage?.["2"], { mean: 3, std: null, median: 3 });
    assert.deepEqual(s1.stats.monthly_discharge?.["1"], { mean: 100, std: null, median: 100 });
    assert.equal(s1.stats.stage_percentiles?.p50, 3);
    approx(s1.stats.stage_percentiles?.p85, 3.7, "p85");
    approx(s1.stats.stage_percentiles?.p95, 3.9, "p95");

    const x9 = stats.X9;
    assert.ok(!x9.ok);
    assert.equal(x9.error, "X9_daily.csv: line 2: not a number: abc");
    console.log("[OK] history stats over a directory");

    assert.throws(
      () => computeStatsForDirectory(path.join(tmp, "missing"), log),
      (e: unknown) => e instanceof ConfigError && e.code === "CONFIG_NOT_FOUND"
    );

    // a file that cannot be written fails only its own gauge
    const blocked = path.join(tmp, "blocked");
    fs.mkdirSync(path.join(blocked, "G1_daily.csv"), { recursive: true });
    const partial = await fetchAllHistory(
      source,
      [
        { id: "G1", latitude: null, longitude: null, flood_stage_ft: null },
        { id: "G2", latitude: null, longitude: null, flood_stage_ft: null },
      ],
      { outDir: blocked, nowMs: NOW, yearsBack: 1 },
      log
    );
    const w1 = partial.G1;
    assert.ok(!w1.ok);
    assert.ok("path" in w1, "write failures carry the target path");
    assert.equal(w1.path, path.join(blocked, "G1_daily.csv"));
    assert.match(w1.error, /EISDIR/);
    assert.deepEqual(partial.G2, { ok: true, path: path.join(blocked, "G2_daily.csv"), rows: 3 });
    console.log(`[FAIL-AS-EXPECTED] history write: ${w1.error}`);
  } finally {
    await up.close();
    fs.rmSync(tmp, { recursive: true, force: true });
  }
}
