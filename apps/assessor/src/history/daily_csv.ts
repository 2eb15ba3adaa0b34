import fs from "node:fs";
import path from "node:path";

import { DailyReadingV1Schema, type DailyReadingV1 } from "@floodrisk/contracts";

export const DAILY_CSV_HEADER = ["date", "stage_ft", "discharge_cfs"] as const;
export const DAILY_CSV_SUFFIX = "_daily.csv";

export class ArchiveFormatError extends Error {
  constructor(public readonly file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = "ArchiveFormatError";
  }
}

export function dailyCsvFileName(gaugeId: string): string {
  return `${gaugeId}${DAILY_CSV_SUFFIX}`;
}

export function gaugeIdFromFileName(fileName: string): string | null {
  return fileName.endsWith(DAILY_CSV_SUFFIX) ? fileName.slice(0, -DAILY_CSV_SUFFIX.length) : null;
}

function cell(v: number | null): string {
  return v === null ? "" : String(v);
}

export function formatDailyCsv(readings: ReadonlyArray<DailyReadingV1>): string {
  const lines: string[] = [DAILY_CSV_HEADER.join(",")];
  for (const r of readings) lines.push([r.date, cell(r.stage_ft), cell(r.discharge_cfs)].join(","));
  return lines.join("\n") + "\n";
}

export function writeDailyCsv(fp: string, readings: ReadonlyArray<DailyReadingV1>): void {
  fs.mkdirSync(path.dirname(fp), { recursive: true });
  fs.writeFileSync(fp, formatDailyCsv(readings), "utf8");
}

function parseCell(raw: string | undefined, file: string, line: number): number | null {
  const s = (raw ?? "").trim();
  if (!s) return null;
  const n = Number(s);
  if (!Number.isFinite(n)) throw new ArchiveFormatError(file, `line ${line}: not a number: ${s}`);
  return n;
}

/**
 * Parses an archive file. The date column may be named `date` or `timestamp`
 * (full timestamps are cut to the calendar day).
 */
export function parseDailyCsv(text: string, file: string): DailyReadingV1[] {
  const lines = text.split(/\r?\n/).filter((l) => l.trim() !== "");
  if (!lines.length) throw new ArchiveFormatError(file, "empty file");

  const header = lines[0].split(",").map((h) => h.trim());
  const dateCol = header.findIndex((h) => h === "date" || h === "timestamp");
  const stageCol = header.indexOf("stage_ft");
  const dischargeCol = header.indexOf("discharge_cfs");
  if (dateCol < 0 || stageCol < 0 || dischargeCol < 0) {
    throw new ArchiveFormatError(file, `unexpected header: ${lines[0]}`);
  }

  const out: DailyReadingV1[] = [];
  for (let i = 1; i < lines.length; i++) {
    const cols = lines[i].split(",");
    const row = DailyReadingV1Schema.safeParse({
      date: (cols[dateCol] ?? "").trim().slice(0, 10),
      stage_ft: parseCell(cols[stageCol], file, i + 1),
      discharge_cfs: parseCell(cols[dischargeCol], file, i + 1),
    });
    if (!row.success) throw new ArchiveFormatError(file, `line ${i + 1}: bad date: ${cols[dateCol] ?? ""}`);
    out.push(row.data);
  }
  return out;
}

export function readDailyCsv(fp: string): DailyReadingV1[] {
  return parseDailyCsv(fs.readFileSync(fp, "utf8"), path.basename(fp));
}
