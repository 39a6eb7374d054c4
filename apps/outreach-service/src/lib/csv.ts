// CSV helpers for lead exports (no deps).
// Usage:
//   const csv = leadsToCsv(records); sendCsv(res, datedFilename("leads"), csv);

import { Response } from "express";
import { LeadRecord } from "../types/lead";

export const LEAD_CSV_COLUMNS: Array<keyof LeadRecord> = [
  "created_at", "name", "email", "company", "property_address",
  "city", "state", "country", "temperature", "weather_description",
  "median_income", "population", "percent_renters", "score",
  "score_category", "insights", "outreach_message", "outreach_source",
];

export function escapeCsv(v: unknown): string {
  const s = v == null ? "" : String(v);
  // Quote when the value has separators, quotes, line breaks or edge spaces
  const needs = /[",\n\r]/.test(s) || /^\s|\s$/.test(s);
  const body = s.replace(/"/g, '""');
  return needs ? `"${body}"` : body;
}

function joinRow(cols: unknown[]): string {
  return cols.map(escapeCsv).join(",");
}

export function leadsToCsv(records: LeadRecord[]): string {
  const rows: string[] = [joinRow(LEAD_CSV_COLUMNS)];
  for (const record of records) {
    rows.push(joinRow(LEAD_CSV_COLUMNS.map(col => record[col])));
  }
  return rows.join("\r\n");
}

export function sendCsv(res: Response, filename: string, csv: string): void {
  res.setHeader("Content-Type", "text/csv; charset=utf-8");
  res.setHeader("Content-Disposition", `attachment; filename="${filename}"`);
  res.end(csv);
}

// filename with a timestamp, e.g. leads-2024-05-01T10-00-00-000Z.csv
export function datedFilename(stem: string, ext = "csv", now: Date = new Date()): string {
  const iso = now.toISOString().replace(/[:.]/g, "-");
  return `${stem}-${iso}.${ext}`;
}
