// src/summary.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { ReconcileReport } from "./update.js";

function fmtBytes(bytes?: number): string {
  if (bytes === undefined) return "-";
  if (bytes < 1024) return `${bytes} B`;
  return `${Math.floor(bytes / 1024)} kB`;
}

export function reportRows(report: ReconcileReport): [string, string][] {
  return [
    ["source", report.source],
    ["fetched", fmtBytes(report.fetchedBytes)],
    ["preload entries", String(report.preloadEntries)],
    ["destination", report.destination],
    ["known hosts", String(report.knownHosts)],
    ["preloaded hosts", String(report.preloaded)],
    ["removed", String(report.removed)],
    ["updated", String(report.updated)],
    ["inserted", String(report.inserted)],
    ["written", report.written ? "yes" : "no"],
    ["backup", report.backupPath ?? "-"],
  ];
}

export function formatReportTable(report: ReconcileReport): string {
  const table = new AsciiTable3("HSTS Preload Sync")
    .setHeading("Field", "Value")
    .setStyle("unicode-round");
  table.setAlign(1, AlignmentEnum.LEFT);
  table.setAlign(2, AlignmentEnum.LEFT);
  for (const [field, value] of reportRows(report)) {
    table.addRow(field, value);
  }
  return table.toString();
}
