/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { JobStatus } from "../../types";

export const TABLE_WIDTHS = {
  jobId: 36,
  target: 20,
  started: 19,
  status: 8,
  size: 10,
  location: 6,
  archiveName: 60,
  error: 24,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const shown = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...shown.map((i) => i.label.length));
  return shown.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

export function formatStatus(status: JobStatus): string {
  switch (status) {
    case "success":
      return color.green(status);
    case "partial":
      return color.yellow(status);
    case "failed":
      return color.red(status);
  }
}

/**
 * `2025-01-31T03:00:00.000Z` -> `2025-01-31 03:00:00`
 */
export function formatTimestamp(value: Date | string): string {
  const iso = typeof value === "string" ? value : value.toISOString();
  return iso.slice(0, 19).replace("T", " ");
}
