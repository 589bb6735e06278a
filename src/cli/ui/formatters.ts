/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { BackupStatus } from "../../core/status/evaluator";

export const TABLE_WIDTHS = {
  file: 48,
  status: 26,
  backup: 48,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const maxLabelLen = Math.max(...items.map((i) => i.label.length));
  return items
    .filter((i) => i.value !== null && i.value !== undefined)
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/** Keep the end of a long path, which is the part that tells files apart. */
export function truncateStart(value: string, width: number): string {
  return value.length <= width ? value : `…${value.slice(value.length - width + 1)}`;
}

export function colorStatus(status: BackupStatus): string {
  if (status.startsWith("VALID_ON_")) return color.green(status);
  if (status.startsWith("UNCONFIRMED_ON_")) return color.yellow(status);
  if (status === "POSSIBLE_UNSYNCED") return color.red(status);
  return color.dim(status);
}
