/**
 * Table formatters
 */

import color from "picocolors";

/**
 * Width of every column: the longest of its header and cells
 */
export function columnWidths(headers: string[], rows: string[][]): number[] {
  return headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? "").trimEnd().length)),
  );
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns
    .map((col, i) => col.trimEnd().padEnd(widths[i] ?? 0))
    .join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}
