// Formatting helpers shared by the report writers and the CLI

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Fixed two-decimal score, "N/A" for absent scores
 */
export function formatScore(value: number | null | undefined, decimals: number = 2): string {
  if (value === null || value === undefined) return "N/A";
  return roundTo(value, decimals).toFixed(decimals);
}

export function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Column widths for a plain-text table: widest of header and values, capped.
 */
export function calculateColumnWidths(
  columns: string[],
  rows: Record<string, unknown>[],
  maxWidth: number = 40
): Record<string, number> {
  const widths: Record<string, number> = {};
  for (const col of columns) {
    widths[col] = col.length;
    for (const row of rows) {
      widths[col] = Math.max(widths[col], formatValue(row[col]).length);
    }
    widths[col] = Math.min(widths[col], maxWidth);
  }
  return widths;
}

export function formatTableRow(
  columns: string[],
  row: Record<string, unknown>,
  widths: Record<string, number>
): string {
  return columns
    .map((col) => formatValue(row[col]).slice(0, widths[col]).padEnd(widths[col]))
    .join(" | ");
}

/**
 * Render rows as an aligned text table (header, separator, rows).
 */
export function formatTable(columns: string[], rows: Record<string, unknown>[]): string[] {
  const widths = calculateColumnWidths(columns, rows);
  const lines = [
    columns.map((col) => col.padEnd(widths[col])).join(" | "),
    columns.map((col) => "-".repeat(widths[col])).join("-+-"),
  ];
  for (const row of rows) {
    lines.push(formatTableRow(columns, row, widths));
  }
  return lines;
}
