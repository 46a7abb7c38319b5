/**
 * Plain-text table rendering for shell output.
 */

export const NO_RECORDS = "No records found";

const CELL_SEPARATOR = " | ";

/**
 * Text for a single cell
 */
export function renderCell(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value === null || value === undefined) {
    return "";
  }
  return String(value);
}

/**
 * Formats rows as left-aligned columns under a header and a dashed separator.
 * Each column is as wide as its longest cell or header.
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) =>
    rows.reduce((max, row) => Math.max(max, (row[i] ?? "").length), h.length)
  );

  const formatRow = (cells: string[]) =>
    widths.map((w, i) => (cells[i] ?? "").padEnd(w)).join(CELL_SEPARATOR);

  const headerRow = formatRow(headers);
  return [headerRow, "-".repeat(headerRow.length), ...rows.map(formatRow)];
}

/**
 * Formats uniform records as a table, using the first record's keys as columns.
 * An empty list renders as a single notice line.
 */
export function formatRecords(records: Record<string, unknown>[]): string[] {
  if (records.length === 0) {
    return [NO_RECORDS];
  }

  const headers = Object.keys(records[0]);
  const rows = records.map((record) => headers.map((h) => renderCell(record[h])));
  return formatTable(headers, rows);
}
