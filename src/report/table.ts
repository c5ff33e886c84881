import { formatValue } from "./sentence.js";

export type TableCell = string | number | null;

const COLUMN_GAP = "  ";

/**
 * Lays out rows as right-aligned text columns, header first. Each column is as
 * wide as its widest cell. No rows renders as an empty string.
 */
export function renderTable<K extends string>(
  columns: readonly K[],
  rows: ReadonlyArray<Readonly<Record<K, TableCell>>>,
): string {
  if (rows.length === 0) {
    return "";
  }

  const cells = rows.map((row) => columns.map((column) => formatValue(row[column])));
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...cells.map((line) => line[index].length)),
  );

  const formatLine = (values: readonly string[]) =>
    values.map((value, index) => value.padStart(widths[index])).join(COLUMN_GAP);

  return [formatLine(columns), ...cells.map(formatLine)].join("\n");
}
