import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";

export type CsvCell = string | number | boolean | Date | null;

export interface CsvTable<Column extends string> {
  columns: readonly Column[];
  rows: readonly Readonly<Record<Column, CsvCell>>[];
}

function formatCell(value: CsvCell): string | number | boolean {
  if (value === null) return "";
  if (value instanceof Date) return value.toISOString();
  return value;
}

/**
 * Header row plus one line per row. Dates are written as ISO-8601 and
 * `null` as an empty cell; no index column.
 */
export function toCsv<Column extends string>(table: CsvTable<Column>): string {
  return Papa.unparse(
    {
      fields: [...table.columns],
      data: table.rows.map((row) =>
        table.columns.map((column) => formatCell(row[column])),
      ),
    },
    { newline: "\n" },
  );
}

export function writeCsv<Column extends string>(
  filePath: string,
  table: CsvTable<Column>,
): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, toCsv(table) + "\n", "utf-8");
}
