import { existsSync, readFileSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import {
  ImportFileNotFoundError,
  InvalidRowError,
  MissingColumnsError,
  UnsupportedFileFormatError,
} from "../errors";

export interface CsvTable {
  columns: string[];
  rows: CsvRow[];
}

export interface CsvRow {
  line: number; // 1-based, header is line 1
  values: Record<string, string>;
}

const CellsSchema = z.array(z.array(z.string()));

export function readCsvFile(filePath: string): CsvTable {
  if (path.extname(filePath).toLowerCase() !== ".csv") {
    throw new UnsupportedFileFormatError(filePath);
  }
  if (!existsSync(filePath)) {
    throw new ImportFileNotFoundError(filePath);
  }

  const cells = CellsSchema.parse(
    parse(readFileSync(filePath, "utf8"), {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );

  const [header = [], ...body] = cells;
  const rows = body.map((cellsOfRow, index) => {
    const values: Record<string, string> = {};
    header.forEach((column, i) => {
      values[column] = cellsOfRow[i] ?? "";
    });
    return { line: index + 2, values };
  });

  return { columns: header, rows };
}

export function requireColumns(
  table: CsvTable,
  required: string[],
  optional: string[] = [],
): void {
  const missing = required.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new MissingColumnsError(missing, table.columns, required, optional);
  }
}

export function readText(row: CsvRow, column: string): string {
  return (row.values[column] ?? "").trim();
}

export function readNumber(row: CsvRow, column: string): number {
  const raw = readText(row, column);
  const value = Number(raw);
  if (raw === "" || Number.isNaN(value)) {
    throw new InvalidRowError(row.line, column, raw);
  }
  return value;
}
