/**
 * CSV loading helpers.
 *
 * Both inputs (the wide extract and the chat log) are read completely into
 * memory before a build starts. Cells are kept as strings; typed reads go
 * through the column schema.
 */

import { existsSync, readFileSync } from "fs";
import Papa from "papaparse";
import { MISSING_CELL_LITERALS } from "../config/constants.ts";
import { throwDataError } from "./errors.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CsvRow = Readonly<Record<string, string | undefined>>;

export interface CsvTable {
  /** Header names in file order */
  headers: readonly string[];
  rows: readonly CsvRow[];
  /** Where the table came from (file path or "<inline>") */
  source: string;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse CSV text with a header row.
 * Delimiter-detection notices are ignored (single-column files trigger them);
 * any other parse error is fatal.
 */
export function parseCsvText(text: string, source = "<inline>"): CsvTable {
  const result = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
  });

  const fatal = result.errors.filter((e) => e.type !== "Delimiter");
  if (fatal.length > 0) {
    const first = fatal[0];
    throwDataError(
      "CSV_PARSE_FAILED",
      `${source}: ${first.message}${first.row !== undefined ? ` (row ${first.row})` : ""}`,
      { source, errorCount: fatal.length, type: first.type },
    );
  }

  return {
    headers: result.meta.fields ?? [],
    rows: result.data,
    source,
  };
}

/**
 * Read and parse a CSV file. A missing file is a fatal input error.
 */
export function readCsvFile(path: string): CsvTable {
  if (!existsSync(path)) {
    throwDataError("MISSING_INPUT", `CSV file not found: ${path}`, { path });
  }
  return parseCsvText(readFileSync(path, "utf-8"), path);
}

/**
 * Serialize records as CSV with the given column order.
 */
export function toCsvText(
  columns: readonly string[],
  records: readonly object[],
): string {
  return Papa.unparse(
    {
      fields: [...columns],
      data: records.map((record) => {
        const values: Map<string, unknown> = new Map(Object.entries(record));
        return columns.map((col) => formatCell(values.get(col)));
      }),
    },
    { newline: "\n" },
  );
}

// ---------------------------------------------------------------------------
// Cells
// ---------------------------------------------------------------------------

/**
 * Read a cell as a trimmed string, or null when it is empty or a
 * missing-value literal (nan, None, ...).
 */
export function readCell(row: CsvRow, column: string | undefined): string | null {
  if (column === undefined) return null;
  const raw = row[column];
  if (raw === undefined) return null;
  const value = raw.trim();
  return MISSING_CELL_LITERALS.has(value) ? null : value;
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "boolean") return value ? "true" : "false";
  return String(value);
}
