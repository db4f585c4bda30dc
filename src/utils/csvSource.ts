import { readFile } from "node:fs/promises";
import Papa from "papaparse";
import type { RawRow } from "../types/compiler";
import { StructuralError } from "../types/errors";
import { debug, warn } from "./logger";

/**
 * A parsed CSV table. Iterating it always starts again from the first data row,
 * so the same source can be walked by several passes.
 */
export class CsvSource implements Iterable<RawRow> {
  readonly fields: string[];
  private readonly rows: RawRow[];

  constructor(fields: string[], rows: RawRow[]) {
    this.fields = fields;
    this.rows = rows;
  }

  get length(): number {
    return this.rows.length;
  }

  [Symbol.iterator](): Iterator<RawRow> {
    return this.rows[Symbol.iterator]();
  }

  /** Throw unless every named column is present in the header. */
  requireColumns(columns: string[], origin: string): void {
    const missing = columns.filter((c) => c && !this.fields.includes(c));
    if (missing.length > 0) {
      throw new StructuralError("INVALID_INPUT", `${origin} is missing column(s): ${missing.join(", ")}`);
    }
  }
}

function toRawRow(record: Record<string, unknown>): RawRow {
  const row: RawRow = {};
  for (const [key, value] of Object.entries(record)) {
    // papaparse puts surplus cells under __parsed_extra as an array
    if (typeof value === "string") row[key] = value;
  }
  return row;
}

/** Parse CSV text with a header line. Row-level parse problems are logged, not fatal. */
export function parseCsv(text: string, origin = "csv"): CsvSource {
  const result = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: true,
  });
  for (const err of result.errors) {
    // header rows are line 1, so data row N is line N + 2
    warn("csv.parseIssue", { origin, code: err.code, message: err.message, row: typeof err.row === "number" ? err.row + 2 : undefined });
  }
  const fields = result.meta.fields ?? [];
  const rows = result.data.map(toRawRow);
  debug("csv.parsed", { origin, rows: rows.length, fields: fields.length });
  return new CsvSource(fields, rows);
}

export async function readCsvFile(path: string): Promise<CsvSource> {
  const text = await readFile(path, "utf-8");
  return parseCsv(text, path);
}
