import type { CompilerConfig, RawRow, Row } from "../types/compiler";
import { StructuralError } from "../types/errors";
import { debug } from "./logger";

/** Cell values treated as missing. */
export const SENTINELS: ReadonlySet<string> = new Set(["", "#N/A", "N/A", "?"]);

export type NormalizeResult =
  | { kind: "row"; row: Row }
  | { kind: "skip"; reason: "status" | "empty-id" };

/**
 * Remembers the last accepted row (as read, before continuation suppression).
 * Starts out all-empty, so the first row never matches a previous identifier.
 */
export class RowCursor {
  private previous: Row = {};

  get previousRow(): Readonly<Row> {
    return this.previous;
  }

  advance(row: Row): void {
    this.previous = row;
  }
}

export function normalizeCell(value: string | undefined): string {
  const trimmed = (value ?? "").trim();
  return SENTINELS.has(trimmed) ? "" : trimmed;
}

export function normalizeCells(raw: RawRow): Row {
  const row: Row = {};
  for (const [key, value] of Object.entries(raw)) row[key] = normalizeCell(value);
  return row;
}

/**
 * Turn one raw row into a clean row, or report why it is skipped.
 * `rowNumber` is the line number used in error messages.
 */
export function normalizeRow(
  raw: RawRow,
  cursor: RowCursor,
  config: CompilerConfig,
  rowNumber: number,
): NormalizeResult {
  const row = normalizeCells(raw);
  const { columns } = config;

  if (columns.status) {
    const status = row[columns.status] ?? "";
    if (!config.allowedStatuses.includes(status)) {
      debug("row.skipped", { row: rowNumber, reason: "status", status });
      return { kind: "skip", reason: "status" };
    }
  }

  const id = row[columns.id] ?? "";
  if (!id) {
    debug("row.skipped", { row: rowNumber, reason: "empty-id" });
    return { kind: "skip", reason: "empty-id" };
  }
  if (!id.startsWith(`${config.prefix}:`)) {
    throw new StructuralError(
      "OUTSIDE_NAMESPACE",
      `Identifier '${id}' is not within the ${config.prefix}: namespace`,
      { row: rowNumber },
    );
  }

  const previous = cursor.previousRow;
  cursor.advance({ ...row });

  if (previous[columns.id] === id) {
    for (const column of config.continuationColumns) {
      if (row[column] && row[column] === previous[column]) row[column] = "";
    }
  }
  return { kind: "row", row };
}
