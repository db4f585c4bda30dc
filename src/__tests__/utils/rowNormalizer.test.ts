import { describe, it, expect, beforeAll } from "vitest";
import { defaultConfig } from "../../stores/compilerConfigStore";
import type { CompilerConfig, Row } from "../../types/compiler";
import { StructuralError } from "../../types/errors";
import { setLogLevel } from "../../utils/logger";
import { RowCursor, normalizeRow, type NormalizeResult } from "../../utils/rowNormalizer";
import { row } from "../fixtures/vocabFixtures";

beforeAll(() => setLogLevel("silent"));

function accepted(result: NormalizeResult): Row {
  if (result.kind !== "row") throw new Error(`expected a row, got skip (${result.reason})`);
  return result.row;
}

describe("normalizeRow", () => {
  it("trims cells and maps sentinels to empty", () => {
    const raw = { ...row({ id: " ex:Work ", label: "#N/A", domain: "?", range: "N/A" }), "rdfs:subClassOf": "  ex:Thing " };
    const out = accepted(normalizeRow(raw, new RowCursor(), defaultConfig, 2));
    expect(out.id).toBe("ex:Work");
    expect(out["rdfs:label-en"]).toBe("");
    expect(out["rdfs:domain"]).toBe("");
    expect(out["rdfs:range"]).toBe("");
    expect(out["rdfs:subClassOf"]).toBe("ex:Thing");
  });

  it("skips rows with a status outside the allowed set", () => {
    const result = normalizeRow(row({ id: "ex:Work", status: "draft" }), new RowCursor(), defaultConfig, 2);
    expect(result).toEqual({ kind: "skip", reason: "status" });
  });

  it("skips rows without an identifier", () => {
    const result = normalizeRow(row({ id: "#N/A" }), new RowCursor(), defaultConfig, 2);
    expect(result).toEqual({ kind: "skip", reason: "empty-id" });
  });

  it("does not filter on status when no status column is configured", () => {
    const config: CompilerConfig = { ...defaultConfig, columns: { ...defaultConfig.columns, status: undefined } };
    const result = normalizeRow(row({ id: "ex:Work", status: "draft" }), new RowCursor(), config, 2);
    expect(result.kind).toBe("row");
  });

  it("rejects identifiers outside the managed prefix", () => {
    let caught: unknown;
    try {
      normalizeRow(row({ id: "other:Work" }), new RowCursor(), defaultConfig, 7);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(StructuralError);
    expect(caught instanceof StructuralError && caught.code).toBe("OUTSIDE_NAMESPACE");
    expect(caught instanceof Error && caught.message).toBe("Identifier 'other:Work' is not within the ex: namespace (row 7)");
  });
});

describe("continuation suppression", () => {
  it("blanks repeated domain and range values for the same identifier", () => {
    const cursor = new RowCursor();
    const first = accepted(normalizeRow(row({ id: "ex:p", domain: "ex:A", range: "ex:B" }), cursor, defaultConfig, 2));
    const second = accepted(normalizeRow(row({ id: "ex:p", domain: "ex:A", range: "ex:C" }), cursor, defaultConfig, 3));
    const third = accepted(normalizeRow(row({ id: "ex:p", domain: "ex:A", range: "ex:C" }), cursor, defaultConfig, 4));

    expect([first["rdfs:domain"], first["rdfs:range"]]).toEqual(["ex:A", "ex:B"]);
    expect([second["rdfs:domain"], second["rdfs:range"]]).toEqual(["", "ex:C"]);
    // compared with the previous row as read, before its domain was blanked
    expect([third["rdfs:domain"], third["rdfs:range"]]).toEqual(["", ""]);
  });

  it("keeps values when the identifier changes", () => {
    const cursor = new RowCursor();
    normalizeRow(row({ id: "ex:p", domain: "ex:A" }), cursor, defaultConfig, 2);
    const next = accepted(normalizeRow(row({ id: "ex:q", domain: "ex:A" }), cursor, defaultConfig, 3));
    expect(next["rdfs:domain"]).toBe("ex:A");
  });

  it("does not advance over skipped rows", () => {
    const cursor = new RowCursor();
    normalizeRow(row({ id: "ex:p", domain: "ex:A" }), cursor, defaultConfig, 2);
    normalizeRow(row({ id: "ex:p", domain: "ex:Z", status: "draft" }), cursor, defaultConfig, 3);
    const next = accepted(normalizeRow(row({ id: "ex:p", domain: "ex:A" }), cursor, defaultConfig, 4));
    expect(next["rdfs:domain"]).toBe("");
    expect(cursor.previousRow["rdfs:domain"]).toBe("ex:A");
  });
});
