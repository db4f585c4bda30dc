import { describe, it, expect } from "vitest";
import { DataFactory } from "n3";
import { buildRegistry } from "../../compiler";
import { OWL, RDF, RDFS } from "../../constants/vocabularies";
import { defaultConfig } from "../../stores/compilerConfigStore";
import { StructuralError } from "../../types/errors";
import { expandComplexValue } from "../../utils/complexValue";
import { VocabularyGraph } from "../../utils/vocabularyGraph";
import { NS } from "../fixtures/vocabFixtures";

const { namedNode } = DataFactory;
const registry = buildRegistry(defaultConfig);
const subject = namedNode(`${NS}realizes`);
const domain = namedNode(RDFS.domain);

function failure(cell: string): StructuralError {
  const graph = new VocabularyGraph();
  try {
    expandComplexValue(graph, subject, domain, cell, registry, 5);
  } catch (err) {
    if (err instanceof StructuralError) return err;
    throw err;
  }
  throw new Error(`expected '${cell}' to fail`);
}

describe("expandComplexValue", () => {
  it("asserts a single term directly", () => {
    const graph = new VocabularyGraph();
    expandComplexValue(graph, subject, domain, "ex:Work", registry);
    expect(graph.size).toBe(1);
    expect(graph.has(subject, RDFS.domain, namedNode(`${NS}Work`))).toBe(true);
  });

  it("materializes a union as an anonymous owl:Class with an ordered list", () => {
    const graph = new VocabularyGraph();
    expandComplexValue(graph, subject, domain, "[ex:Work, {ex:Expression}, , http://example.net/Item]", registry);

    const objects = graph.objects(subject, RDFS.domain);
    expect(objects).toHaveLength(1);
    const union = objects[0];
    expect(union.termType).toBe("BlankNode");
    if (union.termType !== "BlankNode") return;

    expect(graph.has(union, RDF.type, namedNode(OWL.Class))).toBe(true);
    const [head] = graph.objects(union, OWL.unionOf);
    expect(graph.listItems(head).map((t) => t.value)).toEqual([
      `${NS}Work`,
      `${NS}Expression`,
      "http://example.net/Item",
    ]);
    // subject link + type + unionOf + three list cells of two triples each
    expect(graph.size).toBe(9);
  });

  it("rejects a union without a closing bracket and names the triple", () => {
    const err = failure("[ex:Work, ex:Expression");
    expect(err.code).toBe("UNTERMINATED_UNION");
    expect(err.message).toBe(
      `Union start without union end (row 5, triple <${NS}realizes> <${RDFS.domain}> [ex:Work, ex:Expression)`,
    );
  });

  it("rejects nested unions", () => {
    expect(failure("[ex:Work, [ex:Expression, ex:Item]]").code).toBe("NESTED_UNION");
  });

  it("rejects unions with fewer than two members", () => {
    expect(failure("[ex:Work]").code).toBe("UNION_TOO_SMALL");
    expect(failure("[ex:Work, , {}]").code).toBe("UNION_TOO_SMALL");
  });

  it("rejects members with an unknown prefix", () => {
    expect(failure("[ex:Work, zz:Item]").code).toBe("UNDEFINED_PREFIX");
  });
});
