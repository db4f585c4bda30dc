import { DataFactory } from "n3";
import type { NamedNode } from "@rdfjs/types";
import type { NamespaceRegistryEntry } from "../constants/namespaces";
import { OWL, RDF } from "../constants/vocabularies";
import { StructuralError, type ErrorContext } from "../types/errors";
import { resolveIri, resolveTerm } from "./termUtils";
import type { SubjectTerm, VocabularyGraph } from "./vocabularyGraph";

const { namedNode, blankNode } = DataFactory;

/** Split the interior of `[a, b, {c}]` into member references. */
export function parseUnionMembers(cellText: string, context: ErrorContext): string[] {
  if (!cellText.endsWith("]")) {
    throw new StructuralError("UNTERMINATED_UNION", "Union start without union end", context);
  }
  const interior = cellText.slice(1, -1).trim();
  if (interior.includes("[") || interior.includes("]")) {
    throw new StructuralError("NESTED_UNION", "Nested unions are not supported", context);
  }
  const members = interior
    .split(",")
    .map((item) => item.replace(/^[\s{}]+|[\s{}]+$/g, ""))
    .filter(Boolean);
  if (members.length < 2) {
    throw new StructuralError("UNION_TOO_SMALL", "Union needs at least two members", context);
  }
  return members;
}

/**
 * Assert `(subject, predicate, value)` where the value is either a single term or a
 * bracketed union, which becomes an anonymous owl:Class with an owl:unionOf list.
 */
export function expandComplexValue(
  graph: VocabularyGraph,
  subject: SubjectTerm,
  predicate: NamedNode,
  cellText: string,
  registry: NamespaceRegistryEntry[],
  row?: number,
): void {
  const text = cellText.trim();
  const context: ErrorContext = { row, subject: subject.value, predicate: predicate.value, object: text };

  if (!text.startsWith("[")) {
    graph.add(subject, predicate, resolveTerm(text, registry, context));
    return;
  }

  const members = parseUnionMembers(text, context).map((m) => resolveIri(m, registry, context));
  const union = blankNode();
  graph.add(union, RDF.type, namedNode(OWL.Class));
  graph.add(union, OWL.unionOf, graph.createList(members));
  graph.add(subject, predicate, union);
}
