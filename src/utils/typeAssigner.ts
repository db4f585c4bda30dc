import { DataFactory } from "n3";
import type { NamedNode } from "@rdfjs/types";
import type { NamespaceRegistryEntry } from "../constants/namespaces";
import { OWL, RDF, RDFS } from "../constants/vocabularies";
import type { EntityKindToken } from "../types/compiler";
import { StructuralError, type ErrorContext } from "../types/errors";
import { expandPrefixed } from "./termUtils";
import type { VocabularyGraph } from "./vocabularyGraph";

const { namedNode } = DataFactory;

export const ENTITY_KIND_TOKENS: readonly EntityKindToken[] = [
  "Class",
  "ObjectProperty",
  "SymmetricProperty",
  "AsymmetricProperty",
  "TransitiveProperty",
  "ReflexiveProperty",
  "IrreflexiveProperty",
  "InverseFunctionalProperty",
  "DatatypeProperty",
];

type ObjectPropertyCharacteristic = Exclude<EntityKindToken, "Class" | "ObjectProperty" | "DatatypeProperty">;

/**
 * Map a type cell (`owl:Class`, or the absolute OWL IRI) to its kind token.
 * Returns undefined for anything outside the OWL namespace or the known set.
 */
export function parseKindToken(
  text: string,
  registry: NamespaceRegistryEntry[],
  context: ErrorContext = {},
): EntityKindToken | undefined {
  let iri: string;
  try {
    iri = expandPrefixed(text, registry, context);
  } catch (err) {
    if (err instanceof StructuralError) return undefined;
    throw err;
  }
  if (!iri.startsWith(OWL.namespace)) return undefined;
  const local = iri.substring(OWL.namespace.length);
  return ENTITY_KIND_TOKENS.find((t) => t === local);
}

function assertObjectProperty(
  graph: VocabularyGraph,
  subject: NamedNode,
  characteristic?: ObjectPropertyCharacteristic,
): void {
  if (characteristic) graph.add(subject, RDF.type, namedNode(OWL[characteristic]));
  graph.add(subject, RDF.type, namedNode(OWL.ObjectProperty));
  if (!graph.has(subject, RDFS.range)) graph.add(subject, RDFS.range, namedNode(RDFS.Resource));
}

/**
 * Assert the entity kind and fill in the default range. An empty cell is only
 * accepted once the subject already has a type. Must run after the domain
 * and range columns of the same row, since the default only applies when no range exists.
 */
export function assignType(
  graph: VocabularyGraph,
  subject: NamedNode,
  typeText: string,
  registry: NamespaceRegistryEntry[],
  row?: number,
): void {
  const text = typeText.trim();
  if (!text) {
    // continuation rows may leave the type to the group's first row
    if (graph.has(subject, RDF.type)) return;
    throw new StructuralError("UNEXPECTED_TYPE", "Missing type value", { row, subject: subject.value, predicate: RDF.type });
  }

  const context: ErrorContext = { row, subject: subject.value, predicate: RDF.type, object: text };
  const kind = parseKindToken(text, registry, context);
  if (!kind) {
    throw new StructuralError("UNEXPECTED_TYPE", "Unexpected type value", context);
  }

  switch (kind) {
    case "Class":
      graph.add(subject, RDF.type, namedNode(OWL.Class));
      return;
    case "ObjectProperty":
      assertObjectProperty(graph, subject);
      return;
    case "SymmetricProperty":
    case "AsymmetricProperty":
    case "TransitiveProperty":
    case "ReflexiveProperty":
    case "IrreflexiveProperty":
    case "InverseFunctionalProperty":
      assertObjectProperty(graph, subject, kind);
      return;
    case "DatatypeProperty": {
      const ranges = graph.objects(subject, RDFS.range);
      const mismatch = ranges.find((r) => !(r.termType === "NamedNode" && r.value === RDFS.Literal));
      if (mismatch) {
        throw new StructuralError("RANGE_MISMATCH", "Range mismatch for datatype property", {
          ...context,
          predicate: RDFS.range,
          object: mismatch.value,
        });
      }
      graph.add(subject, RDF.type, namedNode(OWL.DatatypeProperty));
      if (ranges.length === 0) graph.add(subject, RDFS.range, namedNode(RDFS.Literal));
      return;
    }
    default: {
      const unreachable: never = kind;
      throw new StructuralError("UNEXPECTED_TYPE", `Unhandled kind ${String(unreachable)}`, context);
    }
  }
}
