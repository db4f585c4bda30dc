import { DataFactory } from "n3";
import type { BlankNode, NamedNode } from "@rdfjs/types";
import type { NamespaceRegistryEntry } from "../constants/namespaces";
import { DCTERMS, OWL, RDF, RDFS, XSD } from "../constants/vocabularies";
import { debug } from "./logger";
import { resolveIri } from "./termUtils";
import type { VocabularyGraph } from "./vocabularyGraph";

const { namedNode, literal } = DataFactory;

const CLASS_TYPES: ReadonlySet<string> = new Set([OWL.Class, RDFS.Class, OWL.DeprecatedClass]);

/**
 * Predicates a deprecated entity keeps. The deprecation markers themselves are kept
 * too, so re-applying the transition to an already deprecated entity changes nothing.
 */
export const RETAINED_PREDICATES: ReadonlySet<string> = new Set([
  RDFS.label,
  DCTERMS.modified,
  RDF.type,
  OWL.deprecated,
  DCTERMS.isReplacedBy,
]);

const TRUE = literal("true", namedNode(XSD.boolean));

export function isDeprecated(graph: VocabularyGraph, subject: NamedNode): boolean {
  return graph.has(subject, OWL.deprecated, TRUE);
}

/**
 * Move an entity into its terminal deprecated state: re-type it, drop everything but
 * the retained predicates, mark it deprecated and link its replacements.
 */
export function deprecate(
  graph: VocabularyGraph,
  subject: NamedNode,
  replacedBy: string,
  registry: NamespaceRegistryEntry[],
  row?: number,
): void {
  const wasClass = graph.objects(subject, RDF.type).some((t) => CLASS_TYPES.has(t.value));
  graph.remove(subject, RDF.type);
  graph.add(subject, RDF.type, namedNode(wasClass ? OWL.DeprecatedClass : OWL.DeprecatedProperty));

  const stripped = graph.quads(subject).filter((q) => !RETAINED_PREDICATES.has(q.predicate.value));
  const orphans: BlankNode[] = [];
  for (const q of stripped) {
    if (q.object.termType === "BlankNode") orphans.push(q.object);
  }
  graph.getStore().removeQuads(stripped);
  for (const node of orphans) graph.removeUnreferencedBlankNode(node);

  graph.add(subject, OWL.deprecated, TRUE);
  for (const item of replacedBy.split(",").map((s) => s.trim()).filter(Boolean)) {
    graph.add(subject, DCTERMS.isReplacedBy, resolveIri(item, registry, { row, subject: subject.value, predicate: DCTERMS.isReplacedBy, object: item }));
  }
  if (stripped.length > 0) debug("deprecation.stripped", { subject: subject.value, removed: stripped.length });
}
