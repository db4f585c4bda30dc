import { DataFactory } from "n3";
import type { NamedNode } from "@rdfjs/types";
import type { NamespaceRegistryEntry } from "../constants/namespaces";
import { OWL, RDF, SKOS } from "../constants/vocabularies";
import type { CompileContext, MappingRelation, MappingTarget } from "../types/compiler";
import { StructuralError, type ErrorContext } from "../types/errors";
import { debug, warn } from "./logger";
import { expandPrefixed, resolveIri, shortLocalName, toPrefixed } from "./termUtils";
import type { VocabularyGraph } from "./vocabularyGraph";

const { namedNode } = DataFactory;

export const MAPPING_RELATIONS: readonly MappingRelation[] = [
  "exactMatch",
  "closeMatch",
  "broadMatch",
  "narrowMatch",
  "relatedMatch",
];

export function isMappingRelation(value: unknown): value is MappingRelation {
  return typeof value === "string" && MAPPING_RELATIONS.some((r) => r === value);
}

/** `skos:closeMatch` or the absolute SKOS IRI -> `closeMatch`. */
export function parseMappingRelation(text: string, registry: NamespaceRegistryEntry[]): MappingRelation | undefined {
  let iri: string;
  try {
    iri = expandPrefixed(text, registry);
  } catch (err) {
    if (err instanceof StructuralError) return undefined;
    throw err;
  }
  if (!iri.startsWith(SKOS.namespace)) return undefined;
  const local = iri.substring(SKOS.namespace.length);
  return isMappingRelation(local) ? local : undefined;
}

// Downloaded class list when there is one, otherwise the capitalization convention
function isTargetClass(target: string, mapping: MappingTarget, ctx: CompileContext): boolean {
  const known = ctx.externalClasses.get(mapping.name);
  if (known) return known.has(target);
  return /^[A-Z]/.test(shortLocalName(target));
}

function checkKind(
  graph: VocabularyGraph,
  subject: NamedNode,
  target: string,
  mapping: MappingTarget,
  ctx: CompileContext,
): void {
  const vocabulary = mapping.vocabulary;
  if (!vocabulary) return;

  const localIsClass = graph.has(subject, RDF.type, namedNode(OWL.Class));
  const targetIsClass = isTargetClass(target, mapping, ctx);
  const exempt = vocabulary.exceptionNamespaces.some((ns) => target.startsWith(ns));

  let message: string | undefined;
  if (localIsClass && !targetIsClass && !exempt) {
    message = `Class is mapped to ${toPrefixed(target, ctx.registry)}, which is not a ${mapping.name} class`;
  } else if (!localIsClass && targetIsClass) {
    message = `Non-class is mapped to the ${mapping.name} class ${toPrefixed(target, ctx.registry)}`;
  }
  if (message) {
    const entity = toPrefixed(subject.value, ctx.registry);
    ctx.diagnostics.push({ entity, message, rule: "mapping-kind-mismatch", severity: "warning" });
    warn("mapping.kindMismatch", { rule: "mapping-kind-mismatch", entity, message });
  }
}

/**
 * Assert one mapping column pair. An empty relation asserts nothing; the relation must
 * be on the target's whitelist and needs a target.
 */
export function assertMapping(
  graph: VocabularyGraph,
  subject: NamedNode,
  relationText: string,
  targetText: string,
  mapping: MappingTarget,
  ctx: CompileContext,
): void {
  const relationToken = relationText.trim();
  if (!relationToken) return;

  const context: ErrorContext = { row: ctx.row, subject: subject.value, predicate: relationToken, object: targetText };
  const relation = parseMappingRelation(relationToken, ctx.registry);
  if (!relation || !mapping.allowedRelations.includes(relation)) {
    throw new StructuralError(
      "UNEXPECTED_MAPPING",
      `Mapping to ${mapping.name} had an unexpected value '${relationToken}'`,
      context,
    );
  }
  const target = targetText.trim();
  if (!target) {
    throw new StructuralError("MAPPING_TARGET_MISSING", `Mapping to ${mapping.name} has no target`, context);
  }

  const targetIri = resolveIri(target, ctx.registry, context);
  graph.add(subject, SKOS[relation], targetIri);
  debug("mapping.asserted", { subject: subject.value, relation, target: targetIri.value });
  checkKind(graph, subject, targetIri.value, mapping, ctx);
}
