/**
 * Consistency checks over the finished vocabulary graph.
 *
 * Only named subjects inside the managed namespace are checked (the ontology resource
 * itself excluded). Every check runs independently and only reports: findings are
 * logged and collected in a ValidationReport, the graph is never changed.
 */
import { DataFactory } from "n3";
import type { NamedNode, Term } from "@rdfjs/types";
import type { NamespaceRegistryEntry } from "../constants/namespaces";
import { DCTERMS, OWL, RDF, RDFS, XSD } from "../constants/vocabularies";
import type { Diagnostic, DiagnosticRule, ValidationReport } from "../types/diagnostics";
import { info, warn } from "./logger";
import { shortLocalName, toPrefixed } from "./termUtils";
import type { VocabularyGraph } from "./vocabularyGraph";

const { namedNode, literal } = DataFactory;

export interface ValidationOptions {
  namespace: string;
  ontologyIri: string;
  registry: NamespaceRegistryEntry[];
  /** When set, every entity is expected to carry a "(New)" change note. */
  versionBuilt: boolean;
  now?: () => number;
}

type Check = (entity: NamedNode, scope: CheckScope) => void;

interface CheckScope {
  graph: VocabularyGraph;
  options: ValidationOptions;
  report: (entity: string, rule: DiagnosticRule, message: string) => void;
  isManaged: (iri: string) => boolean;
}

const NEW_MARKER = " (New)";
const DOMAIN_RANGE = [RDFS.domain, RDFS.range].sort().join(" ");

function typesOf(graph: VocabularyGraph, entity: NamedNode): Set<string> {
  return new Set(graph.objects(entity, RDF.type).map((t) => t.value));
}

const checkLabel: Check = (entity, { graph, report }) => {
  if (!graph.has(entity, RDFS.label)) report(entity.value, "missing-label", "Entity has no rdfs:label");
};

// Literals compare by value, language and datatype; blank nodes are never shared objects
function describeObject(term: Term, registry: NamespaceRegistryEntry[]): { key: string; label: string } | undefined {
  if (term.termType === "NamedNode") return { key: `<${term.value}>`, label: toPrefixed(term.value, registry) };
  if (term.termType !== "Literal") return undefined;
  const quoted = JSON.stringify(term.value);
  const label = term.language ? `${quoted}@${term.language}` : quoted;
  return { key: `${quoted}@${term.language}^^${term.datatype.value}`, label };
}

const checkAmbiguousRelation: Check = (entity, { graph, report, options }) => {
  const predicatesByObject = new Map<string, { label: string; predicates: Set<string> }>();
  for (const q of graph.quads(entity)) {
    const object = describeObject(q.object, options.registry);
    if (!object) continue;
    const entry = predicatesByObject.get(object.key) ?? { label: object.label, predicates: new Set<string>() };
    entry.predicates.add(q.predicate.value);
    predicatesByObject.set(object.key, entry);
  }
  for (const { label, predicates } of predicatesByObject.values()) {
    if (predicates.size < 2) continue;
    const sorted = Array.from(predicates).sort();
    if (sorted.join(" ") === DOMAIN_RANGE) continue;
    const names = sorted.map((p) => toPrefixed(p, options.registry)).join(", ");
    report(entity.value, "ambiguous-relation", `Predicates ${names} all point to ${label}`);
  }
};

const checkNewMarker: Check = (entity, { graph, report, options }) => {
  if (!options.versionBuilt) return;
  const marked = graph
    .objects(entity, DCTERMS.modified)
    .some((o) => o.termType === "Literal" && o.value.endsWith(NEW_MARKER));
  if (!marked) report(entity.value, "missing-new-marker", `No dct:modified note ending in "${NEW_MARKER.trim()}"`);
};

const checkDeprecatedReferenced: Check = (entity, { graph, report, options }) => {
  if (!graph.has(entity, OWL.deprecated, literal("true", namedNode(XSD.boolean)))) return;
  const referrers = graph.subjects(null, entity).filter((s) => !s.equals(entity));
  if (referrers.length === 0) return;
  const names = referrers.map((s) => (s.termType === "NamedNode" ? toPrefixed(s.value, options.registry) : "_:" + s.value));
  report(entity.value, "deprecated-referenced", `Deprecated entity is referenced by ${names.join(", ")}`);
};

const checkNaming: Check = (entity, { graph, report }) => {
  const local = shortLocalName(entity.value);
  if (!local) return;
  const types = typesOf(graph, entity);
  const isClass = types.has(OWL.Class) || types.has(OWL.DeprecatedClass) || types.has(RDFS.Class);
  const first = local.charAt(0);
  if (isClass && first !== first.toUpperCase()) {
    report(entity.value, "naming-convention", "Class name should start with an uppercase letter");
  } else if (!isClass && first !== first.toLowerCase()) {
    report(entity.value, "naming-convention", "Non-class name should start with a lowercase letter");
  }
};

const checkPropertyUsage: Check = (entity, { graph, report }) => {
  const types = typesOf(graph, entity);

  if (types.has(OWL.ObjectProperty)) {
    const literalUse = graph.quads(null, entity).find((q) => q.object.termType === "Literal");
    if (literalUse) {
      report(entity.value, "object-property-literal", `Object property used with literal "${literalUse.object.value}"`);
    }
  }

  if (types.has(OWL.DatatypeProperty)) {
    const ranges = graph.objects(entity, RDFS.range);
    if (ranges.length !== 1 || ranges[0].value !== RDFS.Literal) {
      report(entity.value, "datatype-property-range", "Datatype property range should be exactly rdfs:Literal");
    }
    const resourceUse = graph.quads(null, entity).find((q) => q.object.termType !== "Literal");
    if (resourceUse) {
      report(entity.value, "datatype-property-object", `Datatype property used with non-literal ${resourceUse.object.value}`);
    }
  }

  if (types.has(OWL.AnnotationProperty) && (graph.has(entity, RDFS.domain) || graph.has(entity, RDFS.range))) {
    report(entity.value, "annotation-property-domain-range", "Annotation property should not declare a domain or range");
  }
};

const ENTITY_CHECKS: Check[] = [
  checkLabel,
  checkAmbiguousRelation,
  checkNewMarker,
  checkDeprecatedReferenced,
  checkNaming,
  checkPropertyUsage,
];

function checkDanglingReferences(scope: CheckScope): void {
  const { graph } = scope;
  const seen = new Set<string>();
  for (const q of graph.quads()) {
    const obj = q.object;
    if (obj.termType !== "NamedNode" || seen.has(obj.value) || !scope.isManaged(obj.value)) continue;
    seen.add(obj.value);
    if (!graph.has(obj, null)) {
      scope.report(obj.value, "dangling-reference", "Referenced entity has no triples of its own");
    }
  }
}

/**
 * Run every check and collect the findings. Findings are logged as warnings as they
 * are found.
 */
export function validateGraph(graph: VocabularyGraph, options: ValidationOptions): ValidationReport {
  const clock = options.now ?? Date.now;
  const started = clock();
  const warnings: Diagnostic[] = [];

  const isManaged = (iri: string) => iri.startsWith(options.namespace) && iri !== options.ontologyIri;
  const scope: CheckScope = {
    graph,
    options,
    isManaged,
    report: (entity, rule, message) => {
      const diagnostic: Diagnostic = { entity: toPrefixed(entity, options.registry), rule, message, severity: "warning" };
      warnings.push(diagnostic);
      warn("validation.warning", { rule, entity: diagnostic.entity, message });
    },
  };

  const entities = graph.namedSubjects().filter((s) => isManaged(s.value));
  for (const entity of entities) {
    for (const check of ENTITY_CHECKS) check(entity, scope);
  }
  checkDanglingReferences(scope);

  const finished = clock();
  info("validation.done", { entities: entities.length, warnings: warnings.length });
  return {
    id: `validation-${started}`,
    timestamp: started,
    duration: finished - started,
    checkedEntities: entities.length,
    warnings,
  };
}
