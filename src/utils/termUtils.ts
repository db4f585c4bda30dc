import { DataFactory } from "n3";
import type { NamedNode } from "@rdfjs/types";
import type { NamespaceRegistryEntry } from "../constants/namespaces";
import { XSD } from "../constants/vocabularies";
import { StructuralError, type ErrorContext } from "../types/errors";
import type { ObjectTerm } from "./vocabularyGraph";

const { namedNode, blankNode, literal } = DataFactory;

/**
 * Registry-driven term utilities.
 *
 * Rules:
 * - The namespace registry is always passed in explicitly; there is no ambient registry.
 * - Absolute http(s) IRIs pass through unchanged.
 * - A reference that cannot be expanded throws a StructuralError, which aborts the run.
 */

const ABSOLUTE_IRI = /^https?:\/\//i;
const LITERAL_PATTERN = /^"((?:[^"\\]|\\.)*)"(?:@([A-Za-z]+(?:-[A-Za-z0-9]+)*)|\^\^(\S+))?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?\d*\.\d+$/;

export function isAbsoluteIri(value: string): boolean {
  return ABSOLUTE_IRI.test(value);
}

/**
 * Extract local name from a URI or prefixed name.
 */
export function shortLocalName(uriOrPrefixed?: string): string {
  if (!uriOrPrefixed) return "";
  const s = String(uriOrPrefixed);
  if (s.includes("://")) {
    const parts = s.split(/[#/]/).filter(Boolean);
    return parts.length ? parts[parts.length - 1] : s;
  }
  if (s.includes(":", 1)) {
    return s.split(":").pop() || s;
  }
  const parts = s.split(/[#/]/).filter(Boolean);
  return parts.length ? parts[parts.length - 1] : s;
}

/**
 * Choose the registry entry that matches a given IRI.
 * Prefers the longest namespace match to handle nested namespaces.
 */
export function findRegistryEntryForIri(
  targetIri: string,
  registry: NamespaceRegistryEntry[],
): NamespaceRegistryEntry | undefined {
  if (!targetIri) return undefined;
  let best: NamespaceRegistryEntry | undefined = undefined;
  for (const e of registry) {
    if (!e.namespace) continue;
    if (targetIri.startsWith(e.namespace)) {
      if (!best || e.namespace.length > best.namespace.length) best = e;
    }
  }
  return best;
}

/**
 * Expand a prefixed name using the registry. Absolute IRIs and `<...>` forms
 * are returned as-is (without the angle brackets).
 */
export function expandPrefixed(
  prefixedOrIri: string,
  registry: NamespaceRegistryEntry[],
  context: ErrorContext = {},
): string {
  const value = prefixedOrIri.trim();
  if (value.startsWith("<") && value.endsWith(">")) return value.slice(1, -1);
  if (isAbsoluteIri(value)) return value;

  const idx = value.indexOf(":");
  if (idx === -1) {
    throw new StructuralError("NOT_A_PREFIXED_NAME", `Value '${value}' is neither an absolute IRI nor a prefixed name`, context);
  }
  const prefix = value.substring(0, idx);
  const local = value.substring(idx + 1);

  // empty string "" is a valid default prefix
  const entry = registry.find((e) => e.prefix === prefix);
  if (!entry) {
    throw new StructuralError("UNDEFINED_PREFIX", `Undefined prefix '${prefix}' while expanding '${value}'`, context);
  }
  return `${entry.namespace}${local}`;
}

/**
 * Convert a full IRI into a prefixed form using the registry.
 * Returns the full IRI if no registry entry matches.
 */
export function toPrefixed(iri: string, registry: NamespaceRegistryEntry[]): string {
  if (!iri) return "";
  const entry = findRegistryEntryForIri(iri, registry);
  if (entry) {
    const local = iri.substring(entry.namespace.length);
    return `${entry.prefix}:${local}`;
  }
  return iri;
}

/** Resolve a reference that must denote an IRI. */
export function resolveIri(text: string, registry: NamespaceRegistryEntry[], context: ErrorContext = {}): NamedNode {
  return namedNode(expandPrefixed(text, registry, context));
}

function unescapeLiteral(body: string): string {
  return body.replace(/\\(["\\ntr])/g, (_m, ch: string) => {
    if (ch === "n") return "\n";
    if (ch === "t") return "\t";
    if (ch === "r") return "\r";
    return ch;
  });
}

/**
 * Resolve one cell reference into a term. Accepts:
 *  - absolute IRIs, `<iri>` and prefixed names
 *  - `_:label` blank nodes
 *  - N3 literals: "text", "text"@lang, "text"^^xsd:type, "text"^^<iri>
 *  - the bare literals true, false, integers and decimals
 */
export function resolveTerm(text: string, registry: NamespaceRegistryEntry[], context: ErrorContext = {}): ObjectTerm {
  const value = text.trim();

  if (value.startsWith("\"")) {
    const m = value.match(LITERAL_PATTERN);
    if (!m) {
      throw new StructuralError("INVALID_LITERAL", `Malformed literal ${value}`, context);
    }
    const body = unescapeLiteral(m[1]);
    if (m[2]) return literal(body, m[2].toLowerCase());
    if (m[3]) return literal(body, resolveIri(m[3], registry, context));
    return literal(body);
  }
  if (value === "true" || value === "false") return literal(value, namedNode(XSD.boolean));
  if (INTEGER_PATTERN.test(value)) return literal(value, namedNode(XSD.integer));
  if (DECIMAL_PATTERN.test(value)) return literal(value, namedNode(XSD.decimal));
  if (value.startsWith("_:")) return blankNode(value.substring(2));

  return resolveIri(value, registry, context);
}
