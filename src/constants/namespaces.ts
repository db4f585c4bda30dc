import { DCTERMS, OWL, RDF, RDFS, SKOS, XSD } from "./vocabularies";

export const DEFAULT_NAMESPACE_PREFIX = "ex";
export const DEFAULT_NAMESPACE_URI = "http://example.org/vocab/";

export type NamespaceRegistryEntry = {
  prefix: string;
  namespace: string;
};

/**
 * Prefixes every compilation starts from. Project specific prefixes come from the
 * prefix file, the metadata overlay and the config.
 */
export const BUILTIN_PREFIXES: Record<string, string> = {
  rdf: RDF.namespace,
  rdfs: RDFS.namespace,
  owl: OWL.namespace,
  xsd: XSD.namespace,
  skos: SKOS.namespace,
  dct: DCTERMS.namespace,
};

export function ensureDefaultNamespaceMap(
  input?: Record<string, unknown>,
): Record<string, string> {
  if (!input || typeof input !== "object") return {};
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(input)) {
    if (typeof value !== "string" || value.length === 0) continue;
    result[String(key ?? "")] = value;
  }
  return result;
}

export function registryFromMap(map: Record<string, string>): NamespaceRegistryEntry[] {
  return Object.keys(map)
    .sort()
    .map((prefix) => ({ prefix, namespace: map[prefix] }));
}

export function mapFromRegistry(registry: NamespaceRegistryEntry[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const entry of registry) out[entry.prefix] = entry.namespace;
  return out;
}
