import type { NamespaceRegistryEntry } from "../constants/namespaces";
import type { Diagnostic } from "./diagnostics";

/** A CSV row as parsed from the header line: column name -> cell text. */
export type RawRow = Record<string, string | undefined>;

/** A trimmed row where sentinel values were mapped to the empty string. */
export type Row = Record<string, string>;

export type EntityKindToken =
  | "Class"
  | "ObjectProperty"
  | "SymmetricProperty"
  | "AsymmetricProperty"
  | "TransitiveProperty"
  | "ReflexiveProperty"
  | "IrreflexiveProperty"
  | "InverseFunctionalProperty"
  | "DatatypeProperty";

export type MappingRelation = "exactMatch" | "closeMatch" | "broadMatch" | "narrowMatch" | "relatedMatch";

export type VersionTuple = readonly [major: number, minor: number, patch: number];

export interface Release {
  version: string;
  /** ISO date (YYYY-MM-DD). */
  issued: string;
  /** Description fragments keyed by language. */
  descriptions: Record<string, string>;
}

export interface ChangeNote {
  /** Compact or absolute identifier as written in the notes file. */
  subject: string;
  version: string;
  text: string;
}

export interface MappingVocabulary {
  /** Where the target vocabulary can be downloaded; its classes drive the kind check. */
  source?: string;
  /** Targets under these namespaces are controlled term lists and skip the kind check. */
  exceptionNamespaces: string[];
}

export interface MappingTarget {
  name: string;
  relationColumn: string;
  targetColumn: string;
  allowedRelations: MappingRelation[];
  /** Present for class-structured vocabularies. */
  vocabulary?: MappingVocabulary;
}

export interface ColumnConfig {
  id: string;
  /** language tag -> column */
  labels: Record<string, string>;
  type: string;
  domain: string;
  range: string;
  subClassOf: string;
  subPropertyOf: string;
  status?: string;
  replacedBy: string;
}

export interface CompilerConfig {
  /** IRI of the managed namespace; doubles as the ontology IRI. */
  namespace: string;
  /** Prefix that every row identifier must carry. */
  prefix: string;
  publishingUrl: string;
  columns: ColumnConfig;
  /** Columns whose repeated values within an identifier group are ignored. */
  continuationColumns: string[];
  allowedStatuses: string[];
  deprecatedStatus: string;
  mappings: MappingTarget[];
  prefixes: Record<string, string>;
  releaseColumns: { version: string; issued: string; descriptionPrefix: string };
  changeNoteColumns: { subject: string; version: string; note: string };
  cacheDir: string;
  fetchDelayMs: number;
  fetchTimeoutMs: number;
}

/** Shared read-only state handed to every per-row component. */
export interface CompileContext {
  registry: NamespaceRegistryEntry[];
  config: CompilerConfig;
  /** Class IRIs per mapping target name, loaded before rows are processed. */
  externalClasses: Map<string, Set<string>>;
  diagnostics: Diagnostic[];
  row?: number;
}
