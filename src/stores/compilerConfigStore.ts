/**
 * @fileoverview Compiler Configuration Store
 * Holds the column layout, namespace and mapping settings of a compilation, with
 * JSON import/export. Imported values are checked by the runtime guards and merged
 * over the defaults.
 */

import { readFile } from "node:fs/promises";
import { createStore } from "zustand/vanilla";
import { DEFAULT_NAMESPACE_PREFIX, DEFAULT_NAMESPACE_URI, ensureDefaultNamespaceMap } from "../constants/namespaces";
import type { ColumnConfig, CompilerConfig, MappingTarget, MappingVocabulary } from "../types/compiler";
import { StructuralError } from "../types/errors";
import {
  assertNumber,
  assertPlainObject,
  assertString,
  assertStringArray,
  assertStringRecord,
  invariant,
  type PlainObject,
} from "../utils/guards";
import { info } from "../utils/logger";
import { isMappingRelation } from "../utils/mappingValidator";

const defaultColumns: ColumnConfig = {
  id: "id",
  labels: { en: "rdfs:label-en" },
  type: "rdf:type",
  domain: "rdfs:domain",
  range: "rdfs:range",
  subClassOf: "rdfs:subClassOf",
  subPropertyOf: "rdfs:subPropertyOf",
  status: "status",
  replacedBy: "dct:isReplacedBy",
};

export const defaultConfig: CompilerConfig = {
  namespace: DEFAULT_NAMESPACE_URI,
  prefix: DEFAULT_NAMESPACE_PREFIX,
  publishingUrl: "http://example.org/published/vocab/",
  columns: defaultColumns,
  continuationColumns: [defaultColumns.domain, defaultColumns.range],
  allowedStatuses: ["published", "planned", "deprecated"],
  deprecatedStatus: "deprecated",
  mappings: [
    {
      name: "BIBFRAME",
      relationColumn: "mapping-bf",
      targetColumn: "bf-id",
      allowedRelations: ["exactMatch", "closeMatch", "broadMatch", "narrowMatch"],
      vocabulary: { exceptionNamespaces: [] },
    },
    {
      name: "RDA",
      relationColumn: "mapping-rda",
      targetColumn: "rda-id",
      allowedRelations: ["exactMatch", "closeMatch", "broadMatch", "narrowMatch"],
      vocabulary: { exceptionNamespaces: ["http://rdaregistry.info/termList/"] },
    },
  ],
  prefixes: {
    bf: "http://id.loc.gov/ontologies/bibframe/",
    bflc: "http://id.loc.gov/ontologies/bflc/",
    rdac: "http://rdaregistry.info/Elements/c/",
    rdaw: "http://rdaregistry.info/Elements/w/",
    rdae: "http://rdaregistry.info/Elements/e/",
    rdam: "http://rdaregistry.info/Elements/m/",
    rdai: "http://rdaregistry.info/Elements/i/",
  },
  releaseColumns: { version: "owl:versionInfo", issued: "dct:issued", descriptionPrefix: "description-" },
  changeNoteColumns: { subject: "id", version: "version", note: "note" },
  cacheDir: ".vocab-cache",
  fetchDelayMs: 1000,
  fetchTimeoutMs: 15000,
};

interface CompilerConfigStore {
  config: CompilerConfig;

  updateConfig: (patch: Partial<CompilerConfig>) => void;
  resetToDefaults: () => void;
  exportConfig: () => string;
  importConfig: (configJson: string) => void;
}

function parseColumns(value: unknown, base: ColumnConfig): ColumnConfig {
  assertPlainObject(value, "columns must be an object");
  const columns: ColumnConfig = { ...base };
  for (const key of ["id", "type", "domain", "range", "subClassOf", "subPropertyOf", "replacedBy"] as const) {
    const v = value[key];
    if (v === undefined) continue;
    assertString(v, `columns.${key} must be a string`);
    columns[key] = v;
  }
  if (value.status !== undefined) {
    assertString(value.status, "columns.status must be a string");
    columns.status = value.status || undefined;
  }
  if (value.labels !== undefined) {
    assertStringRecord(value.labels, "columns.labels must map language tags to column names");
    columns.labels = { ...value.labels };
  }
  return columns;
}

function parseVocabulary(value: unknown, at: string): MappingVocabulary {
  assertPlainObject(value, `${at}.vocabulary must be an object`);
  const exceptions = value.exceptionNamespaces ?? [];
  assertStringArray(exceptions, `${at}.vocabulary.exceptionNamespaces must be a string array`);
  const vocabulary: MappingVocabulary = { exceptionNamespaces: exceptions };
  if (value.source !== undefined) {
    assertString(value.source, `${at}.vocabulary.source must be a string`);
    vocabulary.source = value.source;
  }
  return vocabulary;
}

function parseMappingTarget(value: unknown, index: number): MappingTarget {
  const at = `mappings[${index}]`;
  assertPlainObject(value, `${at} must be an object`);
  const { name, relationColumn, targetColumn, allowedRelations } = value;
  assertString(name, `${at}.name must be a string`);
  assertString(relationColumn, `${at}.relationColumn must be a string`);
  assertString(targetColumn, `${at}.targetColumn must be a string`);
  assertStringArray(allowedRelations, `${at}.allowedRelations must be a string array`);
  const relations = allowedRelations.filter(isMappingRelation);
  invariant(relations.length === allowedRelations.length, `${at}.allowedRelations contains an unknown SKOS mapping relation`, {
    allowedRelations,
  });

  const target: MappingTarget = { name, relationColumn, targetColumn, allowedRelations: relations };
  if (value.vocabulary !== undefined) target.vocabulary = parseVocabulary(value.vocabulary, at);
  return target;
}

function pickString(input: PlainObject, key: string, fallback: string): string {
  const v = input[key];
  if (v === undefined) return fallback;
  assertString(v, `${key} must be a string`);
  return v;
}

function pickNumber(input: PlainObject, key: string, fallback: number): number {
  const v = input[key];
  if (v === undefined) return fallback;
  assertNumber(v, `${key} must be a number`);
  return v;
}

function pickStringArray(input: PlainObject, key: string, fallback: string[]): string[] {
  const v = input[key];
  if (v === undefined) return fallback;
  assertStringArray(v, `${key} must be a string array`);
  return v;
}

function pickColumnGroup<T extends Record<string, string>>(input: PlainObject, key: string, base: T): T {
  const v = input[key];
  if (v === undefined) return base;
  assertStringRecord(v, `${key} must map names to column names`);
  const merged: T = { ...base };
  for (const name of Object.keys(base)) {
    const col = v[name];
    if (col !== undefined) Object.assign(merged, { [name]: col });
  }
  return merged;
}

/**
 * Validate an untyped config object and merge it over `base`.
 * Unknown keys are ignored.
 */
export function parseConfig(input: unknown, base: CompilerConfig = defaultConfig): CompilerConfig {
  assertPlainObject(input, "Configuration must be a JSON object");

  const columns = input.columns === undefined ? base.columns : parseColumns(input.columns, base.columns);
  const mappingsInput = input.mappings;
  let mappings = base.mappings;
  if (mappingsInput !== undefined) {
    invariant(Array.isArray(mappingsInput), "mappings must be an array");
    mappings = mappingsInput.map(parseMappingTarget);
  }
  let prefixes = base.prefixes;
  if (input.prefixes !== undefined) {
    assertPlainObject(input.prefixes, "prefixes must be an object");
    prefixes = { ...base.prefixes, ...ensureDefaultNamespaceMap(input.prefixes) };
  }

  const config: CompilerConfig = {
    namespace: pickString(input, "namespace", base.namespace),
    prefix: pickString(input, "prefix", base.prefix),
    publishingUrl: pickString(input, "publishingUrl", base.publishingUrl),
    columns,
    continuationColumns: pickStringArray(input, "continuationColumns", [columns.domain, columns.range]),
    allowedStatuses: pickStringArray(input, "allowedStatuses", base.allowedStatuses),
    deprecatedStatus: pickString(input, "deprecatedStatus", base.deprecatedStatus),
    mappings,
    prefixes,
    releaseColumns: pickColumnGroup(input, "releaseColumns", base.releaseColumns),
    changeNoteColumns: pickColumnGroup(input, "changeNoteColumns", base.changeNoteColumns),
    cacheDir: pickString(input, "cacheDir", base.cacheDir),
    fetchDelayMs: pickNumber(input, "fetchDelayMs", base.fetchDelayMs),
    fetchTimeoutMs: pickNumber(input, "fetchTimeoutMs", base.fetchTimeoutMs),
  };
  invariant(/^https?:\/\//i.test(config.namespace), "namespace must be an absolute http(s) IRI", { namespace: config.namespace });
  invariant(config.prefix.length > 0 && !config.prefix.includes(":"), "prefix must be a non-empty name without ':'", {
    prefix: config.prefix,
  });
  return config;
}

export const compilerConfigStore = createStore<CompilerConfigStore>()((set, get) => ({
  config: defaultConfig,

  updateConfig: (patch: Partial<CompilerConfig>) => {
    set((state) => ({
      config: {
        ...state.config,
        ...patch,
      },
    }));
  },

  resetToDefaults: () => {
    set({ config: { ...defaultConfig } });
  },

  exportConfig: () => {
    return JSON.stringify(get().config, null, 2);
  },

  importConfig: (configJson: string) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(configJson);
    } catch (error) {
      throw new StructuralError("INVALID_CONFIG", `Invalid configuration format: ${error instanceof Error ? error.message : String(error)}`);
    }
    // imports always start from the defaults so earlier imports do not leak through
    set({ config: parseConfig(parsed, defaultConfig) });
  },
}));

/** Read a JSON config file into the store and return the resulting config. */
export async function loadConfigFile(path: string): Promise<CompilerConfig> {
  const text = await readFile(path, "utf-8");
  compilerConfigStore.getState().importConfig(text);
  info("config.loaded", { path });
  return compilerConfigStore.getState().config;
}
