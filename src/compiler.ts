import { DataFactory } from "n3";
import type { NamedNode, Quad } from "@rdfjs/types";
import { BUILTIN_PREFIXES, mapFromRegistry, registryFromMap } from "./constants/namespaces";
import { RDFS } from "./constants/vocabularies";
import { compilerConfigStore } from "./stores/compilerConfigStore";
import type { ChangeNote, CompileContext, CompilerConfig, RawRow, Release, Row } from "./types/compiler";
import type { Diagnostic, ValidationReport } from "./types/diagnostics";
import { isStructuralError } from "./types/errors";
import { expandComplexValue } from "./utils/complexValue";
import { readCsvFile } from "./utils/csvSource";
import { deprecate, isDeprecated } from "./utils/deprecation";
import { CachingFetcher } from "./utils/fetcher";
import { validateGraph } from "./utils/graphValidation";
import { debug, info, resetSummary, timedAsync } from "./utils/logger";
import { assertMapping } from "./utils/mappingValidator";
import { collectClassIris, inferMediaTypeFromName, parseRdf, readPrefixFile, readRdfFile } from "./utils/rdfParser";
import { writeGraphFile } from "./utils/rdfSerialization";
import { RowCursor, normalizeRow } from "./utils/rowNormalizer";
import { resolveIri } from "./utils/termUtils";
import { assignType } from "./utils/typeAssigner";
import {
  applyChangeNotes,
  applyReleaseDescription,
  injectOntologyMetadata,
  loadChangeNotes,
  loadReleases,
  requireVersion,
} from "./utils/versioning";
import { VocabularyGraph } from "./utils/vocabularyGraph";

const { namedNode, literal } = DataFactory;

/**
 * Per-row column steps, in the order they run. Type assignment reads the range
 * asserted by the range step, and deprecation strips what every earlier step added.
 */
export const COLUMN_PROCESSING_ORDER = [
  "labels",
  "domain",
  "range",
  "type",
  "subClassOf",
  "subPropertyOf",
  "mappings",
  "deprecation",
] as const;

export type ColumnStep = (typeof COLUMN_PROCESSING_ORDER)[number];

interface RowState {
  graph: VocabularyGraph;
  subject: NamedNode;
  row: Row;
  rowNumber: number;
  ctx: CompileContext;
}

function cell(row: Row, column: string | undefined): string {
  return column ? row[column] ?? "" : "";
}

function assertList(state: RowState, predicate: string, text: string): void {
  const { graph, subject, ctx, rowNumber } = state;
  for (const item of text.split(",").map((s) => s.trim()).filter(Boolean)) {
    graph.add(subject, predicate, resolveIri(item, ctx.registry, { row: rowNumber, subject: subject.value, predicate, object: item }));
  }
}

const COLUMN_STEPS: Record<ColumnStep, (state: RowState) => void> = {
  labels: ({ graph, subject, row, ctx }) => {
    for (const [lang, column] of Object.entries(ctx.config.columns.labels)) {
      const text = cell(row, column);
      if (text) graph.add(subject, RDFS.label, literal(text, lang));
    }
  },
  domain: (state) => {
    const text = cell(state.row, state.ctx.config.columns.domain);
    if (text) expandComplexValue(state.graph, state.subject, namedNode(RDFS.domain), text, state.ctx.registry, state.rowNumber);
  },
  range: (state) => {
    const text = cell(state.row, state.ctx.config.columns.range);
    if (text) expandComplexValue(state.graph, state.subject, namedNode(RDFS.range), text, state.ctx.registry, state.rowNumber);
  },
  type: ({ graph, subject, row, ctx, rowNumber }) => {
    assignType(graph, subject, cell(row, ctx.config.columns.type), ctx.registry, rowNumber);
  },
  subClassOf: (state) => assertList(state, RDFS.subClassOf, cell(state.row, state.ctx.config.columns.subClassOf)),
  subPropertyOf: (state) => assertList(state, RDFS.subPropertyOf, cell(state.row, state.ctx.config.columns.subPropertyOf)),
  mappings: ({ graph, subject, row, ctx }) => {
    for (const mapping of ctx.config.mappings) {
      assertMapping(graph, subject, cell(row, mapping.relationColumn), cell(row, mapping.targetColumn), mapping, ctx);
    }
  },
  deprecation: ({ graph, subject, row, ctx, rowNumber }) => {
    const { columns, deprecatedStatus } = ctx.config;
    const flagged = Boolean(columns.status) && cell(row, columns.status) === deprecatedStatus;
    if (flagged || isDeprecated(graph, subject)) {
      deprecate(graph, subject, cell(row, columns.replacedBy), ctx.registry, rowNumber);
    }
  },
};

/** Build the namespace table; the managed prefix always maps to the managed namespace. */
export function buildRegistry(config: CompilerConfig, ...extra: Array<Record<string, string>>) {
  const map: Record<string, string> = { ...BUILTIN_PREFIXES, ...config.prefixes };
  for (const prefixes of extra) Object.assign(map, prefixes);
  map[config.prefix] = config.namespace;
  return registryFromMap(map);
}

/** Every column the configured row steps read from, except the optional list columns. */
export function requiredColumns(config: CompilerConfig): string[] {
  const { columns } = config;
  const required = [columns.id, ...Object.values(columns.labels), columns.type, columns.domain, columns.range];
  if (columns.status) required.push(columns.status);
  for (const mapping of config.mappings) required.push(mapping.relationColumn, mapping.targetColumn);
  return required;
}

export interface CompileInputs {
  rows: Iterable<RawRow>;
  config: CompilerConfig;
  /** Triples merged into the graph before any row, e.g. ontology metadata. */
  overlay?: Quad[];
  /** Prefixes from the prefix file and the overlay. */
  prefixes?: Array<Record<string, string>>;
  releases?: Release[];
  changeNotes?: ChangeNote[];
  /** Class IRIs per mapping target name. */
  externalClasses?: Map<string, Set<string>>;
  version?: string;
  priorVersion?: string;
  now?: () => Date;
}

export interface CompileResult {
  graph: VocabularyGraph;
  prefixes: Record<string, string>;
  diagnostics: Diagnostic[];
  report: ValidationReport;
  rowsProcessed: number;
  rowsSkipped: number;
}

/**
 * The synchronous core: rows in, finished and validated graph out. Throws a
 * StructuralError on the first fatal problem.
 */
export function compileVocabulary(inputs: CompileInputs): CompileResult {
  const { config, version, priorVersion } = inputs;
  if (version) requireVersion(version, "Version");
  if (priorVersion) requireVersion(priorVersion, "Prior version");

  const registry = buildRegistry(config, ...(inputs.prefixes ?? []));
  const graph = new VocabularyGraph();
  if (inputs.overlay) graph.addQuads(inputs.overlay);

  const ctx: CompileContext = {
    registry,
    config,
    externalClasses: inputs.externalClasses ?? new Map<string, Set<string>>(),
    diagnostics: [],
  };

  const cursor = new RowCursor();
  const idPrefix = `${config.prefix}:`;
  let processed = 0;
  let skipped = 0;
  let index = 0;

  for (const raw of inputs.rows) {
    // line 1 is the header
    const rowNumber = index + 2;
    index += 1;
    try {
      const result = normalizeRow(raw, cursor, config, rowNumber);
      if (result.kind === "skip") {
        skipped += 1;
        continue;
      }
      const id = cell(result.row, config.columns.id);
      const subject = namedNode(`${config.namespace}${id.substring(idPrefix.length)}`);
      const state: RowState = { graph, subject, row: result.row, rowNumber, ctx: { ...ctx, row: rowNumber } };
      for (const step of COLUMN_PROCESSING_ORDER) COLUMN_STEPS[step](state);
      processed += 1;
    } catch (err) {
      if (isStructuralError(err)) throw err.atRow(rowNumber);
      throw err;
    }
  }
  debug("rows.done", { processed, skipped });

  const ontology = namedNode(config.namespace);
  const now = (inputs.now ?? (() => new Date()))();
  injectOntologyMetadata(graph, ontology, { version, priorVersion, publishingUrl: config.publishingUrl, now });
  const releases = inputs.releases ?? [];
  applyReleaseDescription(graph, ontology, releases, version);
  applyChangeNotes(graph, inputs.changeNotes ?? [], releases, version, ctx);

  const report = validateGraph(graph, {
    namespace: config.namespace,
    ontologyIri: ontology.value,
    registry,
    versionBuilt: Boolean(version),
  });

  return {
    graph,
    prefixes: mapFromRegistry(registry),
    diagnostics: [...ctx.diagnostics, ...report.warnings],
    report,
    rowsProcessed: processed,
    rowsSkipped: skipped,
  };
}

export interface CompileOptions {
  input: string;
  /** Turtle output path. */
  output?: string;
  ntriplesOutput?: string;
  metadataPath?: string;
  prefixesPath?: string;
  releasesPath?: string;
  changeNotesPath?: string;
  version?: string;
  priorVersion?: string;
  config?: CompilerConfig;
  fetcher?: CachingFetcher;
  now?: () => Date;
}

/** Download (or reuse) the class list of every mapping vocabulary that names a source. */
export async function loadExternalClasses(
  config: CompilerConfig,
  fetcher: CachingFetcher,
): Promise<Map<string, Set<string>>> {
  const classes = new Map<string, Set<string>>();
  for (const mapping of config.mappings) {
    const source = mapping.vocabulary?.source;
    if (!source) continue;
    const text = await fetcher.fetchOrReuse(source);
    const parsed = await parseRdf(text, inferMediaTypeFromName(source), source);
    classes.set(mapping.name, collectClassIris(parsed.quads));
    debug("vocabulary.classes", { mapping: mapping.name, classes: classes.get(mapping.name)?.size ?? 0 });
  }
  return classes;
}

/**
 * Read every input, compile, and write the outputs. Nothing is written when
 * compilation fails.
 */
export async function runCompilation(options: CompileOptions): Promise<CompileResult> {
  resetSummary();
  const config = options.config ?? compilerConfigStore.getState().config;

  return timedAsync("compile", { input: options.input }, async () => {
    const source = await readCsvFile(options.input);
    source.requireColumns(requiredColumns(config), "Input");

    const prefixes: Array<Record<string, string>> = [];
    if (options.prefixesPath) prefixes.push(await readPrefixFile(options.prefixesPath));
    let overlay: Quad[] | undefined;
    if (options.metadataPath) {
      const parsed = await readRdfFile(options.metadataPath);
      overlay = parsed.quads;
      prefixes.push(parsed.prefixes);
    }
    const releases = options.releasesPath ? loadReleases(await readCsvFile(options.releasesPath), config.releaseColumns) : [];
    const changeNotes = options.changeNotesPath
      ? loadChangeNotes(await readCsvFile(options.changeNotesPath), config.changeNoteColumns)
      : [];

    const fetcher =
      options.fetcher ??
      new CachingFetcher({ cacheDir: config.cacheDir, delayMs: config.fetchDelayMs, timeoutMs: config.fetchTimeoutMs });
    const externalClasses = await loadExternalClasses(config, fetcher);

    const result = compileVocabulary({
      rows: source,
      config,
      overlay,
      prefixes,
      releases,
      changeNotes,
      externalClasses,
      version: options.version,
      priorVersion: options.priorVersion,
      now: options.now,
    });

    if (options.output) await writeGraphFile(options.output, result.graph, "turtle", result.prefixes);
    if (options.ntriplesOutput) await writeGraphFile(options.ntriplesOutput, result.graph, "ntriples");
    info("compile.done", {
      triples: result.graph.size,
      rows: result.rowsProcessed,
      skipped: result.rowsSkipped,
      diagnostics: result.diagnostics.length,
    });
    return result;
  });
}
