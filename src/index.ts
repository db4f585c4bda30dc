export {
  COLUMN_PROCESSING_ORDER,
  buildRegistry,
  compileVocabulary,
  loadExternalClasses,
  requiredColumns,
  runCompilation,
} from "./compiler";
export type { ColumnStep, CompileInputs, CompileOptions, CompileResult } from "./compiler";
export { compilerConfigStore, defaultConfig, loadConfigFile, parseConfig } from "./stores/compilerConfigStore";
export * from "./types/compiler";
export * from "./types/diagnostics";
export * from "./types/errors";
export { expandComplexValue, parseUnionMembers } from "./utils/complexValue";
export { CsvSource, parseCsv, readCsvFile } from "./utils/csvSource";
export { deprecate, isDeprecated } from "./utils/deprecation";
export { CachingFetcher, doFetch, fetchText } from "./utils/fetcher";
export { validateGraph } from "./utils/graphValidation";
export { assertMapping, parseMappingRelation } from "./utils/mappingValidator";
export { parseRdf, readPrefixFile } from "./utils/rdfParser";
export { serializeGraph, writeGraphFile } from "./utils/rdfSerialization";
export { RowCursor, normalizeRow } from "./utils/rowNormalizer";
export { expandPrefixed, resolveIri, resolveTerm, shortLocalName, toPrefixed } from "./utils/termUtils";
export { assignType } from "./utils/typeAssigner";
export {
  applyChangeNotes,
  compareVersions,
  injectOntologyMetadata,
  loadChangeNotes,
  loadReleases,
  parseVersion,
} from "./utils/versioning";
export { VocabularyGraph } from "./utils/vocabularyGraph";
