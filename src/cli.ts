#!/usr/bin/env node
import { CliUsageError, HELP, VERSION, parseCliArgs, type CliOptions } from "./cliArgs";
import { runCompilation } from "./compiler";
import { compilerConfigStore, loadConfigFile } from "./stores/compilerConfigStore";
import { FetchError, isStructuralError } from "./types/errors";
import { error, parseLogLevel, setLogLevel } from "./utils/logger";

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      console.error(HELP);
      return 2;
    }
    throw err;
  }

  if (options.help) {
    console.log(HELP);
    return 0;
  }
  if (options.about) {
    console.log(VERSION);
    return 0;
  }
  if (!options.input || (!options.output && !options.ntriples)) {
    console.error("Error: --input and --output (or --ntriples) are required");
    return 2;
  }
  if (options.logLevel) {
    const level = parseLogLevel(options.logLevel);
    if (!level) {
      console.error(`Error: unknown log level '${options.logLevel}'`);
      return 2;
    }
    setLogLevel(level);
  }

  const store = compilerConfigStore.getState();
  if (options.config) await loadConfigFile(options.config);
  if (options.namespace) store.updateConfig({ namespace: options.namespace });
  if (options.publishingUrl) store.updateConfig({ publishingUrl: options.publishingUrl });

  const ntriplesOnly = options.outputFormat === "ntriples";
  const result = await runCompilation({
    input: options.input,
    output: ntriplesOnly ? undefined : options.output,
    ntriplesOutput: ntriplesOnly ? options.output : options.ntriples,
    metadataPath: options.metadata,
    prefixesPath: options.prefixes,
    releasesPath: options.releases,
    changeNotesPath: options.notes,
    version: options.version,
    priorVersion: options.priorVersion,
    config: compilerConfigStore.getState().config,
  });

  console.log(
    `Compiled ${result.rowsProcessed} rows into ${result.graph.size} triples (${result.diagnostics.length} warnings)`,
  );
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (isStructuralError(err)) {
      error("compile.failed", { code: err.code, ...err.context });
      console.error(`Error: ${err.message}`);
    } else if (err instanceof FetchError) {
      error("compile.failed", { url: err.url, status: err.status });
      console.error(`Error: ${err.message}`);
    } else {
      console.error(err);
    }
    process.exitCode = 1;
  });
