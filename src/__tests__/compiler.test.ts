import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DataFactory } from "n3";
import { compileVocabulary, requiredColumns, runCompilation, type CompileInputs } from "../compiler";
import { DCTERMS, OWL, RDF, RDFS, SKOS } from "../constants/vocabularies";
import { defaultConfig } from "../stores/compilerConfigStore";
import type { CompilerConfig, RawRow } from "../types/compiler";
import { StructuralError } from "../types/errors";
import { CachingFetcher } from "../utils/fetcher";
import { setLogLevel } from "../utils/logger";
import { parseWithN3 } from "../utils/rdfParser";
import type { VocabularyGraph } from "../utils/vocabularyGraph";
import { BF, METADATA_TTL, NS, RELEASES_CSV, row, toCsv } from "./fixtures/vocabFixtures";

const { namedNode } = DataFactory;
const NOW = () => new Date("2024-05-01T08:30:15Z");

beforeAll(() => setLogLevel("silent"));

function compile(rows: RawRow[], extra: Partial<CompileInputs> = {}) {
  return compileVocabulary({ rows, config: defaultConfig, now: NOW, ...extra });
}

function values(graph: VocabularyGraph, local: string, predicate: string): string[] {
  return graph.objects(namedNode(`${NS}${local}`), predicate).map((o) => o.value).sort();
}

function structuralFailure(fn: () => unknown): StructuralError {
  try {
    fn();
  } catch (err) {
    if (err instanceof StructuralError) return err;
    throw err;
  }
  throw new Error("expected a StructuralError");
}

describe("compileVocabulary", () => {
  it("ignores repeated domain and range values within an identifier group", () => {
    const { graph, rowsProcessed } = compile([
      row({ id: "ex:realizes", label: "realizes", type: "owl:ObjectProperty", domain: "[ex:Work, ex:Expression]", range: "ex:Item" }),
      row({ id: "ex:realizes", domain: "[ex:Work, ex:Expression]", range: "ex:Item", mapBf: "skos:closeMatch", bfId: "bf:instanceOf" }),
    ]);
    expect(rowsProcessed).toBe(2);

    const domains = graph.objects(namedNode(`${NS}realizes`), RDFS.domain);
    expect(domains).toHaveLength(1);
    const union = domains[0];
    if (union.termType !== "BlankNode") throw new Error("expected a union node");
    const [head] = graph.objects(union, OWL.unionOf);
    expect(graph.listItems(head).map((t) => t.value)).toEqual([`${NS}Work`, `${NS}Expression`]);

    expect(values(graph, "realizes", RDFS.range)).toEqual([`${NS}Item`]);
    expect(values(graph, "realizes", SKOS.closeMatch)).toEqual([`${BF}instanceOf`]);
  });

  it("asserts a changed value on a continuation row", () => {
    const { graph } = compile([
      row({ id: "ex:realizes", type: "owl:ObjectProperty", range: "ex:Item" }),
      row({ id: "ex:realizes", range: "ex:Manifestation" }),
    ]);
    expect(values(graph, "realizes", RDFS.range)).toEqual([`${NS}Item`, `${NS}Manifestation`]);
  });

  it("defaults property ranges by kind", () => {
    const { graph } = compile([
      row({ id: "ex:title", label: "title", type: "owl:DatatypeProperty" }),
      row({ id: "ex:part", label: "part", type: "owl:ObjectProperty" }),
    ]);
    expect(values(graph, "title", RDFS.range)).toEqual([RDFS.Literal]);
    expect(values(graph, "part", RDFS.range)).toEqual([RDFS.Resource]);
  });

  it("skips rows with an unknown status or no identifier", () => {
    const { graph, rowsProcessed, rowsSkipped } = compile([
      row({ id: "ex:Draft", status: "draft", label: "Draft", type: "owl:Class" }),
      row({ id: "#N/A", label: "Nothing" }),
      row({ id: "ex:Work", label: "Work", type: "owl:Class" }),
    ]);
    expect(rowsProcessed).toBe(1);
    expect(rowsSkipped).toBe(2);
    expect(graph.has(namedNode(`${NS}Draft`), null)).toBe(false);
  });

  it("reports the row number of a fatal problem", () => {
    const err = structuralFailure(() =>
      compile([row({ id: "ex:Work", label: "Work", type: "owl:Class" }), row({ id: "ex:thing", type: "banana" })]),
    );
    expect(err.code).toBe("UNEXPECTED_TYPE");
    expect(err.message).toBe(`Unexpected type value (row 3, triple <${NS}thing> <${RDF.type}> banana)`);
  });

  it("fills in the row for errors raised below the row loop", () => {
    const err = structuralFailure(() => compile([row({ id: "ex:Work", type: "owl:Class", mapBf: "skos:relatedMatch", bfId: "bf:Work" })]));
    expect(err.code).toBe("UNEXPECTED_MAPPING");
    expect(err.context.row).toBe(2);
  });

  it("requires a type on the first row of an identifier group", () => {
    const err = structuralFailure(() => compile([row({ id: "ex:thing", label: "thing" })]));
    expect(err.code).toBe("UNEXPECTED_TYPE");
    expect(err.message).toBe(`Missing type value (row 2, triple <${NS}thing> <${RDF.type}> ?)`);
  });

  it("lets continuation rows of a typed identifier leave the type empty", () => {
    const { graph, rowsProcessed } = compile([
      row({ id: "ex:Work", label: "Work", type: "owl:Class" }),
      row({ id: "ex:Work", subClassOf: "ex:Thing" }),
    ]);
    expect(rowsProcessed).toBe(2);
    expect(values(graph, "Work", RDF.type)).toEqual([OWL.Class]);
    expect(values(graph, "Work", RDFS.subClassOf)).toEqual([`${NS}Thing`]);
  });

  it("rejects identifiers outside the managed namespace", () => {
    const err = structuralFailure(() => compile([row({ id: "bf:Work", label: "Work" })]));
    expect(err.code).toBe("OUTSIDE_NAMESPACE");
    expect(err.message).toBe("Identifier 'bf:Work' is not within the ex: namespace (row 2)");
  });

  it("keeps a deprecated entity deprecated on later rows", () => {
    const { graph } = compile([
      row({ id: "ex:Old", label: "Old", type: "owl:Class", subClassOf: "ex:Thing", status: "deprecated", replacedBy: "ex:New" }),
      row({ id: "ex:Old", subClassOf: "ex:Other" }),
      row({ id: "ex:New", label: "New", type: "owl:Class" }),
    ]);
    const old = namedNode(`${NS}Old`);
    expect(graph.quads(old).map((q) => q.predicate.value).sort()).toEqual(
      [RDFS.label, RDF.type, OWL.deprecated, DCTERMS.isReplacedBy].sort(),
    );
    expect(values(graph, "Old", RDF.type)).toEqual([OWL.DeprecatedClass]);
    expect(values(graph, "Old", DCTERMS.isReplacedBy)).toEqual([`${NS}New`]);
  });

  it("produces the same graph when a row is repeated", () => {
    const r = row({
      id: "ex:realizes",
      label: "realizes",
      type: "owl:ObjectProperty",
      domain: "[ex:Work, ex:Expression]",
      subPropertyOf: "ex:relation",
    });
    expect(compile([r, r]).graph.size).toBe(compile([r]).graph.size);
  });

  it("reports mapping kind mismatches without failing", () => {
    const { graph, diagnostics } = compile([row({ id: "ex:Work", label: "Work", type: "owl:Class", mapBf: "skos:exactMatch", bfId: "bf:title" })]);
    expect(values(graph, "Work", SKOS.exactMatch)).toEqual([`${BF}title`]);
    expect(diagnostics.filter((d) => d.rule === "mapping-kind-mismatch").map((d) => d.message)).toEqual([
      "Class is mapped to bf:title, which is not a BIBFRAME class",
    ]);
  });

  it("validates the version strings before doing anything", () => {
    expect(() => compile([], { version: "1.0" })).toThrow("Version '1.0' is not in x.y.z format");
    expect(() => compile([], { version: "1.0.0", priorVersion: "x" })).toThrow("Prior version 'x' is not in x.y.z format");
  });

  it("merges the metadata overlay first and keeps its issued date", async () => {
    const { quads, prefixes } = await parseWithN3(METADATA_TTL);
    const { graph } = compile([row({ id: "ex:Work", label: "Work", type: "owl:Class" })], {
      overlay: quads,
      prefixes: [prefixes],
      version: "1.0.0",
    });
    const ontology = namedNode(NS);
    expect(graph.objects(ontology, DCTERMS.issued).map((o) => o.value)).toEqual(["2020-01-01"]);
    expect(graph.objects(ontology, OWL.versionInfo).map((o) => o.value)).toEqual(["1.0.0"]);
    expect(graph.objects(ontology, OWL.versionIRI).map((o) => o.value)).toEqual([
      "http://example.org/published/vocab/1-0-0/",
    ]);
  });
});

describe("runCompilation", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "vocab-compile-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeInput(name: string, text: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, text, "utf-8");
    return path;
  }

  it("writes Turtle and N-Triples that read back to the same graph", async () => {
    const input = await writeInput(
      "vocab.csv",
      toCsv([
        row({ id: "ex:Work", label: "Work", type: "owl:Class", mapBf: "skos:exactMatch", bfId: "bf:Work" }),
        row({ id: "ex:realizes", label: "realizes", type: "owl:ObjectProperty", domain: "[ex:Work, ex:Item]", range: "ex:Work" }),
        row({ id: "ex:Item", label: "Item", type: "owl:Class" }),
      ]),
    );
    const metadataPath = await writeInput("metadata.ttl", METADATA_TTL);
    const releasesPath = await writeInput("releases.csv", RELEASES_CSV);
    const changeNotesPath = await writeInput("notes.csv", "id,version,note\nex:Work,1.0.0,New\nex:Item,1.0.0,New\n");
    const output = join(dir, "vocab.ttl");
    const ntriplesOutput = join(dir, "vocab.nt");

    const result = await runCompilation({
      input,
      output,
      ntriplesOutput,
      metadataPath,
      releasesPath,
      changeNotesPath,
      version: "1.0.0",
      config: defaultConfig,
      now: NOW,
    });

    expect(result.rowsProcessed).toBe(3);
    expect(values(result.graph, "Work", DCTERMS.modified)).toEqual(["2024-06-01 (New)"]);
    expect(result.graph.objects(namedNode(NS), DCTERMS.description).map((o) => o.value)).toEqual([
      "A vocabulary for testing. First stable release.",
    ]);

    const turtle = await parseWithN3(await readFile(output, "utf-8"));
    expect(turtle.quads).toHaveLength(result.graph.size);
    expect(turtle.prefixes.ex).toBe(NS);

    const ntriples = (await readFile(ntriplesOutput, "utf-8")).trim().split("\n");
    expect(ntriples).toHaveLength(result.graph.size);
    expect(ntriples.every((line) => line.endsWith(" ."))).toBe(true);
  });

  it("writes nothing when compilation fails", async () => {
    const input = await writeInput("vocab.csv", toCsv([row({ id: "ex:Work", type: "banana" })]));
    const output = join(dir, "vocab.ttl");
    await expect(runCompilation({ input, output, config: defaultConfig, now: NOW })).rejects.toThrow(
      "Unexpected type value",
    );
    await expect(readFile(output, "utf-8")).rejects.toThrow();
  });

  it("fails on an input without the identifier column", async () => {
    const input = await writeInput("vocab.csv", "name,label\nWork,Work\n");
    await expect(runCompilation({ input, config: defaultConfig, now: NOW })).rejects.toThrow(
      "Input is missing column(s): id",
    );
  });

  it("fails when a configured column is missing from the header", async () => {
    const input = await writeInput("vocab.csv", "id,rdfs:label-en,rdf:type\nex:Work,Work,owl:Class\nex:Item,Item,owl:Class\n");
    const output = join(dir, "vocab.ttl");
    await expect(runCompilation({ input, output, config: defaultConfig, now: NOW })).rejects.toThrow(
      "Input is missing column(s): rdfs:domain, rdfs:range, status, mapping-bf, bf-id, mapping-rda, rda-id",
    );
    await expect(readFile(output, "utf-8")).rejects.toThrow();
  });

  it("only requires the columns the config names", async () => {
    const config: CompilerConfig = {
      ...defaultConfig,
      columns: { ...defaultConfig.columns, status: undefined },
      mappings: [],
    };
    expect(requiredColumns(config)).toEqual(["id", "rdfs:label-en", "rdf:type", "rdfs:domain", "rdfs:range"]);
    const input = await writeInput(
      "vocab.csv",
      "id,rdfs:label-en,rdf:type,rdfs:domain,rdfs:range\nex:Work,Work,owl:Class,,\nex:Item,Item,owl:Class,,\n",
    );
    const result = await runCompilation({ input, config, now: NOW });
    expect(result.rowsProcessed).toBe(2);
    expect(result.rowsSkipped).toBe(0);
  });

  it("checks mappings against a downloaded class list", async () => {
    const [bibframe, rda] = defaultConfig.mappings;
    const config: CompilerConfig = {
      ...defaultConfig,
      mappings: [{ ...bibframe, vocabulary: { source: "http://example.org/bf.ttl", exceptionNamespaces: [] } }, rda],
    };
    let requests = 0;
    const fetcher = new CachingFetcher({
      cacheDir: join(dir, "cache"),
      delayMs: 0,
      timeoutMs: 1000,
      fetchFn: () => {
        requests += 1;
        return Promise.resolve(new Response(`<${BF}Work> a <${OWL.Class}> .\n`));
      },
    });
    const input = await writeInput(
      "vocab.csv",
      toCsv([
        row({ id: "ex:Work", label: "Work", type: "owl:Class", mapBf: "skos:exactMatch", bfId: "bf:Work" }),
        row({ id: "ex:Item", label: "Item", type: "owl:Class", mapBf: "skos:exactMatch", bfId: "bf:Item" }),
      ]),
    );

    const result = await runCompilation({ input, config, fetcher, now: NOW });
    expect(requests).toBe(1);
    expect(result.diagnostics.filter((d) => d.rule === "mapping-kind-mismatch").map((d) => d.entity)).toEqual([
      "ex:Item",
    ]);
  });
});
