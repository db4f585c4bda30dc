import { writeFile } from "node:fs/promises";
import { Writer } from "n3";
import type { Quad } from "@rdfjs/types";
import { info } from "./logger";
import type { VocabularyGraph } from "./vocabularyGraph";

export type ExportFormat = "turtle" | "ntriples";

const WRITER_FORMATS: Record<ExportFormat, string> = {
  turtle: "Turtle",
  ntriples: "N-Triples",
};

export function normalizeExportFormat(value: string): ExportFormat | undefined {
  const v = value.trim().toLowerCase();
  if (v === "turtle" || v === "ttl" || v === "text/turtle") return "turtle";
  if (v === "ntriples" || v === "n-triples" || v === "nt" || v === "application/n-triples") return "ntriples";
  return undefined;
}

function compareTerms(a: Quad, b: Quad): number {
  return (
    a.subject.value.localeCompare(b.subject.value) ||
    a.predicate.value.localeCompare(b.predicate.value) ||
    a.object.value.localeCompare(b.object.value)
  );
}

/**
 * Serialize the graph. Named subjects come out in IRI order so repeated builds of
 * the same input produce the same file; prefixes only apply to Turtle.
 */
export function serializeGraph(
  graph: VocabularyGraph,
  format: ExportFormat,
  prefixes: Record<string, string> = {},
): Promise<string> {
  const writer = new Writer({
    format: WRITER_FORMATS[format],
    prefixes: format === "turtle" ? prefixes : undefined,
  });
  writer.addQuads(graph.quads().sort(compareTerms));

  return new Promise<string>((resolve, reject) => {
    writer.end((err, result: string) => {
      if (err) reject(err);
      else resolve(result);
    });
  });
}

export async function writeGraphFile(
  path: string,
  graph: VocabularyGraph,
  format: ExportFormat,
  prefixes: Record<string, string> = {},
): Promise<void> {
  const text = await serializeGraph(graph, format, prefixes);
  await writeFile(path, text, "utf-8");
  info("output.written", { path, format, triples: graph.size });
}
