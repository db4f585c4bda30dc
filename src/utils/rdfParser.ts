import { readFile } from "node:fs/promises";
import { Readable } from "node:stream";
import { Parser } from "n3";
import type { Quad } from "@rdfjs/types";
import { OWL, RDF, RDFS } from "../constants/vocabularies";
import { StructuralError } from "../types/errors";
import { debug } from "./logger";

export interface ParsedRdf {
  quads: Quad[];
  prefixes: Record<string, string>;
}

const N3_FORMATS: Record<string, string> = {
  "text/turtle": "text/turtle",
  "application/n-triples": "application/n-triples",
  "text/n3": "text/n3",
  "application/trig": "application/trig",
};

/** Media type from a file name or URL, defaulting to Turtle. */
export function inferMediaTypeFromName(name: string): string {
  const lower = name.toLowerCase().split(/[?#]/)[0];
  if (lower.endsWith(".nt")) return "application/n-triples";
  if (lower.endsWith(".n3")) return "text/n3";
  if (lower.endsWith(".trig")) return "application/trig";
  if (lower.endsWith(".jsonld") || lower.endsWith(".json")) return "application/ld+json";
  if (lower.endsWith(".rdf") || lower.endsWith(".owl") || lower.endsWith(".xml")) return "application/rdf+xml";
  return "text/turtle";
}

/** Parse Turtle-family text with n3, collecting the declared prefixes as well. */
export function parseWithN3(text: string, format = "text/turtle", baseIRI?: string): Promise<ParsedRdf> {
  const parser = new Parser({ format, baseIRI });
  const quads: Quad[] = [];
  const prefixes: Record<string, string> = {};

  return new Promise<ParsedRdf>((resolve, reject) => {
    parser.parse(
      text,
      (err, quad) => {
        if (err) {
          reject(new StructuralError("INVALID_INPUT", `RDF parse error: ${err.message}`));
          return;
        }
        if (quad) {
          quads.push(quad);
        } else {
          resolve({ quads, prefixes });
        }
      },
      (prefix, iri) => {
        prefixes[prefix] = iri.value;
      },
    );
  });
}

/** Formats n3 does not read (RDF/XML, JSON-LD) go through rdf-parse. */
async function parseWithRdfParse(text: string, contentType: string, baseIRI?: string): Promise<ParsedRdf> {
  const { rdfParser } = await import("rdf-parse");
  const quads: Quad[] = [];
  const prefixes: Record<string, string> = {};
  const stream = rdfParser.parse(Readable.from([text]), { contentType, baseIRI });

  return new Promise<ParsedRdf>((resolve, reject) => {
    stream.on("prefix", (prefix: string, iri: { value: string }) => {
      prefixes[prefix] = iri.value;
    });
    stream.on("data", (quad: Quad) => {
      quads.push(quad);
    });
    stream.on("error", (err: Error) => {
      reject(new StructuralError("INVALID_INPUT", `RDF parse error: ${err.message}`));
    });
    stream.on("end", () => resolve({ quads, prefixes }));
  });
}

export async function parseRdf(text: string, contentType: string, baseIRI?: string): Promise<ParsedRdf> {
  const n3Format = N3_FORMATS[contentType];
  const parsed = n3Format
    ? await parseWithN3(text, n3Format, baseIRI)
    : await parseWithRdfParse(text, contentType, baseIRI);
  debug("rdf.parsed", { contentType, quads: parsed.quads.length, prefixes: Object.keys(parsed.prefixes).length });
  return parsed;
}

export async function readRdfFile(path: string): Promise<ParsedRdf> {
  const text = await readFile(path, "utf-8");
  return parseRdf(text, inferMediaTypeFromName(path));
}

/** Read the `@prefix` declarations of a Turtle file. */
export async function readPrefixFile(path: string): Promise<Record<string, string>> {
  const text = await readFile(path, "utf-8");
  const { prefixes } = await parseWithN3(text);
  return prefixes;
}

/** Named subjects typed owl:Class or rdfs:Class. */
export function collectClassIris(quads: Quad[]): Set<string> {
  const classes = new Set<string>();
  for (const q of quads) {
    if (
      q.subject.termType === "NamedNode" &&
      q.predicate.value === RDF.type &&
      (q.object.value === OWL.Class || q.object.value === RDFS.Class)
    ) {
      classes.add(q.subject.value);
    }
  }
  return classes;
}
