import { DataFactory } from "n3";
import type { NamedNode } from "@rdfjs/types";
import { DCTERMS, OWL, XSD } from "../constants/vocabularies";
import type { ChangeNote, CompileContext, CompilerConfig, Release, VersionTuple } from "../types/compiler";
import type { Diagnostic } from "../types/diagnostics";
import { StructuralError } from "../types/errors";
import type { CsvSource } from "./csvSource";
import { isDeprecated } from "./deprecation";
import { debug, once, warn } from "./logger";
import { normalizeCells } from "./rowNormalizer";
import { resolveIri, toPrefixed } from "./termUtils";
import type { VocabularyGraph } from "./vocabularyGraph";

const { namedNode, literal } = DataFactory;

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

export function parseVersion(text: string | undefined): VersionTuple | undefined {
  const m = (text ?? "").trim().match(VERSION_PATTERN);
  if (!m) return undefined;
  return [Number(m[1]), Number(m[2]), Number(m[3])];
}

export function compareVersions(a: VersionTuple, b: VersionTuple): number {
  for (let i = 0; i < 3; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  return 0;
}

/** `1.2.0` -> `<publishingUrl>1-2-0/` */
export function versionIri(publishingUrl: string, version: string): string {
  return `${publishingUrl}${version.replace(/\./g, "-")}/`;
}

/** UTC timestamp at second precision, e.g. `2024-05-01T08:30:00Z`. */
export function utcTimestamp(now: Date): string {
  return now.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function requireVersion(value: string, label: string): void {
  if (!parseVersion(value)) {
    throw new StructuralError("INVALID_VERSION", `${label} '${value}' is not in x.y.z format`);
  }
}

export interface OntologyMetadataOptions {
  version?: string;
  priorVersion?: string;
  publishingUrl: string;
  now: Date;
}

/** Version and date metadata on the ontology resource. */
export function injectOntologyMetadata(
  graph: VocabularyGraph,
  ontology: NamedNode,
  options: OntologyMetadataOptions,
): void {
  const { version, priorVersion, publishingUrl, now } = options;
  const timestamp = utcTimestamp(now);

  if (version) {
    requireVersion(version, "Version");
    if (!graph.has(ontology, DCTERMS.issued)) {
      graph.add(ontology, DCTERMS.issued, literal(timestamp.slice(0, 10), namedNode(XSD.date)));
    }
    graph.replace(ontology, OWL.versionIRI, namedNode(versionIri(publishingUrl, version)));
    graph.replace(ontology, OWL.versionInfo, literal(version));
  }
  if (priorVersion) {
    requireVersion(priorVersion, "Prior version");
    graph.replace(ontology, OWL.priorVersion, namedNode(versionIri(publishingUrl, priorVersion)));
  }
  graph.replace(ontology, DCTERMS.modified, literal(timestamp, namedNode(XSD.dateTime)));
}

export function loadReleases(source: CsvSource, columns: CompilerConfig["releaseColumns"]): Release[] {
  source.requireColumns([columns.version, columns.issued], "Releases list");
  const descriptionColumns = source.fields.filter((f) => f.startsWith(columns.descriptionPrefix));
  const releases: Release[] = [];
  for (const raw of source) {
    const row = normalizeCells(raw);
    const version = row[columns.version] ?? "";
    if (!version) continue;
    const descriptions: Record<string, string> = {};
    for (const col of descriptionColumns) {
      const text = row[col];
      if (text) descriptions[col.substring(columns.descriptionPrefix.length)] = text;
    }
    releases.push({ version, issued: row[columns.issued] ?? "", descriptions });
  }
  return releases;
}

export function loadChangeNotes(source: CsvSource, columns: CompilerConfig["changeNoteColumns"]): ChangeNote[] {
  source.requireColumns([columns.subject, columns.version, columns.note], "Change notes list");
  const notes: ChangeNote[] = [];
  for (const raw of source) {
    const row = normalizeCells(raw);
    const subject = row[columns.subject] ?? "";
    const text = row[columns.note] ?? "";
    if (!subject || !text) continue;
    notes.push({ subject, version: row[columns.version] ?? "", text });
  }
  return notes;
}

/**
 * Append the built release's description fragments to the ontology's
 * dct:description of the same language, or add one where none exists.
 */
export function applyReleaseDescription(
  graph: VocabularyGraph,
  ontology: NamedNode,
  releases: Release[],
  version: string | undefined,
): void {
  if (!version) return;
  const release = releases.find((r) => r.version === version);
  if (!release) return;
  for (const [lang, fragment] of Object.entries(release.descriptions)) {
    const existing = graph
      .objects(ontology, DCTERMS.description)
      .find((o) => o.termType === "Literal" && o.language === lang.toLowerCase());
    if (existing) {
      graph.remove(ontology, DCTERMS.description, existing);
      graph.add(ontology, DCTERMS.description, literal(`${existing.value} ${fragment}`, lang.toLowerCase()));
    } else {
      graph.add(ontology, DCTERMS.description, literal(fragment, lang.toLowerCase()));
    }
  }
}

function report(ctx: CompileContext, diagnostic: Diagnostic): void {
  ctx.diagnostics.push(diagnostic);
  warn("changeNote.issue", { rule: diagnostic.rule, entity: diagnostic.entity, message: diagnostic.message });
}

/**
 * Attach change notes as `dct:modified "<issued> (<text>)"`. Notes for versions later
 * than the one being built are left out; notes without a known release date are
 * reported and dropped.
 */
export function applyChangeNotes(
  graph: VocabularyGraph,
  notes: ChangeNote[],
  releases: Release[],
  buildVersion: string | undefined,
  ctx: CompileContext,
): number {
  const issuedByVersion = new Map<string, string>();
  for (const r of releases) {
    if (r.issued) issuedByVersion.set(r.version, r.issued);
  }
  if (notes.length === 0 || issuedByVersion.size === 0) return 0;

  const built = parseVersion(buildVersion);
  let attached = 0;

  for (const note of notes) {
    const entity = note.subject;
    const version = parseVersion(note.version);
    if (!version) {
      report(ctx, { entity, rule: "change-note-malformed", severity: "warning", message: `Malformed version '${note.version}'` });
      continue;
    }
    if (built && compareVersions(version, built) > 0) continue;

    const issued = issuedByVersion.get(note.version.trim());
    if (!issued) {
      report(ctx, { entity, rule: "change-note-unreleased", severity: "warning", message: `No release date for version ${note.version}` });
      continue;
    }

    const subject = resolveIri(note.subject, ctx.registry, { subject: note.subject, predicate: DCTERMS.modified, object: note.text });
    if (isDeprecated(graph, subject) && !note.text.startsWith("Deprecated")) {
      once("debug", "changeNote.deprecatedSubject", subject.value, { entity: toPrefixed(subject.value, ctx.registry) });
      continue;
    }

    const value = `${issued} (${note.text})`;
    const sameDay = graph
      .objects(subject, DCTERMS.modified)
      .some((o) => o.termType === "Literal" && o.value.startsWith(`${issued} (`) && o.value !== value);
    if (sameDay) {
      report(ctx, {
        entity: toPrefixed(subject.value, ctx.registry),
        rule: "change-note-duplicate",
        severity: "warning",
        message: `More than one change note dated ${issued}`,
      });
    }
    if (graph.add(subject, DCTERMS.modified, literal(value))) attached += 1;
  }
  debug("changeNotes.applied", { attached, total: notes.length });
  return attached;
}
