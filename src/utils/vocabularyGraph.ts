import { DataFactory, Store } from "n3";
import type { BlankNode, Literal, NamedNode, Quad, Term } from "@rdfjs/types";
import { RDF } from "../constants/vocabularies";

const { namedNode, blankNode, quad, defaultGraph } = DataFactory;

export type SubjectTerm = NamedNode | BlankNode;
export type ObjectTerm = NamedNode | BlankNode | Literal;

export function isObjectTerm(term: Term): term is ObjectTerm {
  return term.termType === "NamedNode" || term.termType === "BlankNode" || term.termType === "Literal";
}

export function isSubjectTerm(term: Term): term is SubjectTerm {
  return term.termType === "NamedNode" || term.termType === "BlankNode";
}

function toNode(value: string | NamedNode): NamedNode {
  return typeof value === "string" ? namedNode(value) : value;
}

/**
 * The single, explicitly passed graph every compiler component writes to.
 *
 * Everything lives in the default graph of an n3 Store. The store already has set
 * semantics, so asserting an existing triple leaves the size unchanged.
 */
export class VocabularyGraph {
  private readonly store: Store;

  constructor(store: Store = new Store()) {
    this.store = store;
  }

  getStore(): Store {
    return this.store;
  }

  get size(): number {
    return this.store.size;
  }

  /** Assert a triple. Returns false when it was already present. */
  add(subject: SubjectTerm, predicate: string | NamedNode, object: ObjectTerm): boolean {
    const p = toNode(predicate);
    if (this.store.countQuads(subject, p, object, defaultGraph()) > 0) return false;
    this.store.addQuad(quad(subject, p, object, defaultGraph()));
    return true;
  }

  addQuads(quads: Quad[]): number {
    let added = 0;
    for (const q of quads) {
      if (!isSubjectTerm(q.subject) || !isObjectTerm(q.object) || q.predicate.termType !== "NamedNode") continue;
      if (this.add(q.subject, q.predicate, q.object)) added += 1;
    }
    return added;
  }

  has(subject: SubjectTerm | null, predicate: string | NamedNode | null, object?: ObjectTerm | null): boolean {
    const p = predicate === null ? null : toNode(predicate);
    return this.store.countQuads(subject, p, object ?? null, defaultGraph()) > 0;
  }

  quads(subject?: SubjectTerm | null, predicate?: string | NamedNode | null, object?: ObjectTerm | null): Quad[] {
    const p = predicate === null || predicate === undefined ? null : toNode(predicate);
    return this.store.getQuads(subject ?? null, p, object ?? null, defaultGraph());
  }

  objects(subject: SubjectTerm, predicate: string | NamedNode): ObjectTerm[] {
    return this.quads(subject, predicate).map((q) => q.object).filter(isObjectTerm);
  }

  subjects(predicate: string | NamedNode | null, object: ObjectTerm | null): SubjectTerm[] {
    const p = predicate === null ? null : toNode(predicate);
    const seen = new Map<string, SubjectTerm>();
    for (const q of this.store.getQuads(null, p, object, defaultGraph())) {
      if (isSubjectTerm(q.subject)) seen.set(`${q.subject.termType}:${q.subject.value}`, q.subject);
    }
    return Array.from(seen.values());
  }

  /** Every distinct named subject in the graph. */
  namedSubjects(): NamedNode[] {
    const seen = new Map<string, NamedNode>();
    for (const q of this.store.getQuads(null, null, null, defaultGraph())) {
      if (q.subject.termType === "NamedNode") seen.set(q.subject.value, q.subject);
    }
    return Array.from(seen.values());
  }

  /** Remove every triple matching the pattern. Returns the number removed. */
  remove(subject: SubjectTerm | null, predicate?: string | NamedNode | null, object?: ObjectTerm | null): number {
    const matches = this.quads(subject, predicate, object);
    this.store.removeQuads(matches);
    return matches.length;
  }

  /** Replace all (subject, predicate, *) triples with a single value. */
  replace(subject: SubjectTerm, predicate: string | NamedNode, object: ObjectTerm): void {
    this.remove(subject, predicate);
    this.add(subject, predicate, object);
  }

  /** Materialize an ordered RDF collection and return its head node. */
  createList(items: ObjectTerm[]): SubjectTerm {
    if (items.length === 0) return namedNode(RDF.nil);
    const cells = items.map(() => blankNode());
    items.forEach((item, idx) => {
      this.add(cells[idx], RDF.first, item);
      this.add(cells[idx], RDF.rest, idx + 1 < cells.length ? cells[idx + 1] : namedNode(RDF.nil));
    });
    return cells[0];
  }

  /** Read an RDF collection back into an array. Stops on malformed or cyclic lists. */
  listItems(head: Term): ObjectTerm[] {
    const items: ObjectTerm[] = [];
    const visited = new Set<string>();
    let cursor: Term = head;
    while (cursor.termType === "BlankNode" && !visited.has(cursor.value)) {
      visited.add(cursor.value);
      const first = this.objects(cursor, RDF.first);
      const rest = this.objects(cursor, RDF.rest);
      if (first.length !== 1 || rest.length !== 1) break;
      items.push(first[0]);
      cursor = rest[0];
    }
    return items;
  }

  /**
   * Remove a blank node's triples, recursing into blank nodes it points to, as long as
   * nothing else still references them.
   */
  removeUnreferencedBlankNode(node: BlankNode): number {
    if (this.store.countQuads(null, null, node, defaultGraph()) > 0) return 0;
    const outgoing = this.quads(node);
    this.store.removeQuads(outgoing);
    let removed = outgoing.length;
    for (const q of outgoing) {
      if (q.object.termType === "BlankNode") removed += this.removeUnreferencedBlankNode(q.object);
    }
    return removed;
  }
}
