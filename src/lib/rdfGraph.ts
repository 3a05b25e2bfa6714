import { termKey } from "./terms";
import type { IriTerm, RdfObject, RdfSubject } from "./terms";
import type { Triple } from "./triple";

export interface TriplePattern {
  subject?: RdfSubject;
  predicate?: IriTerm;
  object?: RdfObject;
}

interface GraphIndex {
  bySubject: Map<string, Triple[]>;
  byPredicate: Map<string, Triple[]>;
  byObject: Map<string, Triple[]>;
}

function pushIndexed(map: Map<string, Triple[]>, key: string, triple: Triple) {
  const bucket = map.get(key);
  if (bucket) {
    bucket.push(triple);
  } else {
    map.set(key, [triple]);
  }
}

/**
 * Immutable, duplicate-free set of triples. Iteration follows first insertion;
 * subject/predicate/object indices are built on first lookup.
 */
export class RdfGraph implements Iterable<Triple> {
  private readonly byKey: ReadonlyMap<string, Triple>;
  private index: GraphIndex | undefined;

  constructor(triples: Iterable<Triple> = []) {
    const byKey = new Map<string, Triple>();
    for (const triple of triples) {
      if (!byKey.has(triple.key)) byKey.set(triple.key, triple);
    }
    this.byKey = byKey;
  }

  static readonly empty = new RdfGraph();

  static fromTriples(triples: Iterable<Triple>): RdfGraph {
    return new RdfGraph(triples);
  }

  get triples(): Triple[] {
    return Array.from(this.byKey.values());
  }

  get size(): number {
    return this.byKey.size;
  }

  get isEmpty(): boolean {
    return this.byKey.size === 0;
  }

  [Symbol.iterator](): Iterator<Triple> {
    return this.byKey.values();
  }

  has(triple: Triple): boolean {
    return this.byKey.has(triple.key);
  }

  /**
   * Lazy, restartable view over the triples matching `pattern`; every call to
   * the returned iterable's iterator starts a fresh scan.
   */
  findTriples(pattern: TriplePattern = {}): Iterable<Triple> {
    const candidates = this.candidatesFor(pattern);
    const { subject, predicate, object } = pattern;
    const subjectKey = subject ? termKey(subject) : undefined;
    const predicateKey = predicate ? termKey(predicate) : undefined;
    const objectKey = object ? termKey(object) : undefined;
    return {
      *[Symbol.iterator]() {
        for (const triple of candidates) {
          if (subjectKey !== undefined && termKey(triple.subject) !== subjectKey) continue;
          if (predicateKey !== undefined && termKey(triple.predicate) !== predicateKey) continue;
          if (objectKey !== undefined && termKey(triple.object) !== objectKey) continue;
          yield triple;
        }
      },
    };
  }

  hasTriples(pattern: TriplePattern = {}): boolean {
    return !this.findTriples(pattern)[Symbol.iterator]().next().done;
  }

  /** Distinct subjects in first-seen order. */
  subjects(): RdfSubject[] {
    return Array.from(this.getIndex().bySubject.values(), (bucket) => bucket[0].subject);
  }

  merge(other: Iterable<Triple>): RdfGraph {
    return new RdfGraph(concat(this.byKey.values(), other));
  }

  withTriples(triples: Iterable<Triple>): RdfGraph {
    return this.merge(triples);
  }

  withoutTriples(triples: Iterable<Triple>): RdfGraph {
    const removed = new Set<string>();
    for (const triple of triples) removed.add(triple.key);
    if (removed.size === 0) return this;
    return this.filter((triple) => !removed.has(triple.key));
  }

  filter(predicate: (triple: Triple) => boolean): RdfGraph {
    return new RdfGraph(this.triples.filter(predicate));
  }

  /** Set equality. Blank nodes compare by identity. */
  equals(other: RdfGraph): boolean {
    if (other.size !== this.size) return false;
    for (const key of this.byKey.keys()) {
      if (!other.byKey.has(key)) return false;
    }
    return true;
  }

  toString(): string {
    return this.triples.map((t) => t.toString()).join("\n");
  }

  private candidatesFor(pattern: TriplePattern): Iterable<Triple> {
    const { subject, predicate, object } = pattern;
    if (!subject && !predicate && !object) return { [Symbol.iterator]: () => this.byKey.values() };
    const index = this.getIndex();
    const buckets: Triple[][] = [];
    if (subject) buckets.push(index.bySubject.get(termKey(subject)) ?? []);
    if (predicate) buckets.push(index.byPredicate.get(termKey(predicate)) ?? []);
    if (object) buckets.push(index.byObject.get(termKey(object)) ?? []);
    return buckets.reduce((smallest, bucket) => (bucket.length < smallest.length ? bucket : smallest));
  }

  private getIndex(): GraphIndex {
    if (this.index) return this.index;
    const index: GraphIndex = { bySubject: new Map(), byPredicate: new Map(), byObject: new Map() };
    for (const triple of this.byKey.values()) {
      pushIndexed(index.bySubject, termKey(triple.subject), triple);
      pushIndexed(index.byPredicate, termKey(triple.predicate), triple);
      pushIndexed(index.byObject, termKey(triple.object), triple);
    }
    this.index = index;
    return index;
  }
}

function* concat<T>(...sources: Iterable<T>[]): Generator<T> {
  for (const source of sources) yield* source;
}
