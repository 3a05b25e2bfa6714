import {
  DeserializationException,
  PropertyValueNotFoundException,
  RdfMapperException,
  TooManyPropertyValuesException,
} from "../lib/errors";
import type { RdfGraph } from "../lib/rdfGraph";
import { BlankNodeTerm, IriTerm, LiteralTerm, termKey } from "../lib/terms";
import type { RdfObject, RdfSubject } from "../lib/terms";
import type { Triple } from "../lib/triple";
import { isMapperKey } from "../lib/typeToken";
import type { MapperKey } from "../lib/typeToken";
import { Rdf } from "../lib/vocab";
import { UnorderedItemsCollectorDeserializer, unorderedItemsDeserializer } from "../mappers/collections/unorderedItems";
import type { MapperRegistry } from "../registry/mapperRegistry";
import type {
  DeserializationContext,
  OptionalValueOptions,
  SubjectTriplesOptions,
  UnmappedOptions,
} from "../types/context";
import { mapperName } from "../types/mapper";
import type {
  CollectionDeserializerFactory,
  Deserializer,
  DeserializerSource,
  LiteralTermDeserializer,
  MultiObjectsDeserializer,
  UnmappedTriplesDeserializer,
} from "../types/mapper";
import { debug } from "../utils/logger";
import { ResourceReader } from "./resourceReader";

/**
 * Blank nodes reachable from the objects of `triples`, transitively.
 * `visited` is shared across the recursion and keeps cycles finite.
 */
export function getBlankNodeObjectsDeep(
  graph: RdfGraph,
  triples: Iterable<Triple>,
  visited: Set<string> = new Set(),
): BlankNodeTerm[] {
  const found: BlankNodeTerm[] = [];
  for (const triple of triples) {
    const object = triple.object;
    if (!(object instanceof BlankNodeTerm)) continue;
    const key = termKey(object);
    if (visited.has(key)) continue;
    visited.add(key);
    found.push(object);
  }
  const nested = found.flatMap((node) => getBlankNodeObjectsDeep(graph, graph.findTriples({ subject: node }), visited));
  return [...found, ...nested];
}

export class DeserializationContextImpl implements DeserializationContext {
  private readonly readTriples = new Map<string, Triple>();

  constructor(
    readonly graph: RdfGraph,
    readonly registry: MapperRegistry,
  ) {}

  reader(subject: RdfSubject): ResourceReader {
    return new ResourceReader(subject, this);
  }

  /** Top-level entry for a subject of a known rdf:type, used by whole-graph decoding. */
  deserializeResource(subject: RdfSubject, typeIri: IriTerm): unknown {
    if (subject instanceof IriTerm) {
      const deserializer = this.registry.getGlobalResourceDeserializerByType(typeIri);
      this.registerTypeRead(subject, deserializer.typeIri);
      return deserializer.fromRdfResource(subject, this);
    }
    const deserializer = this.registry.getLocalResourceDeserializerByType(typeIri);
    this.registerTypeRead(subject, deserializer.typeIri);
    return deserializer.fromRdfResource(subject, this);
  }

  deserialize<T>(term: RdfObject, source: DeserializerSource<T>): T {
    const deserializer = isMapperKey(source) ? this.lookupDeserializer(term, source) : source;
    return this.apply(term, deserializer);
  }

  fromLiteralTerm<T>(
    term: LiteralTerm,
    source: MapperKey<T> | LiteralTermDeserializer<T>,
    bypassDatatypeCheck = false,
  ): T {
    const deserializer = isMapperKey(source) ? this.registry.getLiteralTermDeserializer(source) : source;
    return deserializer.fromRdfTerm(term, this, bypassDatatypeCheck);
  }

  getTriplesForSubject(subject: RdfSubject, options: SubjectTriplesOptions = {}): Triple[] {
    const { includeBlankNodes = true, trackRead = true } = options;
    const direct = Array.from(this.graph.findTriples({ subject }));
    const result = includeBlankNodes ? [...direct, ...this.blankNodeClosure(direct)] : direct;
    if (trackRead) this.trackTriplesRead(subject, result);
    return result;
  }

  trackTriplesRead(subject: RdfSubject, triples: Iterable<Triple>): void {
    const list = Array.from(triples);
    for (const triple of list) this.readTriples.set(triple.key, triple);
    this.onTriplesRead(subject, list);
  }

  optional<T>(
    subject: RdfSubject,
    predicate: IriTerm,
    source: DeserializerSource<T>,
    options: OptionalValueOptions = {},
  ): T | undefined {
    const { enforceSingleValue = true } = options;
    const triples = this.triplesForReading(subject, predicate);

    const multi = this.findMultiObjectsDeserializer(source);
    if (multi) {
      this.trackTriplesRead(subject, triples);
      return multi.fromRdfObjects(triples.map((t) => t.object), this);
    }

    if (triples.length === 0) return undefined;
    if (enforceSingleValue && triples.length > 1) {
      throw new TooManyPropertyValuesException(subject, predicate, triples.map((t) => t.object));
    }
    const [first] = triples;
    this.trackTriplesRead(subject, [first]);
    return this.deserialize(first.object, source);
  }

  require<T>(
    subject: RdfSubject,
    predicate: IriTerm,
    source: DeserializerSource<T>,
    options: OptionalValueOptions = {},
  ): T {
    const result = this.optional(subject, predicate, source, options);
    if (result === undefined) throw new PropertyValueNotFoundException(subject, predicate);
    return result;
  }

  getValues<T>(subject: RdfSubject, predicate: IriTerm, source: DeserializerSource<T>): T[] {
    return this.requireCollection(subject, predicate, unorderedItemsDeserializer<T>, source);
  }

  requireCollection<C, T>(
    subject: RdfSubject,
    predicate: IriTerm,
    factory: CollectionDeserializerFactory<C, T>,
    itemSource: DeserializerSource<T>,
  ): C {
    return this.require(subject, predicate, factory(itemSource));
  }

  optionalCollection<C, T>(
    subject: RdfSubject,
    predicate: IriTerm,
    factory: CollectionDeserializerFactory<C, T>,
    itemSource: DeserializerSource<T>,
  ): C | undefined {
    return this.optional(subject, predicate, factory(itemSource));
  }

  collect<T, R>(
    subject: RdfSubject,
    predicate: IriTerm,
    itemSource: DeserializerSource<T>,
    collector: (items: T[]) => R,
  ): R {
    return this.require(subject, predicate, new UnorderedItemsCollectorDeserializer(collector, itemSource));
  }

  getMap<K, V>(subject: RdfSubject, predicate: IriTerm, entrySource: DeserializerSource<[K, V]>): Map<K, V> {
    return this.collect(subject, predicate, entrySource, (entries) => new Map(entries));
  }

  getUnmapped<T>(
    subject: RdfSubject,
    source: MapperKey<T> | UnmappedTriplesDeserializer<T>,
    options: UnmappedOptions = {},
  ): T {
    const { globalUnmapped = false } = options;
    const deserializer = isMapperKey(source) ? this.registry.getUnmappedTriplesDeserializer(source) : source;
    if (globalUnmapped && !deserializer.deep) {
      throw new RdfMapperException(
        `Global unmapped capture needs a deep deserializer; ${mapperName(deserializer)} is shallow`,
        "global-unmapped-requires-deep",
      );
    }
    const triples = globalUnmapped
      ? this.graph.withoutTriples(this.readTriples.values()).triples
      : this.remainingTriplesForSubject(subject, deserializer.deep);
    this.trackTriplesRead(subject, triples);
    return deserializer.fromUnmappedTriples(triples);
  }

  /** Every triple marked read so far. */
  getAllProcessedTriples(): Triple[] {
    return Array.from(this.readTriples.values());
  }

  /** Called for resources deserialized below another resource, not for the top-level call. */
  protected onDeserializeChildResource(_subject: RdfSubject): void {}

  protected onTriplesRead(_subject: RdfSubject, _triples: readonly Triple[]): void {}

  private lookupDeserializer<T>(term: RdfObject, key: MapperKey<T>): Deserializer<T> {
    if (term instanceof LiteralTerm) return this.registry.getDeserializer(key, ["literal"]);
    if (term instanceof IriTerm) return this.registry.getDeserializer(key, ["globalResource", "unifiedResource", "iri"]);
    return this.registry.getDeserializer(key, ["localResource", "unifiedResource"]);
  }

  private apply<T>(term: RdfObject, deserializer: Deserializer<T>): T {
    switch (deserializer.kind) {
      case "literal":
        if (!(term instanceof LiteralTerm)) throw termMismatch(term, "a literal", deserializer);
        return deserializer.fromRdfTerm(term, this);
      case "iri":
        if (!(term instanceof IriTerm)) throw termMismatch(term, "an IRI", deserializer);
        return deserializer.fromRdfTerm(term, this);
      case "globalResource":
        if (!(term instanceof IriTerm)) throw termMismatch(term, "an IRI subject", deserializer);
        return this.childResource(term, deserializer);
      case "localResource":
        if (!(term instanceof BlankNodeTerm)) throw termMismatch(term, "a blank node", deserializer);
        return this.childResource(term, deserializer);
      case "unifiedResource":
        if (term instanceof LiteralTerm) throw termMismatch(term, "a resource", deserializer);
        return this.childResource(term, deserializer);
      case "multiObjects":
        return deserializer.fromRdfObjects([term], this);
      case "unmappedTriples":
        throw new DeserializationException(
          `${mapperName(deserializer)} reads unmapped triples and cannot decode the single term ${term}`,
          "unmapped-deserializer-as-value",
        );
    }
  }

  private childResource<S extends RdfSubject, T>(
    subject: S,
    deserializer: { readonly typeIri?: IriTerm; fromRdfResource(subject: S, context: DeserializationContext): T },
  ): T {
    this.onDeserializeChildResource(subject);
    this.registerTypeRead(subject, deserializer.typeIri);
    return deserializer.fromRdfResource(subject, this);
  }

  /** Marks (subject rdf:type typeIri) read when the graph states it. */
  private registerTypeRead(subject: RdfSubject, typeIri: IriTerm | undefined) {
    if (!typeIri) return;
    const typeTriples = Array.from(this.graph.findTriples({ subject, predicate: Rdf.type, object: typeIri }));
    if (typeTriples.length === 0) {
      debug("deserialization.typeTripleMissing", { subject: subject.toString(), typeIri: typeIri.value });
      return;
    }
    this.trackTriplesRead(subject, typeTriples);
  }

  private findMultiObjectsDeserializer<T>(source: DeserializerSource<T>): MultiObjectsDeserializer<T> | undefined {
    if (isMapperKey(source)) return this.registry.findMultiObjectsDeserializer(source);
    return source.kind === "multiObjects" ? source : undefined;
  }

  private triplesForReading(subject: RdfSubject, predicate: IriTerm): Triple[] {
    return this.getTriplesForSubject(subject, { includeBlankNodes: false, trackRead: false }).filter((t) =>
      t.predicate.equals(predicate),
    );
  }

  private remainingTriplesForSubject(subject: RdfSubject, includeBlankNodes: boolean): Triple[] {
    const unread = (t: Triple) => !this.readTriples.has(t.key);
    const direct = Array.from(this.graph.findTriples({ subject })).filter(unread);
    if (!includeBlankNodes) return direct;
    return [...direct, ...this.blankNodeClosure(direct).filter(unread)];
  }

  private blankNodeClosure(triples: readonly Triple[]): Triple[] {
    return getBlankNodeObjectsDeep(this.graph, triples).flatMap((node) => Array.from(this.graph.findTriples({ subject: node })));
  }
}

function termMismatch(term: RdfObject, expected: string, deserializer: Deserializer<unknown>): DeserializationException {
  return new DeserializationException(
    `${mapperName(deserializer)} expects ${expected} but got ${term}`,
    "term-kind-mismatch",
    { term: term.toString(), mapper: mapperName(deserializer) },
  );
}

/**
 * Records which subjects were decoded as children of another resource and
 * which triples were read since the last clearProcessedTriples().
 */
export class TrackingDeserializationContext extends DeserializationContextImpl {
  private readonly processedSubjects = new Set<string>();
  private processedTriples = new Map<string, Triple>();

  protected override onDeserializeChildResource(subject: RdfSubject): void {
    this.processedSubjects.add(termKey(subject));
  }

  protected override onTriplesRead(_subject: RdfSubject, triples: readonly Triple[]): void {
    for (const triple of triples) this.processedTriples.set(triple.key, triple);
  }

  clearProcessedTriples(): void {
    this.processedTriples = new Map();
  }

  getProcessedTriples(): Triple[] {
    return Array.from(this.processedTriples.values());
  }

  isChildSubject(subject: RdfSubject): boolean {
    return this.processedSubjects.has(termKey(subject));
  }
}
