import type { IriTerm, RdfSubject } from "../lib/terms";
import type { MapperKey } from "../lib/typeToken";
import {
  rdfAltDeserializer,
  rdfBagDeserializer,
  rdfSeqDeserializer,
} from "../mappers/collections/rdfContainer";
import { rdfListDeserializer } from "../mappers/collections/rdfList";
import type { DeserializationContext, OptionalValueOptions, UnmappedOptions } from "../types/context";
import type { CollectionDeserializerFactory, DeserializerSource, UnmappedTriplesDeserializer } from "../types/mapper";

/** Property access for one subject; every read is recorded by the owning context. */
export class ResourceReader {
  constructor(
    readonly subject: RdfSubject,
    private readonly context: DeserializationContext,
  ) {}

  require<T>(predicate: IriTerm, source: DeserializerSource<T>, options?: OptionalValueOptions): T {
    return this.context.require(this.subject, predicate, source, options);
  }

  optional<T>(predicate: IriTerm, source: DeserializerSource<T>, options?: OptionalValueOptions): T | undefined {
    return this.context.optional(this.subject, predicate, source, options);
  }

  getValues<T>(predicate: IriTerm, source: DeserializerSource<T>): T[] {
    return this.context.getValues(this.subject, predicate, source);
  }

  requireCollection<C, T>(
    predicate: IriTerm,
    factory: CollectionDeserializerFactory<C, T>,
    itemSource: DeserializerSource<T>,
  ): C {
    return this.context.requireCollection(this.subject, predicate, factory, itemSource);
  }

  optionalCollection<C, T>(
    predicate: IriTerm,
    factory: CollectionDeserializerFactory<C, T>,
    itemSource: DeserializerSource<T>,
  ): C | undefined {
    return this.context.optionalCollection(this.subject, predicate, factory, itemSource);
  }

  requireRdfList<T>(predicate: IriTerm, itemSource: DeserializerSource<T>): T[] {
    return this.requireCollection(predicate, rdfListDeserializer<T>, itemSource);
  }

  optionalRdfList<T>(predicate: IriTerm, itemSource: DeserializerSource<T>): T[] | undefined {
    return this.optionalCollection(predicate, rdfListDeserializer<T>, itemSource);
  }

  requireRdfSeq<T>(predicate: IriTerm, itemSource: DeserializerSource<T>): T[] {
    return this.requireCollection(predicate, rdfSeqDeserializer<T>, itemSource);
  }

  optionalRdfSeq<T>(predicate: IriTerm, itemSource: DeserializerSource<T>): T[] | undefined {
    return this.optionalCollection(predicate, rdfSeqDeserializer<T>, itemSource);
  }

  requireRdfBag<T>(predicate: IriTerm, itemSource: DeserializerSource<T>): T[] {
    return this.requireCollection(predicate, rdfBagDeserializer<T>, itemSource);
  }

  optionalRdfBag<T>(predicate: IriTerm, itemSource: DeserializerSource<T>): T[] | undefined {
    return this.optionalCollection(predicate, rdfBagDeserializer<T>, itemSource);
  }

  requireRdfAlt<T>(predicate: IriTerm, itemSource: DeserializerSource<T>): T[] {
    return this.requireCollection(predicate, rdfAltDeserializer<T>, itemSource);
  }

  optionalRdfAlt<T>(predicate: IriTerm, itemSource: DeserializerSource<T>): T[] | undefined {
    return this.optionalCollection(predicate, rdfAltDeserializer<T>, itemSource);
  }

  collect<T, R>(predicate: IriTerm, itemSource: DeserializerSource<T>, collector: (items: T[]) => R): R {
    return this.context.collect(this.subject, predicate, itemSource, collector);
  }

  getMap<K, V>(predicate: IriTerm, entrySource: DeserializerSource<[K, V]>): Map<K, V> {
    return this.context.getMap(this.subject, predicate, entrySource);
  }

  /** Claims the triples on this subject nothing has read yet. */
  getUnmapped<T>(source: MapperKey<T> | UnmappedTriplesDeserializer<T>, options?: UnmappedOptions): T {
    return this.context.getUnmapped(this.subject, source, options);
  }
}
