import type { IriTerm, RdfSubject } from "../lib/terms";
import type { Triple } from "../lib/triple";
import type { MapperKey } from "../lib/typeToken";
import { rdfAltSerializer, rdfBagSerializer, rdfSeqSerializer } from "../mappers/collections/rdfContainer";
import { rdfListSerializer } from "../mappers/collections/rdfList";
import { unorderedItemsSerializer } from "../mappers/collections/unorderedItems";
import type { SerializationContext } from "../types/context";
import type { CollectionSerializerFactory, SerializerArg, UnmappedTriplesSerializer } from "../types/mapper";

/**
 * Fluent accumulator of the triples describing one subject.
 *
 * ```ts
 * const [subject, triples] = context
 *   .resourceBuilder(context.createIriTerm(person.id))
 *   .addValue(schema("name"), person.name)
 *   .addRdfList(schema("nicknames"), person.nicknames)
 *   .when(person.email !== undefined, (b) => b.addValue(schema("email"), person.email))
 *   .build();
 * ```
 */
export class ResourceBuilder<S extends RdfSubject> {
  private readonly triples: Triple[] = [];

  constructor(
    readonly subject: S,
    private readonly context: SerializationContext,
  ) {}

  addValue<V>(predicate: IriTerm, value: V, serializer?: SerializerArg<V>): this {
    this.triples.push(...this.context.value(this.subject, predicate, value, serializer));
    return this;
  }

  /** Skips null and undefined. */
  addValueIfNotNull<V>(predicate: IriTerm, value: V | null | undefined, serializer?: SerializerArg<V>): this {
    if (value === null || value === undefined) return this;
    return this.addValue(predicate, value, serializer);
  }

  addValues<V>(predicate: IriTerm, values: Iterable<V>, serializer?: SerializerArg<V>): this {
    this.triples.push(...this.context.values(this.subject, predicate, values, serializer));
    return this;
  }

  addCollection<C, V>(
    predicate: IriTerm,
    collection: C,
    factory: CollectionSerializerFactory<C, V>,
    itemSerializer?: SerializerArg<V>,
  ): this {
    this.triples.push(...this.context.collection(this.subject, predicate, collection, factory, itemSerializer));
    return this;
  }

  addRdfList<V>(predicate: IriTerm, items: Iterable<V>, itemSerializer?: SerializerArg<V>): this {
    return this.addCollection(predicate, items, rdfListSerializer<V>, itemSerializer);
  }

  addRdfSeq<V>(predicate: IriTerm, items: Iterable<V>, itemSerializer?: SerializerArg<V>): this {
    return this.addCollection(predicate, items, rdfSeqSerializer<V>, itemSerializer);
  }

  addRdfBag<V>(predicate: IriTerm, items: Iterable<V>, itemSerializer?: SerializerArg<V>): this {
    return this.addCollection(predicate, items, rdfBagSerializer<V>, itemSerializer);
  }

  addRdfAlt<V>(predicate: IriTerm, items: Iterable<V>, itemSerializer?: SerializerArg<V>): this {
    return this.addCollection(predicate, items, rdfAltSerializer<V>, itemSerializer);
  }

  /** One triple per item; order is not preserved by the graph. */
  addUnorderedItems<V>(predicate: IriTerm, items: Iterable<V>, itemSerializer?: SerializerArg<V>): this {
    return this.addCollection(predicate, items, unorderedItemsSerializer<V>, itemSerializer);
  }

  /** One value per entry, each written by `entrySerializer`. */
  addMap<K, V>(predicate: IriTerm, map: ReadonlyMap<K, V>, entrySerializer: SerializerArg<[K, V]>): this {
    return this.addValues(predicate, map.entries(), entrySerializer);
  }

  /** Re-emits triples captured by getUnmapped when the resource was read. */
  addUnmapped<V>(value: V, serializer?: MapperKey<V> | UnmappedTriplesSerializer<V>): this {
    this.triples.push(...this.context.unmappedTriples(this.subject, value, serializer));
    return this;
  }

  addTriples(triples: Iterable<Triple>): this {
    this.triples.push(...triples);
    return this;
  }

  /** Takes over the triples another builder collected so far. */
  addFromBuilder(other: ResourceBuilder<RdfSubject>): this {
    const [, triples] = other.build();
    return this.addTriples(triples);
  }

  when(condition: boolean, fn: (builder: this) => void): this {
    if (condition) fn(this);
    return this;
  }

  build(): [S, Triple[]] {
    return [this.subject, [...this.triples]];
  }
}
