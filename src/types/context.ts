import type { IriTerm, LiteralTerm, RdfObject, RdfSubject } from "../lib/terms";
import type { Triple } from "../lib/triple";
import type { MapperKey } from "../lib/typeToken";
import type { ResourceBuilder } from "../context/resourceBuilder";
import type { ResourceReader } from "../context/resourceReader";
import type {
  CollectionDeserializerFactory,
  CollectionSerializerFactory,
  DeserializerSource,
  LiteralTermDeserializer,
  LiteralTermSerializer,
  SerializerArg,
  UnmappedTriplesDeserializer,
  UnmappedTriplesSerializer,
} from "./mapper";

export interface SerializeOptions<T> {
  serializer?: SerializerArg<T>;
  /** Subject the value hangs off, if any; handed to resource mappers and providers. */
  parentSubject?: RdfSubject;
}

/** One per top-level encode call. */
export interface SerializationContext {
  createIriTerm(value: string): IriTerm;

  resourceBuilder<S extends RdfSubject>(subject: S): ResourceBuilder<S>;

  /** Objects to embed for `value`, plus any triples describing nested structure. */
  serialize<T>(value: T, options?: SerializeOptions<T>): [RdfObject[], Triple[]];

  resource<T>(instance: T, serializer?: SerializerArg<T>): [RdfSubject, Triple[]];

  value<T>(subject: RdfSubject, predicate: IriTerm, value: T, serializer?: SerializerArg<T>): Triple[];

  values<T>(subject: RdfSubject, predicate: IriTerm, values: Iterable<T>, serializer?: SerializerArg<T>): Triple[];

  toLiteralTerm<T>(value: T, serializer?: MapperKey<T> | LiteralTermSerializer<T>): LiteralTerm;

  collection<C, T>(
    subject: RdfSubject,
    predicate: IriTerm,
    collection: C,
    factory: CollectionSerializerFactory<C, T>,
    itemSerializer?: SerializerArg<T>,
  ): Triple[];

  unmappedTriples<T>(subject: RdfSubject, value: T, serializer?: MapperKey<T> | UnmappedTriplesSerializer<T>): Triple[];
}

export interface SubjectTriplesOptions {
  /** Follow blank-node objects transitively. Defaults to true. */
  includeBlankNodes?: boolean;
  /** Mark the returned triples as read. Defaults to true. */
  trackRead?: boolean;
}

export interface OptionalValueOptions {
  /** Fail when the property has more than one value. Defaults to true. */
  enforceSingleValue?: boolean;
}

export interface UnmappedOptions {
  /** Capture every unread triple in the graph instead of the subject's own. */
  globalUnmapped?: boolean;
}

/** One per top-level decode call; remembers which triples were read. */
export interface DeserializationContext {
  reader(subject: RdfSubject): ResourceReader;

  deserialize<T>(term: RdfObject, source: DeserializerSource<T>): T;

  fromLiteralTerm<T>(
    term: LiteralTerm,
    source: MapperKey<T> | LiteralTermDeserializer<T>,
    bypassDatatypeCheck?: boolean,
  ): T;

  getTriplesForSubject(subject: RdfSubject, options?: SubjectTriplesOptions): Triple[];

  trackTriplesRead(subject: RdfSubject, triples: Iterable<Triple>): void;

  optional<T>(
    subject: RdfSubject,
    predicate: IriTerm,
    source: DeserializerSource<T>,
    options?: OptionalValueOptions,
  ): T | undefined;

  require<T>(
    subject: RdfSubject,
    predicate: IriTerm,
    source: DeserializerSource<T>,
    options?: OptionalValueOptions,
  ): T;

  getValues<T>(subject: RdfSubject, predicate: IriTerm, source: DeserializerSource<T>): T[];

  requireCollection<C, T>(
    subject: RdfSubject,
    predicate: IriTerm,
    factory: CollectionDeserializerFactory<C, T>,
    itemSource: DeserializerSource<T>,
  ): C;

  optionalCollection<C, T>(
    subject: RdfSubject,
    predicate: IriTerm,
    factory: CollectionDeserializerFactory<C, T>,
    itemSource: DeserializerSource<T>,
  ): C | undefined;

  collect<T, R>(
    subject: RdfSubject,
    predicate: IriTerm,
    itemSource: DeserializerSource<T>,
    collector: (items: T[]) => R,
  ): R;

  getMap<K, V>(subject: RdfSubject, predicate: IriTerm, entrySource: DeserializerSource<[K, V]>): Map<K, V>;

  getUnmapped<T>(
    subject: RdfSubject,
    source: MapperKey<T> | UnmappedTriplesDeserializer<T>,
    options?: UnmappedOptions,
  ): T;
}
