/**
 * Mapper shapes understood by the registry and the contexts.
 *
 * Every mapper carries a `kind` discriminant naming its shape. A single object
 * may be both the serializer and the deserializer of its shape.
 */
import type { BlankNodeTerm, IriTerm, LiteralTerm, RdfObject, RdfSubject } from "../lib/terms";
import type { Triple } from "../lib/triple";
import type { MapperKey } from "../lib/typeToken";
import type { DeserializationContext, SerializationContext } from "./context";
import type { SerializationProvider } from "../mappers/serializationProvider";

export type MapperKind =
  | "literal"
  | "iri"
  | "globalResource"
  | "localResource"
  | "unifiedResource"
  | "multiObjects"
  | "unmappedTriples";

export const ALL_MAPPER_KINDS: readonly MapperKind[] = [
  "literal",
  "iri",
  "globalResource",
  "localResource",
  "unifiedResource",
  "multiObjects",
  "unmappedTriples",
];

export const RESOURCE_KINDS: readonly MapperKind[] = ["globalResource", "localResource", "unifiedResource"];

// ---------------------------------------------------------------------------
// Terms
// ---------------------------------------------------------------------------

export interface LiteralTermSerializer<T> {
  readonly kind: "literal";
  readonly datatype?: IriTerm;
  toRdfTerm(value: T, context: SerializationContext): LiteralTerm;
}

export interface LiteralTermDeserializer<T> {
  readonly kind: "literal";
  readonly datatype?: IriTerm;
  fromRdfTerm(term: LiteralTerm, context: DeserializationContext, bypassDatatypeCheck?: boolean): T;
}

export interface LiteralTermMapper<T> extends LiteralTermSerializer<T>, LiteralTermDeserializer<T> {}

export interface IriTermSerializer<T> {
  readonly kind: "iri";
  toRdfTerm(value: T, context: SerializationContext): IriTerm;
}

export interface IriTermDeserializer<T> {
  readonly kind: "iri";
  fromRdfTerm(term: IriTerm, context: DeserializationContext): T;
}

export interface IriTermMapper<T> extends IriTermSerializer<T>, IriTermDeserializer<T> {}

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

/** Resource with a global identity: always serialized under an IRI. */
export interface GlobalResourceSerializer<T> {
  readonly kind: "globalResource";
  readonly typeIri?: IriTerm;
  toRdfResource(value: T, context: SerializationContext, parentSubject?: RdfSubject): [IriTerm, Triple[]];
}

export interface GlobalResourceDeserializer<T> {
  readonly kind: "globalResource";
  readonly typeIri?: IriTerm;
  fromRdfResource(subject: IriTerm, context: DeserializationContext): T;
}

export interface GlobalResourceMapper<T> extends GlobalResourceSerializer<T>, GlobalResourceDeserializer<T> {}

/** Anonymous resource: serialized under a fresh blank node. */
export interface LocalResourceSerializer<T> {
  readonly kind: "localResource";
  readonly typeIri?: IriTerm;
  toRdfResource(value: T, context: SerializationContext, parentSubject?: RdfSubject): [BlankNodeTerm, Triple[]];
}

export interface LocalResourceDeserializer<T> {
  readonly kind: "localResource";
  readonly typeIri?: IriTerm;
  fromRdfResource(subject: BlankNodeTerm, context: DeserializationContext): T;
}

export interface LocalResourceMapper<T> extends LocalResourceSerializer<T>, LocalResourceDeserializer<T> {}

/** Resource that may live under either an IRI or a blank node. */
export interface UnifiedResourceSerializer<T> {
  readonly kind: "unifiedResource";
  readonly typeIri?: IriTerm;
  toRdfResource(value: T, context: SerializationContext, parentSubject?: RdfSubject): [RdfSubject, Triple[]];
}

export interface UnifiedResourceDeserializer<T> {
  readonly kind: "unifiedResource";
  readonly typeIri?: IriTerm;
  fromRdfResource(subject: RdfSubject, context: DeserializationContext): T;
}

export interface UnifiedResourceMapper<T> extends UnifiedResourceSerializer<T>, UnifiedResourceDeserializer<T> {}

export type ResourceSerializer<T> =
  | GlobalResourceSerializer<T>
  | LocalResourceSerializer<T>
  | UnifiedResourceSerializer<T>;

export type ResourceDeserializer<T> =
  | GlobalResourceDeserializer<T>
  | LocalResourceDeserializer<T>
  | UnifiedResourceDeserializer<T>;

// ---------------------------------------------------------------------------
// Values spread over several objects, and captured leftovers
// ---------------------------------------------------------------------------

export interface MultiObjectsSerializer<T> {
  readonly kind: "multiObjects";
  toRdfObjects(value: T, context: SerializationContext, parentSubject?: RdfSubject): [RdfObject[], Triple[]];
}

export interface MultiObjectsDeserializer<T> {
  readonly kind: "multiObjects";
  fromRdfObjects(objects: readonly RdfObject[], context: DeserializationContext): T;
}

export interface UnmappedTriplesSerializer<T> {
  readonly kind: "unmappedTriples";
  toUnmappedTriples(subject: RdfSubject, value: T): Triple[];
}

export interface UnmappedTriplesDeserializer<T> {
  readonly kind: "unmappedTriples";
  /** Whether captured triples include everything reachable through blank nodes. */
  readonly deep: boolean;
  fromUnmappedTriples(triples: readonly Triple[]): T;
}

export interface UnmappedTriplesMapper<T> extends UnmappedTriplesSerializer<T>, UnmappedTriplesDeserializer<T> {}

// ---------------------------------------------------------------------------
// Unions and arguments
// ---------------------------------------------------------------------------

export type Serializer<T> =
  | LiteralTermSerializer<T>
  | IriTermSerializer<T>
  | ResourceSerializer<T>
  | MultiObjectsSerializer<T>
  | UnmappedTriplesSerializer<T>;

export type Deserializer<T> =
  | LiteralTermDeserializer<T>
  | IriTermDeserializer<T>
  | ResourceDeserializer<T>
  | MultiObjectsDeserializer<T>
  | UnmappedTriplesDeserializer<T>;

export type Mapper<T> = Serializer<T> | Deserializer<T>;

/** What a caller may pass where a serializer is expected. */
export type SerializerArg<T> = MapperKey<T> | Serializer<T> | SerializationProvider<T>;

/** What a caller may pass where a deserializer is expected. */
export type DeserializerSource<T> = MapperKey<T> | Deserializer<T>;

export type CollectionSerializerFactory<C, T> = (itemSerializer?: Serializer<T>) => Serializer<C>;

export type CollectionDeserializerFactory<C, T> = (itemDeserializer: DeserializerSource<T>) => Deserializer<C>;

export function isSerializer<T>(mapper: Mapper<T>): mapper is Serializer<T> {
  return (
    "toRdfTerm" in mapper ||
    "toRdfResource" in mapper ||
    "toRdfObjects" in mapper ||
    "toUnmappedTriples" in mapper
  );
}

export function isDeserializer<T>(mapper: Mapper<T>): mapper is Deserializer<T> {
  return (
    "fromRdfTerm" in mapper ||
    "fromRdfResource" in mapper ||
    "fromRdfObjects" in mapper ||
    "fromUnmappedTriples" in mapper
  );
}

/**
 * Override adapters resolve their own type through the context again, so they
 * must never become a registry default.
 */
export function delegatesToContext(mapper: object): boolean {
  return "delegatesToContext" in mapper && mapper.delegatesToContext === true;
}

export function mapperName(mapper: object): string {
  return mapper.constructor.name || "anonymous mapper";
}
