import { SerializationException, SerializerNotFoundException } from "../lib/errors";
import { IriTerm, isRdfTerm } from "../lib/terms";
import type { LiteralTerm, RdfObject, RdfSubject } from "../lib/terms";
import { Triple } from "../lib/triple";
import { isMapperKey } from "../lib/typeToken";
import type { MapperKey } from "../lib/typeToken";
import { Rdf } from "../lib/vocab";
import { SerializationProvider } from "../mappers/serializationProvider";
import type { MapperRegistry } from "../registry/mapperRegistry";
import type { SerializationContext, SerializeOptions } from "../types/context";
import { mapperName } from "../types/mapper";
import type {
  CollectionSerializerFactory,
  LiteralTermSerializer,
  ResourceSerializer,
  Serializer,
  SerializerArg,
  UnmappedTriplesSerializer,
} from "../types/mapper";
import { warn } from "../utils/logger";
import { ResourceBuilder } from "./resourceBuilder";

export type IriTermFactory = (value: string) => IriTerm;

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto && typeof proto === "object" && "constructor" in proto && typeof proto.constructor === "function") {
    return proto.constructor.name || "object";
  }
  return "object";
}

export class SerializationContextImpl implements SerializationContext {
  constructor(
    readonly registry: MapperRegistry,
    private readonly iriTermFactory: IriTermFactory = (value) => new IriTerm(value),
  ) {}

  createIriTerm(value: string): IriTerm {
    return this.iriTermFactory(value);
  }

  resourceBuilder<S extends RdfSubject>(subject: S): ResourceBuilder<S> {
    return new ResourceBuilder(subject, this);
  }

  serialize<T>(value: T, options: SerializeOptions<T> = {}): [RdfObject[], Triple[]] {
    const { serializer: arg, parentSubject } = options;
    if (arg === undefined && isRdfTerm(value)) return [[value], []];

    const serializer = this.resolveSerializer(value, arg, parentSubject);
    switch (serializer.kind) {
      case "literal":
      case "iri":
        return [[serializer.toRdfTerm(value, this)], []];
      case "globalResource":
      case "localResource":
      case "unifiedResource": {
        const [subject, triples] = this.createResource(value, serializer, parentSubject);
        return [[subject], triples];
      }
      case "multiObjects":
        return serializer.toRdfObjects(value, this, parentSubject);
      case "unmappedTriples":
        throw new SerializationException(
          `${mapperName(serializer)} captures unmapped triples and cannot produce a property value; use addUnmapped`,
          "unmapped-serializer-as-value",
        );
    }
  }

  resource<T>(instance: T, serializer?: SerializerArg<T>): [RdfSubject, Triple[]] {
    const resolved = this.resolveSerializer(instance, serializer);
    if (resolved.kind !== "globalResource" && resolved.kind !== "localResource" && resolved.kind !== "unifiedResource") {
      throw new SerializationException(
        `${mapperName(resolved)} is a ${resolved.kind} mapper; a resource mapper is required for a top-level object`,
        "resource-serializer-required",
        { mapper: mapperName(resolved), kind: resolved.kind },
      );
    }
    return this.createResource(instance, resolved);
  }

  value<T>(subject: RdfSubject, predicate: IriTerm, value: T, serializer?: SerializerArg<T>): Triple[] {
    const [objects, nested] = this.serialize(value, { serializer, parentSubject: subject });
    return [...objects.map((object) => new Triple(subject, predicate, object)), ...nested];
  }

  values<T>(subject: RdfSubject, predicate: IriTerm, values: Iterable<T>, serializer?: SerializerArg<T>): Triple[] {
    const triples: Triple[] = [];
    for (const value of values) {
      triples.push(...this.value(subject, predicate, value, serializer));
    }
    return triples;
  }

  toLiteralTerm<T>(value: T, serializer?: MapperKey<T> | LiteralTermSerializer<T>): LiteralTerm {
    const resolved = this.resolveLiteralSerializer(value, serializer);
    return resolved.toRdfTerm(value, this);
  }

  collection<C, T>(
    subject: RdfSubject,
    predicate: IriTerm,
    collection: C,
    factory: CollectionSerializerFactory<C, T>,
    itemSerializer?: SerializerArg<T>,
  ): Triple[] {
    const item = itemSerializer === undefined ? undefined : this.resolveArg(itemSerializer, subject);
    return this.value(subject, predicate, collection, factory(item));
  }

  unmappedTriples<T>(
    subject: RdfSubject,
    value: T,
    serializer?: MapperKey<T> | UnmappedTriplesSerializer<T>,
  ): Triple[] {
    let resolved: UnmappedTriplesSerializer<T>;
    if (serializer === undefined) {
      const found = this.registry.findSerializerForValue(value, ["unmappedTriples"]);
      if (found?.kind !== "unmappedTriples") {
        throw new SerializerNotFoundException(describeValue(value), "unmappedTriples");
      }
      resolved = found;
    } else {
      resolved = isMapperKey(serializer) ? this.registry.getUnmappedTriplesSerializer(serializer) : serializer;
    }
    return resolved.toUnmappedTriples(subject, value);
  }

  /**
   * Runs a resource serializer and adds one rdf:type triple for its declared
   * type unless its own output already types the subject.
   */
  private createResource<T>(
    value: T,
    serializer: ResourceSerializer<T>,
    parentSubject?: RdfSubject,
  ): [RdfSubject, Triple[]] {
    const [subject, triples] = serializer.toRdfResource(value, this, parentSubject);
    const typeIri = serializer.typeIri;
    if (!typeIri) return [subject, triples];

    const existing = triples.filter((t) => t.predicate.equals(Rdf.type) && t.subject.equals(subject));
    if (existing.length > 0) {
      if (!existing.some((t) => t.object.equals(typeIri))) {
        warn("serialization.typeMismatch", {
          subject: subject.toString(),
          declared: typeIri.value,
          found: existing.map((t) => t.object.toString()),
          mapper: mapperName(serializer),
        });
      }
      return [subject, triples];
    }
    return [subject, [new Triple(subject, Rdf.type, typeIri), ...triples]];
  }

  private resolveSerializer<T>(value: T, arg: SerializerArg<T> | undefined, parentSubject?: RdfSubject): Serializer<T> {
    if (arg !== undefined) return this.resolveArg(arg, parentSubject);
    const found = this.registry.findSerializerForValue(value);
    if (!found) throw new SerializerNotFoundException(describeValue(value));
    return found;
  }

  private resolveArg<T>(arg: SerializerArg<T>, parentSubject?: RdfSubject): Serializer<T> {
    if (arg instanceof SerializationProvider) {
      if (!parentSubject) {
        throw new SerializationException(
          "A serialization provider needs the parent subject of the value",
          "provider-without-parent",
        );
      }
      return arg.serializer(parentSubject, this);
    }
    return isMapperKey(arg) ? this.registry.getSerializer(arg) : arg;
  }

  private resolveLiteralSerializer<T>(
    value: T,
    serializer: MapperKey<T> | LiteralTermSerializer<T> | undefined,
  ): LiteralTermSerializer<T> {
    if (serializer !== undefined) {
      return isMapperKey(serializer) ? this.registry.getLiteralTermSerializer(serializer) : serializer;
    }
    const found = this.registry.findSerializerForValue(value, ["literal"]);
    if (found?.kind !== "literal") throw new SerializerNotFoundException(describeValue(value), "literal");
    return found;
  }
}
