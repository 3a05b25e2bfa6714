import { DeserializerNotFoundException, RdfMapperException, SerializerNotFoundException } from "../lib/errors";
import type { BlankNodeTerm, IriTerm } from "../lib/terms";
import { TypeToken, constructorChain, keyName, primitiveTokenFor } from "../lib/typeToken";
import type { MapperKey } from "../lib/typeToken";
import {
  ALL_MAPPER_KINDS,
  delegatesToContext,
  isDeserializer,
  isSerializer,
  mapperName,
} from "../types/mapper";
import type {
  Deserializer,
  GlobalResourceDeserializer,
  IriTermDeserializer,
  IriTermSerializer,
  LiteralTermDeserializer,
  LiteralTermSerializer,
  LocalResourceDeserializer,
  Mapper,
  MapperKind,
  MultiObjectsDeserializer,
  Serializer,
  UnifiedResourceDeserializer,
  UnmappedTriplesDeserializer,
  UnmappedTriplesSerializer,
} from "../types/mapper";
import { debug } from "../utils/logger";

interface Slot {
  serializers: Map<MapperKind, Serializer<unknown>>;
  deserializers: Map<MapperKind, Deserializer<unknown>>;
}

interface TypedDeserializer<D> {
  key: MapperKey<unknown>;
  deserializer: D;
}

export type GlobalDeserializerByType =
  | GlobalResourceDeserializer<unknown>
  | UnifiedResourceDeserializer<unknown>;

export type LocalDeserializerByType =
  | LocalResourceDeserializer<unknown>
  | UnifiedResourceDeserializer<unknown>;

/**
 * Holds at most one serializer and one deserializer per (type, shape).
 *
 * A clone is a snapshot: it copies every map at clone time, so later
 * registrations on either registry never reach the other.
 */
export class MapperRegistry {
  private readonly slots = new Map<object, Slot>();
  private readonly guardedTokens: TypeToken<unknown>[] = [];
  private readonly globalByType = new Map<string, TypedDeserializer<GlobalDeserializerByType>>();
  private readonly localByType = new Map<string, TypedDeserializer<LocalDeserializerByType>>();

  clone(): MapperRegistry {
    const copy = new MapperRegistry();
    for (const [key, slot] of this.slots) {
      copy.slots.set(key, { serializers: new Map(slot.serializers), deserializers: new Map(slot.deserializers) });
    }
    copy.guardedTokens.push(...this.guardedTokens);
    for (const [typeIri, entry] of this.globalByType) copy.globalByType.set(typeIri, entry);
    for (const [typeIri, entry] of this.localByType) copy.localByType.set(typeIri, entry);
    return copy;
  }

  /** Stores `mapper` as serializer and/or deserializer of `key`, whichever it implements. */
  registerMapper<T>(key: MapperKey<T>, mapper: Mapper<T>): this {
    this.assertRegistrable(key, mapper);
    if (isSerializer(mapper)) this.registerSerializer(key, mapper);
    if (isDeserializer(mapper)) this.registerDeserializer(key, mapper);
    return this;
  }

  registerSerializer<T>(key: MapperKey<T>, serializer: Serializer<T>): this {
    this.assertRegistrable(key, serializer);
    this.slotFor(key).serializers.set(serializer.kind, serializer);
    debug("registry.register.serializer", { type: keyName(key), kind: serializer.kind, mapper: mapperName(serializer) });
    return this;
  }

  registerDeserializer<T>(key: MapperKey<T>, deserializer: Deserializer<T>): this {
    this.assertRegistrable(key, deserializer);
    this.slotFor(key).deserializers.set(deserializer.kind, deserializer);
    switch (deserializer.kind) {
      case "globalResource":
        if (deserializer.typeIri) this.globalByType.set(deserializer.typeIri.value, { key, deserializer });
        break;
      case "localResource":
        if (deserializer.typeIri) this.localByType.set(deserializer.typeIri.value, { key, deserializer });
        break;
      case "unifiedResource":
        if (deserializer.typeIri) {
          const typeKey = deserializer.typeIri.value;
          if (!this.globalByType.has(typeKey)) this.globalByType.set(typeKey, { key, deserializer });
          if (!this.localByType.has(typeKey)) this.localByType.set(typeKey, { key, deserializer });
        }
        break;
      default:
        break;
    }
    debug("registry.register.deserializer", { type: keyName(key), kind: deserializer.kind, mapper: mapperName(deserializer) });
    return this;
  }

  // -------------------------------------------------------------------------
  // Lookup by key
  // -------------------------------------------------------------------------

  findSerializer<T>(key: MapperKey<T>, kinds: readonly MapperKind[] = ALL_MAPPER_KINDS): Serializer<T> | undefined {
    return this.lookupSerializer(key, kinds);
  }

  getSerializer<T>(key: MapperKey<T>, kinds: readonly MapperKind[] = ALL_MAPPER_KINDS): Serializer<T> {
    const found = this.lookupSerializer(key, kinds);
    if (!found) throw new SerializerNotFoundException(keyName(key), kindsDetail(kinds));
    return found;
  }

  findDeserializer<T>(key: MapperKey<T>, kinds: readonly MapperKind[] = ALL_MAPPER_KINDS): Deserializer<T> | undefined {
    const found = this.lookupDeserializer(key, kinds);
    // Entries are only ever stored under the key they were registered for, so
    // the deserializer stored for MapperKey<T> produces T.
    return found as Deserializer<T> | undefined;
  }

  getDeserializer<T>(key: MapperKey<T>, kinds: readonly MapperKind[] = ALL_MAPPER_KINDS): Deserializer<T> {
    const found = this.findDeserializer(key, kinds);
    if (!found) throw new DeserializerNotFoundException(keyName(key), kindsDetail(kinds));
    return found;
  }

  getLiteralTermSerializer<T>(key: MapperKey<T>): LiteralTermSerializer<T> {
    const found = this.getSerializer(key, ["literal"]);
    if (found.kind !== "literal") throw new SerializerNotFoundException(keyName(key), "literal");
    return found;
  }

  getLiteralTermDeserializer<T>(key: MapperKey<T>): LiteralTermDeserializer<T> {
    const found = this.getDeserializer(key, ["literal"]);
    if (found.kind !== "literal") throw new DeserializerNotFoundException(keyName(key), "literal");
    return found;
  }

  getIriTermSerializer<T>(key: MapperKey<T>): IriTermSerializer<T> {
    const found = this.getSerializer(key, ["iri"]);
    if (found.kind !== "iri") throw new SerializerNotFoundException(keyName(key), "iri");
    return found;
  }

  getIriTermDeserializer<T>(key: MapperKey<T>): IriTermDeserializer<T> {
    const found = this.getDeserializer(key, ["iri"]);
    if (found.kind !== "iri") throw new DeserializerNotFoundException(keyName(key), "iri");
    return found;
  }

  /** The literal deserializer of `key`, provided it reads `datatype`. */
  getLiteralDeserializerByDatatype<T>(key: MapperKey<T>, datatype: IriTerm): LiteralTermDeserializer<T> {
    const found = this.getLiteralTermDeserializer(key);
    if (found.datatype !== undefined && !found.datatype.equals(datatype)) {
      throw new DeserializerNotFoundException(keyName(key), `literal ${datatype}`);
    }
    return found;
  }

  /** `explicit` when given, else the entry for `key`. */
  resolveSerializer<T>(key: MapperKey<T>, explicit?: Serializer<T>): Serializer<T> {
    return explicit ?? this.getSerializer(key);
  }

  resolveDeserializer<T>(key: MapperKey<T>, explicit?: Deserializer<T>): Deserializer<T> {
    return explicit ?? this.getDeserializer(key);
  }

  findMultiObjectsDeserializer<T>(key: MapperKey<T>): MultiObjectsDeserializer<T> | undefined {
    const found = this.findDeserializer(key, ["multiObjects"]);
    return found?.kind === "multiObjects" ? found : undefined;
  }

  getUnmappedTriplesSerializer<T>(key: MapperKey<T>): UnmappedTriplesSerializer<T> {
    const found = this.getSerializer(key, ["unmappedTriples"]);
    if (found.kind !== "unmappedTriples") throw new SerializerNotFoundException(keyName(key), "unmappedTriples");
    return found;
  }

  getUnmappedTriplesDeserializer<T>(key: MapperKey<T>): UnmappedTriplesDeserializer<T> {
    const found = this.getDeserializer(key, ["unmappedTriples"]);
    if (found.kind !== "unmappedTriples") throw new DeserializerNotFoundException(keyName(key), "unmappedTriples");
    return found;
  }

  hasSerializerFor(key: MapperKey<unknown>, kinds: readonly MapperKind[] = ALL_MAPPER_KINDS): boolean {
    return this.lookupSerializer(key, kinds) !== undefined;
  }

  hasDeserializerFor(key: MapperKey<unknown>, kinds: readonly MapperKind[] = ALL_MAPPER_KINDS): boolean {
    return this.lookupDeserializer(key, kinds) !== undefined;
  }

  // -------------------------------------------------------------------------
  // Lookup by runtime value and by rdf:type
  // -------------------------------------------------------------------------

  /**
   * Serializer for an un-annotated value: its primitive token first, then the
   * constructors on its prototype chain, then any guarded token accepting it.
   */
  findSerializerForValue(value: unknown, kinds: readonly MapperKind[] = ALL_MAPPER_KINDS): Serializer<unknown> | undefined {
    const primitive = primitiveTokenFor(value);
    if (primitive) {
      const found = this.lookupSerializer(primitive, kinds);
      if (found) return found;
    }
    for (const ctor of constructorChain(value)) {
      const found = this.lookupSerializer(ctor, kinds);
      if (found) return found;
    }
    for (const token of this.guardedTokens) {
      if (!token.matches(value)) continue;
      const found = this.lookupSerializer(token, kinds);
      if (found) return found;
    }
    return undefined;
  }

  getGlobalResourceDeserializerByType(typeIri: IriTerm): GlobalDeserializerByType {
    const found = this.lookupByType("global", typeIri);
    if (!found) throw new DeserializerNotFoundException(`rdf:type ${typeIri}`, "globalResource");
    return found.deserializer;
  }

  getLocalResourceDeserializerByType(typeIri: IriTerm): LocalDeserializerByType {
    const found = this.lookupByType("local", typeIri);
    if (!found) throw new DeserializerNotFoundException(`rdf:type ${typeIri}`, "localResource");
    return found.deserializer;
  }

  hasGlobalResourceDeserializerFor(typeIri: IriTerm): boolean {
    return this.lookupByType("global", typeIri) !== undefined;
  }

  hasLocalResourceDeserializerFor(typeIri: IriTerm): boolean {
    return this.lookupByType("local", typeIri) !== undefined;
  }

  /** Resource deserializer for a subject of the given rdf:type, picked by subject kind. */
  hasResourceDeserializerFor(subject: IriTerm | BlankNodeTerm, typeIri: IriTerm): boolean {
    return subject.termType === "NamedNode"
      ? this.hasGlobalResourceDeserializerFor(typeIri)
      : this.hasLocalResourceDeserializerFor(typeIri);
  }

  /** The key whose resource deserializer handles `typeIri`, if any. */
  keyForTypeIri(typeIri: IriTerm): MapperKey<unknown> | undefined {
    return (this.lookupByType("global", typeIri) ?? this.lookupByType("local", typeIri))?.key;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private assertRegistrable(key: MapperKey<unknown>, mapper: object) {
    if (delegatesToContext(mapper)) {
      throw new RdfMapperException(
        `${mapperName(mapper)} resolves ${keyName(key)} through the context and cannot be registered as its default mapper; ` +
          `pass it per property instead`,
        "override-mapper-not-registrable",
        { type: keyName(key), mapper: mapperName(mapper) },
      );
    }
  }

  private slotFor(key: MapperKey<unknown>): Slot {
    let slot = this.slots.get(key);
    if (!slot) {
      slot = { serializers: new Map(), deserializers: new Map() };
      this.slots.set(key, slot);
      if (key instanceof TypeToken && key.hasGuard) this.guardedTokens.push(key);
    }
    return slot;
  }

  private lookupSerializer(key: object, kinds: readonly MapperKind[]): Serializer<unknown> | undefined {
    const slot = this.slots.get(key);
    if (slot) {
      for (const kind of kinds) {
        const found = slot.serializers.get(kind);
        if (found) return found;
      }
    }
    return undefined;
  }

  private lookupDeserializer(key: object, kinds: readonly MapperKind[]): Deserializer<unknown> | undefined {
    const slot = this.slots.get(key);
    if (slot) {
      for (const kind of kinds) {
        const found = slot.deserializers.get(kind);
        if (found) return found;
      }
    }
    return undefined;
  }

  private lookupByType(scope: "global", typeIri: IriTerm): TypedDeserializer<GlobalDeserializerByType> | undefined;
  private lookupByType(scope: "local", typeIri: IriTerm): TypedDeserializer<LocalDeserializerByType> | undefined;
  private lookupByType(
    scope: "global" | "local",
    typeIri: IriTerm,
  ): TypedDeserializer<GlobalDeserializerByType | LocalDeserializerByType> | undefined {
    return scope === "global" ? this.globalByType.get(typeIri.value) : this.localByType.get(typeIri.value);
  }

}

function kindsDetail(kinds: readonly MapperKind[]): string | undefined {
  return kinds.length === ALL_MAPPER_KINDS.length ? undefined : kinds.join(" | ");
}
