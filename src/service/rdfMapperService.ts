import { DeserializationContextImpl, TrackingDeserializationContext } from "../context/deserializationContext";
import { SerializationContextImpl } from "../context/serializationContext";
import type { IriTermFactory } from "../context/serializationContext";
import { DeserializationException } from "../lib/errors";
import { RdfGraph } from "../lib/rdfGraph";
import { IriTerm, termKey } from "../lib/terms";
import type { RdfSubject } from "../lib/terms";
import type { Triple } from "../lib/triple";
import { isInstanceOfKey, keyName } from "../lib/typeToken";
import type { MapperKey } from "../lib/typeToken";
import { Rdf } from "../lib/vocab";
import type { MapperRegistry } from "../registry/mapperRegistry";
import { RESOURCE_KINDS } from "../types/mapper";
import type { SerializerArg } from "../types/mapper";
import { debug } from "../utils/logger";
import { checkCompleteness } from "./completeness";
import type { CompletenessMode } from "./completeness";

/** Adds mappers to a per-call clone of the registry. */
export type RegisterCallback = (registry: MapperRegistry) => void;

export interface SerializeCallOptions<T> {
  serializer?: SerializerArg<T>;
  register?: RegisterCallback;
}

export interface DeserializeCallOptions {
  completeness?: CompletenessMode;
  register?: RegisterCallback;
}

export interface DeserializeAllOptions<T> extends DeserializeCallOptions {
  /** Keep only roots of this type. */
  key?: MapperKey<T>;
}

export interface RdfMapperServiceOptions {
  defaultCompleteness?: CompletenessMode;
  iriTermFactory?: IriTermFactory;
}

interface DecodedRoot {
  subject: RdfSubject;
  value: unknown;
  processed: Triple[];
}

/** Graph-level encode and decode on top of a registry. */
export class RdfMapperService {
  private readonly defaultCompleteness: CompletenessMode;
  private readonly iriTermFactory?: IriTermFactory;

  constructor(
    readonly registry: MapperRegistry,
    options: RdfMapperServiceOptions = {},
  ) {
    this.defaultCompleteness = options.defaultCompleteness ?? "strict";
    this.iriTermFactory = options.iriTermFactory;
  }

  // -------------------------------------------------------------------------
  // Serialization
  // -------------------------------------------------------------------------

  serialize<T>(instance: T, options: SerializeCallOptions<T> = {}): RdfGraph {
    const context = this.serializationContext(options.register);
    const [, triples] = context.resource(instance, options.serializer);
    return RdfGraph.fromTriples(triples);
  }

  serializeList<T>(instances: Iterable<T>, options: SerializeCallOptions<T> = {}): RdfGraph {
    const context = this.serializationContext(options.register);
    const triples: Triple[] = [];
    for (const instance of instances) {
      const [, resourceTriples] = context.resource(instance, options.serializer);
      triples.push(...resourceTriples);
    }
    return RdfGraph.fromTriples(triples);
  }

  /** The instance's graph merged with the remainder captured when it was decoded. */
  serializeLossless<T>([instance, remainder]: readonly [T, RdfGraph], options: SerializeCallOptions<T> = {}): RdfGraph {
    return this.serialize(instance, options).merge(remainder);
  }

  serializeListLossless<T>(
    [instances, remainder]: readonly [Iterable<T>, RdfGraph],
    options: SerializeCallOptions<T> = {},
  ): RdfGraph {
    return this.serializeList(instances, options).merge(remainder);
  }

  // -------------------------------------------------------------------------
  // Deserialization of one subject
  // -------------------------------------------------------------------------

  deserializeBySubject<T>(
    graph: RdfGraph,
    subject: RdfSubject,
    key: MapperKey<T>,
    options: DeserializeCallOptions = {},
  ): T {
    const [value, remainder] = this.decodeSubject(graph, subject, key, this.registryFor(options.register));
    checkCompleteness(options.completeness ?? this.defaultCompleteness, remainder);
    return value;
  }

  deserializeBySubjectLossless<T>(
    graph: RdfGraph,
    subject: RdfSubject,
    key: MapperKey<T>,
    options: Pick<DeserializeCallOptions, "register"> = {},
  ): [T, RdfGraph] {
    return this.decodeSubject(graph, subject, key, this.registryFor(options.register));
  }

  /**
   * Decodes the one object of type `key` in `graph`. The subject is the only
   * subject in the graph, else the only one typed with the key's rdf:type,
   * else the only root that whole-graph decoding finds.
   */
  deserialize<T>(graph: RdfGraph, key: MapperKey<T>, options: DeserializeCallOptions = {}): T {
    const [value, remainder] = this.decodeSingle(graph, key, this.registryFor(options.register));
    checkCompleteness(options.completeness ?? this.defaultCompleteness, remainder);
    return value;
  }

  deserializeLossless<T>(
    graph: RdfGraph,
    key: MapperKey<T>,
    options: Pick<DeserializeCallOptions, "register"> = {},
  ): [T, RdfGraph] {
    return this.decodeSingle(graph, key, this.registryFor(options.register));
  }

  // -------------------------------------------------------------------------
  // Whole-graph deserialization
  // -------------------------------------------------------------------------

  deserializeAll(graph: RdfGraph, options?: DeserializeCallOptions): unknown[];
  deserializeAll<T>(graph: RdfGraph, options: DeserializeAllOptions<T> & { key: MapperKey<T> }): T[];
  deserializeAll<T>(graph: RdfGraph, options: DeserializeAllOptions<T> = {}): unknown[] {
    const registry = this.registryFor(options.register);
    const [values, remainder] =
      options.key === undefined ? this.decodeAll(graph, registry) : this.decodeAllOf(graph, registry, options.key);
    checkCompleteness(options.completeness ?? this.defaultCompleteness, remainder);
    return values;
  }

  deserializeAllLossless(graph: RdfGraph, options?: Pick<DeserializeCallOptions, "register">): [unknown[], RdfGraph];
  deserializeAllLossless<T>(
    graph: RdfGraph,
    options: Pick<DeserializeAllOptions<T>, "register" | "key"> & { key: MapperKey<T> },
  ): [T[], RdfGraph];
  deserializeAllLossless<T>(
    graph: RdfGraph,
    options: Pick<DeserializeAllOptions<T>, "register" | "key"> = {},
  ): [unknown[], RdfGraph] {
    const registry = this.registryFor(options.register);
    return options.key === undefined ? this.decodeAll(graph, registry) : this.decodeAllOf(graph, registry, options.key);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private registryFor(register: RegisterCallback | undefined): MapperRegistry {
    if (!register) return this.registry;
    const registry = this.registry.clone();
    register(registry);
    return registry;
  }

  private serializationContext(register: RegisterCallback | undefined): SerializationContextImpl {
    return new SerializationContextImpl(this.registryFor(register), this.iriTermFactory);
  }

  private decodeSubject<T>(
    graph: RdfGraph,
    subject: RdfSubject,
    key: MapperKey<T>,
    registry: MapperRegistry,
  ): [T, RdfGraph] {
    const context = new DeserializationContextImpl(graph, registry);
    const value = context.deserialize(subject, key);
    return [value, graph.withoutTriples(context.getAllProcessedTriples())];
  }

  private decodeSingle<T>(graph: RdfGraph, key: MapperKey<T>, registry: MapperRegistry): [T, RdfGraph] {
    const subject = this.singleSubjectFor(graph, key, registry);
    if (subject) return this.decodeSubject(graph, subject, key, registry);

    const [values, remainder] = this.decodeAllOf(graph, registry, key);
    if (values.length === 0) {
      throw new DeserializationException("No subject found in graph", "no-subject-found", { type: keyName(key) });
    }
    if (values.length > 1) {
      throw new DeserializationException("More than one subject found in graph", "multiple-subjects-found", {
        type: keyName(key),
        count: values.length,
      });
    }
    return [values[0], remainder];
  }

  private singleSubjectFor(graph: RdfGraph, key: MapperKey<unknown>, registry: MapperRegistry): RdfSubject | undefined {
    const subjects = graph.subjects();
    if (subjects.length === 1) return subjects[0];

    const deserializer = registry.findDeserializer(key, RESOURCE_KINDS);
    if (!deserializer || !("typeIri" in deserializer) || !deserializer.typeIri) return undefined;
    const typed = new Map<string, RdfSubject>();
    for (const triple of graph.findTriples({ predicate: Rdf.type, object: deserializer.typeIri })) {
      typed.set(termKey(triple.subject), triple.subject);
    }
    return typed.size === 1 ? [...typed.values()][0] : undefined;
  }

  /**
   * Decodes every typed subject that has a resource deserializer and returns
   * the ones no other resource referenced as a child.
   */
  private collectRoots(graph: RdfGraph, registry: MapperRegistry): DecodedRoot[] {
    const context = new TrackingDeserializationContext(graph, registry);
    const decoded: DecodedRoot[] = [];
    const done = new Set<string>();

    for (const triple of graph.findTriples({ predicate: Rdf.type })) {
      const { subject, object: typeIri } = triple;
      const subjectKey = termKey(subject);
      if (done.has(subjectKey) || !(typeIri instanceof IriTerm)) continue;
      if (!registry.hasResourceDeserializerFor(subject, typeIri)) {
        debug("deserializeAll.noDeserializer", { subject: subject.toString(), typeIri: typeIri.value });
        continue;
      }
      done.add(subjectKey);
      context.clearProcessedTriples();
      const value = context.deserializeResource(subject, typeIri);
      decoded.push({ subject, value, processed: context.getProcessedTriples() });
    }
    return decoded.filter((entry) => !context.isChildSubject(entry.subject));
  }

  private decodeAll(graph: RdfGraph, registry: MapperRegistry): [unknown[], RdfGraph] {
    const roots = this.collectRoots(graph, registry);
    const processed = roots.flatMap((root) => root.processed);
    return [roots.map((root) => root.value), graph.withoutTriples(processed)];
  }

  private decodeAllOf<T>(graph: RdfGraph, registry: MapperRegistry, key: MapperKey<T>): [T[], RdfGraph] {
    const values: T[] = [];
    const processed: Triple[] = [];
    for (const root of this.collectRoots(graph, registry)) {
      if (!isInstanceOfKey(root.value, key)) continue;
      values.push(root.value);
      processed.push(...root.processed);
    }
    return [values, graph.withoutTriples(processed)];
  }
}
