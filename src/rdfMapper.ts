import { N3GraphCodec } from "./codec/rdfGraphCodec";
import type { RdfContentType, RdfGraphCodec } from "./codec/rdfGraphCodec";
import { resolveMapperConfig } from "./config/mapperConfig";
import type { MapperConfig } from "./config/mapperConfig";
import { mergePrefixes } from "./constants/namespaces";
import type { RdfGraph } from "./lib/rdfGraph";
import type { MapperKey } from "./lib/typeToken";
import { createDefaultRegistry } from "./registry/defaultRegistry";
import type { MapperRegistry } from "./registry/mapperRegistry";
import type { CompletenessMode } from "./service/completeness";
import { RdfMapperService } from "./service/rdfMapperService";
import type { RegisterCallback } from "./service/rdfMapperService";
import type { Mapper, SerializerArg } from "./types/mapper";
import { configureLogging } from "./utils/logger";

export interface RdfMapperOptions {
  registry?: MapperRegistry;
  codec?: RdfGraphCodec;
  config?: Partial<MapperConfig>;
}

export interface CodecCallOptions {
  contentType?: RdfContentType;
  register?: RegisterCallback;
}

export interface EncodeCallOptions<T> extends CodecCallOptions {
  serializer?: SerializerArg<T>;
  /** Added to the configured prefixes for this document. */
  prefixes?: Record<string, string>;
}

export interface DecodeCallOptions extends CodecCallOptions {
  baseIri?: string;
  completeness?: CompletenessMode;
}

export interface DecodeObjectsOptions<T> extends DecodeCallOptions {
  key?: MapperKey<T>;
}

/**
 * Entry point: objects to RDF text and back.
 *
 * ```ts
 * const mapper = RdfMapper.withMappers((r) => r.registerMapper(Person, new PersonMapper()));
 * const turtle = mapper.encodeObject(person);
 * const copy = mapper.decodeObject(turtle, Person);
 * ```
 */
export class RdfMapper {
  readonly registry: MapperRegistry;
  readonly config: MapperConfig;
  /** Graph-level operations, for callers that bring their own parser. */
  readonly graph: RdfMapperService;
  private readonly codec: RdfGraphCodec;

  constructor(options: RdfMapperOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.codec = options.codec ?? new N3GraphCodec();
    this.config = resolveMapperConfig(options.config);
    if (this.config.debug) configureLogging({ console: true });
    this.graph = new RdfMapperService(this.registry, { defaultCompleteness: this.config.defaultCompleteness });
  }

  static withDefaultRegistry(config?: Partial<MapperConfig>): RdfMapper {
    return new RdfMapper({ config });
  }

  /** Default registry plus whatever `register` adds. */
  static withMappers(register: RegisterCallback, config?: Partial<MapperConfig>): RdfMapper {
    const registry = createDefaultRegistry();
    register(registry);
    return new RdfMapper({ registry, config });
  }

  registerMapper<T>(key: MapperKey<T>, mapper: Mapper<T>): this {
    this.registry.registerMapper(key, mapper);
    return this;
  }

  // -------------------------------------------------------------------------
  // Encoding
  // -------------------------------------------------------------------------

  encodeObject<T>(instance: T, options: EncodeCallOptions<T> = {}): string {
    const graph = this.graph.serialize(instance, { serializer: options.serializer, register: options.register });
    return this.encodeGraph(graph, options);
  }

  encodeObjects<T>(instances: Iterable<T>, options: EncodeCallOptions<T> = {}): string {
    const graph = this.graph.serializeList(instances, { serializer: options.serializer, register: options.register });
    return this.encodeGraph(graph, options);
  }

  encodeObjectLossless<T>(value: readonly [T, RdfGraph], options: EncodeCallOptions<T> = {}): string {
    const graph = this.graph.serializeLossless(value, { serializer: options.serializer, register: options.register });
    return this.encodeGraph(graph, options);
  }

  encodeObjectsLossless<T>(value: readonly [Iterable<T>, RdfGraph], options: EncodeCallOptions<T> = {}): string {
    const graph = this.graph.serializeListLossless(value, {
      serializer: options.serializer,
      register: options.register,
    });
    return this.encodeGraph(graph, options);
  }

  // -------------------------------------------------------------------------
  // Decoding
  // -------------------------------------------------------------------------

  /** The single object of type `key` in the document. */
  decodeObject<T>(text: string, key: MapperKey<T>, options: DecodeCallOptions = {}): T {
    return this.graph.deserialize(this.decodeGraph(text, options), key, {
      completeness: options.completeness,
      register: options.register,
    });
  }

  decodeObjects(text: string, options?: DecodeCallOptions): unknown[];
  decodeObjects<T>(text: string, options: DecodeObjectsOptions<T> & { key: MapperKey<T> }): T[];
  decodeObjects<T>(text: string, options: DecodeObjectsOptions<T> = {}): unknown[] {
    const graph = this.decodeGraph(text, options);
    const { completeness, register, key } = options;
    return key === undefined
      ? this.graph.deserializeAll(graph, { completeness, register })
      : this.graph.deserializeAll(graph, { completeness, register, key });
  }

  /** The object plus every triple it did not read. */
  decodeObjectLossless<T>(text: string, key: MapperKey<T>, options: DecodeCallOptions = {}): [T, RdfGraph] {
    return this.graph.deserializeLossless(this.decodeGraph(text, options), key, { register: options.register });
  }

  decodeObjectsLossless(text: string, options?: DecodeCallOptions): [unknown[], RdfGraph];
  decodeObjectsLossless<T>(text: string, options: DecodeObjectsOptions<T> & { key: MapperKey<T> }): [T[], RdfGraph];
  decodeObjectsLossless<T>(text: string, options: DecodeObjectsOptions<T> = {}): [unknown[], RdfGraph] {
    const graph = this.decodeGraph(text, options);
    const { register, key } = options;
    return key === undefined
      ? this.graph.deserializeAllLossless(graph, { register })
      : this.graph.deserializeAllLossless(graph, { register, key });
  }

  private encodeGraph(graph: RdfGraph, options: Pick<EncodeCallOptions<unknown>, "contentType" | "prefixes">): string {
    return this.codec.encode(graph, {
      contentType: options.contentType ?? this.config.contentType,
      prefixes: mergePrefixes(this.config.prefixes, options.prefixes),
    });
  }

  private decodeGraph(text: string, options: DecodeCallOptions): RdfGraph {
    return this.codec.decode(text, {
      contentType: options.contentType ?? this.config.contentType,
      baseIri: options.baseIri ?? this.config.baseIri,
    });
  }
}
