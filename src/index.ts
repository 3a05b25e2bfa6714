export { RdfMapper } from "./rdfMapper";
export type {
  CodecCallOptions,
  DecodeCallOptions,
  DecodeObjectsOptions,
  EncodeCallOptions,
  RdfMapperOptions,
} from "./rdfMapper";

export { RdfMapperService } from "./service/rdfMapperService";
export type {
  DeserializeAllOptions,
  DeserializeCallOptions,
  RdfMapperServiceOptions,
  RegisterCallback,
  SerializeCallOptions,
} from "./service/rdfMapperService";
export { COMPLETENESS_MODES, checkCompleteness, isCompletenessMode, unmappedInfo } from "./service/completeness";
export type { CompletenessMode, UnmappedInfo } from "./service/completeness";

export { N3GraphCodec, SUPPORTED_CONTENT_TYPES, isSupportedContentType } from "./codec/rdfGraphCodec";
export type { DecodeOptions, EncodeOptions, RdfContentType, RdfGraphCodec } from "./codec/rdfGraphCodec";

export { DEFAULT_MAPPER_CONFIG, importMapperConfig, resolveMapperConfig } from "./config/mapperConfig";
export type { MapperConfig } from "./config/mapperConfig";

export { MapperRegistry } from "./registry/mapperRegistry";
export { createDefaultRegistry, registerStandardMappers } from "./registry/defaultRegistry";

export { SerializationContextImpl } from "./context/serializationContext";
export type { IriTermFactory } from "./context/serializationContext";
export {
  DeserializationContextImpl,
  TrackingDeserializationContext,
  getBlankNodeObjectsDeep,
} from "./context/deserializationContext";
export { ResourceBuilder } from "./context/resourceBuilder";
export { ResourceReader } from "./context/resourceReader";

export { IriTerm, BlankNodeTerm, LiteralTerm, isRdfTerm, isRdfSubject, termKey } from "./lib/terms";
export type { LiteralOptions, RdfObject, RdfPredicate, RdfSubject, RdfTerm } from "./lib/terms";
export { Triple } from "./lib/triple";
export { RdfGraph } from "./lib/rdfGraph";
export type { TriplePattern } from "./lib/rdfGraph";
export { resolveRootSubject } from "./lib/rootSubject";
export { namespace } from "./lib/namespace";
export type { Namespace } from "./lib/namespace";
export { Rdf, Xsd, memberIndex, memberProperty } from "./lib/vocab";
export { RDF, XSD } from "./constants/vocabularies";
export { TypeToken, Types, typeToken, isInstanceOfKey, keyName } from "./lib/typeToken";
export type { Constructor, LangString, MapperKey, PredicatesMap, TypeGuard } from "./lib/typeToken";
export * from "./lib/errors";

// the IriTermMapper class below shadows the interface of the same name
export type * from "./types/mapper";
export type { IriTermMapper as IriTermMapperShape } from "./types/mapper";
export { delegatesToContext, isDeserializer, isSerializer, mapperName } from "./types/mapper";
export type * from "./types/context";

export { SerializationProvider } from "./mappers/serializationProvider";
export {
  RdfListSerializer,
  RdfListDeserializer,
  rdfListSerializer,
  rdfListDeserializer,
} from "./mappers/collections/rdfList";
export {
  RdfContainerSerializer,
  RdfContainerDeserializer,
  rdfSeqSerializer,
  rdfSeqDeserializer,
  rdfBagSerializer,
  rdfBagDeserializer,
  rdfAltSerializer,
  rdfAltDeserializer,
} from "./mappers/collections/rdfContainer";
export {
  UnorderedItemsSerializer,
  UnorderedItemsDeserializer,
  UnorderedItemsCollectorDeserializer,
  unorderedItemsSerializer,
  unorderedItemsDeserializer,
} from "./mappers/collections/unorderedItems";
export { BaseLiteralTermMapper } from "./mappers/literal/baseLiteralTermMapper";
export {
  StringMapper,
  NumberMapper,
  IntegerMapper,
  DecimalMapper,
  BooleanMapper,
  BigIntMapper,
  DateTimeMapper,
  DateMapper,
  LangStringMapper,
} from "./mappers/literal/standardMappers";
export { DatatypeOverrideMapper } from "./mappers/literal/datatypeOverrideMapper";
export { LanguageOverrideMapper } from "./mappers/literal/languageOverrideMapper";
export { DelegatingLiteralTermMapper } from "./mappers/literal/delegatingLiteralTermMapper";
export {
  IriTermMapper,
  IriFullMapper,
  FragmentIriTermMapper,
  LastPathElementIriTermMapper,
} from "./mappers/iri/iriTermMapper";
export { BaseIriTermMapper, StringIriTermMapper } from "./mappers/iri/baseIriTermMapper";
export { RdfGraphMapper, RdfGraphResourceMapper } from "./mappers/resource/rdfGraphMapper";
export { PredicatesMapMapper } from "./mappers/resource/predicatesMapMapper";
export { configureLogging, getLogSummary, clearLogSummary } from "./utils/logger";
export type { LogEntry, LogLevel, LogSummary } from "./utils/logger";
