import { RdfGraph } from "../lib/rdfGraph";
import { IriTerm } from "../lib/terms";
import { Types } from "../lib/typeToken";
import { IriTermMapper } from "../mappers/iri/iriTermMapper";
import {
  BigIntMapper,
  BooleanMapper,
  DateTimeMapper,
  DecimalMapper,
  IntegerMapper,
  LangStringMapper,
  NumberMapper,
  StringMapper,
} from "../mappers/literal/standardMappers";
import { PredicatesMapMapper } from "../mappers/resource/predicatesMapMapper";
import { RdfGraphMapper, RdfGraphResourceMapper } from "../mappers/resource/rdfGraphMapper";
import { MapperRegistry } from "./mapperRegistry";

/** Registers the built-in mappers on `registry`. */
export function registerStandardMappers(registry: MapperRegistry): MapperRegistry {
  return registry
    .registerMapper(Types.string, new StringMapper())
    .registerMapper(Types.number, new NumberMapper())
    .registerMapper(Types.integer, new IntegerMapper())
    .registerMapper(Types.decimal, new DecimalMapper())
    .registerMapper(Types.boolean, new BooleanMapper())
    .registerMapper(Types.bigint, new BigIntMapper())
    .registerMapper(Types.langString, new LangStringMapper())
    .registerMapper(Date, new DateTimeMapper())
    .registerMapper(IriTerm, new IriTermMapper())
    .registerMapper(RdfGraph, new RdfGraphMapper())
    .registerMapper(RdfGraph, new RdfGraphResourceMapper())
    .registerMapper(Types.predicatesMap, new PredicatesMapMapper());
}

export function createDefaultRegistry(): MapperRegistry {
  return registerStandardMappers(new MapperRegistry());
}
