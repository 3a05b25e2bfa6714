/**
 * Mapper configuration: defaults merged with caller overrides and validated
 * before use.
 */

import { DEFAULT_PREFIXES, mergePrefixes, toPrefixMap } from "../constants/namespaces";
import { isSupportedContentType } from "../codec/rdfGraphCodec";
import type { RdfContentType } from "../codec/rdfGraphCodec";
import { RdfMapperException } from "../lib/errors";
import { isCompletenessMode } from "../service/completeness";
import type { CompletenessMode } from "../service/completeness";
import { expectJsonObject, expectType, invariant, isPrefixTable } from "../utils/guards";
import { isDebugEnabled } from "../utils/logger";

export interface MapperConfig {
  defaultCompleteness: CompletenessMode;
  contentType: RdfContentType;
  // prefix -> namespace; rdf and xsd are always present
  prefixes: Record<string, string>;
  baseIri?: string;
  // mirror debug and info log entries to the console
  debug: boolean;
}

export const DEFAULT_MAPPER_CONFIG: Readonly<MapperConfig> = Object.freeze({
  defaultCompleteness: "strict",
  contentType: "text/turtle",
  prefixes: toPrefixMap(DEFAULT_PREFIXES),
  debug: isDebugEnabled(),
});

/** Merges `partial` over the defaults and validates the result. */
export function resolveMapperConfig(partial: Partial<MapperConfig> = {}): MapperConfig {
  const merged: MapperConfig = {
    ...DEFAULT_MAPPER_CONFIG,
    ...partial,
    prefixes: mergePrefixes(DEFAULT_MAPPER_CONFIG.prefixes, partial.prefixes),
  };
  validateMapperConfig(merged);
  return merged;
}

export function validateMapperConfig(config: MapperConfig): void {
  invariant(isCompletenessMode(config.defaultCompleteness), "defaultCompleteness must be strict, lenient, warnOnly or infoOnly", {
    received: config.defaultCompleteness,
  });
  invariant(isSupportedContentType(config.contentType), "contentType is not supported", {
    received: config.contentType,
  });
  invariant(isPrefixTable(config.prefixes), "prefixes must map prefix names to namespace strings");
  if (config.baseIri !== undefined) expectType(config.baseIri, "string", "baseIri");
  expectType(config.debug, "boolean", "debug");
}

/** Reads a config from JSON text; missing fields take their defaults. */
export function importMapperConfig(json: string): MapperConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new RdfMapperException(
      `Invalid configuration format: ${err instanceof Error ? err.message : String(err)}`,
      "config-invalid-json",
    );
  }
  expectJsonObject(parsed, "configuration");
  const { defaultCompleteness, contentType, prefixes, baseIri, debug } = parsed;
  const partial: Partial<MapperConfig> = {};
  if (defaultCompleteness !== undefined) {
    invariant(isCompletenessMode(defaultCompleteness), "defaultCompleteness must be strict, lenient, warnOnly or infoOnly", {
      received: defaultCompleteness,
    });
    partial.defaultCompleteness = defaultCompleteness;
  }
  if (contentType !== undefined) {
    invariant(typeof contentType === "string" && isSupportedContentType(contentType), "contentType is not supported", {
      received: contentType,
    });
    partial.contentType = contentType;
  }
  if (prefixes !== undefined) {
    invariant(isPrefixTable(prefixes), "prefixes must map prefix names to namespace strings");
    partial.prefixes = prefixes;
  }
  if (baseIri !== undefined) {
    expectType(baseIri, "string", "baseIri");
    partial.baseIri = baseIri;
  }
  if (debug !== undefined) {
    expectType(debug, "boolean", "debug");
    partial.debug = debug;
  }
  return resolveMapperConfig(partial);
}
