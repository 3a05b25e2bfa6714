import { RDF, XSD } from "./vocabularies";

export type NamespaceEntry = {
  prefix: string;
  namespace: string;
};

/** Prefixes every encoder starts from; callers add their own on top. */
export const DEFAULT_PREFIXES: readonly NamespaceEntry[] = [
  { prefix: "rdf", namespace: RDF.namespace },
  { prefix: "xsd", namespace: XSD.namespace },
];

export function toPrefixMap(
  entries: Iterable<NamespaceEntry>,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const entry of entries) {
    if (typeof entry.namespace !== "string" || entry.namespace.length === 0) continue;
    result[String(entry.prefix ?? "")] = entry.namespace;
  }
  return result;
}

export function mergePrefixes(
  base: Record<string, string>,
  extra?: Record<string, string>,
): Record<string, string> {
  if (!extra) return { ...base };
  const result: Record<string, string> = { ...base };
  for (const [key, value] of Object.entries(extra)) {
    if (typeof value !== "string") continue;
    result[key] = value;
  }
  return result;
}
