import { IncompleteDeserializationException } from "../lib/errors";
import type { RdfGraph } from "../lib/rdfGraph";
import { IriTerm, termKey } from "../lib/terms";
import type { RdfSubject } from "../lib/terms";
import { Rdf } from "../lib/vocab";
import { info, warn } from "../utils/logger";

/**
 * What to do when decoding leaves triples unread.
 * strict throws, lenient ignores, warnOnly and infoOnly log at that level.
 */
export type CompletenessMode = "strict" | "lenient" | "warnOnly" | "infoOnly";

export const COMPLETENESS_MODES: readonly CompletenessMode[] = ["strict", "lenient", "warnOnly", "infoOnly"];

export function isCompletenessMode(value: unknown): value is CompletenessMode {
  return COMPLETENESS_MODES.some((mode) => mode === value);
}

export interface UnmappedInfo {
  unmappedSubjects: RdfSubject[];
  /** IRI objects of the rdf:type triples nobody read. */
  unmappedTypes: IriTerm[];
}

export function unmappedInfo(remainder: RdfGraph): UnmappedInfo {
  const types = new Map<string, IriTerm>();
  for (const triple of remainder.findTriples({ predicate: Rdf.type })) {
    if (triple.object instanceof IriTerm) types.set(termKey(triple.object), triple.object);
  }
  return { unmappedSubjects: remainder.subjects(), unmappedTypes: Array.from(types.values()) };
}

export function checkCompleteness(mode: CompletenessMode, remainder: RdfGraph): void {
  if (remainder.isEmpty || mode === "lenient") return;
  const { unmappedSubjects, unmappedTypes } = unmappedInfo(remainder);
  if (mode === "strict") {
    throw new IncompleteDeserializationException(remainder, unmappedSubjects, unmappedTypes);
  }
  const meta = {
    remainingTriples: remainder.size,
    unmappedSubjects: unmappedSubjects.map((s) => s.toString()),
    unmappedTypes: unmappedTypes.map((t) => t.value),
  };
  if (mode === "warnOnly") {
    warn("deserialization.incomplete", meta);
  } else {
    info("deserialization.incomplete", meta);
  }
}
