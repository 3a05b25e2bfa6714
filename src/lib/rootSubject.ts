import { RootSubjectResolutionException } from "./errors";
import { IriTerm, termKey } from "./terms";
import type { RdfSubject } from "./terms";
import type { Triple } from "./triple";

/**
 * Picks the single entry-point subject of a triple set.
 *
 * Subjects with no incoming edge from another subject are toplevel; exactly
 * one of them wins outright. Only when every subject is referenced (a cycle
 * spanning the whole set) does a unique IRI subject win over blank nodes.
 */
export function resolveRootSubject(triples: Iterable<Triple>): RdfSubject {
  const subjects = new Map<string, RdfSubject>();
  const usedAsObject = new Set<string>();
  const objectKeys: Array<[string, string]> = [];

  for (const triple of triples) {
    const subjectKey = termKey(triple.subject);
    if (!subjects.has(subjectKey)) subjects.set(subjectKey, triple.subject);
    objectKeys.push([subjectKey, termKey(triple.object)]);
  }

  if (subjects.size === 0) {
    throw new RootSubjectResolutionException(
      "empty",
      "Cannot determine root subject from empty triples",
    );
  }
  if (subjects.size === 1) {
    return [...subjects.values()][0];
  }

  // self-loops do not count as incoming edges
  for (const [subjectKey, objectKey] of objectKeys) {
    if (subjectKey !== objectKey && subjects.has(objectKey)) usedAsObject.add(objectKey);
  }

  const toplevel = [...subjects.entries()]
    .filter(([key]) => !usedAsObject.has(key))
    .map(([, subject]) => subject);

  if (toplevel.length === 1) return toplevel[0];
  if (toplevel.length > 1) {
    throw new RootSubjectResolutionException(
      "multipleToplevel",
      `Multiple toplevel subjects found: ${toplevel.join(", ")}`,
      toplevel,
    );
  }

  const iriSubjects = [...subjects.values()].filter((s) => s instanceof IriTerm);
  if (iriSubjects.length === 1) return iriSubjects[0];
  if (iriSubjects.length > 1) {
    throw new RootSubjectResolutionException(
      "multipleIri",
      `Multiple IRI subjects in a cyclic graph, cannot choose a root: ${iriSubjects.join(", ")}`,
      iriSubjects,
    );
  }
  throw new RootSubjectResolutionException(
    "cyclicBlankNodes",
    "No toplevel subject found: the triples only contain cyclic blank nodes",
    [...subjects.values()],
  );
}
