import { IriTerm } from "../../lib/terms";
import type { RdfSubject } from "../../lib/terms";
import { Triple } from "../../lib/triple";
import type { PredicatesMap } from "../../lib/typeToken";
import type { UnmappedTriplesMapper } from "../../types/mapper";

/** Unread triples of one subject, grouped by predicate IRI. Shallow. */
export class PredicatesMapMapper implements UnmappedTriplesMapper<PredicatesMap> {
  readonly kind = "unmappedTriples";
  readonly deep = false;

  toUnmappedTriples(subject: RdfSubject, value: PredicatesMap): Triple[] {
    const triples: Triple[] = [];
    for (const [predicate, objects] of value) {
      const iri = new IriTerm(predicate);
      for (const object of objects) triples.push(new Triple(subject, iri, object));
    }
    return triples;
  }

  fromUnmappedTriples(triples: readonly Triple[]): PredicatesMap {
    const map: PredicatesMap = new Map();
    for (const triple of triples) {
      const objects = map.get(triple.predicate.value);
      if (objects) {
        objects.push(triple.object);
      } else {
        map.set(triple.predicate.value, [triple.object]);
      }
    }
    return map;
  }
}
