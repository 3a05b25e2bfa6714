import { CircularRdfListException, InvalidRdfListStructureException, SerializationException } from "../../lib/errors";
import { BlankNodeTerm, LiteralTerm, termKey } from "../../lib/terms";
import type { RdfSubject } from "../../lib/terms";
import { Triple } from "../../lib/triple";
import { Rdf } from "../../lib/vocab";
import type { DeserializationContext, SerializationContext } from "../../types/context";
import type {
  DeserializerSource,
  Serializer,
  UnifiedResourceDeserializer,
  UnifiedResourceSerializer,
} from "../../types/mapper";

/**
 * Ordered sequence as an rdf:List: one blank node per item carrying rdf:first
 * and rdf:rest, the last rest pointing at rdf:nil. The empty sequence is
 * rdf:nil itself with no triples.
 */
export class RdfListSerializer<T> implements UnifiedResourceSerializer<Iterable<T>> {
  readonly kind = "unifiedResource";

  constructor(private readonly itemSerializer?: Serializer<T>) {}

  toRdfResource(values: Iterable<T>, context: SerializationContext): [RdfSubject, Triple[]] {
    const items = Array.from(values);
    if (items.length === 0) return [Rdf.nil, []];

    const nodes = items.map(() => new BlankNodeTerm());
    const triples: Triple[] = [];
    items.forEach((item, index) => {
      const node = nodes[index];
      const [objects, nested] = context.serialize(item, { serializer: this.itemSerializer, parentSubject: node });
      if (objects.length !== 1) {
        throw new SerializationException(
          `rdf:List items must serialize to exactly one term, item ${index} produced ${objects.length}`,
          "list-item-arity",
        );
      }
      triples.push(new Triple(node, Rdf.first, objects[0]), ...nested);
      triples.push(new Triple(node, Rdf.rest, index + 1 < nodes.length ? nodes[index + 1] : Rdf.nil));
    });
    return [nodes[0], triples];
  }
}

export class RdfListDeserializer<T> implements UnifiedResourceDeserializer<T[]> {
  readonly kind = "unifiedResource";

  constructor(private readonly itemDeserializer: DeserializerSource<T>) {}

  fromRdfResource(subject: RdfSubject, context: DeserializationContext): T[] {
    const result: T[] = [];
    const seen = new Set<string>();
    const visited: RdfSubject[] = [];
    let current: RdfSubject = subject;

    while (!current.equals(Rdf.nil)) {
      const key = termKey(current);
      if (seen.has(key)) throw new CircularRdfListException(current, visited);
      seen.add(key);
      visited.push(current);

      const triples = context.getTriplesForSubject(current, { includeBlankNodes: false, trackRead: false });
      const first = triples.filter((t) => t.predicate.equals(Rdf.first));
      const rest = triples.filter((t) => t.predicate.equals(Rdf.rest));
      if (first.length !== 1) {
        throw new InvalidRdfListStructureException(
          `List node ${current} must have exactly one rdf:first, found ${first.length}`,
          current,
        );
      }
      if (rest.length !== 1) {
        throw new InvalidRdfListStructureException(
          `List node ${current} must have exactly one rdf:rest, found ${rest.length}`,
          current,
        );
      }

      const next = rest[0].object;
      if (next instanceof LiteralTerm) {
        throw new InvalidRdfListStructureException(`rdf:rest of ${current} points at a literal: ${next}`, current);
      }
      context.trackTriplesRead(current, [first[0], rest[0]]);
      result.push(context.deserialize(first[0].object, this.itemDeserializer));
      current = next;
    }
    return result;
  }
}

export function rdfListSerializer<T>(itemSerializer?: Serializer<T>): RdfListSerializer<T> {
  return new RdfListSerializer(itemSerializer);
}

export function rdfListDeserializer<T>(itemDeserializer: DeserializerSource<T>): RdfListDeserializer<T> {
  return new RdfListDeserializer(itemDeserializer);
}
