import { DeserializationException, SerializationException } from "../../lib/errors";
import { BlankNodeTerm } from "../../lib/terms";
import type { IriTerm, RdfSubject } from "../../lib/terms";
import { Triple } from "../../lib/triple";
import { Rdf, memberIndex, memberProperty } from "../../lib/vocab";
import type { DeserializationContext, SerializationContext } from "../../types/context";
import type {
  DeserializerSource,
  LocalResourceSerializer,
  Serializer,
  UnifiedResourceDeserializer,
} from "../../types/mapper";

/**
 * rdf:Seq, rdf:Bag and rdf:Alt: one node typed with the container class and
 * one rdf:_n triple per item, numbered from 1 in iteration order.
 */
export class RdfContainerSerializer<T> implements LocalResourceSerializer<Iterable<T>> {
  readonly kind = "localResource";

  constructor(
    readonly typeIri: IriTerm,
    private readonly itemSerializer?: Serializer<T>,
  ) {}

  toRdfResource(values: Iterable<T>, context: SerializationContext): [BlankNodeTerm, Triple[]] {
    const node = new BlankNodeTerm();
    const triples: Triple[] = [new Triple(node, Rdf.type, this.typeIri)];
    let index = 0;
    for (const item of values) {
      index += 1;
      const [objects, nested] = context.serialize(item, { serializer: this.itemSerializer, parentSubject: node });
      if (objects.length !== 1) {
        throw new SerializationException(
          `Container items must serialize to exactly one term, item ${index} produced ${objects.length}`,
          "container-item-arity",
        );
      }
      triples.push(new Triple(node, memberProperty(index), objects[0]), ...nested);
    }
    return [node, triples];
  }
}

/** Reads members back in index order; predicates other than rdf:_n are left unread. */
export class RdfContainerDeserializer<T> implements UnifiedResourceDeserializer<T[]> {
  readonly kind = "unifiedResource";

  constructor(
    readonly typeIri: IriTerm,
    private readonly itemDeserializer: DeserializerSource<T>,
  ) {}

  fromRdfResource(subject: RdfSubject, context: DeserializationContext): T[] {
    const triples = context.getTriplesForSubject(subject, { includeBlankNodes: false, trackRead: false });
    const typeTriples = triples.filter((t) => t.predicate.equals(Rdf.type));
    const ownType = typeTriples.filter((t) => t.object.equals(this.typeIri));
    if (typeTriples.length > 0 && ownType.length === 0) {
      throw new DeserializationException(
        `Expected ${this.typeIri} container at ${subject} but it is typed ${typeTriples.map((t) => t.object).join(", ")}`,
        "container-type-mismatch",
      );
    }

    const members: Array<{ index: number; triple: Triple }> = [];
    for (const triple of triples) {
      const index = memberIndex(triple.predicate);
      if (index !== undefined) members.push({ index, triple });
    }
    members.sort((a, b) => a.index - b.index);

    context.trackTriplesRead(subject, [...ownType, ...members.map((m) => m.triple)]);
    return members.map((m) => context.deserialize(m.triple.object, this.itemDeserializer));
  }
}

export function rdfSeqSerializer<T>(itemSerializer?: Serializer<T>): RdfContainerSerializer<T> {
  return new RdfContainerSerializer(Rdf.Seq, itemSerializer);
}

export function rdfBagSerializer<T>(itemSerializer?: Serializer<T>): RdfContainerSerializer<T> {
  return new RdfContainerSerializer(Rdf.Bag, itemSerializer);
}

export function rdfAltSerializer<T>(itemSerializer?: Serializer<T>): RdfContainerSerializer<T> {
  return new RdfContainerSerializer(Rdf.Alt, itemSerializer);
}

export function rdfSeqDeserializer<T>(itemDeserializer: DeserializerSource<T>): RdfContainerDeserializer<T> {
  return new RdfContainerDeserializer(Rdf.Seq, itemDeserializer);
}

export function rdfBagDeserializer<T>(itemDeserializer: DeserializerSource<T>): RdfContainerDeserializer<T> {
  return new RdfContainerDeserializer(Rdf.Bag, itemDeserializer);
}

export function rdfAltDeserializer<T>(itemDeserializer: DeserializerSource<T>): RdfContainerDeserializer<T> {
  return new RdfContainerDeserializer(Rdf.Alt, itemDeserializer);
}
