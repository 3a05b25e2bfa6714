import type { RdfObject, RdfSubject } from "../../lib/terms";
import type { Triple } from "../../lib/triple";
import type { DeserializationContext, SerializationContext } from "../../types/context";
import type {
  DeserializerSource,
  MultiObjectsDeserializer,
  MultiObjectsSerializer,
  Serializer,
} from "../../types/mapper";

/** Each item becomes its own object of the shared predicate; no intermediate node. */
export class UnorderedItemsSerializer<T> implements MultiObjectsSerializer<Iterable<T>> {
  readonly kind = "multiObjects";

  constructor(private readonly itemSerializer?: Serializer<T>) {}

  toRdfObjects(values: Iterable<T>, context: SerializationContext, parentSubject?: RdfSubject): [RdfObject[], Triple[]] {
    const objects: RdfObject[] = [];
    const triples: Triple[] = [];
    for (const item of values) {
      const [itemObjects, nested] = context.serialize(item, { serializer: this.itemSerializer, parentSubject });
      objects.push(...itemObjects);
      triples.push(...nested);
    }
    return [objects, triples];
  }
}

export class UnorderedItemsDeserializer<T> implements MultiObjectsDeserializer<T[]> {
  readonly kind = "multiObjects";

  constructor(private readonly itemDeserializer: DeserializerSource<T>) {}

  fromRdfObjects(objects: readonly RdfObject[], context: DeserializationContext): T[] {
    return objects.map((object) => context.deserialize(object, this.itemDeserializer));
  }
}

/** Like UnorderedItemsDeserializer, but hands the items to `collector`. */
export class UnorderedItemsCollectorDeserializer<T, R> implements MultiObjectsDeserializer<R> {
  readonly kind = "multiObjects";

  constructor(
    private readonly collector: (items: T[]) => R,
    private readonly itemDeserializer: DeserializerSource<T>,
  ) {}

  fromRdfObjects(objects: readonly RdfObject[], context: DeserializationContext): R {
    return this.collector(objects.map((object) => context.deserialize(object, this.itemDeserializer)));
  }
}

export function unorderedItemsSerializer<T>(itemSerializer?: Serializer<T>): UnorderedItemsSerializer<T> {
  return new UnorderedItemsSerializer(itemSerializer);
}

export function unorderedItemsDeserializer<T>(itemDeserializer: DeserializerSource<T>): UnorderedItemsDeserializer<T> {
  return new UnorderedItemsDeserializer(itemDeserializer);
}
