import { SerializationException } from "../lib/errors";
import { IriTerm } from "../lib/terms";
import type { RdfSubject } from "../lib/terms";
import type { SerializationContext } from "../types/context";
import type { Serializer } from "../types/mapper";

/**
 * Picks a serializer at the moment a value is written, based on the subject
 * it hangs off. Typical use: child IRIs minted below the parent's IRI.
 */
export abstract class SerializationProvider<T> {
  abstract serializer(parentSubject: RdfSubject, context: SerializationContext): Serializer<T>;

  /** A provider that needs the parent's IRI; blank-node parents are rejected. */
  static iriContextual<T>(factory: (parentIri: IriTerm) => Serializer<T>): SerializationProvider<T> {
    return new IriContextualSerializationProvider(factory);
  }

  static nonContextual<T>(serializer: Serializer<T>): SerializationProvider<T> {
    return new NonContextualSerializationProvider(serializer);
  }
}

class IriContextualSerializationProvider<T> extends SerializationProvider<T> {
  constructor(private readonly factory: (parentIri: IriTerm) => Serializer<T>) {
    super();
  }

  serializer(parentSubject: RdfSubject): Serializer<T> {
    if (!(parentSubject instanceof IriTerm)) {
      throw new SerializationException(
        `IRI-contextual serializer requires an IRI parent, got ${parentSubject}`,
        "provider-requires-iri-parent",
      );
    }
    return this.factory(parentSubject);
  }
}

class NonContextualSerializationProvider<T> extends SerializationProvider<T> {
  constructor(private readonly fixed: Serializer<T>) {
    super();
  }

  serializer(): Serializer<T> {
    return this.fixed;
  }
}
