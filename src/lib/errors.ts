import type { PlainObject } from "../utils/guards";
import type { IriTerm, RdfObject, RdfSubject } from "./terms";
import type { RdfGraph } from "./rdfGraph";

/**
 * Base class of every failure raised by the mapping engine.
 * `code` is a stable kebab-case identifier; `context` carries structured
 * details for logs.
 */
export class RdfMapperException extends Error {
  readonly code: string;
  readonly context?: PlainObject;

  constructor(message: string, code = "rdf-mapper-error", context?: PlainObject) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (context && Object.keys(context).length > 0) {
      this.context = context;
    }
  }
}

export class RdfConstraintViolationException extends RdfMapperException {
  constructor(
    readonly constraint: string,
    message: string,
  ) {
    super(message, `constraint-${constraint}`, { constraint });
  }
}

export type MapperRole = "serializer" | "deserializer";

export class MapperNotFoundException extends RdfMapperException {
  constructor(
    readonly role: MapperRole,
    readonly typeName: string,
    detail?: string,
  ) {
    super(
      `No ${role} registered for ${typeName}${detail ? ` (${detail})` : ""}`,
      "mapper-not-found",
      { role, typeName },
    );
  }
}

export class SerializerNotFoundException extends MapperNotFoundException {
  constructor(typeName: string, detail?: string) {
    super("serializer", typeName, detail);
  }
}

export class DeserializerNotFoundException extends MapperNotFoundException {
  constructor(typeName: string, detail?: string) {
    super("deserializer", typeName, detail);
  }
}

export class SerializationException extends RdfMapperException {
  constructor(message: string, code = "serialization-failed", context?: PlainObject) {
    super(message, code, context);
  }
}

export class DeserializationException extends RdfMapperException {
  constructor(message: string, code = "deserialization-failed", context?: PlainObject) {
    super(message, code, context);
  }
}

export class DeserializerDatatypeMismatchException extends DeserializationException {
  readonly actual: IriTerm;
  readonly expected: IriTerm;
  readonly targetType: string;
  readonly mapperName: string;

  constructor(args: {
    actual: IriTerm;
    expected: IriTerm;
    targetType: string;
    mapperName: string;
  }) {
    super(
      `Datatype mismatch in ${args.mapperName}: expected ${args.expected} for ${args.targetType} but found ${args.actual}. ` +
        `Pass bypassDatatypeCheck to accept the literal anyway, or use a DatatypeOverrideMapper for this property.`,
      "datatype-mismatch",
      {
        actual: args.actual.value,
        expected: args.expected.value,
        targetType: args.targetType,
        mapperName: args.mapperName,
      },
    );
    this.actual = args.actual;
    this.expected = args.expected;
    this.targetType = args.targetType;
    this.mapperName = args.mapperName;
  }
}

export class PropertyValueNotFoundException extends DeserializationException {
  constructor(
    readonly subject: RdfSubject,
    readonly predicate: IriTerm,
  ) {
    super(
      `Required property ${predicate} not found on ${subject}`,
      "property-value-not-found",
      { subject: subject.toString(), predicate: predicate.value },
    );
  }
}

export class TooManyPropertyValuesException extends DeserializationException {
  constructor(
    readonly subject: RdfSubject,
    readonly predicate: IriTerm,
    readonly objects: readonly RdfObject[],
  ) {
    super(
      `Expected a single value for ${predicate} on ${subject} but found ${objects.length}: ${objects.join(", ")}`,
      "too-many-property-values",
      { subject: subject.toString(), predicate: predicate.value, count: objects.length },
    );
  }
}

export class IncompleteDeserializationException extends DeserializationException {
  constructor(
    readonly remainingGraph: RdfGraph,
    readonly unmappedSubjects: readonly RdfSubject[],
    readonly unmappedTypes: readonly IriTerm[],
  ) {
    super(
      `Incomplete deserialization: ${remainingGraph.size} unprocessed triples, ` +
        `${unmappedSubjects.length} unmapped subjects` +
        (unmappedTypes.length > 0 ? `, unmapped types: ${unmappedTypes.join(", ")}` : ""),
      "incomplete-deserialization",
      {
        remainingTriples: remainingGraph.size,
        unmappedSubjects: unmappedSubjects.map((s) => s.toString()),
        unmappedTypes: unmappedTypes.map((t) => t.value),
      },
    );
  }

  get remainingTripleCount(): number {
    return this.remainingGraph.size;
  }
}

export class InvalidRdfListStructureException extends DeserializationException {
  constructor(
    message: string,
    readonly node?: RdfSubject,
    code = "invalid-rdf-list",
  ) {
    super(message, code, node ? { node: node.toString() } : undefined);
  }
}

export class CircularRdfListException extends InvalidRdfListStructureException {
  constructor(
    node: RdfSubject,
    readonly visited: readonly RdfSubject[],
  ) {
    super(
      `Circular rdf:List detected: ${node} is reached again after ${visited.length} nodes`,
      node,
      "circular-rdf-list",
    );
  }
}

export type RootResolutionFailure =
  | "empty"
  | "multipleToplevel"
  | "multipleIri"
  | "cyclicBlankNodes";

export class RootSubjectResolutionException extends RdfMapperException {
  constructor(
    readonly reason: RootResolutionFailure,
    message: string,
    readonly candidates: readonly RdfSubject[] = [],
  ) {
    super(message, `root-subject-${reason}`, {
      candidates: candidates.map((c) => c.toString()),
    });
  }
}

export class RdfCodecException extends RdfMapperException {
  constructor(message: string, readonly contentType: string, cause?: unknown) {
    super(message, "codec-failed", {
      contentType,
      cause: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
    });
  }
}
