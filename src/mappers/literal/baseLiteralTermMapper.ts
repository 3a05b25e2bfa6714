import { DeserializationException, DeserializerDatatypeMismatchException, RdfMapperException } from "../../lib/errors";
import { LiteralTerm } from "../../lib/terms";
import type { IriTerm } from "../../lib/terms";
import type { DeserializationContext, SerializationContext } from "../../types/context";
import type { LiteralTermMapper } from "../../types/mapper";

/**
 * Template for literal mappers. Subclasses only convert between the value and
 * its lexical form; tagging, the datatype guard and language handling live here.
 */
export abstract class BaseLiteralTermMapper<T> implements LiteralTermMapper<T> {
  readonly kind = "literal";

  constructor(
    readonly datatype: IriTerm,
    /** Name of the produced type, used in error reports. */
    readonly targetType: string,
  ) {}

  protected abstract convertToString(value: T): string;

  protected abstract convertFromLiteral(term: LiteralTerm, context: DeserializationContext): T;

  /** Language-tagged input is rejected unless a subclass opts in. */
  protected acceptsLanguage(): boolean {
    return false;
  }

  toRdfTerm(value: T, _context: SerializationContext): LiteralTerm {
    return new LiteralTerm(this.convertToString(value), { datatype: this.datatype });
  }

  fromRdfTerm(term: LiteralTerm, context: DeserializationContext, bypassDatatypeCheck = false): T {
    if (!bypassDatatypeCheck && !term.datatype.equals(this.datatype)) {
      throw new DeserializerDatatypeMismatchException({
        actual: term.datatype,
        expected: this.datatype,
        targetType: this.targetType,
        mapperName: this.constructor.name,
      });
    }
    if (term.language !== undefined && !this.acceptsLanguage()) {
      throw new DeserializationException(
        `${this.constructor.name} does not accept language-tagged literals: ${term}`,
        "language-not-accepted",
        { term: term.toString() },
      );
    }
    try {
      return this.convertFromLiteral(term, context);
    } catch (err) {
      if (err instanceof RdfMapperException) throw err;
      throw new DeserializationException(
        `Failed to convert ${term} to ${this.targetType}: ${err instanceof Error ? err.message : String(err)}`,
        "literal-conversion-failed",
        { term: term.toString(), targetType: this.targetType },
      );
    }
  }

  protected invalidLexical(term: LiteralTerm): DeserializationException {
    return new DeserializationException(
      `"${term.value}" is not a valid lexical form for ${this.targetType}`,
      "invalid-lexical-form",
      { value: term.value, datatype: term.datatype.value },
    );
  }
}
