import { DeserializationException, DeserializerDatatypeMismatchException } from "../../lib/errors";
import { LiteralTerm } from "../../lib/terms";
import { keyName } from "../../lib/typeToken";
import type { MapperKey } from "../../lib/typeToken";
import { Rdf } from "../../lib/vocab";
import type { DeserializationContext, SerializationContext } from "../../types/context";
import type { LiteralTermMapper } from "../../types/mapper";

/**
 * Writes a value with the literal mapper registered for `key` and tags the
 * lexical form with `language`. Only valid as an explicit mapper.
 */
export class LanguageOverrideMapper<T> implements LiteralTermMapper<T> {
  readonly kind = "literal";
  readonly datatype = Rdf.langString;
  readonly delegatesToContext = true;

  constructor(
    readonly language: string,
    private readonly key: MapperKey<T>,
  ) {}

  toRdfTerm(value: T, context: SerializationContext): LiteralTerm {
    const base = context.toLiteralTerm(value, this.key);
    return LiteralTerm.withLanguage(base.value, this.language);
  }

  fromRdfTerm(term: LiteralTerm, context: DeserializationContext, bypassDatatypeCheck = false): T {
    if (!bypassDatatypeCheck) {
      if (term.language === undefined) {
        throw new DeserializerDatatypeMismatchException({
          actual: term.datatype,
          expected: this.datatype,
          targetType: keyName(this.key),
          mapperName: this.constructor.name,
        });
      }
      // tags compare case-insensitively
      if (term.language.toLowerCase() !== this.language.toLowerCase()) {
        throw new DeserializationException(
          `${this.constructor.name} expects language "${this.language}" but found "${term.language}"`,
          "language-mismatch",
          { expected: this.language, actual: term.language },
        );
      }
    }
    return context.fromLiteralTerm(new LiteralTerm(term.value), this.key, true);
  }
}
