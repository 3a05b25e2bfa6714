import { DeserializerDatatypeMismatchException } from "../../lib/errors";
import { LiteralTerm } from "../../lib/terms";
import type { IriTerm } from "../../lib/terms";
import { keyName } from "../../lib/typeToken";
import type { MapperKey } from "../../lib/typeToken";
import type { DeserializationContext, SerializationContext } from "../../types/context";
import type { LiteralTermMapper } from "../../types/mapper";

/**
 * Writes a value with the literal mapper registered for `key`, then re-tags
 * the literal with `datatype`. Use per property:
 *
 * ```ts
 * builder.addValue(ex("temperature"), 21.5, new DatatypeOverrideMapper(ex("celsius"), Types.number));
 * ```
 *
 * Only valid as an explicit mapper; the registry refuses it.
 */
export class DatatypeOverrideMapper<T> implements LiteralTermMapper<T> {
  readonly kind = "literal";
  readonly delegatesToContext = true;

  constructor(
    readonly datatype: IriTerm,
    private readonly key: MapperKey<T>,
  ) {}

  toRdfTerm(value: T, context: SerializationContext): LiteralTerm {
    const base = context.toLiteralTerm(value, this.key);
    return new LiteralTerm(base.value, { datatype: this.datatype });
  }

  fromRdfTerm(term: LiteralTerm, context: DeserializationContext, bypassDatatypeCheck = false): T {
    if (!bypassDatatypeCheck && !term.datatype.equals(this.datatype)) {
      throw new DeserializerDatatypeMismatchException({
        actual: term.datatype,
        expected: this.datatype,
        targetType: keyName(this.key),
        mapperName: this.constructor.name,
      });
    }
    return context.fromLiteralTerm(new LiteralTerm(term.value), this.key, true);
  }
}
