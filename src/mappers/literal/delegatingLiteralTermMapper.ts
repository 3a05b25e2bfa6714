import { DeserializerDatatypeMismatchException } from "../../lib/errors";
import { LiteralTerm } from "../../lib/terms";
import type { IriTerm } from "../../lib/terms";
import { keyName } from "../../lib/typeToken";
import type { MapperKey } from "../../lib/typeToken";
import type { DeserializationContext, SerializationContext } from "../../types/context";
import type { LiteralTermMapper } from "../../types/mapper";

/**
 * Literal mapper for a custom type expressed through a carrier type that
 * already has a literal mapper, e.g. a `Temperature` class carried as a number.
 * The carrier's lexical form is written under `datatype`.
 */
export class DelegatingLiteralTermMapper<T, C> implements LiteralTermMapper<T> {
  readonly kind = "literal";

  constructor(
    readonly datatype: IriTerm,
    private readonly carrierKey: MapperKey<C>,
    private readonly toCarrier: (value: T) => C,
    private readonly fromCarrier: (carrier: C) => T,
  ) {}

  toRdfTerm(value: T, context: SerializationContext): LiteralTerm {
    const carried = context.toLiteralTerm(this.toCarrier(value), this.carrierKey);
    return new LiteralTerm(carried.value, { datatype: this.datatype });
  }

  fromRdfTerm(term: LiteralTerm, context: DeserializationContext, bypassDatatypeCheck = false): T {
    if (!bypassDatatypeCheck && !term.datatype.equals(this.datatype)) {
      throw new DeserializerDatatypeMismatchException({
        actual: term.datatype,
        expected: this.datatype,
        targetType: keyName(this.carrierKey),
        mapperName: this.constructor.name,
      });
    }
    return this.fromCarrier(context.fromLiteralTerm(new LiteralTerm(term.value), this.carrierKey, true));
  }
}
