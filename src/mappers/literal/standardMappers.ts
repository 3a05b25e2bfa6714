import { DeserializationException, SerializationException } from "../../lib/errors";
import { LiteralTerm } from "../../lib/terms";
import type { IriTerm } from "../../lib/terms";
import type { LangString } from "../../lib/typeToken";
import { Rdf, Xsd } from "../../lib/vocab";
import type { SerializationContext } from "../../types/context";
import { BaseLiteralTermMapper } from "./baseLiteralTermMapper";

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const DOUBLE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const DATE_TIME = /^(-?\d{4,}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?)(Z|[+-]\d{2}:\d{2})?$/;
const DATE = /^(\d{4}-\d{2}-\d{2})(Z|[+-]\d{2}:\d{2})?$/;

/** Rewrites JavaScript exponent notation (`1e-21`) as plain digits. */
function expandExponent(text: string): string {
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;
  const [, sign, whole, fraction = "", exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`;
  if (point >= digits.length) return sign + digits + "0".repeat(point - digits.length);
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export class StringMapper extends BaseLiteralTermMapper<string> {
  constructor(datatype: IriTerm = Xsd.string) {
    super(datatype, "string");
  }

  protected convertToString(value: string): string {
    return value;
  }

  protected convertFromLiteral(term: LiteralTerm): string {
    return term.value;
  }
}

/** JavaScript numbers as xsd:double, including INF, -INF and NaN. */
export class NumberMapper extends BaseLiteralTermMapper<number> {
  constructor(datatype: IriTerm = Xsd.double) {
    super(datatype, "number");
  }

  protected convertToString(value: number): string {
    if (Number.isNaN(value)) return "NaN";
    if (value === Infinity) return "INF";
    if (value === -Infinity) return "-INF";
    if (Object.is(value, -0)) return "-0";
    return String(value);
  }

  protected convertFromLiteral(term: LiteralTerm): number {
    const raw = term.value.trim();
    if (raw === "NaN") return NaN;
    if (raw === "INF" || raw === "+INF") return Infinity;
    if (raw === "-INF") return -Infinity;
    if (!DOUBLE.test(raw)) throw this.invalidLexical(term);
    return Number(raw);
  }
}

/**
 * JavaScript numbers as xsd:integer. Values outside the safe integer range are
 * refused on read; map them with BigIntMapper instead.
 */
export class IntegerMapper extends BaseLiteralTermMapper<number> {
  constructor(datatype: IriTerm = Xsd.integer) {
    super(datatype, "integer");
  }

  protected convertToString(value: number): string {
    if (!Number.isInteger(value)) {
      throw new SerializationException(`${value} is not an integer`, "not-an-integer", { value });
    }
    return BigInt(value).toString();
  }

  protected convertFromLiteral(term: LiteralTerm): number {
    const raw = term.value.trim();
    if (!INTEGER.test(raw)) throw this.invalidLexical(term);
    const result = Number(raw);
    if (!Number.isSafeInteger(result)) {
      throw new DeserializationException(
        `${raw} is outside the safe integer range of number; use BigIntMapper for this value`,
        "integer-out-of-range",
        { value: raw },
      );
    }
    return result;
  }
}

/**
 * JavaScript numbers as xsd:decimal, written without exponent notation. The
 * written digits are those of the number's shortest round-trip form, so a
 * decimal read from RDF keeps only double precision.
 */
export class DecimalMapper extends BaseLiteralTermMapper<number> {
  constructor(datatype: IriTerm = Xsd.decimal) {
    super(datatype, "decimal");
  }

  protected convertToString(value: number): string {
    if (!Number.isFinite(value)) {
      throw new SerializationException(`${value} has no xsd:decimal form`, "not-a-decimal", { value });
    }
    if (Object.is(value, -0)) return "-0";
    // exponent notation is not valid for xsd:decimal
    return expandExponent(String(value));
  }

  protected convertFromLiteral(term: LiteralTerm): number {
    const raw = term.value.trim();
    if (!DECIMAL.test(raw)) throw this.invalidLexical(term);
    return Number(raw);
  }
}

export class BooleanMapper extends BaseLiteralTermMapper<boolean> {
  constructor(datatype: IriTerm = Xsd.boolean) {
    super(datatype, "boolean");
  }

  protected convertToString(value: boolean): string {
    return value ? "true" : "false";
  }

  protected convertFromLiteral(term: LiteralTerm): boolean {
    switch (term.value.trim()) {
      case "true":
      case "1":
        return true;
      case "false":
      case "0":
        return false;
      default:
        throw this.invalidLexical(term);
    }
  }
}

export class BigIntMapper extends BaseLiteralTermMapper<bigint> {
  constructor(datatype: IriTerm = Xsd.integer) {
    super(datatype, "bigint");
  }

  protected convertToString(value: bigint): string {
    return value.toString();
  }

  protected convertFromLiteral(term: LiteralTerm): bigint {
    const raw = term.value.trim();
    if (!INTEGER.test(raw)) throw this.invalidLexical(term);
    return BigInt(raw);
  }
}

/** Date instants as xsd:dateTime, always written in UTC. */
export class DateTimeMapper extends BaseLiteralTermMapper<Date> {
  constructor(datatype: IriTerm = Xsd.dateTime) {
    super(datatype, "Date");
  }

  protected convertToString(value: Date): string {
    if (Number.isNaN(value.getTime())) {
      throw new SerializationException("Invalid Date cannot be serialized", "invalid-date");
    }
    return value.toISOString();
  }

  /** A value without a time zone is read as UTC. */
  protected convertFromLiteral(term: LiteralTerm): Date {
    const match = DATE_TIME.exec(term.value.trim());
    if (!match) throw this.invalidLexical(term);
    const parsed = new Date(`${match[1]}${match[2] ?? "Z"}`);
    if (Number.isNaN(parsed.getTime())) throw this.invalidLexical(term);
    return parsed;
  }
}

/** Calendar dates as xsd:date (YYYY-MM-DD, UTC midnight). Not a registry default. */
export class DateMapper extends BaseLiteralTermMapper<Date> {
  constructor(datatype: IriTerm = Xsd.date) {
    super(datatype, "date");
  }

  protected convertToString(value: Date): string {
    if (Number.isNaN(value.getTime())) {
      throw new SerializationException("Invalid Date cannot be serialized", "invalid-date");
    }
    return value.toISOString().slice(0, 10);
  }

  protected convertFromLiteral(term: LiteralTerm): Date {
    const match = DATE.exec(term.value.trim());
    if (!match) throw this.invalidLexical(term);
    const parsed = new Date(`${match[1]}T00:00:00Z`);
    if (Number.isNaN(parsed.getTime())) throw this.invalidLexical(term);
    return parsed;
  }
}

/** rdf:langString literals as `{ value, language }`. */
export class LangStringMapper extends BaseLiteralTermMapper<LangString> {
  constructor() {
    super(Rdf.langString, "langString");
  }

  protected override acceptsLanguage(): boolean {
    return true;
  }

  override toRdfTerm(value: LangString, _context: SerializationContext): LiteralTerm {
    return LiteralTerm.withLanguage(value.value, value.language);
  }

  protected convertToString(value: LangString): string {
    return value.value;
  }

  protected convertFromLiteral(term: LiteralTerm): LangString {
    return { value: term.value, language: term.language ?? "" };
  }
}
