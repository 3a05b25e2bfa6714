import { RDF, XSD } from "../constants/vocabularies";
import { RdfConstraintViolationException } from "./errors";

const SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:/;
const FORBIDDEN_IRI_CHARS = /[\s<>"{}|^`\\]/;
const LANGUAGE_TAG = /^[A-Za-z]{1,8}(-[A-Za-z0-9]{1,8})*$/;

function validateIri(value: string) {
  if (value.length === 0) {
    throw new RdfConstraintViolationException("iri-empty", "IRI must not be empty");
  }
  if (!SCHEME.test(value)) {
    throw new RdfConstraintViolationException(
      "iri-absolute",
      `IRI must be absolute (missing scheme): ${value}`,
    );
  }
  if (FORBIDDEN_IRI_CHARS.test(value)) {
    throw new RdfConstraintViolationException(
      "iri-characters",
      `IRI contains characters that are not allowed: ${value}`,
    );
  }
}

/** An absolute IRI. Value equality. */
export class IriTerm {
  readonly termType = "NamedNode";

  constructor(readonly value: string) {
    validateIri(value);
    Object.freeze(this);
  }

  equals(other: unknown): boolean {
    return other instanceof IriTerm && other.value === this.value;
  }

  toString(): string {
    return `<${this.value}>`;
  }
}

let blankNodeCounter = 0;

/**
 * Anonymous node. Two instances are equal only when they are the same object;
 * `id` is a process-unique label for display and indexing.
 */
export class BlankNodeTerm {
  readonly termType = "BlankNode";
  readonly id: string;

  constructor() {
    blankNodeCounter += 1;
    this.id = `b${blankNodeCounter}`;
    Object.freeze(this);
  }

  get value(): string {
    return this.id;
  }

  equals(other: unknown): boolean {
    return other === this;
  }

  toString(): string {
    return `_:${this.id}`;
  }
}

const xsdString = new IriTerm(XSD.string);
const rdfLangString = new IriTerm(RDF.langString);

export interface LiteralOptions {
  datatype?: IriTerm;
  language?: string;
}

/**
 * Typed or language-tagged value. A language tag always comes with
 * rdf:langString and rdf:langString always comes with a language tag.
 */
export class LiteralTerm {
  readonly termType = "Literal";
  readonly datatype: IriTerm;
  readonly language: string | undefined;

  constructor(readonly value: string, options: LiteralOptions = {}) {
    const { datatype, language } = options;
    if (language !== undefined) {
      if (!LANGUAGE_TAG.test(language)) {
        throw new RdfConstraintViolationException(
          "language-tag",
          `Invalid language tag: "${language}"`,
        );
      }
      if (datatype && !datatype.equals(rdfLangString)) {
        throw new RdfConstraintViolationException(
          "language-datatype",
          `Language-tagged literals must use ${rdfLangString}, got ${datatype}`,
        );
      }
      this.datatype = rdfLangString;
      this.language = language;
    } else {
      if (datatype?.equals(rdfLangString)) {
        throw new RdfConstraintViolationException(
          "language-datatype",
          `${rdfLangString} requires a language tag`,
        );
      }
      this.datatype = datatype ?? xsdString;
      this.language = undefined;
    }
    Object.freeze(this);
  }

  static string(value: string): LiteralTerm {
    return new LiteralTerm(value);
  }

  static withLanguage(value: string, language: string): LiteralTerm {
    return new LiteralTerm(value, { language });
  }

  static typed(value: string, datatype: IriTerm | string): LiteralTerm {
    return new LiteralTerm(value, {
      datatype: typeof datatype === "string" ? new IriTerm(datatype) : datatype,
    });
  }

  static integer(value: number | bigint): LiteralTerm {
    return LiteralTerm.typed(value.toString(), XSD.integer);
  }

  static decimal(value: number): LiteralTerm {
    return LiteralTerm.typed(value.toString(), XSD.decimal);
  }

  static boolean(value: boolean): LiteralTerm {
    return LiteralTerm.typed(value ? "true" : "false", XSD.boolean);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof LiteralTerm &&
      other.value === this.value &&
      other.language === this.language &&
      other.datatype.equals(this.datatype)
    );
  }

  toString(): string {
    const quoted = JSON.stringify(this.value);
    if (this.language !== undefined) return `${quoted}@${this.language}`;
    if (this.datatype.equals(xsdString)) return quoted;
    return `${quoted}^^${this.datatype}`;
  }
}

export type RdfSubject = IriTerm | BlankNodeTerm;
export type RdfPredicate = IriTerm;
export type RdfObject = IriTerm | BlankNodeTerm | LiteralTerm;
export type RdfTerm = RdfObject;

export function isRdfTerm(value: unknown): value is RdfTerm {
  return value instanceof IriTerm || value instanceof BlankNodeTerm || value instanceof LiteralTerm;
}

export function isRdfSubject(value: unknown): value is RdfSubject {
  return value instanceof IriTerm || value instanceof BlankNodeTerm;
}

/** Stable string key for a term, suitable for Map/Set membership. */
export function termKey(term: RdfTerm): string {
  if (term instanceof IriTerm) return `<${term.value}>`;
  if (term instanceof BlankNodeTerm) return `_:${term.id}`;
  return `"${JSON.stringify([term.value, term.datatype.value, term.language ?? ""])}`;
}
