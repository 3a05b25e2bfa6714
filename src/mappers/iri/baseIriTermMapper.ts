import { DeserializationException, RdfMapperException } from "../../lib/errors";
import type { IriTerm } from "../../lib/terms";
import type { DeserializationContext, SerializationContext } from "../../types/context";
import type { IriTermMapper } from "../../types/mapper";

const PLACEHOLDER = /\{(\+?)([^}]+)\}/g;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * IRIs built from a template such as `https://example.org/books/{isbn}`.
 *
 * `{name}` is filled percent-encoded; `{+name}` is inserted as is, so it may
 * carry slashes. Placeholders other than the value placeholder are filled by
 * resolvePlaceholder().
 */
export abstract class BaseIriTermMapper<T> implements IriTermMapper<T> {
  readonly kind = "iri";
  private pattern?: RegExp;

  constructor(
    readonly template: string,
    readonly valueVariableName = "value",
  ) {
    const names = Array.from(template.matchAll(PLACEHOLDER), (match) => match[2]);
    if (!names.includes(valueVariableName)) {
      throw new RdfMapperException(
        `Value placeholder "${valueVariableName}" not found in IRI template "${template}"`,
        "iri-template-invalid",
        { template, valueVariableName },
      );
    }
  }

  protected abstract convertToString(value: T): string;

  protected abstract convertFromString(text: string): T;

  protected resolvePlaceholder(name: string): string {
    throw new RdfMapperException(
      `No value for placeholder "${name}" in IRI template "${this.template}"`,
      "iri-template-placeholder",
      { template: this.template, placeholder: name },
    );
  }

  toRdfTerm(value: T, context: SerializationContext): IriTerm {
    const iri = this.template.replace(PLACEHOLDER, (_match, plus: string, name: string) => {
      const raw = name === this.valueVariableName ? this.convertToString(value) : this.resolvePlaceholder(name);
      return plus === "+" ? raw : encodeURIComponent(raw);
    });
    return context.createIriTerm(iri);
  }

  fromRdfTerm(term: IriTerm, _context: DeserializationContext): T {
    const match = this.extractionPattern().exec(term.value);
    if (!match) {
      throw new DeserializationException(
        `IRI ${term} does not match template "${this.template}"`,
        "iri-template-mismatch",
        { iri: term.value, template: this.template },
      );
    }
    const encoded = match.groups?.encoded;
    const reserved = match.groups?.reserved;
    return this.convertFromString(encoded !== undefined ? decodeURIComponent(encoded) : (reserved ?? ""));
  }

  /** Captures the first value placeholder as `encoded` or `reserved`. */
  private extractionPattern(): RegExp {
    if (this.pattern) return this.pattern;
    let source = "";
    let last = 0;
    let captured = false;
    for (const match of this.template.matchAll(PLACEHOLDER)) {
      const index = match.index ?? 0;
      source += escapeRegExp(this.template.slice(last, index));
      const reserved = match[1] === "+";
      if (match[2] === this.valueVariableName && !captured) {
        source += reserved ? "(?<reserved>.*)" : "(?<encoded>[^/]*)";
        captured = true;
      } else {
        source += reserved ? ".*" : "[^/]*";
      }
      last = index + match[0].length;
    }
    source += escapeRegExp(this.template.slice(last));
    this.pattern = new RegExp(`^${source}$`);
    return this.pattern;
  }
}

/** Template mapper for plain string identifiers. */
export class StringIriTermMapper extends BaseIriTermMapper<string> {
  protected convertToString(value: string): string {
    return value;
  }

  protected convertFromString(text: string): string {
    return text;
  }
}
