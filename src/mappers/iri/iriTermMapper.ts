import type { IriTerm } from "../../lib/terms";
import type { DeserializationContext, SerializationContext } from "../../types/context";
import type { IriTermMapper as IriTermMapperShape } from "../../types/mapper";

/** IriTerm values as themselves. */
export class IriTermMapper implements IriTermMapperShape<IriTerm> {
  readonly kind = "iri";

  toRdfTerm(value: IriTerm, _context: SerializationContext): IriTerm {
    return value;
  }

  fromRdfTerm(term: IriTerm, _context: DeserializationContext): IriTerm {
    return term;
  }
}

/** Strings holding a complete IRI. */
export class IriFullMapper implements IriTermMapperShape<string> {
  readonly kind = "iri";

  toRdfTerm(value: string, context: SerializationContext): IriTerm {
    return context.createIriTerm(value);
  }

  fromRdfTerm(term: IriTerm, _context: DeserializationContext): string {
    return term.value;
  }
}

/** `base#value`. A trailing `#` on the base is dropped. */
export class FragmentIriTermMapper implements IriTermMapperShape<string> {
  readonly kind = "iri";

  constructor(readonly baseIri: string) {}

  toRdfTerm(fragment: string, context: SerializationContext): IriTerm {
    const base = this.baseIri.endsWith("#") ? this.baseIri.slice(0, -1) : this.baseIri;
    return context.createIriTerm(`${base}#${fragment}`);
  }

  fromRdfTerm(term: IriTerm, _context: DeserializationContext): string {
    const index = term.value.lastIndexOf("#");
    return index === -1 ? "" : term.value.slice(index + 1);
  }
}

/** `base/value`; decoding returns whatever follows the last slash. */
export class LastPathElementIriTermMapper implements IriTermMapperShape<string> {
  readonly kind = "iri";

  constructor(readonly baseIri: string) {}

  toRdfTerm(pathElement: string, context: SerializationContext): IriTerm {
    const base = this.baseIri.endsWith("/") ? this.baseIri : `${this.baseIri}/`;
    return context.createIriTerm(`${base}${pathElement}`);
  }

  fromRdfTerm(term: IriTerm, _context: DeserializationContext): string {
    const index = term.value.lastIndexOf("/");
    return index === -1 ? term.value : term.value.slice(index + 1);
  }
}
