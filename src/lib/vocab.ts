import { RDF, RDF_MEMBER_PREFIX, XSD } from "../constants/vocabularies";
import { IriTerm } from "./terms";

export const Rdf = {
  type: new IriTerm(RDF.type),
  first: new IriTerm(RDF.first),
  rest: new IriTerm(RDF.rest),
  nil: new IriTerm(RDF.nil),
  List: new IriTerm(RDF.List),
  Bag: new IriTerm(RDF.Bag),
  Seq: new IriTerm(RDF.Seq),
  Alt: new IriTerm(RDF.Alt),
  langString: new IriTerm(RDF.langString),
} as const;

export const Xsd = {
  string: new IriTerm(XSD.string),
  integer: new IriTerm(XSD.integer),
  int: new IriTerm(XSD.int),
  long: new IriTerm(XSD.long),
  boolean: new IriTerm(XSD.boolean),
  decimal: new IriTerm(XSD.decimal),
  double: new IriTerm(XSD.double),
  float: new IriTerm(XSD.float),
  dateTime: new IriTerm(XSD.dateTime),
  date: new IriTerm(XSD.date),
} as const;

/** rdf:_n for a 1-based container index. */
export function memberProperty(index: number): IriTerm {
  return new IriTerm(`${RDF_MEMBER_PREFIX}${index}`);
}

/** The 1-based index of rdf:_n, or undefined for any other predicate. */
export function memberIndex(predicate: IriTerm): number | undefined {
  if (!predicate.value.startsWith(RDF_MEMBER_PREFIX)) return undefined;
  const digits = predicate.value.slice(RDF_MEMBER_PREFIX.length);
  if (!/^[1-9][0-9]*$/.test(digits)) return undefined;
  return Number(digits);
}
