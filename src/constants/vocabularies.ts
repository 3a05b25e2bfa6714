/**
 * Vocabulary IRIs the mapping engine depends on, as plain strings.
 *
 * IriTerm-valued counterparts live in lib/vocab.ts; this module has no imports
 * so that the term model can use it without a cycle.
 */

// ============================================================================
// RDF
// https://www.w3.org/1999/02/22-rdf-syntax-ns
// ============================================================================

export const RDF = {
  namespace: "http://www.w3.org/1999/02/22-rdf-syntax-ns#",
  type: "http://www.w3.org/1999/02/22-rdf-syntax-ns#type",
  first: "http://www.w3.org/1999/02/22-rdf-syntax-ns#first",
  rest: "http://www.w3.org/1999/02/22-rdf-syntax-ns#rest",
  nil: "http://www.w3.org/1999/02/22-rdf-syntax-ns#nil",
  List: "http://www.w3.org/1999/02/22-rdf-syntax-ns#List",
  Bag: "http://www.w3.org/1999/02/22-rdf-syntax-ns#Bag",
  Seq: "http://www.w3.org/1999/02/22-rdf-syntax-ns#Seq",
  Alt: "http://www.w3.org/1999/02/22-rdf-syntax-ns#Alt",
  langString: "http://www.w3.org/1999/02/22-rdf-syntax-ns#langString",
} as const;

/** Prefix shared by the container membership properties rdf:_1, rdf:_2, ... */
export const RDF_MEMBER_PREFIX = `${RDF.namespace}_`;

// ============================================================================
// XSD (XML Schema Datatypes)
// https://www.w3.org/2001/XMLSchema
// ============================================================================

export const XSD = {
  namespace: "http://www.w3.org/2001/XMLSchema#",
  string: "http://www.w3.org/2001/XMLSchema#string",
  integer: "http://www.w3.org/2001/XMLSchema#integer",
  int: "http://www.w3.org/2001/XMLSchema#int",
  long: "http://www.w3.org/2001/XMLSchema#long",
  boolean: "http://www.w3.org/2001/XMLSchema#boolean",
  decimal: "http://www.w3.org/2001/XMLSchema#decimal",
  double: "http://www.w3.org/2001/XMLSchema#double",
  float: "http://www.w3.org/2001/XMLSchema#float",
  dateTime: "http://www.w3.org/2001/XMLSchema#dateTime",
  date: "http://www.w3.org/2001/XMLSchema#date",
} as const;
