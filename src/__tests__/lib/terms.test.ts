import { describe, it, expect } from "vitest";
import { RdfConstraintViolationException } from "../../lib/errors";
import { BlankNodeTerm, IriTerm, LiteralTerm, isRdfSubject, isRdfTerm, termKey } from "../../lib/terms";
import { Triple } from "../../lib/triple";
import { Rdf, Xsd, memberIndex, memberProperty } from "../../lib/vocab";
import { namespace } from "../../lib/namespace";

describe("IriTerm", () => {
  it("compares by value", () => {
    expect(new IriTerm("https://example.org/a").equals(new IriTerm("https://example.org/a"))).toBe(true);
    expect(new IriTerm("https://example.org/a").equals(new IriTerm("https://example.org/b"))).toBe(false);
  });

  it("rejects empty, relative and malformed IRIs", () => {
    expect(() => new IriTerm("")).toThrow(RdfConstraintViolationException);
    expect(() => new IriTerm("relative/path")).toThrow("IRI must be absolute (missing scheme): relative/path");
    expect(() => new IriTerm("https://example.org/a b")).toThrow(RdfConstraintViolationException);
    expect(() => new IriTerm("https://example.org/<x>")).toThrow(RdfConstraintViolationException);
  });

  it("reports the violated constraint in its code", () => {
    try {
      new IriTerm("");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RdfConstraintViolationException);
      if (err instanceof RdfConstraintViolationException) {
        expect(err.code).toBe("constraint-iri-empty");
        expect(err.constraint).toBe("iri-empty");
      }
    }
  });

  it("accepts URNs", () => {
    expect(new IriTerm("urn:example:thing").toString()).toBe("<urn:example:thing>");
  });
});

describe("BlankNodeTerm", () => {
  it("is only equal to itself", () => {
    const a = new BlankNodeTerm();
    const b = new BlankNodeTerm();
    expect(a.equals(a)).toBe(true);
    expect(a.equals(b)).toBe(false);
    expect(a.id).not.toBe(b.id);
    expect(a.toString()).toBe(`_:${a.id}`);
  });
});

describe("LiteralTerm", () => {
  it("defaults to xsd:string", () => {
    const literal = new LiteralTerm("hello");
    expect(literal.datatype.equals(Xsd.string)).toBe(true);
    expect(literal.language).toBeUndefined();
    expect(literal.toString()).toBe('"hello"');
  });

  it("forces rdf:langString for language-tagged values", () => {
    const literal = LiteralTerm.withLanguage("hallo", "de");
    expect(literal.datatype.equals(Rdf.langString)).toBe(true);
    expect(literal.toString()).toBe('"hallo"@de');
  });

  it("rejects rdf:langString without a language and a tag with another datatype", () => {
    expect(() => new LiteralTerm("x", { datatype: Rdf.langString })).toThrow(RdfConstraintViolationException);
    expect(() => new LiteralTerm("x", { datatype: Xsd.integer, language: "en" })).toThrow(
      RdfConstraintViolationException,
    );
  });

  it("validates language tags", () => {
    expect(() => LiteralTerm.withLanguage("x", "en-GB")).not.toThrow();
    expect(() => LiteralTerm.withLanguage("x", "not a tag")).toThrow('Invalid language tag: "not a tag"');
  });

  it("builds typed literals through the convenience constructors", () => {
    expect(LiteralTerm.integer(42).toString()).toBe('"42"^^<http://www.w3.org/2001/XMLSchema#integer>');
    expect(LiteralTerm.boolean(false).value).toBe("false");
    expect(LiteralTerm.decimal(1.5).datatype.equals(Xsd.decimal)).toBe(true);
    expect(LiteralTerm.typed("2024-01-02", "http://www.w3.org/2001/XMLSchema#date").datatype.equals(Xsd.date)).toBe(
      true,
    );
  });

  it("distinguishes equal lexical forms with different datatypes", () => {
    const a = LiteralTerm.typed("1", Xsd.integer);
    const b = LiteralTerm.typed("1", Xsd.decimal);
    expect(a.equals(b)).toBe(false);
    expect(termKey(a)).not.toBe(termKey(b));
    expect(termKey(a)).toBe(termKey(LiteralTerm.integer(1)));
  });
});

describe("term helpers", () => {
  it("recognises terms and subjects", () => {
    expect(isRdfTerm(new LiteralTerm("x"))).toBe(true);
    expect(isRdfTerm("x")).toBe(false);
    expect(isRdfSubject(new LiteralTerm("x"))).toBe(false);
    expect(isRdfSubject(new BlankNodeTerm())).toBe(true);
  });

  it("keys triples structurally", () => {
    const ex = namespace("https://example.org/");
    const a = new Triple(ex("s"), ex("p"), new LiteralTerm("o"));
    const b = new Triple(ex("s"), ex("p"), new LiteralTerm("o"));
    expect(a.equals(b)).toBe(true);
    expect(a.toString()).toBe('<https://example.org/s> <https://example.org/p> "o" .');
  });

  it("maps container indices to membership properties and back", () => {
    expect(memberProperty(3).value).toBe("http://www.w3.org/1999/02/22-rdf-syntax-ns#_3");
    expect(memberIndex(memberProperty(12))).toBe(12);
    expect(memberIndex(Rdf.first)).toBeUndefined();
  });

  it("builds IRIs below a namespace", () => {
    const ns = namespace("https://example.org/vocab#");
    expect(ns.uri).toBe("https://example.org/vocab#");
    expect(ns("name").value).toBe("https://example.org/vocab#name");
  });
});
