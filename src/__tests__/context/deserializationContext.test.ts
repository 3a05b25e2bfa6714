import { describe, it, expect } from "vitest";
import { DeserializationContextImpl, TrackingDeserializationContext } from "../../context/deserializationContext";
import { SerializationContextImpl } from "../../context/serializationContext";
import {
  MapperNotFoundException,
  PropertyValueNotFoundException,
  RdfMapperException,
  TooManyPropertyValuesException,
} from "../../lib/errors";
import { RdfGraph } from "../../lib/rdfGraph";
import { BlankNodeTerm, IriTerm, LiteralTerm } from "../../lib/terms";
import { Triple } from "../../lib/triple";
import { Types } from "../../lib/typeToken";
import { createDefaultRegistry } from "../../registry/defaultRegistry";
import { Author, Book, ex, registerLibraryMappers } from "../fixtures/library";

const registry = registerLibraryMappers(createDefaultRegistry());

function bookGraph(): [Book, RdfGraph] {
  const book = new Book("b1", "Placeholder Title", new Author("a1", "Ada"), ["One", "Two"], ["x"], 12);
  const [, triples] = new SerializationContextImpl(registry).resource(book);
  return [book, RdfGraph.fromTriples(triples)];
}

describe("DeserializationContextImpl reads", () => {
  const s = ex("s");
  const graph = RdfGraph.fromTriples([
    new Triple(s, ex("title"), new LiteralTerm("A")),
    new Triple(s, ex("title"), new LiteralTerm("B")),
    new Triple(s, ex("label"), new LiteralTerm("only")),
  ]);

  it("returns undefined for a missing optional value", () => {
    const context = new DeserializationContextImpl(graph, registry);
    expect(context.optional(s, ex("missing"), Types.string)).toBeUndefined();
  });

  it("fails on a missing required value", () => {
    const context = new DeserializationContextImpl(graph, registry);
    expect(() => context.require(s, ex("missing"), Types.string)).toThrow(PropertyValueNotFoundException);
    expect(() => context.require(s, ex("missing"), Types.string)).toThrow(
      "Required property <https://example.org/vocab#missing> not found on <https://example.org/vocab#s>",
    );
  });

  it("fails on several values unless told otherwise", () => {
    const context = new DeserializationContextImpl(graph, registry);
    expect(() => context.require(s, ex("title"), Types.string)).toThrow(TooManyPropertyValuesException);
    expect(context.require(s, ex("title"), Types.string, { enforceSingleValue: false })).toBe("A");
    expect(context.getAllProcessedTriples().map((t) => t.object.value)).toEqual(["A"]);
  });

  it("collects all values of a predicate", () => {
    const context = new DeserializationContextImpl(graph, registry);
    expect(context.getValues(s, ex("title"), Types.string)).toEqual(["A", "B"]);
    expect(context.collect(s, ex("title"), Types.string, (items) => items.join("+"))).toBe("A+B");
    expect(context.getValues(s, ex("missing"), Types.string)).toEqual([]);
  });

  it("reports when no mapper fits the term kind", () => {
    const [, books] = bookGraph();
    const context = new DeserializationContextImpl(books, registry);
    expect(() => context.require(ex("nobody"), ex("title"), Types.string)).toThrow(PropertyValueNotFoundException);
    const author = Array.from(books.findTriples({ predicate: ex("author") }))[0];
    expect(() => context.deserialize(author.object, Types.string)).toThrow(MapperNotFoundException);
  });
});

describe("getUnmapped", () => {
  const s = ex("s");
  const nested = new BlankNodeTerm();
  const known = new Triple(s, ex("known"), new LiteralTerm("k"));
  const extra = new Triple(s, ex("extra"), new LiteralTerm("e"));
  const link = new Triple(s, ex("nested"), nested);
  const inner = new Triple(nested, ex("inner"), new LiteralTerm("i"));
  const elsewhere = new Triple(ex("other"), ex("p"), new LiteralTerm("o"));
  const graph = RdfGraph.fromTriples([known, extra, link, inner, elsewhere]);

  it("captures the subject's unread triples and blank-node closure with a deep mapper", () => {
    const context = new DeserializationContextImpl(graph, registry);
    context.require(s, ex("known"), Types.string);
    const captured = context.getUnmapped(s, RdfGraph);
    expect(captured.triples).toEqual([extra, link, inner]);
  });

  it("captures only direct triples with a shallow mapper", () => {
    const context = new DeserializationContextImpl(graph, registry);
    context.require(s, ex("known"), Types.string);
    const captured = context.getUnmapped(s, Types.predicatesMap);
    expect(Array.from(captured.keys())).toEqual(["https://example.org/vocab#extra", "https://example.org/vocab#nested"]);
    expect(captured.get("https://example.org/vocab#nested")).toEqual([nested]);
  });

  it("captures every unread triple of the graph in global mode", () => {
    const context = new DeserializationContextImpl(graph, registry);
    context.require(s, ex("known"), Types.string);
    const captured = context.getUnmapped(s, RdfGraph, { globalUnmapped: true });
    expect(captured.triples).toEqual([extra, link, inner, elsewhere]);
    expect(context.getAllProcessedTriples()).toHaveLength(5);
  });

  it("refuses global capture into a shallow mapper", () => {
    const context = new DeserializationContextImpl(graph, registry);
    try {
      context.getUnmapped(s, Types.predicatesMap, { globalUnmapped: true });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RdfMapperException);
      if (err instanceof RdfMapperException) expect(err.code).toBe("global-unmapped-requires-deep");
    }
  });
});

describe("TrackingDeserializationContext", () => {
  it("records child subjects and every triple read", () => {
    const [book, graph] = bookGraph();
    const bookIri = new IriTerm("https://example.org/books/b1");
    const context = new TrackingDeserializationContext(graph, registry);

    expect(context.deserializeResource(bookIri, ex("Book"))).toEqual(book);
    expect(context.isChildSubject(bookIri)).toBe(false);
    expect(context.isChildSubject(new IriTerm("https://example.org/people/a1"))).toBe(true);
    expect(context.getProcessedTriples()).toHaveLength(12);

    context.clearProcessedTriples();
    expect(context.getProcessedTriples()).toEqual([]);
    expect(context.getAllProcessedTriples()).toHaveLength(12);
  });
});
