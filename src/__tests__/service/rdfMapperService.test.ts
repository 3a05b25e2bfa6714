import { beforeEach, describe, it, expect } from "vitest";
import { DeserializationException, IncompleteDeserializationException, SerializerNotFoundException } from "../../lib/errors";
import { RdfGraph } from "../../lib/rdfGraph";
import { IriTerm, LiteralTerm } from "../../lib/terms";
import { Triple } from "../../lib/triple";
import { Rdf } from "../../lib/vocab";
import { createDefaultRegistry } from "../../registry/defaultRegistry";
import { RdfMapperService } from "../../service/rdfMapperService";
import { checkCompleteness, isCompletenessMode, unmappedInfo } from "../../service/completeness";
import { clearLogSummary, getLogSummary } from "../../utils/logger";
import { Author, AuthorMapper, Book, Note, ex, registerLibraryMappers } from "../fixtures/library";

const service = new RdfMapperService(registerLibraryMappers(createDefaultRegistry()));

const ada = new Author("a1", "Ada");
const book = new Book("b1", "Placeholder Title", ada, ["One", "Two"], ["x"], 12);
const unrelated = new Triple(ex("unrelated"), ex("p"), new LiteralTerm("x"));

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof DeserializationException) return err.code;
    throw err;
  }
  return undefined;
}

describe("RdfMapperService round trip", () => {
  it("encodes a book with its author, chapters, tags and pages", () => {
    const graph = service.serialize(book);
    expect(graph.size).toBe(12);
    expect(service.deserialize(graph, Book)).toEqual(book);
  });

  it("omits optional values that are absent", () => {
    const short = new Book("b2", "Short", ada);
    const graph = service.serialize(short);
    // type, title, author link, author type, author name, chapters -> rdf:nil
    expect(graph.size).toBe(6);
    expect(service.deserialize(graph, Book)).toEqual(short);
  });

  it("decodes a subject by its IRI", () => {
    const graph = service.serialize(book);
    const author = service.deserializeBySubject(graph, new IriTerm("https://example.org/people/a1"), Author, {
      completeness: "lenient",
    });
    expect(author).toEqual(ada);
  });
});

describe("completeness", () => {
  const graph = service.serialize(ada).withTriples([unrelated]);

  beforeEach(() => {
    clearLogSummary();
  });

  it("throws on leftover triples in strict mode", () => {
    try {
      service.deserialize(graph, Author);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(IncompleteDeserializationException);
      if (err instanceof IncompleteDeserializationException) {
        expect(err.remainingTripleCount).toBe(1);
        expect(err.unmappedSubjects).toEqual([ex("unrelated")]);
        expect(err.unmappedTypes).toEqual([]);
      }
    }
  });

  it("ignores leftovers in lenient mode", () => {
    expect(service.deserialize(graph, Author, { completeness: "lenient" })).toEqual(ada);
    expect(getLogSummary().logs.filter((e) => e.event === "deserialization.incomplete")).toEqual([]);
  });

  it("logs leftovers in warnOnly and infoOnly modes", () => {
    service.deserialize(graph, Author, { completeness: "warnOnly" });
    service.deserialize(graph, Author, { completeness: "infoOnly" });
    const entries = getLogSummary().logs.filter((e) => e.event === "deserialization.incomplete");
    expect(entries.map((e) => e.level)).toEqual(["warn", "info"]);
    expect(entries[0].meta.remainingTriples).toBe(1);
  });

  it("hands back the remainder in lossless mode", () => {
    const [author, remainder] = service.deserializeLossless(graph, Author);
    expect(author).toEqual(ada);
    expect(remainder.triples).toEqual([unrelated]);
    expect(service.serializeLossless([author, remainder]).equals(graph)).toBe(true);
  });

  it("uses the service default mode", () => {
    const lenient = new RdfMapperService(registerLibraryMappers(createDefaultRegistry()), {
      defaultCompleteness: "lenient",
    });
    expect(lenient.deserialize(graph, Author)).toEqual(ada);
  });

  it("reports unmapped rdf:types", () => {
    const typed = RdfGraph.fromTriples([new Triple(ex("u"), Rdf.type, ex("Unknown")), unrelated]);
    expect(unmappedInfo(typed).unmappedTypes).toEqual([ex("Unknown")]);
    expect(() => checkCompleteness("strict", typed)).toThrow("unmapped types: <https://example.org/vocab#Unknown>");
    expect(isCompletenessMode("warnOnly")).toBe(true);
    expect(isCompletenessMode("lossless")).toBe(false);
  });
});

describe("whole-graph decoding", () => {
  const bo = new Author("a2", "Bo");
  const graph = service.serializeList<Book | Author>([book, bo]);

  it("returns the roots and skips referenced children", () => {
    expect(graph.size).toBe(14);
    expect(service.deserializeAll(graph)).toEqual([book, bo]);
  });

  it("filters roots by type", () => {
    const [authors, remainder] = service.deserializeAllLossless(graph, { key: Author });
    expect(authors).toEqual([bo]);
    expect(remainder.size).toBe(12);
    expect(() => service.deserializeAll(graph, { key: Author })).toThrow(IncompleteDeserializationException);
  });

  it("leaves subjects without a deserializer in the remainder", () => {
    const [values, remainder] = service.deserializeAllLossless(graph.withTriples([unrelated]));
    expect(values).toHaveLength(2);
    expect(remainder.triples).toEqual([unrelated]);
  });
});

describe("single-object decoding errors", () => {
  it("fails when several subjects carry the type", () => {
    const graph = service.serializeList([ada, new Author("a2", "Bo")]);
    expect(codeOf(() => service.deserialize(graph, Author))).toBe("multiple-subjects-found");
  });

  it("fails when no subject carries the type", () => {
    const graph = RdfGraph.fromTriples([unrelated, new Triple(ex("other"), ex("p"), new LiteralTerm("y"))]);
    expect(() => service.deserialize(graph, Author)).toThrow("No subject found in graph");
  });
});

describe("per-call registration", () => {
  it("registers into a clone only", () => {
    const bare = new RdfMapperService(createDefaultRegistry());
    const graph = bare.serialize(ada, { register: (r) => r.registerMapper(Author, new AuthorMapper()) });
    expect(graph.size).toBe(2);
    expect(bare.registry.hasSerializerFor(Author)).toBe(false);
    expect(() => bare.serialize(ada)).toThrow(SerializerNotFoundException);
  });
});

describe("unmapped capture", () => {
  it("keeps unknown properties of a note and writes them back", () => {
    const subject = new IriTerm("https://example.org/notes/n1");
    const graph = RdfGraph.fromTriples([
      new Triple(subject, Rdf.type, ex("Note")),
      new Triple(subject, ex("text"), new LiteralTerm("remember")),
      new Triple(subject, ex("mood"), new LiteralTerm("calm")),
    ]);
    const note = service.deserialize(graph, Note);
    expect(note.text).toBe("remember");
    expect(note.extras.size).toBe(1);
    expect(service.serialize(note).equals(graph)).toBe(true);
  });
});
