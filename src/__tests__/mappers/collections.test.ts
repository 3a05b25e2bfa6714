import { describe, it, expect } from "vitest";
import { DeserializationContextImpl } from "../../context/deserializationContext";
import { SerializationContextImpl } from "../../context/serializationContext";
import { CircularRdfListException, DeserializationException, InvalidRdfListStructureException } from "../../lib/errors";
import { RdfGraph } from "../../lib/rdfGraph";
import { BlankNodeTerm, LiteralTerm } from "../../lib/terms";
import { Triple } from "../../lib/triple";
import { Types } from "../../lib/typeToken";
import { Rdf, memberIndex, memberProperty } from "../../lib/vocab";
import {
  RdfContainerDeserializer,
  RdfContainerSerializer,
  rdfBagDeserializer,
} from "../../mappers/collections/rdfContainer";
import { rdfListDeserializer, rdfListSerializer } from "../../mappers/collections/rdfList";
import { unorderedItemsSerializer } from "../../mappers/collections/unorderedItems";
import { createDefaultRegistry } from "../../registry/defaultRegistry";
import { ex } from "../fixtures/library";

const registry = createDefaultRegistry();
const ser = new SerializationContextImpl(registry);

function contextFor(triples: Triple[]): DeserializationContextImpl {
  return new DeserializationContextImpl(RdfGraph.fromTriples(triples), registry);
}

describe("rdf:List", () => {
  it("writes two triples per item and reads them back in order", () => {
    const [head, triples] = rdfListSerializer<string>().toRdfResource(["apple", "banana", "cherry"], ser);
    expect(triples).toHaveLength(6);
    expect(triples.filter((t) => t.predicate.equals(Rdf.first)).map((t) => t.object.value)).toEqual([
      "apple",
      "banana",
      "cherry",
    ]);
    expect(triples[5].object.equals(Rdf.nil)).toBe(true);

    // reverse insertion order to show the links, not the graph order, drive the result
    const context = contextFor([...triples].reverse());
    expect(rdfListDeserializer(Types.string).fromRdfResource(head, context)).toEqual(["apple", "banana", "cherry"]);
    expect(context.getAllProcessedTriples()).toHaveLength(6);
  });

  it("encodes the empty list as rdf:nil without triples", () => {
    const [head, triples] = rdfListSerializer<string>().toRdfResource([], ser);
    expect(head.equals(Rdf.nil)).toBe(true);
    expect(triples).toEqual([]);
    expect(rdfListDeserializer(Types.string).fromRdfResource(Rdf.nil, contextFor([]))).toEqual([]);
  });

  it("detects cycles", () => {
    const n1 = new BlankNodeTerm();
    const n2 = new BlankNodeTerm();
    const context = contextFor([
      new Triple(n1, Rdf.first, new LiteralTerm("a")),
      new Triple(n1, Rdf.rest, n2),
      new Triple(n2, Rdf.first, new LiteralTerm("b")),
      new Triple(n2, Rdf.rest, n1),
    ]);
    try {
      rdfListDeserializer(Types.string).fromRdfResource(n1, context);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CircularRdfListException);
      if (err instanceof CircularRdfListException) {
        expect(err.code).toBe("circular-rdf-list");
        expect(err.visited).toEqual([n1, n2]);
      }
    }
  });

  it("rejects nodes without exactly one rdf:first", () => {
    const n1 = new BlankNodeTerm();
    const context = contextFor([new Triple(n1, Rdf.rest, Rdf.nil)]);
    expect(() => rdfListDeserializer(Types.string).fromRdfResource(n1, context)).toThrow(
      `List node ${n1} must have exactly one rdf:first, found 0`,
    );
  });

  it("rejects a literal rdf:rest", () => {
    const n1 = new BlankNodeTerm();
    const context = contextFor([
      new Triple(n1, Rdf.first, new LiteralTerm("a")),
      new Triple(n1, Rdf.rest, new LiteralTerm("oops")),
    ]);
    expect(() => rdfListDeserializer(Types.string).fromRdfResource(n1, context)).toThrow(
      InvalidRdfListStructureException,
    );
  });
});

describe("numbered containers", () => {
  for (const type of [Rdf.Seq, Rdf.Bag, Rdf.Alt]) {
    it(`numbers ${type.value.split("#")[1]} members from 1`, () => {
      const [node, triples] = new RdfContainerSerializer<string>(type).toRdfResource(["x", "y", "z"], ser);
      expect(triples).toHaveLength(4);
      expect(triples[0].equals(new Triple(node, Rdf.type, type))).toBe(true);
      expect(triples.slice(1).map((t) => memberIndex(t.predicate))).toEqual([1, 2, 3]);

      const decoded = new RdfContainerDeserializer(type, Types.string).fromRdfResource(
        node,
        contextFor([...triples].reverse()),
      );
      expect(decoded).toEqual(["x", "y", "z"]);
    });
  }

  it("refuses a container of another kind", () => {
    const [node, triples] = new RdfContainerSerializer<string>(Rdf.Seq).toRdfResource(["x"], ser);
    try {
      rdfBagDeserializer(Types.string).fromRdfResource(node, contextFor(triples));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DeserializationException);
      if (err instanceof DeserializationException) expect(err.code).toBe("container-type-mismatch");
    }
  });

  it("accepts an untyped container node", () => {
    const node = new BlankNodeTerm();
    const context = contextFor([
      new Triple(node, memberProperty(2), new LiteralTerm("b")),
      new Triple(node, memberProperty(1), new LiteralTerm("a")),
    ]);
    expect(rdfBagDeserializer(Types.string).fromRdfResource(node, context)).toEqual(["a", "b"]);
  });
});

describe("unordered items", () => {
  it("writes one triple per item on the shared predicate", () => {
    const subject = ex("shelf");
    const triples = ser.value(subject, ex("tag"), ["a", "b"], unorderedItemsSerializer<string>());
    expect(triples.map((t) => t.toString())).toEqual([
      '<https://example.org/vocab#shelf> <https://example.org/vocab#tag> "a" .',
      '<https://example.org/vocab#shelf> <https://example.org/vocab#tag> "b" .',
    ]);
    expect(contextFor(triples).getValues(subject, ex("tag"), Types.string)).toEqual(["a", "b"]);
  });
});
