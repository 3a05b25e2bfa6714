import { describe, it, expect } from "vitest";
import { RdfGraph } from "../../lib/rdfGraph";
import { BlankNodeTerm, LiteralTerm } from "../../lib/terms";
import { Triple } from "../../lib/triple";
import { namespace } from "../../lib/namespace";

const ex = namespace("https://example.org/");

describe("RdfGraph", () => {
  const t1 = new Triple(ex("a"), ex("name"), new LiteralTerm("A"));
  const t2 = new Triple(ex("a"), ex("knows"), ex("b"));
  const t3 = new Triple(ex("b"), ex("name"), new LiteralTerm("B"));

  it("collapses duplicates and keeps insertion order", () => {
    const graph = RdfGraph.fromTriples([t1, t2, new Triple(ex("a"), ex("name"), new LiteralTerm("A")), t3]);
    expect(graph.size).toBe(3);
    expect(graph.triples).toEqual([t1, t2, t3]);
  });

  it("finds triples by any combination of positions", () => {
    const graph = RdfGraph.fromTriples([t1, t2, t3]);
    expect(Array.from(graph.findTriples({ subject: ex("a") }))).toEqual([t1, t2]);
    expect(Array.from(graph.findTriples({ predicate: ex("name") }))).toEqual([t1, t3]);
    expect(Array.from(graph.findTriples({ object: ex("b") }))).toEqual([t2]);
    expect(Array.from(graph.findTriples({ subject: ex("b"), predicate: ex("knows") }))).toEqual([]);
    expect(graph.hasTriples({ predicate: ex("knows") })).toBe(true);
    expect(graph.hasTriples({ predicate: ex("missing") })).toBe(false);
  });

  it("returns restartable iterables", () => {
    const graph = RdfGraph.fromTriples([t1, t2, t3]);
    const found = graph.findTriples({ predicate: ex("name") });
    expect(Array.from(found)).toHaveLength(2);
    expect(Array.from(found)).toHaveLength(2);
    const all = graph.findTriples();
    expect(Array.from(all)).toHaveLength(3);
    expect(Array.from(all)).toHaveLength(3);
  });

  it("lists distinct subjects in first-seen order", () => {
    const graph = RdfGraph.fromTriples([t3, t1, t2]);
    expect(graph.subjects()).toEqual([ex("b"), ex("a")]);
  });

  it("never mutates on merge, add or remove", () => {
    const graph = RdfGraph.fromTriples([t1]);
    const merged = graph.merge([t2]);
    const removed = merged.withoutTriples([t1]);
    expect(graph.size).toBe(1);
    expect(merged.size).toBe(2);
    expect(removed.triples).toEqual([t2]);
    expect(graph.withTriples([t3]).has(t3)).toBe(true);
    expect(graph.has(t3)).toBe(false);
  });

  it("compares as a set", () => {
    expect(RdfGraph.fromTriples([t1, t2]).equals(RdfGraph.fromTriples([t2, t1]))).toBe(true);
    expect(RdfGraph.fromTriples([t1]).equals(RdfGraph.fromTriples([t2]))).toBe(false);
    expect(RdfGraph.empty.isEmpty).toBe(true);
  });

  it("treats blank nodes by identity", () => {
    const b1 = new BlankNodeTerm();
    const b2 = new BlankNodeTerm();
    const a = RdfGraph.fromTriples([new Triple(b1, ex("p"), new LiteralTerm("x"))]);
    const b = RdfGraph.fromTriples([new Triple(b2, ex("p"), new LiteralTerm("x"))]);
    expect(a.equals(b)).toBe(false);
  });

  it("filters into a new graph", () => {
    const graph = RdfGraph.fromTriples([t1, t2, t3]);
    expect(graph.filter((t) => t.object instanceof LiteralTerm).triples).toEqual([t1, t3]);
  });
});
