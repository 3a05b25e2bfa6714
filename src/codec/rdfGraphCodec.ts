import { DataFactory, Parser, Writer } from "n3";
import type { BlankNode, Literal, NamedNode, Quad, Term } from "@rdfjs/types";
import { DEFAULT_PREFIXES, mergePrefixes, toPrefixMap } from "../constants/namespaces";
import { RdfCodecException, RdfMapperException } from "../lib/errors";
import { RdfGraph } from "../lib/rdfGraph";
import { BlankNodeTerm, IriTerm, LiteralTerm } from "../lib/terms";
import type { RdfObject, RdfSubject } from "../lib/terms";
import { Triple } from "../lib/triple";
import { debug } from "../utils/logger";

export type RdfContentType = "text/turtle" | "application/n-triples";

export const SUPPORTED_CONTENT_TYPES: readonly RdfContentType[] = ["text/turtle", "application/n-triples"];

export interface DecodeOptions {
  contentType?: RdfContentType;
  /** Base for relative IRIs in the document. */
  baseIri?: string;
}

export interface EncodeOptions {
  contentType?: RdfContentType;
  /** Prefix to namespace; only Turtle output uses them. */
  prefixes?: Record<string, string>;
}

/** String boundary of the mapper: text in, graph out, and back. */
export interface RdfGraphCodec {
  decode(text: string, options?: DecodeOptions): RdfGraph;
  encode(graph: RdfGraph, options?: EncodeOptions): string;
}

export function isSupportedContentType(value: string): value is RdfContentType {
  return SUPPORTED_CONTENT_TYPES.some((type) => type === value);
}

const DEFAULT_PREFIX_MAP = toPrefixMap(DEFAULT_PREFIXES);

/** Turtle and N-Triples through the n3 parser and writer. */
export class N3GraphCodec implements RdfGraphCodec {
  decode(text: string, options: DecodeOptions = {}): RdfGraph {
    const contentType = options.contentType ?? "text/turtle";
    const parser = new Parser({ format: contentType, baseIRI: options.baseIri });
    let quads: Quad[];
    try {
      quads = parser.parse(text);
    } catch (err) {
      throw new RdfCodecException(
        `Failed to parse ${contentType}: ${err instanceof Error ? err.message : String(err)}`,
        contentType,
        err,
      );
    }

    // one BlankNodeTerm per label, fresh for every document
    const blankNodes = new Map<string, BlankNodeTerm>();
    const toSubject = (term: Term): RdfSubject => {
      if (term.termType === "NamedNode") return this.toIri(term, contentType);
      if (term.termType === "BlankNode") {
        let node = blankNodes.get(term.value);
        if (!node) {
          node = new BlankNodeTerm();
          blankNodes.set(term.value, node);
        }
        return node;
      }
      throw new RdfCodecException(`Unsupported subject term type ${term.termType}`, contentType);
    };
    const toObject = (term: Term): RdfObject => {
      if (term.termType === "Literal") return this.toLiteral(term, contentType);
      return toSubject(term);
    };

    const triples: Triple[] = [];
    for (const quad of quads) {
      if (quad.predicate.termType !== "NamedNode") {
        throw new RdfCodecException(`Unsupported predicate term type ${quad.predicate.termType}`, contentType);
      }
      triples.push(
        new Triple(toSubject(quad.subject), this.toIri(quad.predicate, contentType), toObject(quad.object)),
      );
    }
    debug("codec.decode", { contentType, triples: triples.length, blankNodes: blankNodes.size });
    return RdfGraph.fromTriples(triples);
  }

  encode(graph: RdfGraph, options: EncodeOptions = {}): string {
    const contentType = options.contentType ?? "text/turtle";
    const writer = new Writer({
      format: contentType === "application/n-triples" ? "N-Triples" : "Turtle",
      prefixes: mergePrefixes(DEFAULT_PREFIX_MAP, options.prefixes),
    });

    // labels are renumbered per document so output does not depend on process state
    const labels = new Map<BlankNodeTerm, BlankNode>();
    const blankNode = (node: BlankNodeTerm): BlankNode => {
      let label = labels.get(node);
      if (!label) {
        label = DataFactory.blankNode(`b${labels.size}`);
        labels.set(node, label);
      }
      return label;
    };
    const subject = (term: RdfSubject): NamedNode | BlankNode =>
      term instanceof IriTerm ? DataFactory.namedNode(term.value) : blankNode(term);
    const object = (term: RdfObject): NamedNode | BlankNode | Literal => {
      if (!(term instanceof LiteralTerm)) return subject(term);
      return DataFactory.literal(term.value, term.language ?? DataFactory.namedNode(term.datatype.value));
    };

    for (const triple of graph) {
      writer.addQuad(
        DataFactory.quad(subject(triple.subject), DataFactory.namedNode(triple.predicate.value), object(triple.object)),
      );
    }

    let output: string | undefined;
    let failure: unknown;
    writer.end((err, result) => {
      if (err) {
        failure = err;
        return;
      }
      output = result;
    });
    if (failure !== undefined) {
      throw new RdfCodecException(
        `Failed to write ${contentType}: ${failure instanceof Error ? failure.message : String(failure)}`,
        contentType,
        failure,
      );
    }
    if (output === undefined) {
      throw new RdfMapperException("n3 writer did not complete synchronously", "codec-writer-async", { contentType });
    }
    debug("codec.encode", { contentType, triples: graph.size });
    return output;
  }

  private toIri(term: NamedNode, contentType: string): IriTerm {
    try {
      return new IriTerm(term.value);
    } catch (err) {
      throw new RdfCodecException(`Invalid IRI in ${contentType} input: ${term.value}`, contentType, err);
    }
  }

  private toLiteral(term: Literal, contentType: string): LiteralTerm {
    try {
      if (term.language) return LiteralTerm.withLanguage(term.value, term.language);
      return new LiteralTerm(term.value, { datatype: new IriTerm(term.datatype.value) });
    } catch (err) {
      throw new RdfCodecException(`Invalid literal in ${contentType} input: ${term.value}`, contentType, err);
    }
  }
}
