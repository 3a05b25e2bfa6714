import { RdfGraph } from "../../lib/rdfGraph";
import { resolveRootSubject } from "../../lib/rootSubject";
import type { RdfSubject } from "../../lib/terms";
import type { Triple } from "../../lib/triple";
import type { DeserializationContext, SerializationContext } from "../../types/context";
import type { UnifiedResourceMapper, UnmappedTriplesMapper } from "../../types/mapper";

/**
 * Captures unread triples as a graph and writes them back unchanged. Deep:
 * blank nodes hanging off the subject come along.
 */
export class RdfGraphMapper implements UnmappedTriplesMapper<RdfGraph> {
  readonly kind = "unmappedTriples";
  readonly deep = true;

  toUnmappedTriples(_subject: RdfSubject, value: RdfGraph): Triple[] {
    return value.triples;
  }

  fromUnmappedTriples(triples: readonly Triple[]): RdfGraph {
    return RdfGraph.fromTriples(triples);
  }
}

/**
 * A graph embedded as a property value. Decoding takes the subject's triples
 * and the blank-node closure below it; encoding links to the graph's root.
 */
export class RdfGraphResourceMapper implements UnifiedResourceMapper<RdfGraph> {
  readonly kind = "unifiedResource";

  toRdfResource(value: RdfGraph, _context: SerializationContext): [RdfSubject, Triple[]] {
    return [resolveRootSubject(value), value.triples];
  }

  fromRdfResource(subject: RdfSubject, context: DeserializationContext): RdfGraph {
    return RdfGraph.fromTriples(context.getTriplesForSubject(subject));
  }
}
