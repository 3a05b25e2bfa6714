import { termKey } from "./terms";
import type { IriTerm, RdfObject, RdfSubject } from "./terms";

/** An immutable (subject, predicate, object) statement. */
export class Triple {
  /** Structural identity; two triples with equal terms share a key. */
  readonly key: string;

  constructor(
    readonly subject: RdfSubject,
    readonly predicate: IriTerm,
    readonly object: RdfObject,
  ) {
    this.key = `${termKey(subject)} ${termKey(predicate)} ${termKey(object)}`;
    Object.freeze(this);
  }

  equals(other: unknown): boolean {
    return other instanceof Triple && other.key === this.key;
  }

  toString(): string {
    return `${this.subject} ${this.predicate} ${this.object} .`;
  }
}
