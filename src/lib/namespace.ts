import { IriTerm } from "./terms";

/**
 * Builds IRIs below a common namespace.
 *
 * ```ts
 * const schema = namespace("https://schema.org/");
 * schema("Person"); // <https://schema.org/Person>
 * ```
 */
export type Namespace = ((localName: string) => IriTerm) & { readonly uri: string };

export function namespace(uri: string): Namespace {
  // validates the namespace itself
  new IriTerm(uri);
  const build = (localName: string) => new IriTerm(`${uri}${localName}`);
  return Object.assign(build, { uri });
}
