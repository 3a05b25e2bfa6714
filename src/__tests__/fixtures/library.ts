import { RdfGraph } from "../../lib/rdfGraph";
import { namespace } from "../../lib/namespace";
import { BlankNodeTerm } from "../../lib/terms";
import type { IriTerm } from "../../lib/terms";
import type { Triple } from "../../lib/triple";
import { Types } from "../../lib/typeToken";
import type { MapperRegistry } from "../../registry/mapperRegistry";
import type { DeserializationContext, SerializationContext } from "../../types/context";
import type { GlobalResourceMapper, LocalResourceMapper } from "../../types/mapper";

export const ex = namespace("https://example.org/vocab#");
export const BOOKS = "https://example.org/books/";
export const PEOPLE = "https://example.org/people/";
export const NOTES = "https://example.org/notes/";

export class Author {
  constructor(
    readonly id: string,
    readonly name: string,
  ) {}
}

export class Address {
  constructor(readonly city: string) {}
}

export class Book {
  constructor(
    readonly id: string,
    readonly title: string,
    readonly author: Author,
    readonly chapters: string[] = [],
    readonly tags: string[] = [],
    readonly pages?: number,
  ) {}
}

/** A resource that keeps whatever its mapper does not know about. */
export class Note {
  constructor(
    readonly id: string,
    readonly text: string,
    readonly extras: RdfGraph = RdfGraph.empty,
  ) {}
}

export class AuthorMapper implements GlobalResourceMapper<Author> {
  readonly kind = "globalResource";
  readonly typeIri = ex("Person");

  toRdfResource(author: Author, context: SerializationContext): [IriTerm, Triple[]] {
    return context
      .resourceBuilder(context.createIriTerm(`${PEOPLE}${author.id}`))
      .addValue(ex("name"), author.name)
      .build();
  }

  fromRdfResource(subject: IriTerm, context: DeserializationContext): Author {
    const reader = context.reader(subject);
    return new Author(subject.value.slice(PEOPLE.length), reader.require(ex("name"), Types.string));
  }
}

export class AddressMapper implements LocalResourceMapper<Address> {
  readonly kind = "localResource";
  readonly typeIri = ex("Address");

  toRdfResource(address: Address, context: SerializationContext): [BlankNodeTerm, Triple[]] {
    return context.resourceBuilder(new BlankNodeTerm()).addValue(ex("city"), address.city).build();
  }

  fromRdfResource(subject: BlankNodeTerm, context: DeserializationContext): Address {
    return new Address(context.reader(subject).require(ex("city"), Types.string));
  }
}

export class BookMapper implements GlobalResourceMapper<Book> {
  readonly kind = "globalResource";
  readonly typeIri = ex("Book");

  toRdfResource(book: Book, context: SerializationContext): [IriTerm, Triple[]] {
    return context
      .resourceBuilder(context.createIriTerm(`${BOOKS}${book.id}`))
      .addValue(ex("title"), book.title)
      .addValue(ex("author"), book.author)
      .addRdfList(ex("chapters"), book.chapters)
      .addUnorderedItems(ex("tag"), book.tags)
      .addValueIfNotNull(ex("pages"), book.pages, Types.integer)
      .build();
  }

  fromRdfResource(subject: IriTerm, context: DeserializationContext): Book {
    const reader = context.reader(subject);
    return new Book(
      subject.value.slice(BOOKS.length),
      reader.require(ex("title"), Types.string),
      reader.require(ex("author"), Author),
      reader.requireRdfList(ex("chapters"), Types.string),
      reader.getValues(ex("tag"), Types.string),
      reader.optional(ex("pages"), Types.integer),
    );
  }
}

export class NoteMapper implements GlobalResourceMapper<Note> {
  readonly kind = "globalResource";
  readonly typeIri = ex("Note");

  toRdfResource(note: Note, context: SerializationContext): [IriTerm, Triple[]] {
    return context
      .resourceBuilder(context.createIriTerm(`${NOTES}${note.id}`))
      .addValue(ex("text"), note.text)
      .addUnmapped(note.extras)
      .build();
  }

  fromRdfResource(subject: IriTerm, context: DeserializationContext): Note {
    const reader = context.reader(subject);
    const text = reader.require(ex("text"), Types.string);
    return new Note(subject.value.slice(NOTES.length), text, reader.getUnmapped(RdfGraph));
  }
}

export function registerLibraryMappers(registry: MapperRegistry): MapperRegistry {
  return registry
    .registerMapper(Author, new AuthorMapper())
    .registerMapper(Address, new AddressMapper())
    .registerMapper(Book, new BookMapper())
    .registerMapper(Note, new NoteMapper());
}
