import type { BookDoc } from '../types';

/**
 * Titles of books with an author whose name starts with `prefix`.
 * A title is repeated once per matching author.
 */
export function titlesByAuthorPrefix(books: BookDoc[], prefix: string): string[] {
  return books.flatMap((b) => b.data.authors.filter((a) => a.startsWith(prefix)).map(() => b.data.title));
}

/** Titles that contain `fragment` (case-sensitive), in catalog order. */
export function titlesContaining(books: BookDoc[], fragment: string): string[] {
  return books.filter((b) => b.data.title.includes(fragment)).map((b) => b.data.title);
}

/**
 * Authors found on two different books.
 *
 * Every ordered pair of distinct books (by docId) is compared author by author, and each
 * shared author is yielded once per pair. An author on exactly two books therefore shows
 * up twice; pass the result through `removeDuplicates` to collapse it.
 */
export function authorsWithMultipleBooks(books: BookDoc[]): string[] {
  return books.flatMap((b1) =>
    books
      .filter((b2) => b2.docId !== b1.docId)
      .flatMap((b2) => b1.data.authors.flatMap((a1) => b2.data.authors.filter((a2) => a1 === a2))),
  );
}
