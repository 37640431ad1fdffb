import type { CatalogInput } from '../types';
import { parseCatalogInput } from '../utils/validation';

import peopleData from '../../data/people.json';
import booksData from '../../data/books.json';

/**
 * The bundled family and book datasets, validated.
 */
export function loadFixtures(): CatalogInput {
  return parseCatalogInput({ people: peopleData.people, books: booksData.books });
}
