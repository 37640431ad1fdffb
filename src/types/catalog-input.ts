import type { PersonDoc } from './person';
import type { BookDoc } from './book';

/**
 * Input payload for the catalog queries.
 */
export type CatalogInput = {
  people: PersonDoc[];
  books: BookDoc[];
};

/** Overrides for the parameterised queries. Missing values fall back to config. */
export type CatalogQueryOptions = {
  authorPrefix?: string;
  titleFragment?: string;
};
