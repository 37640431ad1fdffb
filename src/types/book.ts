import type { Doc } from './doc';

/**
 * Book document in the catalog. Two books are the same book when their docIds match.
 */
export type BookDoc = Doc<
  'book',
  {
    title: string;
    authors: string[];
  }
>;
