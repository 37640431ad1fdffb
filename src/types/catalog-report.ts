import type { MotherAndChildName } from './person';

/**
 * Output of a full catalog run: one answer per query plus a line of explanation for each.
 */
export type CatalogReport = {
  motherChildPairs: MotherAndChildName[];
  titlesByAuthor: string[];
  titlesMatching: string[];
  repeatAuthors: string[];
  uniqueRepeatAuthors: string[];
  explanation: string[];
};
