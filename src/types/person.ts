import type { Doc } from './doc';

/** A person in the family dataset. Children are referenced by docId. */
export type PersonDoc = Doc<
  'person',
  {
    name: string;
    isMale: boolean;
    childIds?: string[];
  }
>;

/** Pair of a mother's name and one of her children's names. */
export type MotherAndChildName = [mother: string, child: string];
