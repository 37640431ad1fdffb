import type { MotherAndChildName, PersonDoc } from '../types';
import { CatalogError } from './catalog-error';

/**
 * Names of every mother paired with each of her children.
 *
 * Walks people in input order, skips males, then yields one pair per child in the
 * order the children are listed.
 *
 * @throws CatalogError if a child id does not name a person in `people`
 */
export function motherChildPairs(people: PersonDoc[]): MotherAndChildName[] {
  const byId = new Map(people.map((p) => [p.docId, p] as const));

  return people
    .filter((p) => !p.data.isMale)
    .flatMap((mother) =>
      (mother.data.childIds ?? []).map((childId): MotherAndChildName => {
        const child = byId.get(childId);
        if (!child) throw new CatalogError(`Child ${childId} of ${mother.data.name} not found`);
        return [mother.data.name, child.data.name];
      }),
    );
}
