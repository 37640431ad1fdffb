/**
 * Drops every later occurrence of `head` from `rest` and puts `head` in front.
 *
 * `head` stays fixed for the whole pass, so only repeats of that one value are removed.
 */
export function removeRepeatsOf(head: string, rest: readonly string[]): string[] {
  const out: string[] = [head];
  for (const x of rest) {
    if (x !== head) out.push(x);
  }
  return out;
}

/**
 * Collapses repeats of the input's first element, keeping first-seen order.
 *
 * Repeats of any other element are kept: `['a', 'b', 'b']` comes back unchanged.
 * Use {@link distinct} for a general unique filter.
 *
 * @example
 * ```typescript
 * removeDuplicates(['Ullman, Jeffrey', 'Ullman, Jeffrey']); // ['Ullman, Jeffrey']
 * removeDuplicates(['a', 'b', 'a']); // ['a', 'b']
 * ```
 */
export function removeDuplicates(input: readonly string[]): string[] {
  const [head, ...tail] = input;
  if (head === undefined) return [];
  return removeRepeatsOf(head, tail);
}

/** General unique filter: the first occurrence of each value wins. */
export function distinct(input: readonly string[]): string[] {
  const seen = new Set<string>();
  return input.filter((s) => {
    if (seen.has(s)) return false;
    seen.add(s);
    return true;
  });
}
