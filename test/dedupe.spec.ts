import { distinct, removeDuplicates, removeRepeatsOf } from '../src/catalog/dedupe';

describe('removeDuplicates', () => {
  test('empty input gives empty output', () => {
    expect(removeDuplicates([])).toEqual([]);
  });

  test('single element comes back unchanged', () => {
    expect(removeDuplicates(['a'])).toEqual(['a']);
  });

  test('two equal authors collapse to one', () => {
    expect(removeDuplicates(['Ullman, Jeffrey', 'Ullman, Jeffrey'])).toEqual(['Ullman, Jeffrey']);
  });

  test('repeats of the first element are removed wherever they occur', () => {
    expect(removeDuplicates(['a', 'b', 'a'])).toEqual(['a', 'b']);
    expect(removeDuplicates(['x', 'x', 'y', 'x', 'z'])).toEqual(['x', 'y', 'z']);
  });

  test('repeats of a later element are kept', () => {
    expect(removeDuplicates(['a', 'b', 'b'])).toEqual(['a', 'b', 'b']);
  });

  test('does not mutate its input', () => {
    const input = ['a', 'b', 'a'];
    const out = removeDuplicates(input);
    expect(input).toEqual(['a', 'b', 'a']);
    expect(out).not.toBe(input);
  });

  test('handles long inputs without growing the stack', () => {
    const input = Array.from({ length: 200_000 }, (_, i) => (i % 2 === 0 ? 'a' : `b${i}`));
    const out = removeDuplicates(input);
    expect(out).toHaveLength(100_001);
    expect(out[0]).toBe('a');
    expect(out[1]).toBe('b1');
  });
});

describe('removeRepeatsOf', () => {
  test('compares every element against the fixed head', () => {
    expect(removeRepeatsOf('a', ['b', 'a', 'c', 'b'])).toEqual(['a', 'b', 'c', 'b']);
  });

  test('empty rest yields just the head', () => {
    expect(removeRepeatsOf('a', [])).toEqual(['a']);
  });
});

describe('distinct', () => {
  test('removes every repeat and keeps first-seen order', () => {
    expect(distinct(['a', 'b', 'b', 'c', 'a'])).toEqual(['a', 'b', 'c']);
  });

  test('empty input gives empty output', () => {
    expect(distinct([])).toEqual([]);
  });

  test('collapses repeats of later elements and leaves the input alone', () => {
    const input = ['a', 'b', 'b'];
    expect(distinct(input)).toEqual(['a', 'b']);
    expect(input).toEqual(['a', 'b', 'b']);
  });
});
