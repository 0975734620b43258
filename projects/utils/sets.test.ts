import { EMPTY_SET_LABEL, HashMap, NumberSet } from './sets.js';

describe('NumberSet', () => {
  test('hash', () => {
    expect(new NumberSet([6, 2, 7, 3]).hash()).toBe('{2,3,6,7}');
    expect(new NumberSet([10, 9]).hash()).toBe('{9,10}');
    expect(new NumberSet([4]).hash()).toBe('{4}');
  });

  const labels: [number[], string][] = [
    [[6, 2, 7, 3], '{2,3,6,7}'],
    [[4], '4'],
    [[], EMPTY_SET_LABEL],
  ];
  test.each(labels)('label of %p is %p', (items, expected) => {
    expect(new NumberSet(items).label()).toBe(expected);
  });
});

describe('HashMap', () => {
  test('keys compare by hash', () => {
    const map = new HashMap<NumberSet, string>((s) => s.hash());
    map.set(new NumberSet([1, 2, 3]), 'first');
    expect(map.has(new NumberSet([3, 2, 1]))).toBe(true);
    expect(map.get(new NumberSet([3, 1, 2]))).toBe('first');
    expect(map.get(new NumberSet([1, 2]))).toBeUndefined();
    map.set(new NumberSet([2, 1, 3]), 'second');
    expect(map.size).toBe(1);
    expect(map.get(new NumberSet([1, 2, 3]))).toBe('second');
  });

  test('initial entries', () => {
    const map = new HashMap<NumberSet, number>((s) => s.hash(), [
      [new NumberSet([1]), 1],
      [new NumberSet([2, 1]), 2],
    ]);
    expect(map.size).toBe(2);
    expect(map.get(new NumberSet([1, 2]))).toBe(2);
  });
});
