import {
  CountMap,
  countsFor,
  increment,
  incrementAll,
  positiveDelta,
  rankCounts,
  toRecord,
} from './counter.util';

describe('counter util', () => {
  it('ranks by count and keeps first-seen order for ties', () => {
    const counts: CountMap = new Map();
    incrementAll(counts, ['lima', 'cusco', 'lima', 'quito', 'cusco', 'cusco']);
    increment(counts, 'arequipa', 2);

    expect(rankCounts(counts, 10)).toEqual([
      ['cusco', 3],
      ['lima', 2],
      ['arequipa', 2],
      ['quito', 1],
    ]);
    expect(rankCounts(counts, 2)).toEqual([
      ['cusco', 3],
      ['lima', 2],
    ]);
  });

  it('keeps only keys whose count went up', () => {
    const current: CountMap = new Map([
      ['rome', 5],
      ['paris', 2],
      ['lima', 1],
    ]);
    const previous: CountMap = new Map([
      ['rome', 2],
      ['paris', 5],
      ['oslo', 4],
    ]);

    expect([...positiveDelta(current, previous)]).toEqual([
      ['rome', 3],
      ['lima', 1],
    ]);
    expect([...positiveDelta(current, undefined)]).toEqual([
      ['rome', 5],
      ['paris', 2],
      ['lima', 1],
    ]);
  });

  it('creates grouped counters on first use', () => {
    const grouped = new Map<string, CountMap>();
    increment(countsFor(grouped, 'a'), 'rome');
    increment(countsFor(grouped, 'a'), 'rome');

    expect(toRecord(countsFor(grouped, 'a'))).toEqual({ rome: 2 });
    expect(grouped.size).toBe(1);
  });
});
