import { describe, expect, it } from 'vitest';

import { compareValues, sortRows } from '../src/order';
import type { ColumnReader } from '../src/source';

const readerOf =
  (values: unknown[]): ColumnReader =>
  (row) =>
    values[row];

describe('compareValues', () => {
  it('orders values of the same kind naturally', () => {
    expect(compareValues(1, 2)).toBe(-1);
    expect(compareValues('b', 'a')).toBe(1);
    expect(compareValues(new Date(5), new Date(1))).toBe(1);
    expect(compareValues(true, false)).toBe(1);
    expect(compareValues(3n, 3n)).toBe(0);
  });

  it('compares numbers with bigints numerically', () => {
    expect(compareValues(1n, 2)).toBe(-1);
    expect(compareValues(2.5, 2n)).toBe(1);
  });

  it('compares large bigints with numbers exactly', () => {
    expect(compareValues(2n ** 53n + 1n, 2 ** 53)).toBe(1);
    expect(compareValues(2 ** 53, 2n ** 53n + 1n)).toBe(-1);
    expect(compareValues(2 ** 53, 2n ** 53n)).toBe(0);
    expect(compareValues(-2.5, -2n)).toBe(-1);
    expect(compareValues(Number.POSITIVE_INFINITY, 10n ** 400n)).toBe(1);
    expect(compareValues(true, 1n)).toBe(0);
  });

  it('falls back to type names for mixed kinds', () => {
    expect(compareValues(1, 'a')).toBe(-1);
    expect(compareValues('a', new Date(0))).toBe(1);
  });
});

describe('sortRows', () => {
  it('keeps input order without keys', () => {
    expect(Array.from(sortRows(3, []))).toEqual([0, 1, 2]);
  });

  it('sorts by several keys with per-key direction and stable ties', () => {
    const group = readerOf(['b', 'a', 'b', 'a', null]);
    const time = readerOf([2, 3, 1, 3, 0]);
    const order = sortRows(5, [
      { read: group, ascending: true },
      { read: time, ascending: false }
    ]);
    expect(Array.from(order)).toEqual([1, 3, 0, 2, 4]);
  });

  it('puts missing values last in descending order too', () => {
    const order = sortRows(5, [{ read: readerOf([3, null, 1, Number.NaN, 2]), ascending: false }]);
    expect(Array.from(order)).toEqual([0, 4, 2, 1, 3]);
  });
});
