/**
 * @fileoverview Scan order for the table front end. Rows are sorted by one or
 *   more order columns, each ascending or descending. Missing values (null,
 *   undefined, NaN) sort last in either direction and ties keep their input
 *   order, since `Array.prototype.sort` is stable.
 */
import type { ColumnReader } from './source';

export type OrderKey = {
  read: ColumnReader;
  ascending: boolean;
};

function isMissing(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Natural ordering for present values. Numbers, bigints and booleans compare
 * with each other numerically, without rounding bigints; other mixed types
 * fall back to their type names.
 */
export function compareValues(a: unknown, b: unknown): number {
  if (a instanceof Date && b instanceof Date) {
    return compareNumbers(a.getTime(), b.getTime());
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return compareStrings(a, b);
  }
  if (isNumeric(a) && isNumeric(b)) {
    return compareNumeric(a, b);
  }
  return compareStrings(typeName(a), typeName(b));
}

function isNumeric(value: unknown): value is number | bigint | boolean {
  return typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean';
}

function compareNumeric(a: number | bigint | boolean, b: number | bigint | boolean): number {
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'bigint') {
    const result = compareNumberToBigint(Number(b), a);
    return result === 0 ? 0 : -result;
  }
  if (typeof b === 'bigint') {
    return compareNumberToBigint(Number(a), b);
  }
  return compareNumbers(Number(a), Number(b));
}

function compareNumberToBigint(a: number, b: bigint): number {
  if (Number.isNaN(a)) return 0;
  if (a === Number.POSITIVE_INFINITY) return 1;
  if (a === Number.NEGATIVE_INFINITY) return -1;
  const whole = Math.floor(a);
  const wholeBig = BigInt(whole);
  if (wholeBig !== b) return wholeBig < b ? -1 : 1;
  return a > whole ? 1 : 0;
}

function typeName(value: unknown): string {
  return value instanceof Date ? 'date' : typeof value;
}

/** Returns row indices in scan order. With no keys the input order is kept. */
export function sortRows(count: number, keys: OrderKey[]): Uint32Array {
  const indices = Array.from({ length: count }, (_, row) => row);
  if (keys.length > 0) {
    indices.sort((left, right) => compareRows(left, right, keys));
  }
  return Uint32Array.from(indices);
}

function compareRows(left: number, right: number, keys: OrderKey[]): number {
  for (const key of keys) {
    const a = key.read(left);
    const b = key.read(right);
    const aMissing = isMissing(a);
    const bMissing = isMissing(b);
    if (aMissing && bMissing) continue;
    if (aMissing) return 1;
    if (bMissing) return -1;
    const result = compareValues(a, b);
    if (result !== 0) return key.ascending ? result : -result;
  }
  return 0;
}
