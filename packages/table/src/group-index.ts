/**
 * @fileoverview Lays sorted rows out group by group, CSR style:
 *
 * - **rowIdsByGroup**: original row indices, grouped, each group in scan order
 * - **groupOffsets**: where each group starts, plus the row count at the end
 *
 * For scan order [4, 0, 3, 1, 2] with group codes (by row) [0, 1, 0, 1, 0]:
 *
 * ```
 * group 0: rows [4, 0, 2]
 * group 1: rows [3, 1]
 *
 * rowIdsByGroup: [4, 0, 2, 3, 1]
 * groupOffsets:  [0,       3,    5]
 * ```
 *
 * Built with a two-pass counting layout; placing rows while walking the scan
 * order keeps each group's rows in that order.
 */
import type { ColumnReader } from './source';

export type GroupLayout = {
  rowIdsByGroup: Uint32Array;
  groupOffsets: Uint32Array;
};

export type GroupCodes = {
  codes: Uint32Array;
  groupCount: number;
};

/**
 * Dictionary-encodes the composite group key of every row. Keys match by
 * null-safe equality: missing values form one group, Dates match by
 * timestamp, and `1` never matches `'1'`. Other objects match only
 * themselves.
 */
export function encodeGroups(count: number, readers: ColumnReader[]): GroupCodes {
  const codes = new Uint32Array(count);
  if (readers.length === 0) {
    return { codes, groupCount: count === 0 ? 0 : 1 };
  }

  const dictionary = new Map<string, number>();
  const references = new Map<unknown, number>();
  for (let row = 0; row < count; row++) {
    const key = readers.map((read) => keyPart(read(row), references)).join('\u0000');
    let code = dictionary.get(key);
    if (code === undefined) {
      code = dictionary.size;
      dictionary.set(key, code);
    }
    codes[row] = code;
  }
  return { codes, groupCount: dictionary.size };
}

function keyPart(value: unknown, references: Map<unknown, number>): string {
  if (value === null || value === undefined) return 'null';
  if (value instanceof Date) return `date:${value.getTime()}`;
  if (typeof value === 'object' || typeof value === 'function' || typeof value === 'symbol') {
    let ref = references.get(value);
    if (ref === undefined) {
      ref = references.size;
      references.set(value, ref);
    }
    return `ref:${ref}`;
  }
  return `${typeof value}:${String(value)}`;
}

export function buildGroupLayout(scanOrder: Uint32Array, groups: GroupCodes): GroupLayout {
  const { codes, groupCount } = groups;
  const rowCount = scanOrder.length;

  const counts = new Uint32Array(groupCount);
  for (let i = 0; i < rowCount; i++) {
    counts[codes[i]]++;
  }

  const offsets = new Uint32Array(groupCount + 1);
  for (let group = 0, acc = 0; group < groupCount; group++) {
    offsets[group] = acc;
    acc += counts[group];
  }
  offsets[groupCount] = rowCount;

  const cursor = offsets.slice();
  const rowIds = new Uint32Array(rowCount);
  for (let k = 0; k < rowCount; k++) {
    const row = scanOrder[k];
    rowIds[cursor[codes[row]]++] = row;
  }

  return { rowIdsByGroup: rowIds, groupOffsets: offsets };
}
