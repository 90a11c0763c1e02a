/**
 * @fileoverview Table front end for `@markerspan/core`. Validates ordering
 *   options, sorts rows, splits them into groups, runs the core once per group
 *   through `assignSegments`, and hands the ids back in input row order.
 */
import {
  ConfigurationError,
  assignSegments,
  createLogger,
  resolveMarkerConfig,
  resolveMode,
  type AssignOptions,
  type MarkerConfig
} from '@markerspan/core';

import { buildGroupLayout, encodeGroups } from './group-index';
import { sortRows, type OrderKey } from './order';
import { columnReader, rowCount, type ColumnarTable, type RowTable, type TableSource } from './source';

export type { ColumnarTable, RowTable, TableSource } from './source';
export { compareValues, sortRows } from './order';
export { buildGroupLayout, encodeGroups, type GroupCodes, type GroupLayout } from './group-index';

export const DEFAULT_TARGET_COLUMN = 'iids';

export type IntervalTableOptions = MarkerConfig &
  AssignOptions & {
    markerColumn: string;
    orderBy?: string | string[];
    ascending?: boolean | boolean[];
    groupBy?: string | string[];
    targetColumn?: string;
  };

export type ResolvedTableOptions = {
  markerColumn: string;
  orderBy: string[];
  ascending: boolean[];
  groupBy: string[];
  targetColumn: string;
};

function ensureList<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? [...value] : [value];
}

function requireColumnName(name: unknown, option: string): string {
  if (typeof name !== 'string' || name.length === 0) {
    throw new ConfigurationError(`\`${option}\` must name a column.`);
  }
  return name;
}

/**
 * @throws ConfigurationError when column names are empty, or `ascending`
 *   does not supply exactly one boolean per `orderBy` column
 */
export function resolveTableOptions(options: IntervalTableOptions): ResolvedTableOptions {
  const markerColumn = requireColumnName(options.markerColumn, 'markerColumn');
  const orderBy = ensureList(options.orderBy).map((name) => requireColumnName(name, 'orderBy'));
  const groupBy = ensureList(options.groupBy).map((name) => requireColumnName(name, 'groupBy'));
  const targetColumn = requireColumnName(options.targetColumn ?? DEFAULT_TARGET_COLUMN, 'targetColumn');

  let ascending = ensureList(options.ascending);
  if (ascending.length === 0) {
    ascending = orderBy.map(() => true);
  } else if (ascending.length !== orderBy.length) {
    throw new ConfigurationError(
      `\`orderBy\` and \`ascending\` must have an equal number of items (${orderBy.length} vs ${ascending.length}).`
    );
  }
  if (!ascending.every((flag) => typeof flag === 'boolean')) {
    throw new ConfigurationError('Only `true` and `false` are accepted for `ascending`.');
  }

  return { markerColumn, orderBy, ascending, groupBy, targetColumn };
}

/**
 * Interval ids for every row of `table`, aligned with the input row order.
 *
 * @example
 * ```typescript
 * identifyIntervals(
 *   [
 *     { sensor: 'a', ts: 2, event: 'end' },
 *     { sensor: 'a', ts: 1, event: 'start' },
 *     { sensor: 'b', ts: 1, event: 'start' }
 *   ],
 *   { markerColumn: 'event', markerStart: 'start', markerEnd: 'end', orderBy: 'ts', groupBy: 'sensor' }
 * );
 * // Uint32Array [1, 1, 0]
 * ```
 */
export function identifyIntervals(table: TableSource, options: IntervalTableOptions): Uint32Array {
  const resolved = resolveTableOptions(options);
  const markerConfig: MarkerConfig = {
    markerStart: options.markerStart,
    markerEnd: options.markerEnd,
    policy: options.policy
  };
  // fail on configuration before touching any data
  resolveMarkerConfig(markerConfig);
  const mode = resolveMode(options.mode);

  const count = rowCount(table);
  const keys: OrderKey[] = resolved.orderBy.map((name, index) => ({
    read: columnReader(table, name),
    ascending: resolved.ascending[index]
  }));
  const scanOrder = sortRows(count, keys);
  const groups = encodeGroups(
    count,
    resolved.groupBy.map((name) => columnReader(table, name))
  );
  const { rowIdsByGroup, groupOffsets } = buildGroupLayout(scanOrder, groups);
  createLogger('table').log(
    `identifyIntervals rows=${count} groups=${groups.groupCount} orderBy=${resolved.orderBy.join(',')}`
  );

  const readMarker = columnReader(table, resolved.markerColumn);
  const markers = Array.from(rowIdsByGroup, (row) => readMarker(row));
  const scanIds = assignSegments(markers, groupOffsets, markerConfig, { mode });

  const ids = new Uint32Array(count);
  for (let k = 0; k < count; k++) {
    ids[rowIdsByGroup[k]] = scanIds[k];
  }
  return ids;
}

/** Copies each row with its interval id stored under `targetColumn`. */
export function attachIntervalIds(rows: RowTable, options: IntervalTableOptions): RowTable {
  const target = resolveTableOptions(options).targetColumn;
  const ids = identifyIntervals(rows, options);
  return rows.map((row, index) => ({ ...row, [target]: ids[index] }));
}

/** Returns a columnar table with the interval ids added as `targetColumn`. */
export function appendIntervalColumn(table: ColumnarTable, options: IntervalTableOptions): ColumnarTable {
  const target = resolveTableOptions(options).targetColumn;
  const ids = identifyIntervals(table, options);
  return { columns: { ...table.columns, [target]: ids }, length: ids.length };
}
