export type RowTable = Record<string, unknown>[];

export type ColumnarTable = {
  columns: Record<string, ArrayLike<unknown>>;
  length?: number;
};

export type TableSource = RowTable | ColumnarTable;

export type ColumnReader = (row: number) => unknown;

export function isColumnar(source: TableSource): source is ColumnarTable {
  return !Array.isArray(source);
}

export function rowCount(source: TableSource): number {
  if (!isColumnar(source)) return source.length;
  if (source.length !== undefined) return source.length;
  const first = Object.values(source.columns)[0];
  return first ? first.length : 0;
}

/** Reads one column by row index. Absent columns read as null. */
export function columnReader(source: TableSource, name: string): ColumnReader {
  if (isColumnar(source)) {
    const column = Object.prototype.hasOwnProperty.call(source.columns, name) ? source.columns[name] : undefined;
    if (!column) return () => null;
    return (row) => column[row];
  }
  const rows = source;
  return (row) => rows[row][name];
}
