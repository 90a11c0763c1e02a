/**
 * @fileoverview Order-aware columnar primitives the vectorized policies are
 *   composed from. Each operation reads its inputs without mutating them and
 *   returns a fresh typed array of the same length, so a columnar engine can
 *   translate every step into one native windowed expression:
 *
 * | operation      | windowed equivalent                                   |
 * |----------------|-------------------------------------------------------|
 * | `lag`          | `lag(col, 1, fill) over (order by …)`                 |
 * | `prefixSum`    | `sum(col) over (order by … rows unbounded preceding)` |
 * | `forwardFill`  | `last(col, ignore nulls) over (… unbounded preceding)`|
 * | `backwardFill` | `first(col, ignore nulls) over (partition by id …)`   |
 * | `sumById`      | `sum(col) over (partition by id)`                     |
 *
 * Missing values are modelled with a sentinel number instead of null so the
 * columns stay in typed arrays.
 */

export function add(a: ArrayLike<number>, b: ArrayLike<number>): Int32Array {
  const out = new Int32Array(a.length);
  for (let i = 0; i < a.length; i++) {
    out[i] = a[i] + b[i];
  }
  return out;
}

/**
 * Shifts a column one position later in scan order; position 0 takes `fill`.
 *
 * Example: lag([1, 0, 1], 9) → [9, 1, 0]
 */
export function lag(values: ArrayLike<number>, fill: number): Int32Array {
  const out = new Int32Array(values.length);
  if (values.length === 0) return out;
  out[0] = fill;
  for (let i = 1; i < values.length; i++) {
    out[i] = values[i - 1];
  }
  return out;
}

/**
 * Running (inclusive) sum along scan order.
 *
 * Example: prefixSum([1, 0, 2, 0]) → [1, 1, 3, 3]
 */
export function prefixSum(values: ArrayLike<number>): Uint32Array {
  const out = new Uint32Array(values.length);
  for (let i = 0, acc = 0; i < values.length; i++) {
    acc += values[i];
    out[i] = acc;
  }
  return out;
}

/**
 * Replaces each `missing` entry with the closest present value before it.
 * Entries before the first present value stay `missing`.
 */
export function forwardFill(values: ArrayLike<number>, missing: number): Int32Array {
  const out = new Int32Array(values.length);
  let last = missing;
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (value !== missing) last = value;
    out[i] = last;
  }
  return out;
}

/**
 * Replaces each `missing` entry with the closest present value at or after it
 * inside the same run of equal ids. Runs are contiguous stretches of `ids`.
 */
export function backwardFill(values: ArrayLike<number>, ids: ArrayLike<number>, missing: number): Int32Array {
  const length = values.length;
  const out = new Int32Array(length);
  let next = missing;
  for (let i = length - 1; i >= 0; i--) {
    if (i === length - 1 || ids[i] !== ids[i + 1]) {
      next = missing;
    }
    const value = values[i];
    if (value !== missing) next = value;
    out[i] = next;
  }
  return out;
}

/**
 * Broadcasts the per-id total of `values` back to every position carrying
 * that id. Ids are bucketed like histogram bins, so they need not be
 * contiguous.
 *
 * Example: sumById([1, 0, 1, 1], [1, 1, 2, 1]) → [2, 2, 1, 2]
 */
export function sumById(values: ArrayLike<number>, ids: Uint32Array): Uint32Array {
  let maxId = 0;
  for (let i = 0; i < ids.length; i++) {
    if (ids[i] > maxId) maxId = ids[i];
  }

  const totals = new Uint32Array(ids.length === 0 ? 0 : maxId + 1);
  for (let i = 0; i < ids.length; i++) {
    totals[ids[i]] += values[i];
  }

  const out = new Uint32Array(ids.length);
  for (let i = 0; i < ids.length; i++) {
    out[i] = totals[ids[i]];
  }
  return out;
}
