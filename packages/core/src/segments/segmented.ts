/**
 * @fileoverview Runs interval assignment over a column holding several
 *   groups back to back. Groups are described CSR-style by an offsets array:
 *
 * ```
 * values:  [s, a, e, s, e, x]
 * offsets: [0,       3,    6]
 *           group 0  group 1  end
 * ```
 *
 * Each segment is computed on its own, so ids restart at 1 per group and no
 * counter carries over from one group to the next.
 */
import { ConfigurationError } from '../errors';
import type { MarkerSequence, ResolvedMarkerConfig } from '../types';

export type GroupAssigner = (values: MarkerSequence, config: ResolvedMarkerConfig) => Uint32Array;

export function validateOffsets(offsets: ArrayLike<number>, length: number) {
  if (offsets.length === 0 || offsets[0] !== 0) {
    throw new ConfigurationError('Segment offsets must start at 0.');
  }
  for (let g = 1; g < offsets.length; g++) {
    if (offsets[g] < offsets[g - 1]) {
      throw new ConfigurationError(`Segment offsets must not decrease (index ${g}).`);
    }
  }
  if (offsets[offsets.length - 1] !== length) {
    throw new ConfigurationError(
      `Segment offsets must end at the column length ${length}, got ${offsets[offsets.length - 1]}.`
    );
  }
}

export function assignSegmentsWith(
  assign: GroupAssigner,
  values: MarkerSequence,
  offsets: ArrayLike<number>,
  config: ResolvedMarkerConfig
): Uint32Array {
  validateOffsets(offsets, values.length);
  const out = new Uint32Array(values.length);
  for (let g = 0; g + 1 < offsets.length; g++) {
    const start = offsets[g];
    const end = offsets[g + 1];
    if (start === end) continue;
    out.set(assign(sliceSequence(values, start, end), config), start);
  }
  return out;
}

function sliceSequence(values: MarkerSequence, start: number, end: number): MarkerSequence {
  return Array.from({ length: end - start }, (_, k) => values[start + k]);
}
