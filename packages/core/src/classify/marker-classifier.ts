import type { MarkerClass, MarkerMasks, MarkerSequence, ResolvedMarkerConfig } from '../types';

/**
 * Equality where two missing values match each other but never a present one.
 * Dates compare by timestamp and NaN matches NaN. Any other object only
 * matches itself, so an array or record cell never equals a marker.
 */
export function nullSafeEquals(a: unknown, b: unknown): boolean {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) return aMissing && bMissing;
  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }
  if (typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b)) {
    return true;
  }
  return a === b;
}

export function classifyResolved(value: unknown, config: ResolvedMarkerConfig): MarkerClass {
  if (nullSafeEquals(value, config.markerStart)) return 'start';
  if (!config.identical && nullSafeEquals(value, config.markerEnd)) return 'end';
  return 'other';
}

export function classifyColumnResolved(values: MarkerSequence, config: ResolvedMarkerConfig): MarkerMasks {
  const length = values.length;
  const isStart = new Uint8Array(length);
  const isEnd = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    const kind = classifyResolved(values[i], config);
    if (kind === 'start') {
      isStart[i] = 1;
    } else if (kind === 'end') {
      isEnd[i] = 1;
    }
  }
  return { isStart, isEnd };
}
