/**
 * @fileoverview Strict policy without sequential state.
 *
 * 1. `boundary = isStart + lag(isEnd, 0)`: an end marker belongs to the run
 *    it closes, so the id only moves on at the element after it.
 * 2. `rawIds = prefixSum(boundary)`: every start and every element following
 *    an end opens a new raw id.
 * 3. A raw id is valid iff its run holds exactly two markers: the start that
 *    opened it and the end that closed it. Duplicates leave a run with one
 *    marker, which is therefore invalid.
 *
 * Example, markers `[end, A, start, B, end, C]`:
 *
 * ```
 * isStart      0 0 1 0 0 0
 * lag(isEnd)   0 1 0 0 0 1
 * rawIds       0 1 2 2 2 3
 * markers/run  1 0 2 2 2 0
 * valid        0 0 1 1 1 0
 * ```
 */
import type { MarkerMasks, RawAssignment } from '../types';
import { add, lag, prefixSum, sumById } from '../window/ops';

export function buildStrictRawIds(masks: MarkerMasks): RawAssignment {
  const { isStart, isEnd } = masks;
  const boundary = add(isStart, lag(isEnd, 0));
  const rawIds = prefixSum(boundary);
  const markerCounts = sumById(add(isStart, isEnd), rawIds);

  const valid = new Uint8Array(rawIds.length);
  for (let i = 0; i < valid.length; i++) {
    valid[i] = markerCounts[i] === 2 ? 1 : 0;
  }
  return { rawIds, valid };
}

/**
 * Identical-marker mode: each marker moves the id on by one; elements before
 * the first marker stay invalid.
 */
export function buildToggleRawIds(masks: MarkerMasks): RawAssignment {
  const rawIds = prefixSum(masks.isStart);
  const valid = new Uint8Array(rawIds.length);
  for (let i = 0; i < valid.length; i++) {
    valid[i] = rawIds[i] > 0 ? 1 : 0;
  }
  return { rawIds, valid };
}
