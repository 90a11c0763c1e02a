/**
 * @fileoverview Vectorized raw-id builders for the tolerant boundary policies.
 *   All three start from a forward-filled marker state column:
 *
 * ```
 * state = forwardFill(opening → 1, closing → 0, other → missing)
 * ```
 *
 * so `state[i]` says whether the latest marker at or before `i` opened or
 * closed an interval, and `lag(state, 0)` says the same for the element
 * before. Each policy derives its run boundaries from those two columns and
 * then checks every run for a start and an end marker.
 */
import type { MarkerMasks, RawAssignment } from '../types';
import { backwardFill, forwardFill, lag, prefixSum, sumById } from '../window/ops';

const MISSING = -1;

function markerState(opening: Uint8Array, closing: Uint8Array): Int32Array {
  const marks = new Int32Array(opening.length);
  for (let i = 0; i < marks.length; i++) {
    marks[i] = opening[i] ? 1 : closing[i] ? 0 : MISSING;
  }
  return forwardFill(marks, MISSING);
}

/**
 * Runs for first-opening / first-closing matching: a run begins wherever a
 * marker has been seen and the previous element was not inside an open run.
 * Every element after a close therefore starts a throwaway run of its own
 * until the next opening marker.
 */
function firstMatchRuns(opening: Uint8Array, closing: Uint8Array): Uint32Array {
  const state = markerState(opening, closing);
  const previous = lag(state, 0);
  const boundary = new Uint8Array(state.length);
  for (let i = 0; i < boundary.length; i++) {
    boundary[i] = state[i] !== MISSING && previous[i] !== 1 ? 1 : 0;
  }
  return prefixSum(boundary);
}

function requireStartAndEnd(rawIds: Uint32Array, masks: MarkerMasks): Uint8Array {
  const starts = sumById(masks.isStart, rawIds);
  const ends = sumById(masks.isEnd, rawIds);
  const valid = new Uint8Array(rawIds.length);
  for (let i = 0; i < valid.length; i++) {
    valid[i] = starts[i] > 0 && ends[i] > 0 ? 1 : 0;
  }
  return valid;
}

/**
 * The earliest start of a run is matched with the earliest end after it.
 * Later starts before that end are swallowed into the interval.
 */
export function buildFirstFirstRawIds(masks: MarkerMasks): RawAssignment {
  const rawIds = firstMatchRuns(masks.isStart, masks.isEnd);
  return { rawIds, valid: requireStartAndEnd(rawIds, masks) };
}

/**
 * Mirror image of first/first: scanning backwards with the roles swapped,
 * the latest end opens and the nearest start before it closes. Raw ids come
 * back in decreasing order; renumbering restores scan order.
 */
export function buildLastLastRawIds(masks: MarkerMasks): RawAssignment {
  const reversedStart = masks.isStart.slice().reverse();
  const reversedEnd = masks.isEnd.slice().reverse();
  const rawIds = firstMatchRuns(reversedEnd, reversedStart).reverse();
  return { rawIds, valid: requireStartAndEnd(rawIds, masks) };
}

/**
 * Widest match: a run begins at the first start after a close and keeps
 * everything up to the next such start. Within it, only elements with an end
 * marker at or after them are kept, which trims noise after the last end.
 */
export function buildFirstLastRawIds(masks: MarkerMasks): RawAssignment {
  const { isStart, isEnd } = masks;
  const state = markerState(isStart, isEnd);
  const previous = lag(state, 0);
  const boundary = new Uint8Array(state.length);
  for (let i = 0; i < boundary.length; i++) {
    boundary[i] = state[i] === 1 && previous[i] !== 1 ? 1 : 0;
  }
  const rawIds = prefixSum(boundary);

  const endMarks = new Int32Array(isEnd.length);
  for (let i = 0; i < endMarks.length; i++) {
    endMarks[i] = isEnd[i] ? 1 : MISSING;
  }
  const endAhead = backwardFill(endMarks, rawIds, MISSING);
  const starts = sumById(isStart, rawIds);

  const valid = new Uint8Array(rawIds.length);
  for (let i = 0; i < valid.length; i++) {
    valid[i] = starts[i] > 0 && endAhead[i] === 1 ? 1 : 0;
  }
  return { rawIds, valid };
}
