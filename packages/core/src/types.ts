/**
 * @fileoverview Shared type definitions for markerspan: the marker value
 *   domain, the caller-facing configuration, resolved configuration consumed by
 *   the assigners, and the intermediate raw-id layout that every vectorized
 *   policy produces before renumbering. The table package and the tests import
 *   these through `index.ts`.
 */

export type MarkerValue = string | number | bigint | boolean | Date | null;

/**
 * Cells of one group, already in scan order. Cells of any type are accepted;
 * only a cell equal to a configured marker counts as one.
 */
export type MarkerSequence = ArrayLike<unknown>;

export type BoundaryPolicy = 'strict' | 'first_first' | 'last_last' | 'first_last';

export type MarkerClass = 'start' | 'end' | 'other';

export type AssignMode = 'vectorized' | 'sequential';

export type MarkerConfig = {
  markerStart: MarkerValue;
  /** Omit to enter identical-marker mode. */
  markerEnd?: MarkerValue;
  policy?: BoundaryPolicy;
};

export type AssignOptions = {
  mode?: AssignMode;
};

export type ResolvedMarkerConfig = {
  markerStart: MarkerValue;
  markerEnd: MarkerValue;
  identical: boolean;
  policy: BoundaryPolicy;
};

export type MarkerMasks = {
  isStart: Uint8Array;
  isEnd: Uint8Array;
};

/**
 * Output of a policy's raw-id stage: possibly sparse, possibly
 * non-monotonic ids plus a per-position validity flag.
 */
export type RawAssignment = {
  rawIds: Uint32Array;
  valid: Uint8Array;
};

/** Which marker of a run decides where an interval opens and where it closes. */
export type TieBreak = 'first' | 'last';

export type PolicyRules = {
  start: TieBreak;
  end: TieBreak;
};
