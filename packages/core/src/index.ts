import { assignVectorized } from './assign/vectorized';
import { classifyColumnResolved, classifyResolved } from './classify/marker-classifier';
import { resolveMarkerConfig, resolveMode } from './config';
import { scanSequential } from './scan/sequential-scanner';
import { assignSegmentsWith, type GroupAssigner } from './segments/segmented';
import type {
  AssignMode,
  AssignOptions,
  MarkerClass,
  MarkerConfig,
  MarkerMasks,
  MarkerSequence
} from './types';
import { createLogger } from './utils/logger';

export type {
  AssignMode,
  AssignOptions,
  BoundaryPolicy,
  MarkerClass,
  MarkerConfig,
  MarkerMasks,
  MarkerSequence,
  MarkerValue,
  PolicyRules,
  RawAssignment,
  ResolvedMarkerConfig,
  TieBreak
} from './types';
export type { GroupAssigner } from './segments/segmented';
export type { RawIdBuilder } from './assign/vectorized';

export { ConfigurationError } from './errors';
export {
  DEFAULT_MODE,
  DEFAULT_POLICY,
  POLICY_RULES,
  isAssignMode,
  isBoundaryPolicy,
  resolveMarkerConfig,
  resolveMode
} from './config';
export { nullSafeEquals } from './classify/marker-classifier';
export { scanSequential } from './scan/sequential-scanner';
export { assignVectorized, buildRawAssignment } from './assign/vectorized';
export { buildStrictRawIds, buildToggleRawIds } from './assign/prefix-sum';
export { buildFirstFirstRawIds, buildFirstLastRawIds, buildLastLastRawIds } from './assign/policies';
export { positiveMask, renumber } from './renumber/renumberer';
export { validateOffsets } from './segments/segmented';
export { add, backwardFill, forwardFill, lag, prefixSum, sumById } from './window/ops';
export { Logger, createLogger } from './utils/logger';

function assignerFor(mode: AssignMode): GroupAssigner {
  return mode === 'sequential' ? scanSequential : assignVectorized;
}

/**
 * Assigns interval ids to one group's markers, already in scan order.
 *
 * @returns ids aligned with `sequence`: 0 outside valid intervals, 1..K inside
 * @throws ConfigurationError on missing `markerStart`, unknown policy or mode
 *
 * @example
 * ```typescript
 * assignIds(['end', 'a', 'start', 'b', 'end', 'c'], { markerStart: 'start', markerEnd: 'end' });
 * // Uint32Array [0, 0, 1, 1, 1, 0]
 * ```
 */
export function assignIds(sequence: MarkerSequence, config: MarkerConfig, options: AssignOptions = {}): Uint32Array {
  const resolved = resolveMarkerConfig(config);
  const mode = resolveMode(options.mode);
  createLogger('assign').log(
    `assignIds policy=${resolved.policy} identical=${resolved.identical} mode=${mode} length=${sequence.length}`
  );
  return assignerFor(mode)(sequence, resolved);
}

/**
 * Runs {@link assignIds} over groups stored back to back; `offsets` holds
 * each group's first index plus the total length as the last entry.
 */
export function assignSegments(
  values: MarkerSequence,
  offsets: ArrayLike<number>,
  config: MarkerConfig,
  options: AssignOptions = {}
): Uint32Array {
  const resolved = resolveMarkerConfig(config);
  const mode = resolveMode(options.mode);
  createLogger('assign').log(
    `assignSegments groups=${Math.max(0, offsets.length - 1)} mode=${mode} length=${values.length}`
  );
  return assignSegmentsWith(assignerFor(mode), values, offsets, resolved);
}

export function classify(value: unknown, config: MarkerConfig): MarkerClass {
  return classifyResolved(value, resolveMarkerConfig(config));
}

export function classifyColumn(values: MarkerSequence, config: MarkerConfig): MarkerMasks {
  return classifyColumnResolved(values, resolveMarkerConfig(config));
}
