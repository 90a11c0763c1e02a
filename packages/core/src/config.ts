import { nullSafeEquals } from './classify/marker-classifier';
import { ConfigurationError } from './errors';
import type {
  AssignMode,
  BoundaryPolicy,
  MarkerConfig,
  PolicyRules,
  ResolvedMarkerConfig
} from './types';

export const DEFAULT_POLICY: BoundaryPolicy = 'strict';
export const DEFAULT_MODE: AssignMode = 'vectorized';

/**
 * Tie-break rules behind each policy. `strict` keeps the last of a run of
 * starts and the first of a run of ends.
 */
export const POLICY_RULES: Record<BoundaryPolicy, PolicyRules> = {
  strict: { start: 'last', end: 'first' },
  first_first: { start: 'first', end: 'first' },
  last_last: { start: 'last', end: 'last' },
  first_last: { start: 'first', end: 'last' }
};

const MODES: readonly AssignMode[] = ['vectorized', 'sequential'];

export function isBoundaryPolicy(value: unknown): value is BoundaryPolicy {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(POLICY_RULES, value);
}

export function isAssignMode(value: unknown): value is AssignMode {
  return typeof value === 'string' && MODES.some((mode) => mode === value);
}

/**
 * Applies defaults and validates marker configuration. Omitting `markerEnd`,
 * or passing a value equal to `markerStart`, selects identical-marker mode.
 *
 * @throws ConfigurationError when `markerStart` is missing or `policy` is unknown
 */
export function resolveMarkerConfig(config: MarkerConfig): ResolvedMarkerConfig {
  if (config.markerStart === undefined) {
    throw new ConfigurationError('`markerStart` is required.');
  }

  const policy = config.policy ?? DEFAULT_POLICY;
  if (!isBoundaryPolicy(policy)) {
    throw new ConfigurationError(
      `Unknown boundary policy "${String(policy)}"; expected one of ${Object.keys(POLICY_RULES).join(', ')}.`
    );
  }

  const markerEnd = config.markerEnd === undefined ? config.markerStart : config.markerEnd;
  return {
    markerStart: config.markerStart,
    markerEnd,
    identical: nullSafeEquals(config.markerStart, markerEnd),
    policy
  };
}

export function resolveMode(mode: AssignMode | undefined): AssignMode {
  const resolved = mode ?? DEFAULT_MODE;
  if (!isAssignMode(resolved)) {
    throw new ConfigurationError(`Unknown assign mode "${String(resolved)}"; expected vectorized or sequential.`);
  }
  return resolved;
}
