import { classifyColumnResolved } from '../classify/marker-classifier';
import { renumber } from '../renumber/renumberer';
import type { BoundaryPolicy, MarkerMasks, MarkerSequence, RawAssignment, ResolvedMarkerConfig } from '../types';
import { buildFirstFirstRawIds, buildFirstLastRawIds, buildLastLastRawIds } from './policies';
import { buildStrictRawIds, buildToggleRawIds } from './prefix-sum';

export type RawIdBuilder = (masks: MarkerMasks) => RawAssignment;

const RAW_ID_BUILDERS: Record<BoundaryPolicy, RawIdBuilder> = {
  strict: buildStrictRawIds,
  first_first: buildFirstFirstRawIds,
  last_last: buildLastLastRawIds,
  first_last: buildFirstLastRawIds
};

export function buildRawAssignment(masks: MarkerMasks, config: ResolvedMarkerConfig): RawAssignment {
  if (config.identical) {
    return buildToggleRawIds(masks);
  }
  return RAW_ID_BUILDERS[config.policy](masks);
}

export function assignVectorized(values: MarkerSequence, config: ResolvedMarkerConfig): Uint32Array {
  const masks = classifyColumnResolved(values, config);
  const { rawIds, valid } = buildRawAssignment(masks, config);
  return renumber(rawIds, valid);
}
