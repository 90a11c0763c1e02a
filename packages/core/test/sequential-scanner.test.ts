import { describe, expect, it } from 'vitest';

import { resolveMarkerConfig } from '../src/config';
import { scanSequential } from '../src/scan/sequential-scanner';
import type { BoundaryPolicy, MarkerValue } from '../src/types';

const scan = (values: MarkerValue[], policy: BoundaryPolicy = 'strict') =>
  Array.from(scanSequential(values, resolveMarkerConfig({ markerStart: 's', markerEnd: 'e', policy })));

describe('scanSequential (strict)', () => {
  it('labels a single interval and zeroes stray markers around it', () => {
    expect(scan(['e', 'a', 's', 'b', 'e', 'c'])).toEqual([0, 0, 1, 1, 1, 0]);
  });

  it('keeps only the last of consecutive starts', () => {
    expect(scan(['s', 's', 'a', 'e'])).toEqual([0, 1, 1, 1]);
    expect(scan(['s', 'a', 's', 'b', 'e'])).toEqual([0, 0, 1, 1, 1]);
  });

  it('keeps only the first of consecutive ends', () => {
    expect(scan(['s', 'e', 'e', 'a'])).toEqual([1, 1, 0, 0]);
  });

  it('drops an interval left open at the end of the sequence', () => {
    expect(scan(['a', 's', 'b', 'c'])).toEqual([0, 0, 0, 0]);
  });

  it('numbers back-to-back intervals densely', () => {
    expect(scan(['s', 'e', 's', 'e', 'x', 's', 'a', 'e'])).toEqual([1, 1, 2, 2, 0, 3, 3, 3]);
  });

  it('handles empty and single-element sequences', () => {
    expect(scan([])).toEqual([]);
    expect(scan(['s'])).toEqual([0]);
    expect(scan(['e'])).toEqual([0]);
  });
});

describe('scanSequential (identical markers)', () => {
  it('toggles on every occurrence of the marker', () => {
    const config = resolveMarkerConfig({ markerStart: 'sun' });
    expect(Array.from(scanSequential(['sun', 'day', 'sun', 'day'], config))).toEqual([1, 1, 2, 2]);
    expect(Array.from(scanSequential(['night', 'sun', 'sun', 'day'], config))).toEqual([0, 1, 2, 2]);
  });

  it('ignores the policy', () => {
    const config = resolveMarkerConfig({ markerStart: 'sun', markerEnd: 'sun', policy: 'first_last' });
    expect(Array.from(scanSequential(['sun', 'day', 'sun', 'day'], config))).toEqual([1, 1, 2, 2]);
  });
});

describe('scanSequential (tolerant policies)', () => {
  it('first_first swallows later starts into the first one', () => {
    expect(scan(['s', 's', 'a', 'e'], 'first_first')).toEqual([1, 1, 1, 1]);
    expect(scan(['s', 'a', 'e', 'b', 'e', 'c'], 'first_first')).toEqual([1, 1, 1, 0, 0, 0]);
  });

  it('first_first still needs an end', () => {
    expect(scan(['a', 's', 'b', 'c'], 'first_first')).toEqual([0, 0, 0, 0]);
    expect(scan(['s', 's', 'a'], 'first_first')).toEqual([0, 0, 0]);
  });

  it('last_last extends to the last end before the next start', () => {
    expect(scan(['s', 'a', 'e', 'b', 'e', 'c'], 'last_last')).toEqual([1, 1, 1, 1, 1, 0]);
    expect(scan(['s1', 's', 'x', 's', 'e', 'y', 'e', 's', 'z'], 'last_last')).toEqual([
      0, 0, 0, 1, 1, 1, 1, 0, 0
    ]);
  });

  it('first_last spans from the first start to the last end', () => {
    expect(scan(['s', 'a', 's', 'e', 'b', 'e', 'c', 's', 'd'], 'first_last')).toEqual([
      1, 1, 1, 1, 1, 1, 0, 0, 0
    ]);
  });

  it('resolves start, start, end, start, end per policy', () => {
    const values = ['s', 's', 'e', 's', 'e'];
    expect(scan(values, 'strict')).toEqual([0, 1, 1, 2, 2]);
    expect(scan(values, 'first_first')).toEqual([1, 1, 1, 2, 2]);
    expect(scan(values, 'last_last')).toEqual([0, 1, 1, 2, 2]);
    expect(scan(values, 'first_last')).toEqual([1, 1, 1, 2, 2]);
  });
});
