import { describe, expect, it } from 'vitest';

import { buildStrictRawIds, buildToggleRawIds } from '../src/assign/prefix-sum';
import { classifyColumn } from '../src';

describe('buildStrictRawIds', () => {
  it('opens a raw id at each start and after each end', () => {
    const masks = classifyColumn(['end', 'a', 'start', 'b', 'end', 'c'], {
      markerStart: 'start',
      markerEnd: 'end'
    });
    const { rawIds, valid } = buildStrictRawIds(masks);
    expect(Array.from(rawIds)).toEqual([0, 1, 2, 2, 2, 3]);
    expect(Array.from(valid)).toEqual([0, 0, 1, 1, 1, 0]);
  });

  it('invalidates runs that hold a duplicate start', () => {
    const masks = classifyColumn(['s', 's', 'a', 'e'], { markerStart: 's', markerEnd: 'e' });
    const { rawIds, valid } = buildStrictRawIds(masks);
    expect(Array.from(rawIds)).toEqual([1, 2, 2, 2]);
    expect(Array.from(valid)).toEqual([0, 1, 1, 1]);
  });

  it('skips raw ids when an end is directly followed by a start', () => {
    const masks = classifyColumn(['s', 'e', 's', 'e'], { markerStart: 's', markerEnd: 'e' });
    const { rawIds, valid } = buildStrictRawIds(masks);
    expect(Array.from(rawIds)).toEqual([1, 1, 3, 3]);
    expect(Array.from(valid)).toEqual([1, 1, 1, 1]);
  });
});

describe('buildToggleRawIds', () => {
  it('counts markers seen so far', () => {
    const masks = classifyColumn(['x', 'sun', 'day', 'sun'], { markerStart: 'sun' });
    const { rawIds, valid } = buildToggleRawIds(masks);
    expect(Array.from(rawIds)).toEqual([0, 1, 1, 2]);
    expect(Array.from(valid)).toEqual([0, 1, 1, 1]);
  });
});
