import { describe, expect, it } from 'vitest';

import { classify, classifyColumn } from '../src';
import { nullSafeEquals } from '../src/classify/marker-classifier';

describe('nullSafeEquals', () => {
  it('treats two missing values as equal', () => {
    expect(nullSafeEquals(null, null)).toBe(true);
    expect(nullSafeEquals(undefined, null)).toBe(true);
    expect(nullSafeEquals(null, 0)).toBe(false);
    expect(nullSafeEquals('', null)).toBe(false);
  });

  it('compares dates by timestamp and matches NaN with NaN', () => {
    expect(nullSafeEquals(new Date(1_000), new Date(1_000))).toBe(true);
    expect(nullSafeEquals(new Date(1_000), 1_000)).toBe(false);
    expect(nullSafeEquals(Number.NaN, Number.NaN)).toBe(true);
  });

  it('does not coerce between types', () => {
    expect(nullSafeEquals(1, '1')).toBe(false);
    expect(nullSafeEquals(1n, 1)).toBe(false);
  });

  it('matches other objects only by identity', () => {
    const cell = ['start'];
    expect(nullSafeEquals(cell, 'start')).toBe(false);
    expect(nullSafeEquals({ toString: () => 'start' }, 'start')).toBe(false);
    expect(nullSafeEquals(cell, cell)).toBe(true);
  });
});

describe('classify', () => {
  const config = { markerStart: 'start', markerEnd: 'end' };

  it('tags start, end and other values', () => {
    expect(classify('start', config)).toBe('start');
    expect(classify('end', config)).toBe('end');
    expect(classify('noise', config)).toBe('other');
    expect(classify(null, config)).toBe('other');
  });

  it('matches a null marker against null and undefined values', () => {
    const nullStart = { markerStart: null, markerEnd: 'end' };
    expect(classify(null, nullStart)).toBe('start');
    expect(classify(undefined, nullStart)).toBe('start');
    expect(classify('null', nullStart)).toBe('other');
  });

  it('reports every marker as a start in identical-marker mode', () => {
    expect(classify('sun', { markerStart: 'sun' })).toBe('start');
    expect(classify('sun', { markerStart: 'sun', markerEnd: 'sun' })).toBe('start');
    expect(classify('day', { markerStart: 'sun' })).toBe('other');
  });
});

describe('classifyColumn', () => {
  it('builds start and end masks', () => {
    const masks = classifyColumn(['end', 'a', 'start', 'b', 'end', 'c'], {
      markerStart: 'start',
      markerEnd: 'end'
    });
    expect(Array.from(masks.isStart)).toEqual([0, 0, 1, 0, 0, 0]);
    expect(Array.from(masks.isEnd)).toEqual([1, 0, 0, 0, 1, 0]);
  });

  it('leaves the end mask empty for identical markers', () => {
    const masks = classifyColumn([1, 2, 1], { markerStart: 1 });
    expect(Array.from(masks.isStart)).toEqual([1, 0, 1]);
    expect(Array.from(masks.isEnd)).toEqual([0, 0, 0]);
  });
});
