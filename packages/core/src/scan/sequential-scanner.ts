/**
 * @fileoverview Sequential reference scan. One pass over a group's markers,
 *   buffering elements since the last confirmed boundary and flushing them as
 *   a valid interval or as zeros. Every vectorized policy is tested against
 *   this scanner.
 *
 * ## Strict policy (start: last, end: first)
 *
 * - start, no open interval  → open `active = counter + 1`, buffer the element
 * - start, interval open     → emit 0 for the buffer, restart it with this
 *                              element tagged `active` (the last start wins)
 * - end, interval open       → flush buffer and element tagged `active`,
 *                              close, `counter += 1` (the first end wins)
 * - anything else            → buffer tagged with `active` (0 when closed)
 * - end of sequence          → emit 0 for the buffer
 *
 * ## Other tie-breaks
 *
 * Start rule `first` buffers a start seen while an interval is open as plain
 * content. End rule `last` closes tentatively: later elements form a tail that
 * a further end commits into the interval; the next start, or the end of the
 * sequence, emits the interval and zeros the tail.
 */
import { classifyResolved } from '../classify/marker-classifier';
import { POLICY_RULES } from '../config';
import type { MarkerSequence, ResolvedMarkerConfig } from '../types';

class PendingRun {
  private tags: number[] = [];
  private from = 0;
  private committed = 0;

  constructor(private readonly out: Uint32Array) {}

  push(tag: number) {
    this.tags.push(tag);
  }

  /** Marks everything buffered so far as part of the interval. */
  commit() {
    this.committed = this.tags.length;
  }

  /** Writes committed tags as they are and the uncommitted tail as 0. */
  flush() {
    for (let k = 0; k < this.tags.length; k++) {
      this.out[this.from + k] = k < this.committed ? this.tags[k] : 0;
    }
    this.from += this.tags.length;
    this.tags = [];
    this.committed = 0;
  }

  discard() {
    this.committed = 0;
    this.flush();
  }
}

export function scanSequential(values: MarkerSequence, config: ResolvedMarkerConfig): Uint32Array {
  const out = new Uint32Array(values.length);
  if (config.identical) {
    return scanToggle(values, config, out);
  }

  const rules = POLICY_RULES[config.policy];
  const pending = new PendingRun(out);
  let counter = 0;
  let active = 0;
  let closing = false;

  for (let i = 0; i < values.length; i++) {
    const kind = classifyResolved(values[i], config);

    if (kind === 'start' && closing) {
      pending.flush();
      counter += 1;
      closing = false;
      active = counter + 1;
      pending.push(active);
    } else if (kind === 'start' && active === 0) {
      active = counter + 1;
      pending.push(active);
    } else if (kind === 'start') {
      if (rules.start === 'last') {
        pending.discard();
      }
      pending.push(active);
    } else if (kind === 'end' && active !== 0) {
      pending.push(active);
      pending.commit();
      if (rules.end === 'first') {
        pending.flush();
        active = 0;
        counter += 1;
      } else {
        closing = true;
      }
    } else {
      pending.push(active);
    }
  }

  // an interval still open here never saw its end; a closing one keeps its committed part
  pending.flush();
  return out;
}

/** Identical-marker mode: every marker opens the next id. */
function scanToggle(values: MarkerSequence, config: ResolvedMarkerConfig, out: Uint32Array) {
  let counter = 0;
  for (let i = 0; i < values.length; i++) {
    if (classifyResolved(values[i], config) === 'start') {
      counter += 1;
    }
    out[i] = counter;
  }
  return out;
}
