/**
 * Unit tests for seeded random streams
 */

import { describe, it, expect } from 'vitest';
import { createRandomStream, deriveSeed, ZERO_NOISE_STREAM } from './index.js';

describe('createRandomStream', () => {
  it('reproduces the same sequence for the same seed', () => {
    const a = createRandomStream('run-1');
    const b = createRandomStream('run-1');
    const seqA = [a.next(), a.next(), a.gaussian(0, 1)];
    const seqB = [b.next(), b.next(), b.gaussian(0, 1)];
    expect(seqA).toEqual(seqB);
  });

  it('produces different sequences for different seeds', () => {
    const a = createRandomStream('run-1');
    const b = createRandomStream('run-2');
    expect(a.next()).not.toBe(b.next());
  });

  it('returns uniform values in [0, 1)', () => {
    const stream = createRandomStream(42);
    for (let i = 0; i < 1000; i++) {
      const v = stream.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('returns the mean when stddev is zero', () => {
    const stream = createRandomStream('fixed');
    expect(stream.gaussian(3.5, 0)).toBe(3.5);
  });

  it('gaussian samples centre on the mean', () => {
    const stream = createRandomStream('gauss');
    let sum = 0;
    const n = 5000;
    for (let i = 0; i < n; i++) sum += stream.gaussian(10, 2);
    expect(sum / n).toBeCloseTo(10, 0);
  });

  it('forked streams are independent of the parent position', () => {
    const parent = createRandomStream('root');
    const forkBefore = parent.fork('child').next();
    parent.next();
    parent.next();
    const forkAfter = parent.fork('child').next();
    expect(forkAfter).toBe(forkBefore);
  });
});

describe('deriveSeed', () => {
  it('encodes each part', () => {
    expect(deriveSeed('seed', 'emf-01', 1000)).toBe('["seed","emf-01",1000]');
  });

  it('keeps separators inside parts distinct', () => {
    expect(deriveSeed('a:b', 'c')).not.toBe(deriveSeed('a', 'b:c'));
  });
});

describe('ZERO_NOISE_STREAM', () => {
  it('returns the mean for every gaussian draw', () => {
    expect(ZERO_NOISE_STREAM.gaussian(1.25, 100)).toBe(1.25);
    expect(ZERO_NOISE_STREAM.gaussian()).toBe(0);
  });
});
