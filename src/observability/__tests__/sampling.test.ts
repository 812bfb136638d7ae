/**
 * Sampling Utility Tests
 *
 * Boundary conditions (0.0, 1.0) and the comparison against Math.random()
 * for fractional sample rates.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { shouldRecord } from '../sampling.js';

describe('shouldRecord', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('always records at sample_rate 1.0', () => {
    for (let i = 0; i < 100; i++) {
      expect(shouldRecord(1.0)).toBe(true);
    }
  });

  it('always records at sample_rate > 1.0', () => {
    expect(shouldRecord(1.5)).toBe(true);
  });

  it('never records at sample_rate 0.0', () => {
    for (let i = 0; i < 100; i++) {
      expect(shouldRecord(0.0)).toBe(false);
    }
  });

  it('never records at sample_rate < 0.0', () => {
    expect(shouldRecord(-0.5)).toBe(false);
  });

  it('records when the random draw falls below the rate', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.2);
    expect(shouldRecord(0.25)).toBe(true);
  });

  it('skips when the random draw is at or above the rate', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.25);
    expect(shouldRecord(0.25)).toBe(false);
  });
});
