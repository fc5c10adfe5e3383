import { describe, it, expect } from '@jest/globals';
import { detectMotion, variance } from '../../src/services/motion';

describe('Motion detection', () => {
  it('should compute the population variance', () => {
    expect(variance([])).toBe(0);
    expect(variance([2, 4])).toBe(1);
  });

  it('should need at least three samples', () => {
    expect(detectMotion([])).toBe(false);
    expect(detectMotion([0.2, 1.8])).toBe(false);
  });

  it('should detect movement above the variance threshold', () => {
    expect(detectMotion([1, 1, 1])).toBe(false);
    expect(detectMotion([0.5, 1.5, 1.0])).toBe(true);
  });

  it('should only consider the most recent window', () => {
    expect(detectMotion([0, 5, 0, 1, 1, 1, 1, 1])).toBe(false);
  });

  it('should skip non-finite samples', () => {
    expect(detectMotion([1, Number.NaN, 1, Number.POSITIVE_INFINITY, 1])).toBe(false);
  });
});
