// pattern: Functional Core

import { describe, it, expect } from 'vitest';
import { windowStart } from './time-range.ts';
import { FIXED_NOW } from '../../integration/test-helpers.ts';

describe('windowStart', () => {
  it('should reach back the given number of hours', () => {
    expect(windowStart(FIXED_NOW, 1.5).toISOString()).toBe('2024-05-01T10:30:00.000Z');
  });

  it('should reject a window that starts before the earliest representable date', () => {
    expect(() => windowStart(FIXED_NOW, 1e12)).toThrow('time_range_hours is too large: 1000000000000');
  });
});
