import { describe, it, expect } from 'vitest';
import { estimateRemainingSeconds, formatDuration } from './time.js';

describe('formatDuration', () => {
  it('should format hours, minutes and seconds', () => {
    expect(formatDuration(3725)).toBe('1h 2m 5s');
    expect(formatDuration(59.9)).toBe('59s');
    expect(formatDuration(90061)).toBe('1d 1h 1m 1s');
  });

  it('should keep zero units after a larger one', () => {
    expect(formatDuration(3600)).toBe('1h 0m 0s');
  });

  it('should return a dash for invalid input', () => {
    expect(formatDuration(-1)).toBe('—');
    expect(formatDuration(NaN)).toBe('—');
  });
});

describe('estimateRemainingSeconds', () => {
  it('should extrapolate from the observed rate', () => {
    expect(estimateRemainingSeconds(10, 30, 5)).toBe(10);
  });

  it('should be NaN before any progress', () => {
    expect(estimateRemainingSeconds(0, 30, 5)).toBeNaN();
  });
});
