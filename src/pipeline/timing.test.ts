import { describe, expect, it } from 'vitest';
import { planNarrationTiming } from './timing.js';

describe('planNarrationTiming', () => {
  it('compresses narration that overruns the footage', () => {
    expect(planNarrationTiming(5, 8)).toEqual({ retime: true, factor: 1.6, duration: 5 });
  });

  it('plays a barely longer narration as is', () => {
    expect(planNarrationTiming(7.8, 8)).toEqual({ retime: false, factor: 8 / 7.8, duration: 8 });
  });

  it('compresses once the factor exceeds the threshold', () => {
    const timing = planNarrationTiming(7.6, 8);
    expect(timing.retime).toBe(true);
    expect(timing.factor).toBeCloseTo(1.0526, 4);
    expect(timing.duration).toBe(7.6);
  });

  it('never retimes when the footage is longer', () => {
    expect(planNarrationTiming(12, 6.5)).toEqual({ retime: false, factor: 1, duration: 6.5 });
  });

  it('never retimes against an unreadable video duration', () => {
    expect(planNarrationTiming(0, 6.5)).toEqual({ retime: false, factor: 1, duration: 6.5 });
  });

  it('honours a custom threshold', () => {
    expect(planNarrationTiming(7.8, 8, 1.01).retime).toBe(true);
  });
});
