import { describe, it, expect, beforeEach } from 'vitest';
import { FailureTracker } from '../../../src/hooks/failure-tracker.js';

describe('FailureTracker', () => {
  let now: number;
  let tracker: FailureTracker;

  beforeEach(() => {
    now = 1_000;
    tracker = new FailureTracker(3, 100, () => now);
  });

  it('should trip on the threshold and start over', () => {
    expect(tracker.recordFailure('a')).toBe(false);
    expect(tracker.recordFailure('a')).toBe(false);
    expect(tracker.recordFailure('a')).toBe(true);
    expect(tracker.count('a')).toBe(0);
  });

  it('should count addons separately', () => {
    tracker.recordFailure('a');
    tracker.recordFailure('a');
    expect(tracker.recordFailure('b')).toBe(false);
    expect(tracker.count('a')).toBe(2);
    expect(tracker.count('b')).toBe(1);
  });

  it('should clear the count on success', () => {
    tracker.recordFailure('a');
    tracker.recordFailure('a');
    tracker.recordSuccess('a');
    expect(tracker.recordFailure('a')).toBe(false);
    expect(tracker.count('a')).toBe(1);
  });

  it('should forget failures outside the window', () => {
    tracker.recordFailure('a');
    tracker.recordFailure('a');
    now += 100;
    expect(tracker.recordFailure('a')).toBe(false);
    expect(tracker.count('a')).toBe(1);
  });

  it('should reset one addon or all of them', () => {
    tracker.recordFailure('a');
    tracker.recordFailure('b');
    tracker.reset('a');
    expect(tracker.count('a')).toBe(0);
    expect(tracker.count('b')).toBe(1);
    tracker.reset();
    expect(tracker.count('b')).toBe(0);
  });
});
