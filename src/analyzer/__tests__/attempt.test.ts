import { describe, expect, it, vi } from 'vitest';
import { attempt } from '../attempt.js';

describe('attempt', () => {
  it('stops at the first accepted value', async () => {
    const fn = vi.fn(async () => 'good');
    const outcome = await attempt(fn, { maxAttempts: 2, check: () => [] });

    expect(outcome).toEqual({ value: 'good', attempts: 1, accepted: true, problems: [] });
    expect(fn).toHaveBeenCalledWith(null);
  });

  it('passes the rejected value and its problems to the retry', async () => {
    const fn = vi.fn(async (previous: { value: string; problems: string[] } | null) => (previous ? 'better' : 'bad'));
    const outcome = await attempt(fn, { maxAttempts: 2, check: (v) => (v === 'bad' ? ['too bad'] : []) });

    expect(outcome).toEqual({ value: 'better', attempts: 2, accepted: true, problems: [] });
    expect(fn).toHaveBeenLastCalledWith({ value: 'bad', problems: ['too bad'] });
  });

  it('returns the last value when every attempt fails the check', async () => {
    let n = 0;
    const outcome = await attempt(async () => `draft ${++n}`, { maxAttempts: 2, check: () => ['nope'] });

    expect(outcome).toEqual({ value: 'draft 2', attempts: 2, accepted: false, problems: ['nope'] });
  });

  it('does not retry thrown errors', async () => {
    const fn = vi.fn(async () => {
      throw new Error('connection refused');
    });

    await expect(attempt(fn, { maxAttempts: 3, check: () => [] })).rejects.toThrow('connection refused');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('requires at least one attempt', async () => {
    await expect(attempt(async () => 1, { maxAttempts: 0, check: () => [] })).rejects.toBeInstanceOf(RangeError);
  });
});
