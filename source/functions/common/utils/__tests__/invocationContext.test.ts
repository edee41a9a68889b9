// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { assertActive, Clock, createInvocationContext, remainingMillis, withDeadline } from '../invocationContext';
import { DeadlineExceededError } from '../remediationErrors';

class ManualClock implements Clock {
  constructor(private current: number) {}

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

describe('invocation context', () => {
  const start = Date.UTC(2024, 2, 4, 9, 30);

  it('computes the deadline from the clock', () => {
    const clock = new ManualClock(start);

    const ctx = createInvocationContext(5000, clock);

    expect(ctx.deadline).toEqual(new Date(start + 5000));
    expect(ctx.signal.aborted).toBe(false);
    expect(remainingMillis(ctx, clock)).toBe(5000);
  });

  it('reports no time left once the deadline passed', () => {
    const clock = new ManualClock(start);
    const ctx = createInvocationContext(5000, clock);

    clock.advance(6000);

    expect(remainingMillis(ctx, clock)).toBe(0);
    expect(() => assertActive(ctx, 'fetch-policy', 'organizations/12', clock)).toThrow(DeadlineExceededError);
    expect(() => assertActive(ctx, 'fetch-policy', 'organizations/12', clock)).toThrow(
      'Invocation deadline exceeded before fetch-policy on organizations/12',
    );
  });

  describe('withDeadline', () => {
    it('passes the remaining time to the call', async () => {
      const clock = new ManualClock(start);
      const controller = new AbortController();
      const ctx = { signal: controller.signal, deadline: new Date(start + 3000) };
      clock.advance(1000);
      const call = jest.fn(async (timeoutMs: number) => `ok after ${timeoutMs}`);

      await expect(withDeadline(ctx, 'fetch-policy', 'organizations/12', call, clock)).resolves.toBe('ok after 2000');
      expect(call).toHaveBeenCalledWith(2000);
    });

    it('propagates call failures unchanged', async () => {
      const controller = new AbortController();
      const ctx = { signal: controller.signal, deadline: new Date(Date.now() + 60_000) };
      const failure = new Error('boom');

      await expect(withDeadline(ctx, 'write-policy', undefined, () => Promise.reject(failure))).rejects.toBe(failure);
    });

    it('rejects as soon as the invocation is aborted', async () => {
      const controller = new AbortController();
      const ctx = { signal: controller.signal, deadline: new Date(Date.now() + 60_000) };

      const pending = withDeadline(ctx, 'write-policy', undefined, () => new Promise<never>(() => undefined));
      controller.abort();

      await expect(pending).rejects.toThrow('Invocation deadline exceeded before write-policy');
    });
  });
});
