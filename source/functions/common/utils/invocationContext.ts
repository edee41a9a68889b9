// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { DeadlineExceededError, RemediationStage } from './remediationErrors';

export interface Clock {
  now(): Date;
}

class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

export const getClock = (): Clock => new SystemClock();

/** Cancellation and deadline shared by every gateway call of one invocation */
export interface InvocationContext {
  readonly signal: AbortSignal;
  readonly deadline: Date;
}

export function createInvocationContext(timeoutMs: number, clock: Clock = getClock()): InvocationContext {
  return {
    signal: AbortSignal.timeout(timeoutMs),
    deadline: new Date(clock.now().getTime() + timeoutMs),
  };
}

export function remainingMillis(ctx: InvocationContext, clock: Clock = getClock()): number {
  return Math.max(0, ctx.deadline.getTime() - clock.now().getTime());
}

/** Throws when the invocation was aborted or its deadline has passed */
export function assertActive(
  ctx: InvocationContext,
  stage: RemediationStage,
  resource?: string,
  clock: Clock = getClock(),
): void {
  if (ctx.signal.aborted || remainingMillis(ctx, clock) === 0) {
    throw new DeadlineExceededError(stage, resource, ctx.signal.reason);
  }
}

/**
 * Runs a gateway call with the time left on the invocation, rejecting as soon as
 * the invocation is aborted even if the call itself does not observe the signal.
 */
export async function withDeadline<T>(
  ctx: InvocationContext,
  stage: RemediationStage,
  resource: string | undefined,
  call: (timeoutMs: number) => Promise<T>,
  clock: Clock = getClock(),
): Promise<T> {
  assertActive(ctx, stage, resource, clock);

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(new DeadlineExceededError(stage, resource, ctx.signal.reason));
    ctx.signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([call(remainingMillis(ctx, clock)), aborted]);
  } finally {
    if (onAbort) ctx.signal.removeEventListener('abort', onAbort);
  }
}
