// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

export type RemediationStage =
  | 'parse'
  | 'configuration'
  | 'fetch-organization'
  | 'fetch-policy'
  | 'write-policy';

export interface RemediationErrorOptions {
  stage?: RemediationStage;
  resource?: string;
  cause?: unknown;
}

/**
 * Base class for every failure a remediation surfaces to its caller.
 * `retryable` tells the dispatcher whether redelivering the event can help.
 */
export abstract class RemediationError extends Error {
  abstract readonly retryable: boolean;
  readonly stage?: RemediationStage;
  readonly resource?: string;

  protected constructor(message: string, options: RemediationErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RemediationError';
    this.stage = options.stage;
    this.resource = options.resource;
  }
}

export class UnsupportedFindingCategoryError extends RemediationError {
  readonly retryable = false;

  constructor(
    readonly category: string,
    readonly expectedCategory: string,
  ) {
    super(`Unsupported finding category "${category}", expected "${expectedCategory}"`, { stage: 'parse' });
    this.name = 'UnsupportedFindingCategoryError';
  }
}

export class MalformedPayloadError extends RemediationError {
  readonly retryable = false;

  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'parse', cause });
    this.name = 'MalformedPayloadError';
  }
}

export class ConfigurationError extends RemediationError {
  readonly retryable = false;

  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'configuration', cause });
    this.name = 'ConfigurationError';
  }
}

export class PolicyFetchError extends RemediationError {
  readonly retryable = true;

  constructor(resource: string, stage: 'fetch-organization' | 'fetch-policy', cause?: unknown) {
    super(`Failed to ${stage === 'fetch-organization' ? 'get organization' : 'get IAM policy'} for ${resource}`, {
      stage,
      resource,
      cause,
    });
    this.name = 'PolicyFetchError';
  }
}

export class PolicyWriteError extends RemediationError {
  readonly retryable = true;

  constructor(resource: string, cause?: unknown) {
    super(`Failed to set IAM policy for ${resource}`, { stage: 'write-policy', resource, cause });
    this.name = 'PolicyWriteError';
  }
}

/** The policy changed between read and write; re-fetch and recompute rather than resending */
export class ConcurrentModificationError extends RemediationError {
  readonly retryable = true;

  constructor(resource: string, cause?: unknown) {
    super(`IAM policy for ${resource} was modified concurrently`, { stage: 'write-policy', resource, cause });
    this.name = 'ConcurrentModificationError';
  }
}

export class DeadlineExceededError extends RemediationError {
  readonly retryable = true;

  constructor(stage: RemediationStage, resource?: string, cause?: unknown) {
    super(`Invocation deadline exceeded before ${stage}${resource ? ` on ${resource}` : ''}`, {
      stage,
      resource,
      cause,
    });
    this.name = 'DeadlineExceededError';
  }
}
