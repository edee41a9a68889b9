// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { RemediationError } from './remediationErrors';

// a type alias so it can be passed as Powertools log attributes
export type ErrorDescription = {
  errorName: string;
  errorMessage: string;
  retryable: boolean;
  stage?: string;
  resource?: string;
  cause?: string;
};

/**
 * Utility class for standardized error handling and formatting
 */
export class ErrorUtils {
  private static readonly MAX_ERROR_LENGTH = 1000;

  /**
   * Formats an error message with character limit
   * @param error - The error to format (can be Error, string, or unknown)
   * @returns A formatted error message string (max 1000 chars)
   */
  static formatErrorMessage(error: unknown): string {
    let message: string;

    if (error instanceof Error) {
      message = error.message;
    } else if (typeof error === 'string') {
      message = error;
    } else {
      message = String(error);
    }

    if (message.length > this.MAX_ERROR_LENGTH) {
      return message.substring(0, this.MAX_ERROR_LENGTH) + '...';
    }

    return message;
  }

  /**
   * Flattens an error into log attributes. Errors outside the remediation taxonomy are
   * reported as retryable so the trigger runtime gets a chance to redeliver.
   */
  static describe(error: unknown): ErrorDescription {
    const description: ErrorDescription = {
      errorName: error instanceof Error ? error.name : typeof error,
      errorMessage: this.formatErrorMessage(error),
      retryable: error instanceof RemediationError ? error.retryable : true,
    };

    if (error instanceof RemediationError) {
      if (error.stage) description.stage = error.stage;
      if (error.resource) description.resource = error.resource;
    }
    if (error instanceof Error && error.cause !== undefined) {
      description.cause = this.formatErrorMessage(error.cause);
    }

    return description;
  }

  static isRetryable(error: unknown): boolean {
    return this.describe(error).retryable;
  }
}
