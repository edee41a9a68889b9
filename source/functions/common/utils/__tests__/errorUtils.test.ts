// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { ErrorUtils } from '../errorUtils';
import { ConfigurationError, PolicyFetchError } from '../remediationErrors';

describe('ErrorUtils', () => {
  describe('formatErrorMessage', () => {
    it('formats errors, strings and other values', () => {
      expect(ErrorUtils.formatErrorMessage(new Error('boom'))).toBe('boom');
      expect(ErrorUtils.formatErrorMessage('plain')).toBe('plain');
      expect(ErrorUtils.formatErrorMessage(42)).toBe('42');
    });

    it('truncates long messages to 1000 characters', () => {
      const message = ErrorUtils.formatErrorMessage('x'.repeat(1200));

      expect(message).toBe('x'.repeat(1000) + '...');
    });
  });

  describe('describe', () => {
    it('includes stage, resource and cause of remediation errors', () => {
      const error = new PolicyFetchError('organizations/12', 'fetch-policy', new Error('14 UNAVAILABLE'));

      expect(ErrorUtils.describe(error)).toEqual({
        errorName: 'PolicyFetchError',
        errorMessage: 'Failed to get IAM policy for organizations/12',
        retryable: true,
        stage: 'fetch-policy',
        resource: 'organizations/12',
        cause: '14 UNAVAILABLE',
      });
    });

    it('reports configuration errors as not retryable', () => {
      expect(ErrorUtils.describe(new ConfigurationError('bad config'))).toEqual({
        errorName: 'ConfigurationError',
        errorMessage: 'bad config',
        retryable: false,
        stage: 'configuration',
      });
      expect(ErrorUtils.isRetryable(new ConfigurationError('bad config'))).toBe(false);
    });

    it('treats unknown errors as retryable', () => {
      expect(ErrorUtils.describe(new TypeError('oops'))).toEqual({
        errorName: 'TypeError',
        errorMessage: 'oops',
        retryable: true,
      });
    });
  });
});
