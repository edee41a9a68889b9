// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0
import { Logger } from '@aws-lambda-powertools/logger';

export const DEFAULT_SERVICE_NAME = 'iam-member-remediation';

export function getLogger(serviceName: string = process.env.SERVICE_NAME ?? DEFAULT_SERVICE_NAME): Logger {
  return new Logger({ serviceName });
}
