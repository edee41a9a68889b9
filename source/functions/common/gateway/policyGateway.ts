// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Organization, Policy, VersionedPolicy } from '../../../data-models';
import { InvocationContext } from '../utils/invocationContext';

/**
 * Read and conditional-write access to the IAM policy of a cloud resource.
 *
 * Implementations throw `PolicyFetchError` / `PolicyWriteError` for infrastructure failures,
 * `DeadlineExceededError` once the invocation deadline passes, and `ConcurrentModificationError`
 * when `expectedVersion` no longer matches the stored policy.
 */
export interface PolicyGateway {
  getOrganization(ctx: InvocationContext, organizationId: string): Promise<Organization>;
  getPolicy(ctx: InvocationContext, resource: string): Promise<VersionedPolicy>;
  setPolicy(ctx: InvocationContext, resource: string, policy: Policy, expectedVersion: string): Promise<void>;
}

export const organizationResourceName = (organizationId: string): string => `organizations/${organizationId}`;
