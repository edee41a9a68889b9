// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { OrganizationsClient, protos } from '@google-cloud/resource-manager';
import { Logger } from '@aws-lambda-powertools/logger';
import { Organization, Policy, PolicyBinding, VersionedPolicy } from '../../../data-models';
import { InvocationContext, withDeadline } from '../utils/invocationContext';
import {
  ConcurrentModificationError,
  PolicyFetchError,
  PolicyWriteError,
  RemediationError,
} from '../utils/remediationErrors';
import { organizationResourceName, PolicyGateway } from './policyGateway';

type IOrganization = protos.google.cloud.resourcemanager.v3.IOrganization;
type IPolicy = protos.google.iam.v1.IPolicy;
type IBinding = protos.google.iam.v1.IBinding;

// gRPC status returned by setIamPolicy when the etag is stale
const ABORTED = 10;
// conditional bindings are only returned when version 3 is requested
const REQUESTED_POLICY_VERSION = 3;

interface CallOptions {
  timeout?: number;
}

/** The subset of `OrganizationsClient` this gateway calls */
export interface OrganizationsApi {
  getOrganization(
    request: protos.google.cloud.resourcemanager.v3.IGetOrganizationRequest,
    options?: CallOptions,
  ): Promise<[IOrganization, ...unknown[]]>;
  getIamPolicy(request: protos.google.iam.v1.IGetIamPolicyRequest, options?: CallOptions): Promise<[IPolicy, ...unknown[]]>;
  setIamPolicy(request: protos.google.iam.v1.ISetIamPolicyRequest, options?: CallOptions): Promise<[IPolicy, ...unknown[]]>;
}

export function encodeEtag(etag: IPolicy['etag']): string {
  if (!etag) return '';
  return typeof etag === 'string' ? etag : Buffer.from(etag).toString('base64');
}

function isAborted(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === ABORTED;
}

function toBinding(binding: IBinding): PolicyBinding {
  const result: PolicyBinding = {
    role: binding.role ?? '',
    members: [...(binding.members ?? [])],
  };
  if (binding.condition?.expression) {
    result.condition = { expression: binding.condition.expression };
    if (binding.condition.title) result.condition.title = binding.condition.title;
    if (binding.condition.description) result.condition.description = binding.condition.description;
  }
  return result;
}

function fromBinding(binding: PolicyBinding): IBinding {
  return {
    role: binding.role,
    members: binding.members,
    ...(binding.condition && { condition: binding.condition }),
  };
}

export class ResourceManagerGateway implements PolicyGateway {
  constructor(
    private readonly logger: Logger,
    private readonly client: OrganizationsApi = new OrganizationsClient(),
  ) {}

  async getOrganization(ctx: InvocationContext, organizationId: string): Promise<Organization> {
    const name = organizationResourceName(organizationId);
    try {
      const [organization] = await withDeadline(ctx, 'fetch-organization', name, (timeout) =>
        this.client.getOrganization({ name }, { timeout }),
      );
      if (!organization.displayName) {
        throw new Error(`Organization ${name} has no display name to derive its domain from`);
      }
      return { id: organizationId, domain: organization.displayName };
    } catch (error) {
      if (error instanceof RemediationError) throw error;
      throw new PolicyFetchError(name, 'fetch-organization', error);
    }
  }

  async getPolicy(ctx: InvocationContext, resource: string): Promise<VersionedPolicy> {
    try {
      const [policy] = await withDeadline(ctx, 'fetch-policy', resource, (timeout) =>
        this.client.getIamPolicy({ resource, options: { requestedPolicyVersion: REQUESTED_POLICY_VERSION } }, { timeout }),
      );
      const version = encodeEtag(policy.etag);
      // without an etag the write would be an unconditional overwrite
      if (!version) {
        throw new Error(`IAM policy for ${resource} was returned without an etag`);
      }
      this.logger.debug('Fetched IAM policy', { resource, etag: version, bindings: policy.bindings?.length ?? 0 });

      return {
        policy: {
          bindings: (policy.bindings ?? []).map(toBinding),
          ...(policy.version != null && { version: policy.version }),
        },
        version,
      };
    } catch (error) {
      if (error instanceof RemediationError) throw error;
      throw new PolicyFetchError(resource, 'fetch-policy', error);
    }
  }

  async setPolicy(ctx: InvocationContext, resource: string, policy: Policy, expectedVersion: string): Promise<void> {
    const request: protos.google.iam.v1.ISetIamPolicyRequest = {
      resource,
      policy: {
        bindings: policy.bindings.map(fromBinding),
        etag: Buffer.from(expectedVersion, 'base64'),
        ...(policy.version != null && { version: policy.version }),
      },
    };

    try {
      await withDeadline(ctx, 'write-policy', resource, (timeout) => this.client.setIamPolicy(request, { timeout }));
      this.logger.debug('Updated IAM policy', { resource, etag: expectedVersion });
    } catch (error) {
      if (error instanceof RemediationError) throw error;
      if (isAborted(error)) throw new ConcurrentModificationError(resource, error);
      throw new PolicyWriteError(resource, error);
    }
  }
}
