// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Logger } from '@aws-lambda-powertools/logger';
import { RemoveNonOrgMembersConfiguration } from '../../data-models';
import { organizationResourceName, PolicyGateway } from '../common/gateway/policyGateway';
import { assertActive, InvocationContext } from '../common/utils/invocationContext';
import {
  ConcurrentModificationError,
  PolicyFetchError,
  PolicyWriteError,
  RemediationError,
} from '../common/utils/remediationErrors';
import { DEFAULT_MAX_WRITE_ATTEMPTS } from '../common/utils/configuration';
import { bindingsEqual, filterPolicy, RemovedMember } from './policyFilter';

export interface Values {
  organizationID: string;
}

export interface Services {
  gateway: PolicyGateway;
  configuration: RemoveNonOrgMembersConfiguration;
  logger: Logger;
  maxWriteAttempts?: number;
}

export type RemediationStatus = 'UPDATED' | 'UNCHANGED' | 'SKIPPED';

export interface RemediationResult {
  status: RemediationStatus;
  resource: string;
  removedMembers: RemovedMember[];
  // fetch-filter-write cycles run, 0 when skipped
  attempts: number;
}

/** Removes users outside the organization's domain and the allow-list from the organization IAM policy */
export class RemediationExecutor {
  private readonly gateway: PolicyGateway;
  private readonly configuration: RemoveNonOrgMembersConfiguration;
  private readonly logger: Logger;
  private readonly maxWriteAttempts: number;

  constructor(services: Services) {
    this.gateway = services.gateway;
    this.configuration = services.configuration;
    this.logger = services.logger;
    this.maxWriteAttempts = Math.max(1, services.maxWriteAttempts ?? DEFAULT_MAX_WRITE_ATTEMPTS);
  }

  private isInScope(resource: string): boolean {
    const { Resources } = this.configuration;
    return !Resources || Resources.length === 0 || Resources.includes(resource);
  }

  // gateways classify their own failures; anything else is attributed to the stage that raised it
  private async call<T>(operation: () => Promise<T>, wrap: (error: unknown) => RemediationError): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw error instanceof RemediationError ? error : wrap(error);
    }
  }

  async execute(ctx: InvocationContext, values: Values): Promise<RemediationResult> {
    const resource = organizationResourceName(values.organizationID);

    if (!this.isInScope(resource)) {
      this.logger.info('Resource is not listed in the remediation configuration, skipping', {
        resource,
        resources: this.configuration.Resources,
      });
      return { status: 'SKIPPED', resource, removedMembers: [], attempts: 0 };
    }

    const organization = await this.call(
      () => this.gateway.getOrganization(ctx, values.organizationID),
      (error) => new PolicyFetchError(resource, 'fetch-organization', error),
    );
    const allowDomains = new Set(this.configuration.AllowDomains);

    for (let attempt = 1; ; attempt++) {
      const { policy, version } = await this.call(
        () => this.gateway.getPolicy(ctx, resource),
        (error) => new PolicyFetchError(resource, 'fetch-policy', error),
      );
      const { policy: filtered, removedMembers } = filterPolicy(policy, organization.domain, allowDomains);

      if (bindingsEqual(policy.bindings, filtered.bindings)) {
        this.logger.info('IAM policy has no members outside the organization, nothing to remove', {
          resource,
          orgDomain: organization.domain,
        });
        return { status: 'UNCHANGED', resource, removedMembers: [], attempts: attempt };
      }

      assertActive(ctx, 'write-policy', resource);

      try {
        await this.call(
          () => this.gateway.setPolicy(ctx, resource, filtered, version),
          (error) => new PolicyWriteError(resource, error),
        );
      } catch (error) {
        if (error instanceof ConcurrentModificationError && attempt < this.maxWriteAttempts) {
          this.logger.warn('IAM policy changed while remediating, re-fetching', {
            resource,
            attempt,
            maxWriteAttempts: this.maxWriteAttempts,
          });
          continue;
        }
        throw error;
      }

      for (const { role, member } of removedMembers) {
        this.logger.info(`Removed ${member} from ${role}`, { resource, role, member });
      }
      return { status: 'UPDATED', resource, removedMembers, attempts: attempt };
    }
  }
}
