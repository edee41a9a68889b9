// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod';
import { Logger } from '@aws-lambda-powertools/logger';
import { RemoveNonOrgMembersConfiguration } from '../../data-models';
import { PolicyGateway } from '../common/gateway/policyGateway';
import { getRuntimeSettings, RuntimeSettings } from '../common/utils/configuration';
import { Clock, createInvocationContext, getClock } from '../common/utils/invocationContext';
import { ErrorUtils } from '../common/utils/errorUtils';
import { MalformedPayloadError, UnsupportedFindingCategoryError } from '../common/utils/remediationErrors';
import { optionalSourceProperty, parseFinding } from './findingParser';
import { RemediationExecutor } from './remediationExecutor';

/** Pub/Sub message as carried in the data of a messagePublished CloudEvent */
export interface MessagePublishedData {
  message?: {
    data?: string;
    messageId?: string;
    attributes?: Record<string, string>;
  };
  subscription?: string;
}

export interface PubSubCloudEvent {
  id?: string;
  data?: MessagePublishedData;
}

export interface HandlerDependencies {
  logger: Logger;
  gateway: PolicyGateway;
  loadConfiguration: () => Promise<RemoveNonOrgMembersConfiguration>;
  getSettings?: () => RuntimeSettings;
  clock?: Clock;
}

const PERSISTENT_KEYS = ['eventId', 'findingName'];

// informational only; a value of another shape is left out of the log
const LoggedSourceProperty = z.string().optional().catch(undefined);

export class RemoveNonOrgMembersHandler {
  private readonly logger: Logger;

  constructor(private readonly dependencies: HandlerDependencies) {
    this.logger = dependencies.logger;
  }

  /**
   * Resolves when the event is handled or deliberately discarded; rejects when redelivery may help.
   */
  async handle(event: PubSubCloudEvent): Promise<void> {
    this.logger.appendKeys({ eventId: event.id ?? 'unknown' });

    try {
      await this.remediate(event);
    } catch (error) {
      if (error instanceof UnsupportedFindingCategoryError) {
        this.logger.info('Finding category is not handled by this remediation, discarding event', {
          category: error.category,
          expectedCategory: error.expectedCategory,
        });
        return;
      }
      if (error instanceof MalformedPayloadError) {
        this.logger.error('Received malformed finding notification that is not eligible for a retry, discarding', {
          ...ErrorUtils.describe(error),
          messageId: event.data?.message?.messageId,
        });
        return;
      }

      this.logger.error('Remediation failed', { ...ErrorUtils.describe(error) });
      throw error;
    } finally {
      this.logger.removeKeys(PERSISTENT_KEYS);
    }
  }

  private async remediate(event: PubSubCloudEvent): Promise<void> {
    const data = event.data?.message?.data;
    if (!data) {
      throw new MalformedPayloadError('Pub/Sub message carries no data');
    }

    const finding = parseFinding(Buffer.from(data, 'base64'));
    this.logger.appendKeys({ findingName: finding.name });
    this.logger.debug('Received finding', {
      organizationID: finding.organizationID,
      state: finding.state,
      severity: optionalSourceProperty(finding, 'SeverityLevel', LoggedSourceProperty),
      scanner: optionalSourceProperty(finding, 'ScannerName', LoggedSourceProperty),
      eventTime: finding.eventTime,
    });

    if (finding.state === 'INACTIVE') {
      this.logger.info('Finding is no longer active, skipping remediation');
      return;
    }

    const settings = (this.dependencies.getSettings ?? getRuntimeSettings)();
    const configuration = await this.dependencies.loadConfiguration();
    const ctx = createInvocationContext(settings.timeoutMs, this.dependencies.clock ?? getClock());

    const executor = new RemediationExecutor({
      gateway: this.dependencies.gateway,
      configuration,
      logger: this.logger,
      maxWriteAttempts: settings.maxWriteAttempts,
    });
    const result = await executor.execute(ctx, { organizationID: finding.organizationID });

    this.logger.info('Remediation finished', {
      status: result.status,
      resource: result.resource,
      removedMembers: result.removedMembers.length,
      attempts: result.attempts,
    });
  }
}
