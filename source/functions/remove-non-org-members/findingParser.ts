// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod';
import { Finding, NON_ORG_IAM_MEMBER_CATEGORY, NotificationEnvelopeSchema } from '../../data-models';
import { MalformedPayloadError, UnsupportedFindingCategoryError } from '../common/utils/remediationErrors';

// matches organizations/{id} as a path segment, e.g. in
// organizations/1050000000008/sources/1986930501000008034 or
// //cloudresourcemanager.googleapis.com/organizations/1050000000008
const ORGANIZATION_PATH_REGEX = /(?:^|\/)organizations\/(\d+)(?:\/|$)/;

export function getOrganizationIdFromPath(path: string): string | undefined {
  return ORGANIZATION_PATH_REGEX.exec(path)?.[1];
}

/**
 * Decodes a security finding notification and validates that it belongs to this remediation.
 * @param raw - notification body as delivered by the trigger
 * @param expectedCategory - the only category this remediation handles
 */
export function parseFinding(raw: Uint8Array | string, expectedCategory = NON_ORG_IAM_MEMBER_CATEGORY): Finding {
  const text = typeof raw === 'string' ? raw : Buffer.from(raw).toString('utf8');

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new MalformedPayloadError('Notification payload is not valid JSON', error);
  }

  const result = NotificationEnvelopeSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new MalformedPayloadError(`Notification payload does not match the finding schema: ${issues.join('; ')}`);
  }

  const { finding } = result.data;
  if (finding.category !== expectedCategory) {
    throw new UnsupportedFindingCategoryError(finding.category, expectedCategory);
  }

  const organizationID = getOrganizationIdFromPath(finding.parent) ?? getOrganizationIdFromPath(finding.resourceName);
  if (!organizationID) {
    throw new MalformedPayloadError(
      `Unable to extract an organization id from parent "${finding.parent}" or resourceName "${finding.resourceName}"`,
    );
  }

  return {
    name: finding.name,
    organizationID,
    category: finding.category,
    state: finding.state,
    resourceName: finding.resourceName,
    sourceProperties: finding.sourceProperties,
    createTime: finding.createTime,
    eventTime: finding.eventTime,
  };
}

/** Reads a source property that must be present with the given shape */
export function requireSourceProperty<T extends z.ZodTypeAny>(finding: Finding, key: string, schema: T): z.infer<T> {
  if (!Object.hasOwn(finding.sourceProperties, key)) {
    throw new MalformedPayloadError(`Finding ${finding.name} has no source property "${key}"`);
  }
  const result = schema.safeParse(finding.sourceProperties[key]);
  if (!result.success) {
    throw new MalformedPayloadError(`Source property "${key}" of finding ${finding.name} has an unexpected shape`, result.error);
  }
  return result.data;
}

/** Like `requireSourceProperty`, but an absent property yields undefined */
export function optionalSourceProperty<T extends z.ZodTypeAny>(
  finding: Finding,
  key: string,
  schema: T,
): z.infer<T> | undefined {
  if (!Object.hasOwn(finding.sourceProperties, key)) return undefined;
  return requireSourceProperty(finding, key, schema);
}
