// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod';

// Category emitted by the IAM scanner for users outside the organization
export const NON_ORG_IAM_MEMBER_CATEGORY = 'NON_ORG_IAM_MEMBER';

export type FindingState = 'ACTIVE' | 'INACTIVE';

export const SecurityFindingSchema = z
  .object({
    name: z.string(),
    parent: z.string(),
    resourceName: z.string(),
    state: z.enum(['ACTIVE', 'INACTIVE']),
    category: z.string(),
    externalUri: z.string().optional(),
    sourceProperties: z.record(z.unknown()).default({}),
    securityMarks: z
      .object({
        name: z.string(),
        marks: z.record(z.string()).optional(),
      })
      .optional(),
    eventTime: z.string(),
    createTime: z.string(),
  })
  .passthrough();

export const NotificationEnvelopeSchema = z.object({
  notificationConfigName: z.string(),
  finding: SecurityFindingSchema,
});

export type SecurityFinding = z.infer<typeof SecurityFindingSchema>;
export type NotificationEnvelope = z.infer<typeof NotificationEnvelopeSchema>;

/** Finding as consumed by a remediation, with the owning organization resolved */
export interface Finding {
  name: string;
  organizationID: string;
  category: string;
  state: FindingState;
  resourceName: string;
  sourceProperties: Record<string, unknown>;
  createTime: string;
  eventTime: string;
}
