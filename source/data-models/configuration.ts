// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod';

export const ORGANIZATION_RESOURCE_PATTERN = /^organizations\/\d+$/;

const DomainSchema = z
  .string()
  .min(1, 'Domain must not be empty')
  .refine((domain) => !domain.includes('@'), { message: 'Domain must not contain "@"' })
  .refine((domain) => !/\s/.test(domain), { message: 'Domain must not contain whitespace' });

const ResourceSchema = z.string().regex(ORGANIZATION_RESOURCE_PATTERN, 'Resource must look like organizations/{id}');

export const RemoveNonOrgMembersConfigurationSchema = z.object({
  AllowDomains: z.array(DomainSchema).default([]),
  Resources: z.array(ResourceSchema).nullable().default(null),
});

export type RemoveNonOrgMembersConfiguration = z.infer<typeof RemoveNonOrgMembersConfigurationSchema>;
