// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

export interface Organization {
  id: string;
  // primary domain of the organization's directory, e.g. example.com
  domain: string;
}

export interface BindingCondition {
  expression: string;
  title?: string;
  description?: string;
}

export interface PolicyBinding {
  role: string;
  members: string[];
  condition?: BindingCondition;
}

export interface Policy {
  bindings: PolicyBinding[];
  // IAM policy schema version; 3 when any binding carries a condition
  version?: number;
}

/** A policy together with the opaque version tag (etag) it was read at */
export interface VersionedPolicy {
  policy: Policy;
  version: string;
}

export type PrincipalType = 'user' | 'serviceAccount' | 'group' | 'domain' | 'other';

export interface Principal {
  type: PrincipalType;
  identifier: string;
}
