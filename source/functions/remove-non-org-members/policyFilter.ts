// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Policy, PolicyBinding } from '../../data-models';
import { isAllowed } from './principalMatcher';

export interface RemovedMember {
  role: string;
  member: string;
}

export interface FilterResult {
  policy: Policy;
  removedMembers: RemovedMember[];
}

/**
 * Drops disallowed members from every binding, keeping member order. Bindings themselves are
 * never dropped, even when left without members.
 */
export function filterPolicy(policy: Policy, orgDomain: string, allowDomains: ReadonlySet<string>): FilterResult {
  const removedMembers: RemovedMember[] = [];

  const bindings = policy.bindings.map((binding): PolicyBinding => {
    const members = binding.members.filter((member) => {
      const allowed = isAllowed(member, orgDomain, allowDomains);
      if (!allowed) removedMembers.push({ role: binding.role, member });
      return allowed;
    });
    return { ...binding, members };
  });

  return { policy: { ...policy, bindings }, removedMembers };
}

function sameMembers(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const members = new Set(a);
  return b.every((member) => members.has(member)) && new Set(b).size === members.size;
}

/** Pairwise comparison of role and member set */
export function bindingsEqual(a: readonly PolicyBinding[], b: readonly PolicyBinding[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((binding, index) => binding.role === b[index].role && sameMembers(binding.members, b[index].members));
}
