// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Principal, PrincipalType } from '../../data-models';

const KNOWN_TYPES: ReadonlySet<string> = new Set<PrincipalType>(['user', 'serviceAccount', 'group', 'domain']);

function isKnownType(type: string): type is Exclude<PrincipalType, 'other'> {
  return KNOWN_TYPES.has(type);
}

/**
 * Splits a binding member such as `user:alice@example.com` on its first colon.
 * Members without a recognised type prefix (allUsers, deleted:user:..., principal://...) are `other`.
 */
export function parsePrincipal(member: string): Principal {
  const separator = member.indexOf(':');
  if (separator === -1) return { type: 'other', identifier: member };

  const type = member.substring(0, separator);
  const identifier = member.substring(separator + 1);
  return { type: isKnownType(type) ? type : 'other', identifier };
}

/** Domain after the last `@` of an identifier, or undefined when there is none */
export function getEmailDomain(identifier: string): string | undefined {
  const at = identifier.lastIndexOf('@');
  if (at === -1 || at === identifier.length - 1) return undefined;
  return identifier.substring(at + 1);
}

/**
 * Decides whether a member may stay in a binding. Only `user` members are filtered; their
 * domain must equal the organization's domain or one of `allowDomains` exactly, so neither
 * evilexample.com nor example.com.evil pass for example.com, and sub.example.com needs its own entry.
 */
export function isAllowed(member: string, orgDomain: string, allowDomains: ReadonlySet<string>): boolean {
  const { type, identifier } = parsePrincipal(member);
  if (type !== 'user') return true;

  const domain = getEmailDomain(identifier);
  if (domain === undefined) return false;

  return domain === orgDomain || allowDomains.has(domain);
}
