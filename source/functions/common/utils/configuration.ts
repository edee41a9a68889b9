// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Logger } from '@aws-lambda-powertools/logger';
import { RemoveNonOrgMembersConfiguration, RemoveNonOrgMembersConfigurationSchema } from '../../../data-models';
import { ConfigurationError } from './remediationErrors';

export const DEFAULT_CONFIG_PATH = 'config.json';
export const DEFAULT_TIMEOUT_MS = 50_000;
export const DEFAULT_MAX_WRITE_ATTEMPTS = 3;

export interface RuntimeSettings {
  timeoutMs: number;
  maxWriteAttempts: number;
}

const configurationCache = new Map<string, RemoveNonOrgMembersConfiguration>();

/** Validates an already-decoded configuration document */
export function parseConfiguration(document: unknown): RemoveNonOrgMembersConfiguration {
  const result = RemoveNonOrgMembersConfigurationSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid remediation configuration: ${issues.join('; ')}`, result.error);
  }
  return result.data;
}

export async function loadConfiguration(
  logger: Logger,
  path: string = process.env.REMEDIATION_CONFIG_PATH ?? DEFAULT_CONFIG_PATH,
): Promise<RemoveNonOrgMembersConfiguration> {
  const absolutePath = resolve(path);
  const cached = configurationCache.get(absolutePath);
  if (cached) {
    logger.debug('Using cached remediation configuration', { path: absolutePath });
    return cached;
  }

  let raw: string;
  try {
    raw = await readFile(absolutePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read remediation configuration from ${absolutePath}`, error);
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Remediation configuration at ${absolutePath} is not valid JSON`, error);
  }

  const configuration = parseConfiguration(document);
  configurationCache.set(absolutePath, configuration);

  logger.debug('Loaded remediation configuration', {
    path: absolutePath,
    allowDomains: configuration.AllowDomains,
    resources: configuration.Resources,
  });
  return configuration;
}

export function clearConfigurationCache(): void {
  configurationCache.clear();
}

function readPositiveInteger(name: string, fallback: number, env: NodeJS.ProcessEnv): number {
  const value = env[name];
  if (value === undefined || value === '') return fallback;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function getRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  return {
    timeoutMs: readPositiveInteger('REMEDIATION_TIMEOUT_MS', DEFAULT_TIMEOUT_MS, env),
    maxWriteAttempts: readPositiveInteger('MAX_WRITE_ATTEMPTS', DEFAULT_MAX_WRITE_ATTEMPTS, env),
  };
}
