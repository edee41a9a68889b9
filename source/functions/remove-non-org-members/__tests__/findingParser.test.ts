// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod';
import {
  getOrganizationIdFromPath,
  optionalSourceProperty,
  parseFinding,
  requireSourceProperty,
} from '../findingParser';
import { MalformedPayloadError, UnsupportedFindingCategoryError } from '../../common/utils/remediationErrors';
import { buildNotification, TEST_ORG_ID } from './testData';

describe('parseFinding', () => {
  it('reads a finding of the supported category', () => {
    const finding = parseFinding(JSON.stringify(buildNotification()));

    expect(finding).toEqual({
      name: `organizations/${TEST_ORG_ID}/sources/1357913579/findings/f0e1d2c3b4a5968778695a4b3c2d1e0f`,
      organizationID: TEST_ORG_ID,
      category: 'NON_ORG_IAM_MEMBER',
      state: 'ACTIVE',
      resourceName: `//cloudresourcemanager.googleapis.com/organizations/${TEST_ORG_ID}`,
      sourceProperties: {
        ReactivationCount: 0,
        SeverityLevel: 'High',
        ScannerName: 'IAM_SCANNER',
        ProjectId: '(none)',
      },
      createTime: '2024-02-13T22:51:00.516Z',
      eventTime: '2024-03-04T09:30:24.033Z',
    });
  });

  it('accepts raw bytes', () => {
    const bytes = new Uint8Array(Buffer.from(JSON.stringify(buildNotification())));

    expect(parseFinding(bytes).organizationID).toBe(TEST_ORG_ID);
  });

  it('rejects other categories', () => {
    const payload = JSON.stringify(buildNotification({ category: 'OPEN_FIREWALL' }));

    expect(() => parseFinding(payload)).toThrow(UnsupportedFindingCategoryError);
    expect(() => parseFinding(payload)).toThrow(
      'Unsupported finding category "OPEN_FIREWALL", expected "NON_ORG_IAM_MEMBER"',
    );
  });

  it('marks unsupported categories as not retryable', () => {
    let caught: unknown;
    try {
      parseFinding(JSON.stringify(buildNotification({ category: 'ANY_OTHER_SHA' })));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnsupportedFindingCategoryError);
    expect(caught).toMatchObject({ retryable: false, stage: 'parse', category: 'ANY_OTHER_SHA' });
  });

  it('falls back to the resource name for the organization id', () => {
    const payload = JSON.stringify(buildNotification({ parent: 'folders/777/sources/1' }));

    expect(parseFinding(payload).organizationID).toBe(TEST_ORG_ID);
  });

  it('fails when no organization id can be found', () => {
    const payload = JSON.stringify(
      buildNotification({ parent: 'folders/777/sources/1', resourceName: '//cloudresourcemanager.googleapis.com/projects/p1' }),
    );

    expect(() => parseFinding(payload)).toThrow(MalformedPayloadError);
  });

  it('fails on invalid JSON', () => {
    expect(() => parseFinding('{"finding":')).toThrow('Notification payload is not valid JSON');
  });

  it('fails when required finding fields are missing', () => {
    const notification = buildNotification();
    const { category: _category, ...withoutCategory } = notification.finding;

    expect(() => parseFinding(JSON.stringify({ ...notification, finding: withoutCategory }))).toThrow(
      MalformedPayloadError,
    );
  });

  it('fails on an unknown finding state', () => {
    const notification = { ...buildNotification(), finding: { ...buildNotification().finding, state: 'MUTED' } };

    expect(() => parseFinding(JSON.stringify(notification))).toThrow(MalformedPayloadError);
  });
});

describe('getOrganizationIdFromPath', () => {
  it.each([
    ['organizations/1050/sources/1', '1050'],
    ['//cloudresourcemanager.googleapis.com/organizations/1050', '1050'],
    ['organizations/abc/sources/1', undefined],
    ['myorganizations/1050', undefined],
    ['projects/1050', undefined],
  ])('parses %s', (path, expected) => {
    expect(getOrganizationIdFromPath(path)).toBe(expected);
  });
});

describe('source properties', () => {
  const finding = parseFinding(JSON.stringify(buildNotification()));

  it('reads a present property with the expected shape', () => {
    expect(requireSourceProperty(finding, 'SeverityLevel', z.string())).toBe('High');
    expect(requireSourceProperty(finding, 'ReactivationCount', z.number())).toBe(0);
  });

  it('fails when a required property is absent', () => {
    expect(() => requireSourceProperty(finding, 'Explanation', z.string())).toThrow(
      `Finding ${finding.name} has no source property "Explanation"`,
    );
  });

  it('fails when a property has the wrong shape', () => {
    expect(() => requireSourceProperty(finding, 'SeverityLevel', z.number())).toThrow(MalformedPayloadError);
    expect(() => optionalSourceProperty(finding, 'SeverityLevel', z.number())).toThrow(MalformedPayloadError);
  });

  it('returns undefined for an absent optional property', () => {
    expect(optionalSourceProperty(finding, 'Explanation', z.string())).toBeUndefined();
  });

  it('ignores keys inherited by the property map', () => {
    expect(optionalSourceProperty(finding, 'constructor', z.string())).toBeUndefined();
    expect(() => requireSourceProperty(finding, 'toString', z.string())).toThrow(
      `Finding ${finding.name} has no source property "toString"`,
    );
  });
});
