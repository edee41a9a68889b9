// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import * as functions from '@google-cloud/functions-framework';
import { ResourceManagerGateway } from '../common/gateway/resourceManagerGateway';
import { loadConfiguration } from '../common/utils/configuration';
import { getLogger } from '../common/utils/logger';
import { MessagePublishedData, RemoveNonOrgMembersHandler } from './removeNonOrgMembersHandler';

const logger = getLogger();

const handler = new RemoveNonOrgMembersHandler({
  logger,
  gateway: new ResourceManagerGateway(logger),
  loadConfiguration: () => loadConfiguration(logger),
});

functions.cloudEvent<MessagePublishedData>('removeNonOrgMembers', (event: functions.CloudEvent<MessagePublishedData>) =>
  handler.handle(event),
);
