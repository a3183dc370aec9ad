/**
 *  Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
 *
 *  Licensed under the Apache License, Version 2.0 (the "License"). You may not use this file except in compliance
 *  with the License. A copy of the License is located at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 *  or in the 'license' file accompanying this file. This file is distributed on an 'AS IS' BASIS, WITHOUT WARRANTIES
 *  OR CONDITIONS OF ANY KIND, express or implied. See the License for the specific language governing permissions
 *  and limitations under the License.
 */

import { APIGatewayClient } from '@aws-sdk/client-api-gateway';
import path from 'path';
import { createLogger } from '../common/logger';
import { ICorsConfiguration } from './interfaces';
import { getCorsHeaders } from './header-options';
import { putIntegration, putIntegrationResponse, putMethod, putMethodResponse } from './functions';
import {
  CORS_MOCK_REQUEST_TEMPLATE,
  DEFAULT_INTEGRATION_TIMEOUT_MS,
  JSON_CONTENT_TYPE,
  OPTIONS_METHOD,
  RESPONSE_STATUS_CODE,
} from './constants';

const logger = createLogger([path.parse(path.basename(__filename)).name]);

export function isCorsEnabled(cors?: ICorsConfiguration): boolean {
  return cors?.enabled ?? true;
}

/**
 * Explicit CORS headers, else the headers of the configured preset
 */
export function resolveCorsHeaders(cors?: ICorsConfiguration): Record<string, string> {
  return cors?.headers ?? getCorsHeaders(cors?.preset);
}

/**
 * Adds an OPTIONS method answered by a MOCK integration that returns the CORS headers
 */
export async function createCorsMethod(
  client: APIGatewayClient,
  restApiId: string,
  resourceId: string,
  corsHeaders: Record<string, string>,
  dryRun: boolean,
  logPrefix: string,
): Promise<void> {
  const target = { restApiId, resourceId, httpMethod: OPTIONS_METHOD };

  await putMethod(client, { ...target, authorizationType: 'NONE', apiKeyRequired: false }, dryRun, logPrefix);

  await putIntegration(
    client,
    {
      ...target,
      type: 'MOCK',
      requestTemplates: { [JSON_CONTENT_TYPE]: CORS_MOCK_REQUEST_TEMPLATE },
      passthroughBehavior: 'WHEN_NO_MATCH',
      timeoutInMillis: DEFAULT_INTEGRATION_TIMEOUT_MS,
    },
    dryRun,
    logPrefix,
  );

  const headerNames = Object.keys(corsHeaders);
  await putMethodResponse(
    client,
    {
      ...target,
      statusCode: RESPONSE_STATUS_CODE,
      responseParameters: Object.fromEntries(headerNames.map(name => [`method.response.header.${name}`, true])),
    },
    dryRun,
    logPrefix,
  );
  await putIntegrationResponse(
    client,
    {
      ...target,
      statusCode: RESPONSE_STATUS_CODE,
      responseParameters: Object.fromEntries(
        Object.entries(corsHeaders).map(([name, value]) => [`method.response.header.${name}`, value]),
      ),
    },
    dryRun,
    logPrefix,
  );

  logger.info(`CORS configured on resource ${resourceId}`, logPrefix);
}
