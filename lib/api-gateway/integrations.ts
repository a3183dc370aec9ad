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

/**
 * @fileoverview VPC Link integrations
 *
 * Each method is wired to `<backend host><full backend path>` through the VPC Link whose id is
 * held by a stage variable, so one endpoint definition serves every stage of the API.
 */

import { APIGatewayClient } from '@aws-sdk/client-api-gateway';
import path from 'path';
import { createLogger } from '../common/logger';
import { HttpMethod, IEndpointConfiguration, IIntegrationConfiguration } from './interfaces';
import { getPathParameters } from './path-parser';
import { resolveAuthHeaders } from './header-options';
import { putIntegration, putIntegrationResponse, putMethodResponse } from './functions';
import {
  DEFAULT_CONNECTION_TYPE,
  DEFAULT_INTEGRATION_TIMEOUT_MS,
  DEFAULT_INTEGRATION_TYPE,
  DEFAULT_PASSTHROUGH_BEHAVIOR,
  JSON_CONTENT_TYPE,
  RESPONSE_MODEL,
  RESPONSE_STATUS_CODE,
} from './constants';

const logger = createLogger([path.parse(path.basename(__filename)).name]);

/**
 * Returns the integration headers: explicit auth headers or the catalogue defaults of the auth
 * type, then the custom headers, which win on a name clash
 */
export function resolveIntegrationHeaders(config: IEndpointConfiguration): Record<string, string> {
  const authType = config.authentication?.authType;
  const authHeaders =
    config.headers?.authHeaders ??
    (authType ? resolveAuthHeaders(authType, { cognitoPool: config.authentication?.cognitoPool }) : {});

  return { ...authHeaders, ...config.headers?.customHeaders };
}

/**
 * Builds the integration request parameters: headers, then path parameter mappings
 *
 * @example
 * ```typescript
 * buildIntegrationRequestParameters({ 'Claim-Email': 'context.authorizer.claims.email' }, '/v1/items/{itemId}');
 * // {
 * //   'integration.request.header.Claim-Email': 'context.authorizer.claims.email',
 * //   'integration.request.path.itemId': 'method.request.path.itemId',
 * // }
 * ```
 */
export function buildIntegrationRequestParameters(
  headers: Record<string, string>,
  resourcePath: string,
): Record<string, string> {
  const parameters: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    parameters[`integration.request.header.${name}`] = value;
  }
  for (const name of getPathParameters(resourcePath)) {
    parameters[`integration.request.path.${name}`] = `method.request.path.${name}`;
  }
  return parameters;
}

/**
 * Returns the backend host, a stage variable reference when `backendHostVariable` is set
 */
export function resolveBackendHost(integration: IIntegrationConfiguration): string {
  if (integration.backendHostVariable) {
    return `https://\${stageVariables.${integration.backendHostVariable}}`;
  }
  return integration.backendHost ?? '';
}

/**
 * Puts the integration, method response and integration response of every method
 * @returns Methods whose integration conflicted with an existing one
 */
export async function configureIntegrations(
  client: APIGatewayClient,
  restApiId: string,
  resourceId: string,
  resourcePath: string,
  config: IEndpointConfiguration,
  dryRun: boolean,
  logPrefix: string,
): Promise<HttpMethod[]> {
  const integration = config.integration;
  const uri = `${resolveBackendHost(integration)}${config.fullBackendPath}`;
  const requestParameters = buildIntegrationRequestParameters(resolveIntegrationHeaders(config), resourcePath);
  const conflicts: HttpMethod[] = [];

  for (const httpMethod of config.httpMethods) {
    const target = { restApiId, resourceId, httpMethod };

    const configured = await putIntegration(
      client,
      {
        ...target,
        type: integration.integrationType ?? DEFAULT_INTEGRATION_TYPE,
        integrationHttpMethod: httpMethod,
        uri,
        connectionType: integration.connectionType ?? DEFAULT_CONNECTION_TYPE,
        connectionId: `\${stageVariables.${integration.connectionVariable}}`,
        requestParameters,
        passthroughBehavior: integration.passthroughBehavior ?? DEFAULT_PASSTHROUGH_BEHAVIOR,
        timeoutInMillis: integration.timeoutMs ?? DEFAULT_INTEGRATION_TIMEOUT_MS,
      },
      dryRun,
      logPrefix,
    );
    if (!configured) {
      conflicts.push(httpMethod);
      continue;
    }

    await putMethodResponse(
      client,
      { ...target, statusCode: RESPONSE_STATUS_CODE, responseModels: { [JSON_CONTENT_TYPE]: RESPONSE_MODEL } },
      dryRun,
      logPrefix,
    );
    await putIntegrationResponse(
      client,
      { ...target, statusCode: RESPONSE_STATUS_CODE, responseTemplates: { [JSON_CONTENT_TYPE]: '' } },
      dryRun,
      logPrefix,
    );

    logger.info(`Configured integration ${httpMethod} -> ${uri}`, logPrefix);
  }

  return conflicts;
}
