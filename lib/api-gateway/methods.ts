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
import { HttpMethod, IAuthenticationConfiguration, IMethodAuthorization } from './interfaces';
import { getPathParameters } from './path-parser';
import { putMethod } from './functions';

const logger = createLogger([path.parse(path.basename(__filename)).name]);

/**
 * Maps the authentication settings onto the API Gateway method authorization
 *
 * - API_KEY method or auth type: no authorizer, API key required
 * - NO_AUTH auth type: no authorization at all
 * - anything else: Cognito user pool authorizer
 */
export function resolveMethodAuthorization(authentication?: IAuthenticationConfiguration): IMethodAuthorization {
  if (authentication?.method === 'API_KEY' || authentication?.authType === 'API_KEY') {
    return { authorizationType: 'NONE', apiKeyRequired: true };
  }
  if (authentication?.authType === 'NO_AUTH') {
    return { authorizationType: 'NONE', apiKeyRequired: false };
  }
  return { authorizationType: 'COGNITO_USER_POOLS', apiKeyRequired: false, authorizerId: authentication?.authorizerId };
}

/**
 * Builds `method.request.path.<name>: true` for every placeholder of the path
 */
export function buildMethodRequestParameters(resourcePath: string): Record<string, boolean> {
  return Object.fromEntries(getPathParameters(resourcePath).map(name => [`method.request.path.${name}`, true]));
}

/**
 * Creates the HTTP methods of a resource
 * @returns Methods that already existed
 */
export async function createHttpMethods(
  client: APIGatewayClient,
  restApiId: string,
  resourceId: string,
  resourcePath: string,
  httpMethods: HttpMethod[],
  authorization: IMethodAuthorization,
  dryRun: boolean,
  logPrefix: string,
): Promise<HttpMethod[]> {
  const requestParameters = buildMethodRequestParameters(resourcePath);
  const existing: HttpMethod[] = [];

  for (const httpMethod of httpMethods) {
    const created = await putMethod(
      client,
      {
        restApiId,
        resourceId,
        httpMethod,
        authorizationType: authorization.authorizationType,
        authorizerId: authorization.authorizerId,
        apiKeyRequired: authorization.apiKeyRequired,
        requestParameters: Object.keys(requestParameters).length > 0 ? requestParameters : undefined,
      },
      dryRun,
      logPrefix,
    );
    if (created) {
      logger.info(`Created method ${httpMethod} on ${resourcePath}`, logPrefix);
    } else {
      existing.push(httpMethod);
    }
  }

  return existing;
}
