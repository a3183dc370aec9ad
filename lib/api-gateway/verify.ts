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
import { getIntegration } from './functions';

/**
 * Checks that every method of the resource has an integration
 * @returns Methods without an integration
 */
export async function findMissingIntegrations(
  client: APIGatewayClient,
  restApiId: string,
  resourceId: string,
  httpMethods: string[],
  logPrefix: string,
): Promise<string[]> {
  const missing: string[] = [];
  for (const httpMethod of httpMethods) {
    const integration = await getIntegration(client, restApiId, resourceId, httpMethod, logPrefix);
    if (!integration) {
      missing.push(httpMethod);
    }
  }
  return missing;
}
