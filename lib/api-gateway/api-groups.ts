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

import { APIGatewayClient, RestApi } from '@aws-sdk/client-api-gateway';
import path from 'path';
import { createLogger } from '../common/logger';
import { IModuleResponse, ModuleName } from '../common/interfaces';
import { MODULE_STATE_CODE } from '../common/types';
import { getErrorDetails, setRetryStrategy } from '../common/utility';
import { ApiEnvironment, IApiGroup, IApiGroupsModuleRequest, IApiGroupsResponse, IRestApiSummary } from './interfaces';
import { listRestApis } from './functions';

const logger = createLogger([path.parse(path.basename(__filename)).name]);

const ENVIRONMENTS: readonly ApiEnvironment[] = ['CI', 'DEV', 'PROD'];

function toEnvironment(suffix: string): ApiEnvironment | undefined {
  return ENVIRONMENTS.find(environment => environment === suffix.toUpperCase());
}

function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Groups REST APIs by base name, `orders-api-dev` and `orders-api-PROD` both land in `orders-api`
 *
 * A name whose last `-` suffix is not CI, DEV or PROD forms its own group. Nameless APIs are
 * dropped. Groups, and the APIs within a group, are sorted by name in code point order, so
 * upper case sorts before lower case.
 */
export function groupRestApis(restApis: RestApi[]): IApiGroup[] {
  const groups = new Map<string, IRestApiSummary[]>();

  for (const restApi of restApis) {
    if (!restApi.name || !restApi.id) {
      continue;
    }

    const separatorIndex = restApi.name.lastIndexOf('-');
    const environment = separatorIndex > 0 ? toEnvironment(restApi.name.slice(separatorIndex + 1)) : undefined;
    const baseName = environment ? restApi.name.slice(0, separatorIndex) : restApi.name;

    const apis = groups.get(baseName) ?? [];
    apis.push({ id: restApi.id, name: restApi.name, environment });
    groups.set(baseName, apis);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => compareCodePoints(a, b))
    .map(([name, apis]) => ({ name, apis: apis.sort((a, b) => compareCodePoints(a.name, b.name)) }));
}

/**
 * Lists the REST APIs of the account and region grouped by base name
 * @param props {@link IApiGroupsModuleRequest}
 */
export async function listApiGroups(props: IApiGroupsModuleRequest): Promise<IModuleResponse<IApiGroupsResponse>> {
  const moduleName = props.moduleName ?? ModuleName.API_GATEWAY_GROUPS;
  const dryRun = props.dryRun ?? false;
  const logPrefix = `${props.invokingAccountId}:${props.region}`;

  try {
    const client = new APIGatewayClient({
      region: props.region,
      customUserAgent: props.solutionId,
      retryStrategy: setRetryStrategy(),
      credentials: props.credentials,
    });

    const groups = groupRestApis(await listRestApis(client, logPrefix));
    const summary = `Found ${groups.length} API groups`;
    logger.info(summary, logPrefix);

    return {
      status: MODULE_STATE_CODE.SUCCESS,
      summary,
      timestamp: new Date().toISOString(),
      moduleName,
      dryRun,
      response: { groups },
    };
  } catch (error: unknown) {
    const errorDetails = getErrorDetails(error);
    const summary = `Listing API groups failed with error : ${errorDetails.message}`;
    logger.error(summary, logPrefix);
    return {
      error: errorDetails,
      status: MODULE_STATE_CODE.FAILED,
      summary,
      timestamp: new Date().toISOString(),
      moduleName,
      dryRun,
    };
  }
}
