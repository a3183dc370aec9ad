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
 * @fileoverview Configuration Validation Module - Checks that the resources an endpoint relies on still exist
 *
 * Looks up the REST API, the stage variable holding the VPC Link id, and optionally the
 * authorizer and the Cognito user pool named in the configuration.
 */

import { APIGatewayClient } from '@aws-sdk/client-api-gateway';
import {
  CognitoIdentityProviderClient,
  UserPoolDescriptionType,
  paginateListUserPools,
} from '@aws-sdk/client-cognito-identity-provider';
import path from 'path';
import { createLogger } from '../common/logger';
import { IModuleResponse, ModuleName } from '../common/interfaces';
import { MODULE_STATE_CODE } from '../common/types';
import { getErrorDetails, setRetryStrategy } from '../common/utility';
import {
  IConfigurationChecks,
  IConfigurationValidationModuleRequest,
  IConfigurationValidationResponse,
} from './interfaces';
import { getRestApi, listAuthorizers, listStages } from './functions';

const logger = createLogger([path.parse(path.basename(__filename)).name]);

/** ListUserPools page size, the service maximum */
const USER_POOL_PAGE_SIZE = 60;

/**
 * Lists every Cognito user pool of the account and region
 */
export async function listUserPools(
  client: CognitoIdentityProviderClient,
  logPrefix: string,
): Promise<UserPoolDescriptionType[]> {
  const commandName = 'paginateListUserPools';
  const parameters = { MaxResults: USER_POOL_PAGE_SIZE };
  logger.commandExecution(commandName, parameters, logPrefix);

  const userPools: UserPoolDescriptionType[] = [];
  const paginator = paginateListUserPools({ client, pageSize: USER_POOL_PAGE_SIZE }, parameters);
  for await (const page of paginator) {
    userPools.push(...(page.UserPools ?? []));
  }

  logger.commandSuccess(commandName, parameters, logPrefix);
  return userPools;
}

/**
 * Validates the API, connection variable, authorizer and Cognito pool of a configuration
 *
 * @param props {@link IConfigurationValidationModuleRequest}
 * @returns SUCCESS when every performed check passed, FAILED otherwise
 */
export async function validateConfiguration(
  props: IConfigurationValidationModuleRequest,
): Promise<IModuleResponse<IConfigurationValidationResponse>> {
  const moduleName = props.moduleName ?? ModuleName.API_GATEWAY_CONFIGURATION;
  const dryRun = props.dryRun ?? false;
  const config = props.configuration;
  const logPrefix = config.restApiId;

  try {
    logger.processStart(`Validating configuration of REST API ${config.restApiId}`, logPrefix);

    const clientConfig = {
      region: props.region,
      customUserAgent: props.solutionId,
      retryStrategy: setRetryStrategy(),
      credentials: props.credentials,
    };
    const client = new APIGatewayClient(clientConfig);

    const restApi = await getRestApi(client, config.restApiId, logPrefix);
    const checks: IConfigurationChecks = { api: restApi !== undefined, connectionVariable: false };

    if (restApi) {
      const stages = await listStages(client, config.restApiId, logPrefix);
      checks.connectionVariable = stages.some(stage => config.connectionVariable in (stage.variables ?? {}));
    }

    if (config.authorizerId) {
      const authorizers = restApi ? await listAuthorizers(client, config.restApiId, logPrefix) : [];
      checks.authorizer = authorizers.some(authorizer => authorizer.id === config.authorizerId);
    }

    if (config.cognitoPool) {
      const cognitoClient = new CognitoIdentityProviderClient(clientConfig);
      const userPools = await listUserPools(cognitoClient, logPrefix);
      checks.cognitoPool = userPools.some(pool => pool.Name === config.cognitoPool);
    }

    const failedChecks = Object.entries(checks)
      .filter(([, passed]) => passed === false)
      .map(([name]) => name);
    const valid = failedChecks.length === 0;

    for (const [name, passed] of Object.entries(checks)) {
      logger.info(`${passed ? '✓' : '✗'} ${name}`, logPrefix);
    }

    const summary = valid
      ? `Configuration of REST API ${config.restApiId} is valid`
      : `Configuration of REST API ${config.restApiId} is invalid, failed checks: ${failedChecks.join(', ')}`;
    logger.processEnd(summary, logPrefix);

    return {
      status: valid ? MODULE_STATE_CODE.SUCCESS : MODULE_STATE_CODE.FAILED,
      summary,
      timestamp: new Date().toISOString(),
      moduleName,
      dryRun,
      response: { valid, checks },
    };
  } catch (error: unknown) {
    const errorDetails = getErrorDetails(error);
    const summary = `Configuration validation failed with error : ${errorDetails.message}`;
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
