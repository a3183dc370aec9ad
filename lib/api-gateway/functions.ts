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
 * @fileoverview API Gateway Core Functions - REST API resource, method and integration operations
 *
 * Every mutating function honours `dryRun`: the command is logged and not sent. Puts rejected
 * with ConflictException are logged as warnings and reported as `false` so callers can treat the
 * target as already present. Read paths that run at scale are wrapped with throttling backoff.
 */

import {
  APIGatewayClient,
  Authorizer,
  ConflictException,
  CreateResourceCommand,
  CreateResourceCommandInput,
  GetAuthorizerCommand,
  GetAuthorizersCommand,
  GetIntegrationCommand,
  GetResourcesCommand,
  GetRestApiCommand,
  GetStagesCommand,
  Integration,
  NotFoundException,
  PutIntegrationCommand,
  PutIntegrationCommandInput,
  PutIntegrationResponseCommand,
  PutIntegrationResponseCommandInput,
  PutMethodCommand,
  PutMethodCommandInput,
  PutMethodResponseCommand,
  PutMethodResponseCommandInput,
  Resource,
  RestApi,
  Stage,
  paginateGetRestApis,
} from '@aws-sdk/client-api-gateway';
import path from 'path';
import { createLogger } from '../common/logger';
import { executeApi } from '../common/utility';
import { throttlingBackOff } from '../common/throttle';
import { MODULE_EXCEPTIONS } from '../common/types';

const logger = createLogger([path.parse(path.basename(__filename)).name]);

/** Page size of GetResources and GetAuthorizers, the service maximum */
const PAGE_LIMIT = 500;

/**
 * Lists every resource of a REST API
 * @param client - API Gateway client
 * @param restApiId - REST API id
 * @param logPrefix - Prefix for logging messages
 * @param embedMethods - Embed the method definitions of every resource
 */
export async function listResources(
  client: APIGatewayClient,
  restApiId: string,
  logPrefix: string,
  embedMethods = false,
): Promise<Resource[]> {
  const commandName = 'GetResourcesCommand';
  const parameters = { restApiId, limit: PAGE_LIMIT, embed: embedMethods ? ['methods'] : undefined };
  logger.commandExecution(commandName, parameters, logPrefix);

  const resources: Resource[] = [];
  let position: string | undefined;
  do {
    const page = await throttlingBackOff(() => client.send(new GetResourcesCommand({ ...parameters, position })));
    resources.push(...(page.items ?? []));
    position = page.position;
  } while (position);

  logger.commandSuccess(commandName, parameters, logPrefix);
  return resources;
}

/**
 * Finds the id of the `/` resource
 * @throws {Error} When the list holds no root resource
 */
export function getRootResourceId(resources: Resource[], restApiId: string): string {
  const rootId = resources.find(resource => resource.path === '/')?.id;
  if (!rootId) {
    throw new Error(`${MODULE_EXCEPTIONS.SERVICE_EXCEPTION}: Root resource not found for REST API ${restApiId}`);
  }
  return rootId;
}

/**
 * Creates one child resource
 * @returns The created resource, undefined on dry run or when a resource with the same path part already exists
 */
export async function createResource(
  client: APIGatewayClient,
  input: CreateResourceCommandInput,
  dryRun: boolean,
  logPrefix: string,
): Promise<Resource | undefined> {
  const commandName = 'CreateResourceCommand';
  const parameters = { ...input };
  if (dryRun) {
    logger.dryRun(commandName, parameters, logPrefix);
    return undefined;
  }

  try {
    return await executeApi(
      commandName,
      parameters,
      () => client.send(new CreateResourceCommand(parameters)),
      logger,
      logPrefix,
      [ConflictException],
    );
  } catch (error: unknown) {
    if (error instanceof ConflictException) {
      logger.warn(`Resource ${input.pathPart} already exists under ${input.parentId}`, logPrefix);
      return undefined;
    }
    throw error;
  }
}

/**
 * Sends a put command, mapping ConflictException to `false`
 */
async function sendPut<TInput extends object>(
  commandName: string,
  input: TInput,
  send: (parameters: TInput) => Promise<unknown>,
  dryRun: boolean,
  logPrefix: string,
  conflictMessage: string,
): Promise<boolean> {
  if (dryRun) {
    logger.dryRun(commandName, input, logPrefix);
    return true;
  }

  try {
    await executeApi(commandName, input, () => send(input), logger, logPrefix, [ConflictException]);
    return true;
  } catch (error: unknown) {
    if (error instanceof ConflictException) {
      logger.warn(conflictMessage, logPrefix);
      return false;
    }
    throw error;
  }
}

/**
 * Creates a method on a resource
 * @returns false when the method already exists
 */
export async function putMethod(
  client: APIGatewayClient,
  input: PutMethodCommandInput,
  dryRun: boolean,
  logPrefix: string,
): Promise<boolean> {
  return sendPut(
    'PutMethodCommand',
    input,
    parameters => client.send(new PutMethodCommand(parameters)),
    dryRun,
    logPrefix,
    `Method ${input.httpMethod} already exists on resource ${input.resourceId}`,
  );
}

/**
 * Sets up the integration of a method
 * @returns false when the service reports a conflict
 */
export async function putIntegration(
  client: APIGatewayClient,
  input: PutIntegrationCommandInput,
  dryRun: boolean,
  logPrefix: string,
): Promise<boolean> {
  return sendPut(
    'PutIntegrationCommand',
    input,
    parameters => client.send(new PutIntegrationCommand(parameters)),
    dryRun,
    logPrefix,
    `Integration for ${input.httpMethod} on resource ${input.resourceId} conflicts with an existing one`,
  );
}

export async function putMethodResponse(
  client: APIGatewayClient,
  input: PutMethodResponseCommandInput,
  dryRun: boolean,
  logPrefix: string,
): Promise<boolean> {
  return sendPut(
    'PutMethodResponseCommand',
    input,
    parameters => client.send(new PutMethodResponseCommand(parameters)),
    dryRun,
    logPrefix,
    `Method response ${input.statusCode} for ${input.httpMethod} already exists on resource ${input.resourceId}`,
  );
}

export async function putIntegrationResponse(
  client: APIGatewayClient,
  input: PutIntegrationResponseCommandInput,
  dryRun: boolean,
  logPrefix: string,
): Promise<boolean> {
  return sendPut(
    'PutIntegrationResponseCommand',
    input,
    parameters => client.send(new PutIntegrationResponseCommand(parameters)),
    dryRun,
    logPrefix,
    `Integration response ${input.statusCode} for ${input.httpMethod} already exists on resource ${input.resourceId}`,
  );
}

/**
 * Reads the integration of a method
 * @returns undefined when the method has no integration
 */
export async function getIntegration(
  client: APIGatewayClient,
  restApiId: string,
  resourceId: string,
  httpMethod: string,
  logPrefix: string,
): Promise<Integration | undefined> {
  const parameters = { restApiId, resourceId, httpMethod };
  try {
    return await executeApi(
      'GetIntegrationCommand',
      parameters,
      () => client.send(new GetIntegrationCommand(parameters)),
      logger,
      logPrefix,
      [NotFoundException],
    );
  } catch (error: unknown) {
    if (error instanceof NotFoundException) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Lists every REST API of the account and region
 */
export async function listRestApis(client: APIGatewayClient, logPrefix: string): Promise<RestApi[]> {
  const commandName = 'paginateGetRestApis';
  const parameters = { limit: PAGE_LIMIT };
  logger.commandExecution(commandName, parameters, logPrefix);

  const restApis: RestApi[] = [];
  const paginator = paginateGetRestApis({ client, pageSize: PAGE_LIMIT }, {});
  for await (const page of paginator) {
    restApis.push(...(page.items ?? []));
  }

  logger.commandSuccess(commandName, parameters, logPrefix);
  return restApis;
}

/**
 * Reads one REST API
 * @returns undefined when the API does not exist
 */
export async function getRestApi(
  client: APIGatewayClient,
  restApiId: string,
  logPrefix: string,
): Promise<RestApi | undefined> {
  const parameters = { restApiId };
  try {
    return await executeApi(
      'GetRestApiCommand',
      parameters,
      () => client.send(new GetRestApiCommand(parameters)),
      logger,
      logPrefix,
      [NotFoundException],
    );
  } catch (error: unknown) {
    if (error instanceof NotFoundException) {
      return undefined;
    }
    throw error;
  }
}

export async function listStages(client: APIGatewayClient, restApiId: string, logPrefix: string): Promise<Stage[]> {
  const parameters = { restApiId };
  const response = await executeApi(
    'GetStagesCommand',
    parameters,
    () => client.send(new GetStagesCommand(parameters)),
    logger,
    logPrefix,
  );
  return response.item ?? [];
}

/**
 * Lists the authorizers of a REST API, following `position` until the last page
 */
export async function listAuthorizers(
  client: APIGatewayClient,
  restApiId: string,
  logPrefix: string,
): Promise<Authorizer[]> {
  const commandName = 'GetAuthorizersCommand';
  const parameters = { restApiId, limit: PAGE_LIMIT };
  logger.commandExecution(commandName, parameters, logPrefix);

  const authorizers: Authorizer[] = [];
  let position: string | undefined;
  do {
    const page = await throttlingBackOff(() => client.send(new GetAuthorizersCommand({ ...parameters, position })));
    authorizers.push(...(page.items ?? []));
    position = page.position;
  } while (position);

  logger.commandSuccess(commandName, parameters, logPrefix);
  return authorizers;
}

/**
 * Reads one authorizer
 * @returns undefined when the authorizer does not exist
 */
export async function getAuthorizer(
  client: APIGatewayClient,
  restApiId: string,
  authorizerId: string,
  logPrefix: string,
): Promise<Authorizer | undefined> {
  const parameters = { restApiId, authorizerId };
  try {
    return await executeApi(
      'GetAuthorizerCommand',
      parameters,
      () => throttlingBackOff(() => client.send(new GetAuthorizerCommand(parameters))),
      logger,
      logPrefix,
      [NotFoundException],
    );
  } catch (error: unknown) {
    if (error instanceof NotFoundException) {
      return undefined;
    }
    throw error;
  }
}
