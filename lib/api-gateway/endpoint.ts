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
 * @fileoverview API Gateway Endpoint Module - Orchestrates the creation of one REST endpoint
 *
 * Steps, in order:
 * - parse_path: derive the API Gateway path and split it into segments
 * - create_resources: walk the segments root first, creating what is missing
 * - create_methods: put every HTTP method with the resolved authorization
 * - configure_integrations: VPC Link integration plus 200 method and integration responses
 * - create_cors: OPTIONS method backed by a MOCK integration (failure only adds a warning)
 * - verify: every method, OPTIONS included, must have an integration
 *
 * Every step is recorded in the response. A failing step stops the workflow and the response
 * carries its error code and the name of the step that failed.
 */

import { APIGatewayClient } from '@aws-sdk/client-api-gateway';
import path from 'path';
import { createLogger } from '../common/logger';
import { IModuleResponse, ModuleName } from '../common/interfaces';
import { MODULE_STATE_CODE } from '../common/types';
import { generateDryRunResponse, getErrorDetails, setRetryStrategy } from '../common/utility';
import {
  EndpointErrorCode,
  EndpointStepName,
  IEndpointCreationResponse,
  IEndpointModuleRequest,
  IEndpointStep,
} from './interfaces';
import { validateEndpointConfiguration } from './validators';
import { deriveApiGatewayPath, isValidPath, parsePathSegments } from './path-parser';
import { ensureResourceHierarchy } from './resource-hierarchy';
import { createHttpMethods, resolveMethodAuthorization } from './methods';
import { configureIntegrations } from './integrations';
import { createCorsMethod, isCorsEnabled, resolveCorsHeaders } from './cors';
import { findMissingIntegrations } from './verify';
import { OPTIONS_METHOD } from './constants';

const logger = createLogger([path.parse(path.basename(__filename)).name]);

/**
 * Failure of a workflow step, carrying the error code reported to the caller
 */
class EndpointStepError extends Error {
  constructor(
    readonly errorCode: EndpointErrorCode,
    message: string,
  ) {
    super(message);
    this.name = errorCode;
  }
}

/**
 * Runs one step, recording it as failed and converting its error when the action throws
 */
async function runStep<T>(
  steps: IEndpointStep[],
  name: EndpointStepName,
  errorCode: EndpointErrorCode,
  action: () => Promise<T>,
): Promise<T> {
  try {
    return await action();
  } catch (error: unknown) {
    steps.push({ name, status: 'failed' });
    if (error instanceof EndpointStepError) {
      throw error;
    }
    throw new EndpointStepError(errorCode, getErrorDetails(error).message);
  }
}

/**
 * Creates (or completes) one endpoint of a REST API
 *
 * @param props {@link IEndpointModuleRequest}
 * @returns Module response whose `response` lists the executed steps
 *
 * @example
 * ```typescript
 * const result = await createEndpoint({
 *   operation: 'create-endpoint',
 *   partition: 'aws',
 *   region: 'us-east-1',
 *   globalRegion: 'us-east-1',
 *   invokingAccountId: '111111111111',
 *   configuration: {
 *     restApiId: 'a1b2c3d4e5',
 *     fullBackendPath: '/discounts/v1/items/{itemId}',
 *     httpMethods: ['GET'],
 *     integration: { connectionVariable: 'vpcLinkId', backendHost: 'https://internal-nlb.example.com' },
 *     authentication: { method: 'AUTHORIZER', authType: 'COGNITO_CUSTOMER', authorizerId: 'abc123' },
 *   },
 * });
 * ```
 */
export async function createEndpoint(
  props: IEndpointModuleRequest,
): Promise<IModuleResponse<IEndpointCreationResponse>> {
  const moduleName = props.moduleName ?? ModuleName.API_GATEWAY_ENDPOINT;
  const dryRun = props.dryRun ?? false;
  const config = props.configuration;
  const logPrefix = config.restApiId;
  const steps: IEndpointStep[] = [];
  const warnings: string[] = [];

  const failure = (errorCode: EndpointErrorCode, message: string): IModuleResponse<IEndpointCreationResponse> => {
    const summary = `Endpoint creation failed with error : ${message}`;
    logger.error(summary, logPrefix);
    return {
      error: { name: errorCode, message },
      status: MODULE_STATE_CODE.FAILED,
      summary,
      timestamp: new Date().toISOString(),
      moduleName,
      dryRun,
      response: { steps, warnings, errorCode, failedStep: steps.at(-1)?.name },
    };
  };

  const validationErrors = validateEndpointConfiguration(config);
  if (validationErrors.length > 0) {
    return failure(EndpointErrorCode.INVALID_PAYLOAD, `Invalid endpoint configuration: ${validationErrors.join('; ')}`);
  }

  try {
    // parse_path
    const apiGatewayPath = config.apiGatewayPath ?? deriveApiGatewayPath(config.fullBackendPath);
    if (!isValidPath(apiGatewayPath)) {
      steps.push({ name: 'parse_path', status: 'failed' });
      return failure(EndpointErrorCode.INVALID_PAYLOAD, `Invalid API Gateway path: ${apiGatewayPath}`);
    }
    const segments = parsePathSegments(apiGatewayPath);
    steps.push({ name: 'parse_path', status: 'ok' });
    logger.processStart(
      `Creating endpoint ${apiGatewayPath} (${segments.length} segments) for ${config.fullBackendPath}`,
      logPrefix,
    );

    const client = new APIGatewayClient({
      region: props.region,
      customUserAgent: props.solutionId,
      retryStrategy: setRetryStrategy(),
      credentials: props.credentials,
    });

    // create_resources
    const hierarchy = await runStep(steps, 'create_resources', EndpointErrorCode.RESOURCE_CREATION_FAILED, () =>
      ensureResourceHierarchy(client, config.restApiId, apiGatewayPath, dryRun, logPrefix),
    );
    steps.push({
      name: 'create_resources',
      status: 'ok',
      created: hierarchy.created.length,
      skipped: hierarchy.skipped,
    });
    if (hierarchy.skipped > 0) {
      warnings.push(`${hierarchy.skipped} resources already existed`);
    }
    const resourceId = hierarchy.resourceId;

    // create_methods
    const existingMethods = await runStep(steps, 'create_methods', EndpointErrorCode.METHOD_CREATION_FAILED, () =>
      createHttpMethods(
        client,
        config.restApiId,
        resourceId,
        apiGatewayPath,
        config.httpMethods,
        resolveMethodAuthorization(config.authentication),
        dryRun,
        logPrefix,
      ),
    );
    steps.push({ name: 'create_methods', status: 'ok', count: config.httpMethods.length });
    warnings.push(...existingMethods.map(method => `Method ${method} already existed`));

    // configure_integrations
    const conflictingIntegrations = await runStep(
      steps,
      'configure_integrations',
      EndpointErrorCode.INTEGRATION_FAILED,
      () => configureIntegrations(client, config.restApiId, resourceId, apiGatewayPath, config, dryRun, logPrefix),
    );
    steps.push({ name: 'configure_integrations', status: 'ok' });
    warnings.push(...conflictingIntegrations.map(method => `Integration for ${method} already existed`));

    // create_cors
    const corsEnabled = isCorsEnabled(config.cors);
    if (!corsEnabled) {
      steps.push({ name: 'create_cors', status: 'skipped' });
    } else {
      try {
        const corsHeaders = resolveCorsHeaders(config.cors);
        const corsResourceIds = [resourceId];
        if (config.cors?.applyToCreatedResources) {
          corsResourceIds.push(...hierarchy.created.map(resource => resource.id).filter(id => id !== resourceId));
        }
        for (const corsResourceId of corsResourceIds) {
          await createCorsMethod(client, config.restApiId, corsResourceId, corsHeaders, dryRun, logPrefix);
        }
        steps.push({ name: 'create_cors', status: 'ok' });
      } catch (error: unknown) {
        const { message } = getErrorDetails(error);
        logger.warn(`CORS configuration failed: ${message}`, logPrefix);
        steps.push({ name: 'create_cors', status: 'failed' });
        warnings.push(`CORS configuration failed: ${message}`);
      }
    }

    // verify
    if (dryRun) {
      steps.push({ name: 'verify', status: 'skipped' });
    } else {
      const methodsToVerify: string[] = corsEnabled ? [...config.httpMethods, OPTIONS_METHOD] : [...config.httpMethods];
      const missing = await runStep(steps, 'verify', EndpointErrorCode.VERIFICATION_FAILED, () =>
        findMissingIntegrations(client, config.restApiId, resourceId, methodsToVerify, logPrefix),
      );
      if (missing.length > 0) {
        steps.push({ name: 'verify', status: 'failed' });
        return failure(
          EndpointErrorCode.VERIFICATION_FAILED,
          `Integration verification failed, missing integrations for ${missing.join(', ')}`,
        );
      }
      steps.push({ name: 'verify', status: 'ok' });
    }

    logger.processEnd(`Endpoint ${apiGatewayPath} ready (resource ${resourceId})`, logPrefix);

    const summary = dryRun
      ? generateDryRunResponse(
          moduleName,
          props.operation,
          `Endpoint ${apiGatewayPath} would be created with ${hierarchy.created.length} new resources`,
        )
      : `Endpoint ${apiGatewayPath} created on REST API ${config.restApiId}`;

    return {
      status: MODULE_STATE_CODE.SUCCESS,
      summary,
      timestamp: new Date().toISOString(),
      moduleName,
      dryRun,
      response: { resourceId, apiGatewayPath, steps, warnings },
    };
  } catch (error: unknown) {
    if (error instanceof EndpointStepError) {
      return failure(error.errorCode, error.message);
    }
    steps.push({ name: 'error', status: 'failed' });
    return failure(EndpointErrorCode.ENDPOINT_CREATION_ERROR, getErrorDetails(error).message);
  }
}
