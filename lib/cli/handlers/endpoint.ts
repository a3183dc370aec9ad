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
 * @fileoverview Endpoint CLI Command Handler - Parses and checks endpoint configurations
 *
 * Only the shape of the configuration is checked here, the endpoint module validates its values.
 */

import { createEndpoint } from '../../api-gateway/endpoint';
import {
  AUTH_METHODS,
  AUTH_TYPES,
  CORS_PRESETS,
  HTTP_METHODS,
  IEndpointConfiguration,
  IEndpointCreationResponse,
  IEndpointModuleRequest,
} from '../../api-gateway/interfaces';
import {
  CliExecutionParameterType,
  getConfig,
  getDryRunFromArgs,
  getSessionDetailsFromArgs,
  isOptionalOneOf,
  isOptionalString,
  isOptionalStringMap,
  isRecord,
  logError,
  logErrorAndExit,
} from './root';
import { IModuleResponse } from '../../common/interfaces';

const PASSTHROUGH_BEHAVIORS = ['WHEN_NO_MATCH', 'WHEN_NO_TEMPLATES', 'NEVER'] as const;
const INTEGRATION_TYPES = ['HTTP_PROXY', 'HTTP', 'AWS_PROXY', 'AWS', 'MOCK'] as const;
const CONNECTION_TYPES = ['VPC_LINK', 'INTERNET'] as const;

/**
 * Abstract command handler class for endpoint creation
 */
export abstract class EndpointCommand {
  /**
   * Creates the endpoint described by `--configuration`
   * @param param - CLI execution parameters
   */
  public static async execute(param: CliExecutionParameterType): Promise<IModuleResponse<IEndpointCreationResponse>> {
    return createEndpoint(await EndpointCommand.getParams(param));
  }

  /**
   * Parses and validates CLI parameters to create the endpoint module request
   * @param param - CLI execution parameters
   */
  public static async getParams(param: CliExecutionParameterType): Promise<IEndpointModuleRequest> {
    if (typeof param.args['configuration'] !== 'string') {
      logErrorAndExit(
        'An error occurred (MissingRequiredParameters): The configuration parameter is a required string',
      );
    }

    const config = getConfig(param.args['configuration']);
    if (!EndpointCommand.validConfig(config)) {
      process.exit(1);
    }

    const currentSessionDetails = await getSessionDetailsFromArgs(param);

    return {
      ...currentSessionDetails,
      moduleName: param.moduleName,
      operation: param.commandName,
      dryRun: getDryRunFromArgs(param),
      configuration: config,
    };
  }

  /**
   * Checks the configuration shape
   * @param config - Parsed configuration
   * @returns Type guard indicating if config is an {@link IEndpointConfiguration}
   */
  public static validConfig(config: unknown): config is IEndpointConfiguration {
    if (!isRecord(config)) {
      logError('(ConfigValidation): config must be an object');
      return false;
    }
    if (typeof config['restApiId'] !== 'string') {
      logError('(ConfigValidation): config.restApiId must be a string');
      return false;
    }
    if (typeof config['fullBackendPath'] !== 'string') {
      logError('(ConfigValidation): config.fullBackendPath must be a string');
      return false;
    }
    if (!isOptionalString(config['apiGatewayPath'])) {
      logError('(ConfigValidation): config.apiGatewayPath must be a string');
      return false;
    }
    const httpMethods = config['httpMethods'];
    const knownMethod = (method: unknown) => HTTP_METHODS.some(allowed => allowed === method);
    if (!Array.isArray(httpMethods) || !httpMethods.every(knownMethod)) {
      logError(`(ConfigValidation): config.httpMethods must be an array of ${HTTP_METHODS.join(', ')}`);
      return false;
    }
    return (
      EndpointCommand.validIntegration(config['integration']) &&
      EndpointCommand.validAuthentication(config['authentication']) &&
      EndpointCommand.validHeaders(config['headers']) &&
      EndpointCommand.validCors(config['cors'])
    );
  }

  private static validIntegration(integration: unknown): boolean {
    if (!isRecord(integration)) {
      logError('(ConfigValidation): config.integration must be an object');
      return false;
    }
    if (typeof integration['connectionVariable'] !== 'string') {
      logError('(ConfigValidation): config.integration.connectionVariable must be a string');
      return false;
    }
    if (!isOptionalString(integration['backendHost']) || !isOptionalString(integration['backendHostVariable'])) {
      logError('(ConfigValidation): config.integration.backendHost and backendHostVariable must be strings');
      return false;
    }
    if (integration['timeoutMs'] !== undefined && typeof integration['timeoutMs'] !== 'number') {
      logError('(ConfigValidation): config.integration.timeoutMs must be a number');
      return false;
    }
    if (!isOptionalOneOf(integration['passthroughBehavior'], PASSTHROUGH_BEHAVIORS)) {
      logError(
        `(ConfigValidation): config.integration.passthroughBehavior must be one of ${PASSTHROUGH_BEHAVIORS.join(', ')}`,
      );
      return false;
    }
    if (!isOptionalOneOf(integration['integrationType'], INTEGRATION_TYPES)) {
      logError(
        `(ConfigValidation): config.integration.integrationType must be one of ${INTEGRATION_TYPES.join(', ')}`,
      );
      return false;
    }
    if (!isOptionalOneOf(integration['connectionType'], CONNECTION_TYPES)) {
      logError(
        `(ConfigValidation): config.integration.connectionType must be one of ${CONNECTION_TYPES.join(', ')}`,
      );
      return false;
    }
    return true;
  }

  private static validAuthentication(authentication: unknown): boolean {
    if (authentication === undefined) {
      return true;
    }
    if (!isRecord(authentication)) {
      logError('(ConfigValidation): config.authentication must be an object');
      return false;
    }
    if (!isOptionalOneOf(authentication['method'], AUTH_METHODS)) {
      logError(`(ConfigValidation): config.authentication.method must be one of ${AUTH_METHODS.join(', ')}`);
      return false;
    }
    if (!isOptionalOneOf(authentication['authType'], AUTH_TYPES)) {
      logError(`(ConfigValidation): config.authentication.authType must be one of ${AUTH_TYPES.join(', ')}`);
      return false;
    }
    if (!isOptionalString(authentication['authorizerId']) || !isOptionalString(authentication['cognitoPool'])) {
      logError('(ConfigValidation): config.authentication.authorizerId and cognitoPool must be strings');
      return false;
    }
    return true;
  }

  private static validHeaders(headers: unknown): boolean {
    if (headers === undefined) {
      return true;
    }
    if (!isRecord(headers)) {
      logError('(ConfigValidation): config.headers must be an object');
      return false;
    }
    if (!isOptionalStringMap(headers['authHeaders']) || !isOptionalStringMap(headers['customHeaders'])) {
      logError('(ConfigValidation): config.headers.authHeaders and customHeaders must map header names to strings');
      return false;
    }
    return true;
  }

  private static validCors(cors: unknown): boolean {
    if (cors === undefined) {
      return true;
    }
    if (!isRecord(cors)) {
      logError('(ConfigValidation): config.cors must be an object');
      return false;
    }
    if (cors['enabled'] !== undefined && typeof cors['enabled'] !== 'boolean') {
      logError('(ConfigValidation): config.cors.enabled must be a boolean');
      return false;
    }
    if (!isOptionalOneOf(cors['preset'], CORS_PRESETS)) {
      logError(`(ConfigValidation): config.cors.preset must be one of ${CORS_PRESETS.join(', ')}`);
      return false;
    }
    if (!isOptionalStringMap(cors['headers'])) {
      logError('(ConfigValidation): config.cors.headers must map header names to strings');
      return false;
    }
    if (cors['applyToCreatedResources'] !== undefined && typeof cors['applyToCreatedResources'] !== 'boolean') {
      logError('(ConfigValidation): config.cors.applyToCreatedResources must be a boolean');
      return false;
    }
    return true;
  }
}
