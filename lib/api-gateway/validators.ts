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

import {
  AUTH_METHODS,
  AUTH_TYPES,
  CORS_PRESETS,
  HTTP_METHODS,
  IAuthenticationConfiguration,
  IEndpointConfiguration,
} from './interfaces';
import { isValidPath } from './path-parser';
import { getIntegrationConfigOptions } from './header-options';
import {
  MAX_HEADER_NAME_LENGTH,
  MAX_HEADER_VALUE_LENGTH,
  MAX_INTEGRATION_TIMEOUT_MS,
  MIN_INTEGRATION_TIMEOUT_MS,
} from './constants';

/**
 * Validates an endpoint configuration before any API Gateway call is made
 *
 * @returns Error messages, empty when the configuration is valid
 */
export function validateEndpointConfiguration(config: IEndpointConfiguration): string[] {
  const errors: string[] = [];

  if (!config.restApiId) {
    errors.push('restApiId is required');
  }

  if (!config.fullBackendPath) {
    errors.push('fullBackendPath is required');
  } else if (!isValidPath(config.fullBackendPath)) {
    errors.push(`Invalid fullBackendPath: ${config.fullBackendPath}`);
  }

  if (config.apiGatewayPath !== undefined && !isValidPath(config.apiGatewayPath)) {
    errors.push(`Invalid apiGatewayPath: ${config.apiGatewayPath}`);
  }

  errors.push(...validateHttpMethods(config.httpMethods));
  errors.push(...validateIntegration(config));

  const authentication: IAuthenticationConfiguration = config.authentication ?? {};
  if (authentication.method && !AUTH_METHODS.includes(authentication.method)) {
    errors.push(`Invalid authentication method: ${authentication.method}. Allowed: ${AUTH_METHODS.join(', ')}`);
  }
  if (authentication.authType && !AUTH_TYPES.includes(authentication.authType)) {
    errors.push(`Invalid authentication authType: ${authentication.authType}. Allowed: ${AUTH_TYPES.join(', ')}`);
  }
  // method defaults to AUTHORIZER
  const authorizerRequired =
    (authentication.method ?? 'AUTHORIZER') === 'AUTHORIZER' &&
    authentication.authType !== 'NO_AUTH' &&
    authentication.authType !== 'API_KEY';
  if (authorizerRequired && !authentication.authorizerId) {
    errors.push('authentication.authorizerId is required when authentication method is AUTHORIZER');
  }

  errors.push(...validateHeaders(config.headers?.authHeaders, 'authHeaders'));
  errors.push(...validateHeaders(config.headers?.customHeaders, 'customHeaders'));
  errors.push(...validateHeaders(config.cors?.headers, 'cors.headers'));

  const preset = config.cors?.preset;
  if (preset !== undefined && !CORS_PRESETS.includes(preset)) {
    errors.push(`Invalid CORS preset: ${preset}. Allowed: ${CORS_PRESETS.join(', ')}`);
  }

  return errors;
}

function validateHttpMethods(httpMethods: readonly string[] | undefined): string[] {
  if (!Array.isArray(httpMethods) || httpMethods.length === 0) {
    return ['httpMethods must contain at least one method'];
  }

  const errors: string[] = [];
  const seen = new Set<string>();
  for (const method of httpMethods) {
    if (!HTTP_METHODS.some(allowed => allowed === method)) {
      errors.push(`Invalid HTTP method: ${method}. Allowed: ${HTTP_METHODS.join(', ')}`);
    }
    if (seen.has(method)) {
      errors.push(`Duplicate HTTP method: ${method}`);
    }
    seen.add(method);
  }
  return errors;
}

function validateIntegration(config: IEndpointConfiguration): string[] {
  const integration = config.integration;
  if (!integration) {
    return ['integration is required'];
  }

  const errors: string[] = [];
  if (!integration.connectionVariable) {
    errors.push('integration.connectionVariable is required');
  }

  const hostSettings = [integration.backendHost, integration.backendHostVariable].filter(Boolean).length;
  if (hostSettings !== 1) {
    errors.push('Exactly one of integration.backendHost and integration.backendHostVariable is required');
  }

  const timeoutMs = integration.timeoutMs;
  if (
    timeoutMs !== undefined &&
    (!Number.isInteger(timeoutMs) || timeoutMs < MIN_INTEGRATION_TIMEOUT_MS || timeoutMs > MAX_INTEGRATION_TIMEOUT_MS)
  ) {
    errors.push(
      `integration.timeoutMs must be an integer between ${MIN_INTEGRATION_TIMEOUT_MS} and ${MAX_INTEGRATION_TIMEOUT_MS}`,
    );
  }

  const options = getIntegrationConfigOptions();
  const choices: [string, string | undefined, string[]][] = [
    ['passthroughBehavior', integration.passthroughBehavior, options.passthrough_behavior.options],
    ['integrationType', integration.integrationType, options.integration_type.options],
    ['connectionType', integration.connectionType, options.connection_type.options],
  ];
  for (const [name, value, allowed] of choices) {
    if (value !== undefined && !allowed.includes(value)) {
      errors.push(`Invalid integration.${name}: ${value}. Allowed: ${allowed.join(', ')}`);
    }
  }

  return errors;
}

function validateHeaders(headers: Record<string, string> | undefined, field: string): string[] {
  if (!headers) {
    return [];
  }

  const errors: string[] = [];
  for (const [name, value] of Object.entries(headers)) {
    if (name.length === 0 || name.length > MAX_HEADER_NAME_LENGTH) {
      errors.push(`${field}: header name must be 1 to ${MAX_HEADER_NAME_LENGTH} characters`);
    }
    if (typeof value !== 'string' || value.length === 0 || value.length > MAX_HEADER_VALUE_LENGTH) {
      errors.push(`${field}.${name}: header value must be 1 to ${MAX_HEADER_VALUE_LENGTH} characters`);
    }
  }
  return errors;
}
