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
 * @fileoverview Header Options - Catalogue of integration headers, CORS presets and integration settings
 *
 * The catalogue lives in `header-options.json`. Header values are API Gateway mapping expressions
 * (`context.authorizer.claims.email`, `stageVariables.knownTokenKey`) or quoted literals (`'*'`).
 */

import path from 'path';
import headerOptions from './header-options.json';
import {
  AuthType,
  CorsPreset,
  HEADER_OPTION_FILTERS,
  HeaderOptionFilter,
  HeaderOptionsResponse,
  IHeaderOptionsCatalogue,
  IHeaderOptionsModuleRequest,
} from './interfaces';
import { COGNITO_POOL_HEADER } from './constants';
import { IModuleResponse, ModuleName } from '../common/interfaces';
import { MODULE_EXCEPTIONS, MODULE_STATE_CODE } from '../common/types';
import { createLogger } from '../common/logger';
import { getErrorDetails } from '../common/utility';

const logger = createLogger([path.parse(path.basename(__filename)).name]);

const CATALOGUE: IHeaderOptionsCatalogue = headerOptions;

/**
 * Returns a copy of the catalogue sections selected by `filter`
 * @throws {Error} When the filter is unknown
 */
export function getHeaderOptions(filter: string = 'all'): HeaderOptionsResponse {
  if (!isHeaderOptionFilter(filter)) {
    throw new Error(
      `${MODULE_EXCEPTIONS.INVALID_INPUT}: Invalid filter: ${filter}. Allowed values are ${HEADER_OPTION_FILTERS.join(', ')}`,
    );
  }

  switch (filter) {
    case 'auth_headers':
      return { auth_headers: structuredClone(CATALOGUE.auth_headers) };
    case 'cors_headers':
      return { cors_headers: structuredClone(CATALOGUE.cors_headers) };
    case 'integration_config':
      return { integration_config: structuredClone(CATALOGUE.integration_config) };
    default:
      return structuredClone(CATALOGUE);
  }
}

export function isHeaderOptionFilter(value: string): value is HeaderOptionFilter {
  return HEADER_OPTION_FILTERS.some(filter => filter === value);
}

/**
 * Resolves the integration headers of an auth type from the catalogue defaults
 *
 * Required headers are always included, optional ones only with `includeOptional`. The
 * `CognitoPool` entry is replaced by the configured pool and then dropped since API Gateway must
 * not forward it as a header.
 *
 * @example
 * ```typescript
 * resolveAuthHeaders('COGNITO_CUSTOMER');
 * // {
 * //   'Claim-Email': 'context.authorizer.claims.email',
 * //   'Claim-User-Id': 'context.authorizer.claims.custom:customer_id',
 * //   'KNOWN-TOKEN-KEY': 'stageVariables.knownTokenKey',
 * // }
 * ```
 */
export function resolveAuthHeaders(
  authType: AuthType,
  options?: { cognitoPool?: string; includeOptional?: boolean },
): Record<string, string> {
  const group = CATALOGUE.auth_headers[authType];
  if (!group) {
    return {};
  }

  const headers: Record<string, string> = {};
  for (const [name, option] of Object.entries(group.headers)) {
    if (option.required || options?.includeOptional) {
      headers[name] = option.default;
    }
  }

  if (options?.cognitoPool && COGNITO_POOL_HEADER in headers) {
    headers[COGNITO_POOL_HEADER] = `'${options.cognitoPool}'`;
  }
  delete headers[COGNITO_POOL_HEADER];

  return headers;
}

/**
 * Returns the `header name -> value` map of a CORS preset
 */
export function getCorsHeaders(preset: CorsPreset = 'DEFAULT'): Record<string, string> {
  const group = CATALOGUE.cors_headers[preset];
  if (!group) {
    throw new Error(`${MODULE_EXCEPTIONS.INVALID_INPUT}: Unknown CORS preset ${preset}`);
  }
  return Object.fromEntries(Object.entries(group.headers).map(([name, option]) => [name, option.default]));
}

/**
 * Allowed values of the integration settings
 */
export function getIntegrationConfigOptions() {
  return CATALOGUE.integration_config;
}

/**
 * Module entry point returning the catalogue sections selected by the request filter
 */
export async function describeHeaderOptions(
  props: IHeaderOptionsModuleRequest,
): Promise<IModuleResponse<HeaderOptionsResponse>> {
  const moduleName = ModuleName.API_GATEWAY_HEADER_OPTIONS;
  const filter = props.filter ?? 'all';
  try {
    const options = getHeaderOptions(filter);
    const summary = `Returned ${Object.keys(options).length} option categories`;
    logger.info(summary);
    return {
      status: MODULE_STATE_CODE.SUCCESS,
      summary,
      timestamp: new Date().toISOString(),
      moduleName,
      dryRun: false,
      response: options,
    };
  } catch (error: unknown) {
    const errorDetails = getErrorDetails(error);
    logger.error(errorDetails.message);
    return {
      error: errorDetails,
      status: MODULE_STATE_CODE.FAILED,
      summary: `Header options lookup failed with error : ${errorDetails.message}`,
      timestamp: new Date().toISOString(),
      moduleName,
      dryRun: false,
    };
  }
}
