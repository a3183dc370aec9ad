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
 * @fileoverview API Gateway Interface Definitions - Types for endpoint creation and configuration checks
 *
 * Key interface categories:
 * - Endpoint configuration (paths, methods, integration, authentication, headers, CORS)
 * - Module requests and step-by-step responses
 * - Header option catalogue
 * - Configuration validation and API grouping results
 */

import { IModuleRequest } from '../common/interfaces';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export const AUTH_TYPES = ['COGNITO_ADMIN', 'COGNITO_CUSTOMER', 'NO_AUTH', 'API_KEY'] as const;
export type AuthType = (typeof AUTH_TYPES)[number];

export const AUTH_METHODS = ['AUTHORIZER', 'API_KEY'] as const;
export type AuthMethod = (typeof AUTH_METHODS)[number];

export const CORS_PRESETS = ['DEFAULT', 'RESTRICTED'] as const;
export type CorsPreset = (typeof CORS_PRESETS)[number];

export type PassthroughBehavior = 'WHEN_NO_MATCH' | 'WHEN_NO_TEMPLATES' | 'NEVER';
export type EndpointIntegrationType = 'HTTP_PROXY' | 'HTTP' | 'AWS_PROXY' | 'AWS' | 'MOCK';
export type EndpointConnectionType = 'VPC_LINK' | 'INTERNET';

export const HEADER_OPTION_FILTERS = ['auth_headers', 'cors_headers', 'integration_config', 'all'] as const;
export type HeaderOptionFilter = (typeof HEADER_OPTION_FILTERS)[number];

/**
 * Backend integration settings
 */
export interface IIntegrationConfiguration {
  /**
   * Stage variable holding the VPC Link id
   *
   * @example
   * ```
   * vpcLinkId
   * ```
   */
  readonly connectionVariable: string;
  /**
   * Backend base URL, prepended to the full backend path
   *
   * @example
   * ```
   * https://internal-nlb.example.com
   * ```
   */
  readonly backendHost?: string;
  /**
   * Stage variable holding the backend host, used instead of `backendHost`.
   * The URI becomes `https://${stageVariables.<name>}<fullBackendPath>`
   */
  readonly backendHostVariable?: string;
  /** Integration timeout, 50 to 29000 milliseconds */
  readonly timeoutMs?: number;
  readonly passthroughBehavior?: PassthroughBehavior;
  readonly integrationType?: EndpointIntegrationType;
  readonly connectionType?: EndpointConnectionType;
}

/**
 * Authorization settings applied to every created method
 */
export interface IAuthenticationConfiguration {
  /** AUTHORIZER (Cognito user pool authorizer) or API_KEY */
  readonly method?: AuthMethod;
  /** Header profile, also selects NONE authorization for NO_AUTH and API_KEY */
  readonly authType?: AuthType;
  /** API Gateway authorizer id, required for AUTHORIZER */
  readonly authorizerId?: string;
  /** Cognito user pool name */
  readonly cognitoPool?: string;
}

/**
 * Integration request headers
 */
export interface IHeadersConfiguration {
  /** Explicit auth headers, resolved from the auth type when omitted */
  readonly authHeaders?: Record<string, string>;
  /** Additional headers, these override auth headers of the same name */
  readonly customHeaders?: Record<string, string>;
}

/**
 * CORS settings for the OPTIONS method
 */
export interface ICorsConfiguration {
  /** Defaults to true */
  readonly enabled?: boolean;
  /** Header preset, DEFAULT when omitted */
  readonly preset?: CorsPreset;
  /** Explicit CORS headers, override the preset entirely */
  readonly headers?: Record<string, string>;
  /** Also configure OPTIONS on every intermediate resource created along the path */
  readonly applyToCreatedResources?: boolean;
}

/**
 * Complete configuration for one endpoint
 */
export interface IEndpointConfiguration {
  /**
   * REST API id
   *
   * @example
   * ```
   * a1b2c3d4e5
   * ```
   */
  readonly restApiId: string;
  /**
   * Backend path including the service prefix
   *
   * @example
   * ```
   * /discounts/v1/items/{itemId}
   * ```
   */
  readonly fullBackendPath: string;
  /**
   * API Gateway resource path, derived from `fullBackendPath` by dropping its first segment when omitted
   */
  readonly apiGatewayPath?: string;
  readonly httpMethods: HttpMethod[];
  readonly integration: IIntegrationConfiguration;
  readonly authentication?: IAuthenticationConfiguration;
  readonly headers?: IHeadersConfiguration;
  readonly cors?: ICorsConfiguration;
}

/**
 * Request for the endpoint creation module
 */
export interface IEndpointModuleRequest extends IModuleRequest {
  readonly configuration: IEndpointConfiguration;
}

export type EndpointStepName =
  | 'parse_path'
  | 'create_resources'
  | 'create_methods'
  | 'configure_integrations'
  | 'create_cors'
  | 'verify'
  | 'error';

export type EndpointStepStatus = 'ok' | 'failed' | 'skipped';

/**
 * Outcome of one endpoint creation step
 */
export interface IEndpointStep {
  name: EndpointStepName;
  status: EndpointStepStatus;
  /** Resources created (create_resources) */
  created?: number;
  /** Resources that already existed (create_resources) */
  skipped?: number;
  /** Methods handled (create_methods) */
  count?: number;
}

/**
 * Error codes reported by a failed endpoint creation
 */
export enum EndpointErrorCode {
  INVALID_PAYLOAD = 'INVALID_PAYLOAD',
  RESOURCE_CREATION_FAILED = 'RESOURCE_CREATION_FAILED',
  METHOD_CREATION_FAILED = 'METHOD_CREATION_FAILED',
  INTEGRATION_FAILED = 'INTEGRATION_FAILED',
  VERIFICATION_FAILED = 'VERIFICATION_FAILED',
  ENDPOINT_CREATION_ERROR = 'ENDPOINT_CREATION_ERROR',
}

/**
 * Endpoint creation result
 */
export interface IEndpointCreationResponse {
  /** Id of the final resource of the path */
  resourceId?: string;
  apiGatewayPath?: string;
  steps: IEndpointStep[];
  warnings: string[];
  errorCode?: EndpointErrorCode;
  /** Name of the last recorded step when the creation failed */
  failedStep?: EndpointStepName;
}

/**
 * A resource created by the hierarchy walk
 */
export interface ICreatedResource {
  id: string;
  path: string;
  parentId: string;
}

/**
 * Result of ensuring every path segment exists
 */
export interface IResourceHierarchyResult {
  /** Id of the last segment (the root id for an empty path) */
  resourceId: string;
  created: ICreatedResource[];
  /** Number of segments that already existed */
  skipped: number;
}

/**
 * Resolved method authorization
 */
export interface IMethodAuthorization {
  authorizationType: 'NONE' | 'COGNITO_USER_POOLS';
  apiKeyRequired: boolean;
  authorizerId?: string;
}

/**
 * Header catalogue entry
 */
export interface IHeaderOption {
  default: string;
  description: string;
  required?: boolean;
}

export interface IHeaderOptionGroup {
  description: string;
  headers: Record<string, IHeaderOption>;
}

export interface INumericOption {
  default: number;
  min: number;
  max: number;
  description: string;
}

export interface IChoiceOption {
  default: string;
  options: string[];
  description: string;
}

export interface IIntegrationConfigOptions {
  timeout_ms: INumericOption;
  passthrough_behavior: IChoiceOption;
  integration_type: IChoiceOption;
  connection_type: IChoiceOption;
}

/**
 * Full header and integration option catalogue
 */
export interface IHeaderOptionsCatalogue {
  auth_headers: Record<string, IHeaderOptionGroup>;
  cors_headers: Record<string, IHeaderOptionGroup>;
  integration_config: IIntegrationConfigOptions;
}

export type HeaderOptionsResponse = Partial<IHeaderOptionsCatalogue>;

/**
 * Request for the header options module
 */
export interface IHeaderOptionsModuleRequest {
  readonly filter?: HeaderOptionFilter;
}

/**
 * Resources the configuration validation should look for
 */
export interface IConfigurationValidationConfiguration {
  readonly restApiId: string;
  readonly connectionVariable: string;
  readonly authorizerId?: string;
  readonly cognitoPool?: string;
}

export interface IConfigurationValidationModuleRequest extends IModuleRequest {
  readonly configuration: IConfigurationValidationConfiguration;
}

/**
 * Individual check outcomes, absent when the corresponding input was not provided
 */
export interface IConfigurationChecks {
  api: boolean;
  connectionVariable: boolean;
  authorizer?: boolean;
  cognitoPool?: boolean;
}

export interface IConfigurationValidationResponse {
  valid: boolean;
  checks: IConfigurationChecks;
}

export type ApiEnvironment = 'CI' | 'DEV' | 'PROD';

/**
 * REST API summary used for grouping
 */
export interface IRestApiSummary {
  id: string;
  name: string;
  environment?: ApiEnvironment;
}

export interface IApiGroup {
  name: string;
  apis: IRestApiSummary[];
}

export interface IApiGroupsResponse {
  groups: IApiGroup[];
}

export type IApiGroupsModuleRequest = IModuleRequest;
