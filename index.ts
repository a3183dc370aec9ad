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

//
// Common resources
//
export { MODULE_EXCEPTIONS, MODULE_STATE_CODE } from './lib/common/types';
export type { ErrorDetailsType } from './lib/common/types';
export { ModuleName } from './lib/common/interfaces';
export type { IModuleRequest, IModuleResponse, IConcurrencySettings, ISessionContext } from './lib/common/interfaces';
export { createLogger, createStatusLogger, setLogLevel } from './lib/common/logger';

//
// API Gateway endpoint resources
//
export type {
  IEndpointConfiguration,
  IEndpointModuleRequest,
  IEndpointCreationResponse,
  IEndpointStep,
} from './lib/api-gateway/interfaces';
export { EndpointErrorCode } from './lib/api-gateway/interfaces';
export { createEndpoint } from './lib/api-gateway/endpoint';
export { validateEndpointConfiguration } from './lib/api-gateway/validators';
export { parsePathSegments, getPathParameters, deriveApiGatewayPath } from './lib/api-gateway/path-parser';

export type {
  IConfigurationValidationModuleRequest,
  IConfigurationValidationResponse,
} from './lib/api-gateway/interfaces';
export { validateConfiguration } from './lib/api-gateway/configuration-validation';

export type {
  IHeaderOptionsModuleRequest,
  HeaderOptionsResponse,
  HeaderOptionFilter,
} from './lib/api-gateway/interfaces';
export {
  describeHeaderOptions,
  getHeaderOptions,
  resolveAuthHeaders,
  getCorsHeaders,
} from './lib/api-gateway/header-options';

export type { IApiGroupsModuleRequest, IApiGroupsResponse, IApiGroup } from './lib/api-gateway/interfaces';
export { listApiGroups, groupRestApis } from './lib/api-gateway/api-groups';

//
// Security audit resources
//
export type {
  ISecurityAuditModuleRequest,
  ISecurityAuditResponse,
  ISecurityFinding,
  FindingSeverity,
} from './lib/security-audit/interfaces';
export { SecurityRuleId } from './lib/security-audit/interfaces';
export { auditApiSecurity } from './lib/security-audit/audit';
export { SECURITY_RULES, evaluateMethod } from './lib/security-audit/rules';
