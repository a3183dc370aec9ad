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
 * @fileoverview Security Audit Interface Definitions - Findings, rule context and audit results
 */

import { Authorizer, Method } from '@aws-sdk/client-api-gateway';
import { IConcurrencySettings, IModuleRequest } from '../common/interfaces';

export const SEVERITIES = ['HIGH', 'MEDIUM', 'LOW'] as const;
export type FindingSeverity = (typeof SEVERITIES)[number];

export enum SecurityRuleId {
  OPEN_METHOD = 'OPEN_METHOD',
  API_KEY_ONLY = 'API_KEY_ONLY',
  MISSING_AUTHORIZER = 'MISSING_AUTHORIZER',
  AUTHORIZER_NOT_FOUND = 'AUTHORIZER_NOT_FOUND',
  AUTHORIZER_TYPE_MISMATCH = 'AUTHORIZER_TYPE_MISMATCH',
  CORS_WILDCARD_ORIGIN = 'CORS_WILDCARD_ORIGIN',
}

/**
 * One audit finding, also one row of the CSV report
 */
export interface ISecurityFinding {
  apiId: string;
  apiName: string;
  resourcePath: string;
  httpMethod: string;
  ruleId: SecurityRuleId;
  severity: FindingSeverity;
  authorizationType: string;
  authorizerId?: string;
  authorizerName?: string;
  description: string;
}

/**
 * Everything a rule needs to judge one method
 */
export interface IMethodEvaluationContext {
  apiId: string;
  apiName: string;
  resourcePath: string;
  httpMethod: string;
  method: Method;
  /**
   * Authorizer referenced by the method: undefined when it references none, null when the
   * referenced authorizer does not exist
   */
  authorizer?: Authorizer | null;
}

/**
 * Authorizer referenced by a method
 */
export interface IAuthorizerReference {
  restApiId: string;
  authorizerId: string;
}

/**
 * Outcome of an authorizer prefetch. Failed references stay out of the cache
 */
export interface IAuthorizerPrefetchResult {
  /** Authorizers read from the service, missing ones included */
  fetched: number;
  failed: { reference: IAuthorizerReference; error: string }[];
}

/**
 * Security audit settings
 */
export interface ISecurityAuditConfiguration {
  /** REST APIs to audit, every API of the region when omitted */
  readonly restApiIds?: string[];
  /** CSV report path, `security_report_<timestamp>.csv` when omitted */
  readonly reportPath?: string;
  /** Do not write the CSV report */
  readonly skipReport?: boolean;
  readonly concurrency?: IConcurrencySettings;
}

export interface ISecurityAuditModuleRequest extends IModuleRequest {
  readonly configuration: ISecurityAuditConfiguration;
}

/**
 * A REST API the audit could not scan
 */
export interface IFailedApi {
  apiId: string;
  error: string;
}

export interface ISecurityAuditResponse {
  apisScanned: number;
  resourcesScanned: number;
  methodsScanned: number;
  /** Authorizers fetched from the service, each distinct reference counts once */
  authorizersFetched: number;
  findings: ISecurityFinding[];
  severityCounts: Record<FindingSeverity, number>;
  failedApis: IFailedApi[];
  reportPath?: string;
}
