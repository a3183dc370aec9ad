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
 * @fileoverview Common Interface Definitions - Shared interfaces for module requests and responses
 *
 * Key interface categories:
 * - AWS credential and session context
 * - Module operation requests and responses
 * - Worker pool concurrency settings
 */

import { ErrorDetailsType, MODULE_STATE_CODE } from './types';

/**
 * Temporary AWS credentials used to build SDK clients
 */
export interface IAssumeRoleCredential {
  /** AWS access key ID */
  accessKeyId: string;
  /** AWS secret access key */
  secretAccessKey: string;
  /** AWS session token */
  sessionToken: string;
  /** Optional credential expiration timestamp */
  expiration?: Date;
}

/**
 * AWS session context information for operations
 */
export interface ISessionContext {
  /** Account ID of the invoking session */
  invokingAccountId: string;
  /** Current AWS region */
  region: string;
  /** Global region for the partition */
  globalRegion: string;
  /** AWS partition */
  partition: string;
}

/**
 * Standard module request interface extending session context
 */
export interface IModuleRequest extends ISessionContext {
  /** Operation to perform */
  operation: string;
  /** Optional module name */
  moduleName?: string;
  /** Solution identifier sent as the SDK user agent */
  readonly solutionId?: string;
  /** Optional credentials, the default provider chain is used otherwise */
  credentials?: IAssumeRoleCredential;
  /** Whether to perform dry run */
  dryRun?: boolean;
}

/**
 * Standard module response interface with generic result type
 * @template T - Type of the response data
 */
export interface IModuleResponse<T = unknown> {
  /** Error information if operation failed */
  error?: ErrorDetailsType;
  /** Operation status code */
  status: MODULE_STATE_CODE;
  /** Human-readable operation summary */
  summary: string;
  /** Operation timestamp */
  timestamp: string;
  /** Name of the module that generated the response */
  moduleName: string;
  /** Whether this was a dry run operation */
  dryRun: boolean;
  /** Optional response data */
  response?: T;
}

/**
 * Concurrency settings for worker pool operations
 */
export interface IConcurrencySettings {
  /** Maximum number of requests in flight at once */
  readonly maxConcurrentRequests?: number;
  /** Timeout in milliseconds for an individual task */
  readonly operationTimeoutMs?: number;
}

/**
 * Enumeration of supported module names
 */
export enum ModuleName {
  API_GATEWAY_ENDPOINT = 'api-gateway-endpoint',
  API_GATEWAY_CONFIGURATION = 'api-gateway-configuration',
  API_GATEWAY_GROUPS = 'api-gateway-groups',
  API_GATEWAY_HEADER_OPTIONS = 'api-gateway-header-options',
  API_GATEWAY_SECURITY_AUDIT = 'api-gateway-security-audit',
}
