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
 * @fileoverview Common Constants - Default worker pool settings
 *
 * API Gateway control plane read calls are rate limited per account (GetResources in particular),
 * so the default pool width is kept small. Raise it with `--max-concurrency` when auditing
 * accounts with generous limits.
 */

/**
 * Default maximum number of API calls the worker pool keeps in flight.
 *
 * @see {@link IConcurrencySettings.maxConcurrentRequests}
 * @default 10
 */
export const DEFAULT_MAX_CONCURRENT_REQUESTS = 10;

/**
 * Default timeout in milliseconds for a single worker pool task.
 *
 * This is a hard limit: a task that does not settle within it rejects, it is not retried.
 *
 * @see {@link IConcurrencySettings.operationTimeoutMs}
 * @default 60000 (1 minute)
 */
export const DEFAULT_OPERATION_TIMEOUT_MS = 1 * 60000;
