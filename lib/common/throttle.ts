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
 * @fileoverview AWS API Throttling and Retry Utilities
 *
 * API Gateway enforces low per-account limits on its control plane (GetResources and
 * GetAuthorizers answer with TooManyRequestsException long before the SDK retry budget is
 * useful), so read-heavy paths such as the security audit wrap their calls with
 * {@link throttlingBackOff} on top of the client retry strategy.
 *
 * @example
 * ```typescript
 * const page = await throttlingBackOff(() =>
 *   client.send(new GetResourcesCommand({ restApiId: 'a1b2c3d4e5', embed: ['methods'] })),
 * );
 * ```
 */

import { backOff, IBackOffOptions } from 'exponential-backoff';

/**
 * Executes an AWS SDK request with exponential backoff, retrying only throttling and transient errors.
 *
 * Defaults: 150ms starting delay, 20 attempts, full jitter.
 *
 * @param request - Function producing the request promise, invoked once per attempt
 * @param options - Overrides for the backoff settings (the retry predicate is fixed)
 */
export function throttlingBackOff<T>(
  request: () => Promise<T>,
  options?: Partial<Omit<IBackOffOptions, 'retry'>>,
): Promise<T> {
  return backOff(request, {
    startingDelay: 150,
    numOfAttempts: 20,
    jitter: 'full',
    retry: isThrottlingError,
    ...options,
  });
}

const RETRYABLE_ERROR_NAMES = new Set([
  'TooManyRequestsException', // API Gateway
  'LimitExceededException', // API Gateway, Cognito
  'ServiceUnavailableException', // API Gateway
  'ThrottlingException',
  'Throttling',
  'InternalErrorException', // Cognito
  'InternalFailure',
  'ECONNRESET',
  'EPIPE',
  'ENOTFOUND',
  'ETIMEDOUT',
]);

/**
 * Determines whether an error raised by an SDK call should be retried.
 *
 * True when the error is flagged `retryable`, when the SDK marked it as a throttling error
 * (`$retryable.throttling`), or when its name is a known throttling or transient failure.
 */
export const isThrottlingError = (e: unknown): boolean => {
  if (typeof e !== 'object' || e === null) {
    return false;
  }
  if ('retryable' in e && e.retryable === true) {
    return true;
  }
  if (
    '$retryable' in e &&
    typeof e.$retryable === 'object' &&
    e.$retryable !== null &&
    'throttling' in e.$retryable &&
    e.$retryable.throttling === true
  ) {
    return true;
  }
  return 'name' in e && typeof e.name === 'string' && RETRYABLE_ERROR_NAMES.has(e.name);
};
