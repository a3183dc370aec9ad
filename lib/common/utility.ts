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
 * @fileoverview Common Utility Functions - Shared utilities for AWS operations
 *
 * Key capabilities:
 * - AWS SDK retry strategy configuration
 * - Standardized API execution with logging
 * - Dry run and error detail helpers for module responses
 */

import { ConfiguredRetryStrategy } from '@aws-sdk/util-retry';
import { ErrorDetailsType } from './types';
import { IconLogger } from './logger';

/**
 * Creates a configured retry strategy for AWS SDK clients
 *
 * The attempt count comes from `APIGW_SDK_MAX_ATTEMPTS` (default 800).
 */
export function setRetryStrategy() {
  const numberOfRetries = Number(process.env['APIGW_SDK_MAX_ATTEMPTS'] ?? 800);
  return new ConfiguredRetryStrategy(numberOfRetries, (attempt: number) => 100 + attempt * 1000);
}

/**
 * Executes AWS API calls with standardized logging and error handling
 * @param commandName - Name of the AWS command being executed
 * @param parameters - Parameters passed to the command
 * @param apiCall - Function that executes the API call
 * @param logger - Logger instance for consistent logging
 * @param logPrefix - Prefix for log messages
 * @param expectedExceptions - Exceptions logged as warnings instead of errors
 * @throws Re-throws any errors after logging
 */
export async function executeApi<T>(
  commandName: string,
  parameters: object,
  apiCall: () => Promise<T>,
  logger: IconLogger,
  logPrefix: string,
  expectedExceptions?: (abstract new (...args: never[]) => Error)[],
): Promise<T> {
  try {
    logger.info(`Executing ${commandName} with arguments: ${JSON.stringify(parameters)}`, logPrefix);
    const result = await apiCall();
    logger.info(`Successfully executed ${commandName}`, logPrefix);
    return result;
  } catch (error) {
    const { name, message } = getErrorDetails(error);
    const isExpectedException = expectedExceptions?.some(ExceptionType => error instanceof ExceptionType);

    const logLine = `[API EXCEPTION]: ${commandName} failed with ${name}: ${message}`;
    if (isExpectedException) {
      logger.warn(logLine, logPrefix);
    } else {
      logger.error(logLine, logPrefix);
    }
    throw error;
  }
}

/**
 * Extracts a name and message from any thrown value
 */
export function getErrorDetails(error: unknown): ErrorDetailsType {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'UnknownError', message: String(error) };
}

/**
 * Builds the summary returned by a module invoked in dry run mode
 * @param moduleName - Name of the module
 * @param operation - Operation that was requested
 * @param message - Status line describing what would have happened
 */
export function generateDryRunResponse(moduleName: string, operation: string, message: string): string {
  return `[DRY-RUN]: ${moduleName} ${operation} (no actual changes were made)\nValidation: ✓ Successful\nStatus: ${message}`;
}
