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
 * @fileoverview Common Type Definitions - Shared enums and aliases used by every module
 */

/**
 * Enumeration of module exception types for error handling
 */
export enum MODULE_EXCEPTIONS {
  /** General service exception */
  SERVICE_EXCEPTION = 'ServiceException',
  /** Invalid input parameter exception */
  INVALID_INPUT = 'InvalidInputException',
}

/**
 * Enumeration of module operation state codes
 */
export enum MODULE_STATE_CODE {
  /** Operation completed successfully */
  SUCCESS = 'success',
  /** Operation failed with error */
  FAILED = 'failed',
  /** Operation completed (general completion) */
  COMPLETED = 'completed',
  /** Operation was skipped */
  SKIPPED = 'skipped',
}

/**
 * Error name and message pair carried by failed module responses
 */
export type ErrorDetailsType = {
  name: string;
  message: string;
};
