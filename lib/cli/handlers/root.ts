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
 * @fileoverview CLI Root Handler - Common utilities and types for CLI operations
 *
 * Key capabilities:
 * - Configuration file and JSON string parsing
 * - AWS session context from `--region`, `AWS_REGION` or us-east-1
 * - Common CLI option definitions
 * - Configuration shape checks shared by the command handlers
 * - Error logging and exit handling
 */

import fs from 'fs';
import path from 'path';
import { getCurrentSessionDetails } from '../../common/sts-functions';
import { ISessionContext } from '../../common/interfaces';
import { createLogger } from '../../common/logger';

const logger = createLogger([path.parse(path.basename(__filename)).name]);

export const DEFAULT_REGION = 'us-east-1';

/**
 * Parsed JSON configuration object
 */
export type ConfigurationObjectType = Record<string, unknown>;

/**
 * Type definition for CLI invocation arguments from yargs
 */
export type CliInvokeArgumentType = {
  /** Positional arguments */
  _: (string | number)[];
  /** Optional output format */
  output?: 'json' | 'text' | 'table';
  /** Additional named arguments */
  [x: string]: unknown;
};

/**
 * Type definition for CLI execution parameters passed to handlers
 */
export type CliExecutionParameterType = {
  /** Name of the resource being executed */
  moduleName: string;
  /** Name of the command verb being executed */
  commandName: string;
  /** Parsed CLI arguments */
  args: CliInvokeArgumentType;
};

/**
 * Type definition for CLI command options configuration
 */
export type CommandOptionsType = {
  [key: string]: {
    /** Option value type */
    type: 'string' | 'boolean' | 'number';
    /** Option description for help text */
    description: string;
    /** Optional short alias for the option */
    alias?: string;
    /** Default value */
    default?: boolean | number | string;
    /** Allowed values */
    choices?: string[];
    /** Whether the option is required */
    required?: boolean;
  };
};

/**
 * Common CLI options available across all commands
 */
export const CliCommonOptions: CommandOptionsType[] = [
  {
    verbose: {
      alias: 'v',
      type: 'boolean',
      description: 'Run with verbose logging',
      default: false,
    },
  },
  {
    'dry-run': {
      type: 'boolean',
      description: 'Run the command in dry run mode',
      default: false,
    },
  },
  {
    region: {
      alias: 'r',
      type: 'string',
      description: 'AWS region for the session',
    },
  },
];

/**
 * Narrows a value to a plain JSON object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

/**
 * Narrows a value to a `name -> string` map, undefined included
 */
export function isOptionalStringMap(value: unknown): value is Record<string, string> | undefined {
  return value === undefined || (isRecord(value) && Object.values(value).every(item => typeof item === 'string'));
}

/**
 * Narrows a value to one of the allowed literals, undefined included
 */
export function isOptionalOneOf<T extends string>(value: unknown, allowed: readonly T[]): value is T | undefined {
  return value === undefined || allowed.some(item => item === value);
}

/**
 * Parses configuration from file path or JSON string
 * @param configArg - Configuration argument (file:// path or JSON string)
 * @returns Parsed configuration object
 */
export function getConfig(configArg: string): ConfigurationObjectType {
  let raw = configArg;
  if (configArg.startsWith('file://')) {
    const filePath = configArg.slice(7);
    if (!fs.existsSync(filePath)) {
      logErrorAndExit(
        `An error occurred (MissingConfigurationFile): The configuration file ${filePath} does not exists.`,
      );
    }
    raw = fs.readFileSync(filePath, 'utf8');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    logErrorAndExit(`An error occurred (InvalidConfiguration): The configuration is not valid JSON. ${reason}`);
  }

  if (!isRecord(parsed)) {
    logErrorAndExit('An error occurred (InvalidConfiguration): The configuration must be a JSON object');
  }
  return parsed;
}

/**
 * Region from `--region`, then `AWS_REGION`, then us-east-1
 */
export function getRegionFromArgs(param: CliExecutionParameterType): string {
  return typeof param.args['region'] === 'string'
    ? param.args['region']
    : process.env['AWS_REGION'] || DEFAULT_REGION;
}

/**
 * Retrieves AWS session context from CLI parameters
 * @param param - CLI execution parameters
 * @returns Promise resolving to session context
 */
export async function getSessionDetailsFromArgs(param: CliExecutionParameterType): Promise<ISessionContext> {
  const region = getRegionFromArgs(param);

  logger.info(`Getting current session details for region ${region}`);
  return getCurrentSessionDetails({ region });
}

/**
 * Reads the `--dry-run` flag
 */
export function getDryRunFromArgs(param: CliExecutionParameterType): boolean {
  return param.args['dry-run'] === true;
}

/**
 * Logs error message to console with CLI prefix
 * @param message - Error message to log
 */
export function logError(message: string): void {
  console.error(`apigw-builder: error: ${message}`);
}

/**
 * Logs error message and exits process with specified code
 * @param message - Error message to log
 * @param exitCode - Exit code (default: 1)
 */
export function logErrorAndExit(message: string, exitCode: number = 1): never {
  logError(message);
  process.exit(exitCode);
}
