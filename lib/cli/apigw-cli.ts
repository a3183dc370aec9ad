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
 * @fileoverview CLI Main Entry Point - Routes `<command> <resource>` invocations to their handlers
 */

import { Options } from 'yargs';
import { CliInvokeArgumentType, CommandOptionsType } from './handlers/root';
import { Commands } from './commands/registry';
import { IModuleResponse } from '../common/interfaces';
import { setLogLevel } from '../common/logger';

export const USAGE = 'Usage: apigw-builder <command> <resource> [options]';

/**
 * Log level used for a run, `--verbose` forces info
 */
export function resolveLogLevel(verbose: boolean): string {
  return verbose ? 'info' : (process.env['LOG_LEVEL'] ?? 'warn');
}

/**
 * Flattens the option list of a resource into a yargs builder object
 */
export function toYargsOptions(options: CommandOptionsType[]): Record<string, Options> {
  return options.reduce<Record<string, Options>>(
    (previousValue, currentValue) => ({ ...previousValue, ...currentValue }),
    {},
  );
}

/**
 * Main CLI entry point that processes command-line arguments and executes appropriate handlers
 * @param argv - Parsed command-line arguments from yargs
 * @returns Usage or error text, or the module response
 */
export async function main(argv: CliInvokeArgumentType): Promise<string | IModuleResponse<unknown>> {
  if (argv['help'] || argv['h']) {
    return '';
  }

  const verbName = argv._[0]?.toString();
  const resourceName = argv._[1]?.toString();

  if (!verbName || !resourceName) {
    return USAGE;
  }

  const verb = Commands[verbName];
  if (!verb) {
    return `Invalid command "${verbName}"`;
  }

  const resource = verb.resources[resourceName];
  if (!resource) {
    return `Invalid resource "${resourceName}" for command "${verbName}"`;
  }

  setLogLevel(resolveLogLevel(argv['verbose'] === true));

  return resource.execute({
    moduleName: resourceName,
    commandName: verbName,
    args: argv,
  });
}
