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
 * @fileoverview API Gateway CLI Command Definitions
 *
 * Options and handlers for endpoint creation, configuration checks, header option lookups and API grouping.
 */

import { ApiGroupsCommand } from '../handlers/api-groups';
import { ConfigurationValidationCommand } from '../handlers/configuration';
import { EndpointCommand } from '../handlers/endpoint';
import { HeaderOptionsCommand } from '../handlers/header-options';
import { CliCommonOptions, CommandOptionsType } from '../handlers/root';
import { HEADER_OPTION_FILTERS } from '../../api-gateway/interfaces';

const configurationOption = (description: string): CommandOptionsType => ({
  configuration: {
    alias: 'c',
    type: 'string',
    description,
    required: true,
  },
});

export const ApiGatewayCommands = {
  createEndpoint: {
    description: 'Create a REST API endpoint with its resources, methods, VPC Link integrations and CORS',
    options: [
      ...CliCommonOptions,
      configurationOption('Path to endpoint configuration file (file://) or JSON configuration string'),
    ],
    execute: EndpointCommand.execute,
  },
  validateConfiguration: {
    description: 'Check that a REST API, its stage variable, authorizer and Cognito user pool exist',
    options: [
      ...CliCommonOptions,
      configurationOption('Path to validation configuration file (file://) or JSON configuration string'),
    ],
    execute: ConfigurationValidationCommand.execute,
  },
  getHeaderOptions: {
    description: 'Show the header option catalogue',
    options: [
      ...CliCommonOptions,
      {
        filter: {
          alias: 'f',
          type: 'string',
          description: 'Catalogue section to show',
          choices: [...HEADER_OPTION_FILTERS],
          default: 'all',
        },
      },
    ] satisfies CommandOptionsType[],
    execute: HeaderOptionsCommand.execute,
  },
  listApiGroups: {
    description: 'List REST APIs grouped by base name and environment',
    options: CliCommonOptions,
    execute: ApiGroupsCommand.execute,
  },
};
