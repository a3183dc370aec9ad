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
 * @fileoverview CLI Command Registry - Maps command verbs to their resources
 *
 * Commands are organized as verb -> resource -> handler, e.g. `create endpoint`.
 */

import { ApiGatewayCommands } from './api-gateway';
import { SecurityAuditCommands } from './security-audit';
import { CliExecutionParameterType, CommandOptionsType } from '../handlers/root';
import { IModuleResponse } from '../../common/interfaces';

/**
 * Definition of a single resource under a verb
 */
export type CommandResourceType = {
  /** Description of the resource operation */
  description: string;
  /** Command-line options for the resource */
  options: CommandOptionsType[];
  /** Execution handler for the resource operation */
  execute: (param: CliExecutionParameterType) => Promise<string | IModuleResponse<unknown>>;
};

/**
 * Type definition for command structure hierarchy
 */
type CommandStructure = {
  /** Description of the command verb */
  description: string;
  /** Map of resource names to their command definitions */
  resources: Record<string, CommandResourceType>;
};

/**
 * Central registry of all available CLI commands organized by verb and resource
 */
export const Commands: Record<string, CommandStructure> = {
  create: {
    description: 'Create API Gateway resources',
    resources: {
      endpoint: ApiGatewayCommands.createEndpoint,
    },
  },
  validate: {
    description: 'Validate API Gateway settings before creating endpoints',
    resources: {
      configuration: ApiGatewayCommands.validateConfiguration,
    },
  },
  get: {
    description: 'Show reference information',
    resources: {
      'header-options': ApiGatewayCommands.getHeaderOptions,
    },
  },
  list: {
    description: 'List API Gateway resources',
    resources: {
      'api-groups': ApiGatewayCommands.listApiGroups,
    },
  },
  audit: {
    description: 'Audit API Gateway security settings',
    resources: {
      security: SecurityAuditCommands.audit,
    },
  },
};
