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

import { SecurityAuditCommand } from '../handlers/security-audit';
import { CliCommonOptions, CommandOptionsType } from '../handlers/root';

/**
 * Command-line options for the security audit
 */
const options: CommandOptionsType[] = [
  ...CliCommonOptions,
  {
    'api-ids': {
      type: 'string',
      description: 'Comma separated REST API IDs to audit, every REST API in the region otherwise',
    },
  },
  {
    report: {
      type: 'string',
      description: 'Path of the CSV findings report, a timestamped file in the working directory otherwise',
    },
  },
  {
    'skip-report': {
      type: 'boolean',
      description: 'Do not write the CSV findings report',
      default: false,
    },
  },
  {
    'max-concurrency': {
      type: 'number',
      description: 'Maximum number of API Gateway requests in flight',
    },
  },
];

export const SecurityAuditCommands = {
  audit: {
    description: 'Audit the authorization settings of REST API methods and write findings to CSV',
    options,
    execute: SecurityAuditCommand.execute,
  },
};
