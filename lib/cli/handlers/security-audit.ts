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

import { auditApiSecurity } from '../../security-audit/audit';
import { ISecurityAuditModuleRequest, ISecurityAuditResponse } from '../../security-audit/interfaces';
import { CliExecutionParameterType, getDryRunFromArgs, getSessionDetailsFromArgs, logErrorAndExit } from './root';
import { IModuleResponse } from '../../common/interfaces';

/**
 * Abstract command handler class for the security audit
 */
export abstract class SecurityAuditCommand {
  public static async execute(param: CliExecutionParameterType): Promise<IModuleResponse<ISecurityAuditResponse>> {
    return auditApiSecurity(await SecurityAuditCommand.getParams(param));
  }

  /**
   * Builds the audit request from `--api-ids`, `--report`, `--skip-report` and `--max-concurrency`
   */
  public static async getParams(param: CliExecutionParameterType): Promise<ISecurityAuditModuleRequest> {
    const maxConcurrency = param.args['max-concurrency'];
    let maxConcurrentRequests: number | undefined;
    if (maxConcurrency !== undefined) {
      if (typeof maxConcurrency !== 'number' || !Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
        logErrorAndExit('An error occurred (InvalidParameter): max-concurrency must be a positive integer');
      }
      maxConcurrentRequests = maxConcurrency;
    }

    const apiIds = param.args['api-ids'];
    const restApiIds =
      typeof apiIds === 'string'
        ? apiIds
            .split(',')
            .map(id => id.trim())
            .filter(id => id.length > 0)
        : undefined;
    const reportPath = typeof param.args['report'] === 'string' ? param.args['report'] : undefined;

    const currentSessionDetails = await getSessionDetailsFromArgs(param);

    return {
      ...currentSessionDetails,
      moduleName: param.moduleName,
      operation: param.commandName,
      dryRun: getDryRunFromArgs(param),
      configuration: {
        ...(restApiIds !== undefined && { restApiIds }),
        ...(reportPath !== undefined && { reportPath }),
        skipReport: param.args['skip-report'] === true,
        ...(maxConcurrentRequests !== undefined && { concurrency: { maxConcurrentRequests } }),
      },
    };
  }
}
