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

import { listApiGroups } from '../../api-gateway/api-groups';
import { IApiGroupsResponse } from '../../api-gateway/interfaces';
import { CliExecutionParameterType, getDryRunFromArgs, getSessionDetailsFromArgs } from './root';
import { IModuleResponse } from '../../common/interfaces';

/**
 * Abstract command handler class listing REST APIs grouped by base name
 */
export abstract class ApiGroupsCommand {
  public static async execute(param: CliExecutionParameterType): Promise<IModuleResponse<IApiGroupsResponse>> {
    const currentSessionDetails = await getSessionDetailsFromArgs(param);
    return listApiGroups({
      ...currentSessionDetails,
      moduleName: param.moduleName,
      operation: param.commandName,
      dryRun: getDryRunFromArgs(param),
    });
  }
}
