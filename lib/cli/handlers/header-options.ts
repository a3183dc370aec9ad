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

import { describeHeaderOptions, isHeaderOptionFilter } from '../../api-gateway/header-options';
import { HEADER_OPTION_FILTERS, HeaderOptionsResponse } from '../../api-gateway/interfaces';
import { CliExecutionParameterType, logErrorAndExit } from './root';
import { IModuleResponse } from '../../common/interfaces';

/**
 * Abstract command handler class for the header option catalogue, no AWS session is needed
 */
export abstract class HeaderOptionsCommand {
  public static async execute(param: CliExecutionParameterType): Promise<IModuleResponse<HeaderOptionsResponse>> {
    const filter = param.args['filter'] ?? 'all';
    if (typeof filter !== 'string' || !isHeaderOptionFilter(filter)) {
      logErrorAndExit(
        `An error occurred (InvalidParameter): filter must be one of ${HEADER_OPTION_FILTERS.join(', ')}`,
      );
    }
    return describeHeaderOptions({ filter });
  }
}
