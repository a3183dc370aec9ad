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

import { validateConfiguration } from '../../api-gateway/configuration-validation';
import {
  IConfigurationValidationConfiguration,
  IConfigurationValidationModuleRequest,
  IConfigurationValidationResponse,
} from '../../api-gateway/interfaces';
import {
  CliExecutionParameterType,
  getConfig,
  getDryRunFromArgs,
  getSessionDetailsFromArgs,
  isOptionalString,
  isRecord,
  logError,
  logErrorAndExit,
} from './root';
import { IModuleResponse } from '../../common/interfaces';

/**
 * Abstract command handler class for configuration validation
 */
export abstract class ConfigurationValidationCommand {
  public static async execute(
    param: CliExecutionParameterType,
  ): Promise<IModuleResponse<IConfigurationValidationResponse>> {
    return validateConfiguration(await ConfigurationValidationCommand.getParams(param));
  }

  public static async getParams(param: CliExecutionParameterType): Promise<IConfigurationValidationModuleRequest> {
    if (typeof param.args['configuration'] !== 'string') {
      logErrorAndExit(
        'An error occurred (MissingRequiredParameters): The configuration parameter is a required string',
      );
    }

    const config = getConfig(param.args['configuration']);
    if (!ConfigurationValidationCommand.validConfig(config)) {
      process.exit(1);
    }

    const currentSessionDetails = await getSessionDetailsFromArgs(param);

    return {
      ...currentSessionDetails,
      moduleName: param.moduleName,
      operation: param.commandName,
      dryRun: getDryRunFromArgs(param),
      configuration: {
        restApiId: config.restApiId,
        connectionVariable: config.connectionVariable,
        authorizerId: config.authorizerId,
        cognitoPool: config.cognitoPool,
      },
    };
  }

  /**
   * @returns Type guard indicating if config is an {@link IConfigurationValidationConfiguration}
   */
  public static validConfig(config: unknown): config is IConfigurationValidationConfiguration {
    if (!isRecord(config)) {
      logError('(ConfigValidation): config must be an object');
      return false;
    }
    if (typeof config['restApiId'] !== 'string') {
      logError('(ConfigValidation): config.restApiId must be a string');
      return false;
    }
    if (typeof config['connectionVariable'] !== 'string') {
      logError('(ConfigValidation): config.connectionVariable must be a string');
      return false;
    }
    if (!isOptionalString(config['authorizerId'])) {
      logError('(ConfigValidation): config.authorizerId must be a string');
      return false;
    }
    if (!isOptionalString(config['cognitoPool'])) {
      logError('(ConfigValidation): config.cognitoPool must be a string');
      return false;
    }
    return true;
  }
}
