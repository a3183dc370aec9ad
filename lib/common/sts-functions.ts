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
 * @fileoverview AWS STS Utility Functions - Session context resolution
 */

import path from 'path';
import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import { IAssumeRoleCredential, ISessionContext } from './interfaces';
import { executeApi, setRetryStrategy } from './utility';
import { MODULE_EXCEPTIONS } from './types';
import { createLogger } from './logger';

const logger = createLogger([path.parse(path.basename(__filename)).name]);

/**
 * Returns the global region of an AWS partition
 * @param partition - AWS partition (aws, aws-cn, aws-us-gov, ...)
 */
export function getGlobalRegion(partition: string): string {
  switch (partition) {
    case 'aws-us-gov':
      return 'us-gov-west-1';
    case 'aws-iso':
      return 'us-iso-east-1';
    case 'aws-iso-b':
      return 'us-isob-east-1';
    case 'aws-iso-e':
      return 'eu-isoe-west-1';
    case 'aws-iso-f':
      return 'us-isof-south-1';
    case 'aws-cn':
      return 'cn-northwest-1';
    default:
      return 'us-east-1';
  }
}

/**
 * Resolves the account, partition and region of the current credentials
 *
 * @param props.region - Region override, the SDK configured region is used otherwise
 * @throws {Error} When GetCallerIdentity returns no Account or Arn, or no region can be resolved
 */
export async function getCurrentSessionDetails(props: {
  logPrefix?: string;
  region?: string;
  solutionId?: string;
  credentials?: IAssumeRoleCredential;
}): Promise<ISessionContext> {
  const client: STSClient = new STSClient({
    region: props.region,
    customUserAgent: props.solutionId,
    retryStrategy: setRetryStrategy(),
    credentials: props.credentials,
  });
  const configRegion = await client.config.region();
  const logPrefix = props.logPrefix ?? `Invoker:${configRegion}`;

  const commandName = 'GetCallerIdentityCommand';
  const parameters = {};
  const response = await executeApi(
    commandName,
    parameters,
    () => client.send(new GetCallerIdentityCommand(parameters)),
    logger,
    logPrefix,
  );

  if (!response.Account) {
    throw new Error(`${MODULE_EXCEPTIONS.SERVICE_EXCEPTION}: ${commandName} did not return Account property`);
  }

  if (!response.Arn) {
    throw new Error(`${MODULE_EXCEPTIONS.SERVICE_EXCEPTION}: ${commandName} did not return Arn property`);
  }

  // arn:partition:service:region:account:resource
  const partition = response.Arn.split(':')[1];

  const resolvedRegion: string | undefined = props.region ?? configRegion;
  if (!resolvedRegion) {
    throw new Error(`${MODULE_EXCEPTIONS.INVALID_INPUT}: Region is missing`);
  }

  const sessionContext: ISessionContext = {
    invokingAccountId: response.Account,
    region: resolvedRegion,
    globalRegion: getGlobalRegion(partition),
    partition,
  };

  logger.info(`Current session details: ${JSON.stringify(sessionContext)}`, logPrefix);

  return sessionContext;
}
