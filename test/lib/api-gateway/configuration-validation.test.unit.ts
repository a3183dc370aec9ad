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

import { describe, beforeEach, expect, test, vi } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  APIGatewayClient,
  GetAuthorizersCommand,
  GetRestApiCommand,
  GetStagesCommand,
  NotFoundException,
} from '@aws-sdk/client-api-gateway';
import { CognitoIdentityProviderClient, ListUserPoolsCommand } from '@aws-sdk/client-cognito-identity-provider';
import { listUserPools, validateConfiguration } from '../../../lib/api-gateway/configuration-validation';
import { IConfigurationValidationConfiguration } from '../../../lib/api-gateway/interfaces';
import { MODULE_STATE_CODE } from '../../../lib/common/types';

vi.mock('../../../lib/common/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    processStart: vi.fn(),
    processEnd: vi.fn(),
    commandExecution: vi.fn(),
    commandSuccess: vi.fn(),
  })),
}));

const MOCK_CONSTANTS = {
  restApiId: 'a1b2c3d4e5',
  request: {
    operation: 'validate',
    partition: 'aws',
    region: 'us-east-1',
    globalRegion: 'us-east-1',
    invokingAccountId: '111111111111',
  },
};

function request(configuration: IConfigurationValidationConfiguration) {
  return { ...MOCK_CONSTANTS.request, configuration };
}

const apiGatewayMock = mockClient(APIGatewayClient);
const cognitoMock = mockClient(CognitoIdentityProviderClient);

describe('configuration-validation', () => {
  beforeEach(() => {
    apiGatewayMock.reset();
    cognitoMock.reset();
    apiGatewayMock.on(GetRestApiCommand).resolves({ id: MOCK_CONSTANTS.restApiId, name: 'orders-api-dev' });
    apiGatewayMock.on(GetStagesCommand).resolves({ item: [{ stageName: 'dev', variables: { vpcLinkId: 'vl-1' } }] });
    apiGatewayMock.on(GetAuthorizersCommand).resolves({ items: [{ id: 'auth01', type: 'COGNITO_USER_POOLS' }] });
    cognitoMock.on(ListUserPoolsCommand).resolves({ UserPools: [{ Id: 'us-east-1_pool', Name: 'customers' }] });
  });

  describe('listUserPools', () => {
    test('should follow every page', async () => {
      cognitoMock
        .on(ListUserPoolsCommand)
        .resolvesOnce({ UserPools: [{ Name: 'admins' }], NextToken: 'page-2' })
        .resolvesOnce({ UserPools: [{ Name: 'customers' }] });

      const pools = await listUserPools(new CognitoIdentityProviderClient({}), 'test');

      expect(pools.map(pool => pool.Name)).toEqual(['admins', 'customers']);
      expect(cognitoMock.commandCalls(ListUserPoolsCommand)[0].args[0].input).toEqual({ MaxResults: 60 });
      expect(cognitoMock.commandCalls(ListUserPoolsCommand)[1].args[0].input).toEqual({
        MaxResults: 60,
        NextToken: 'page-2',
      });
    });
  });

  describe('validateConfiguration', () => {
    test('should pass every check', async () => {
      const result = await validateConfiguration(
        request({
          restApiId: MOCK_CONSTANTS.restApiId,
          connectionVariable: 'vpcLinkId',
          authorizerId: 'auth01',
          cognitoPool: 'customers',
        }),
      );

      expect(result.status).toBe(MODULE_STATE_CODE.SUCCESS);
      expect(result.summary).toBe('Configuration of REST API a1b2c3d4e5 is valid');
      expect(result.moduleName).toBe('api-gateway-configuration');
      expect(result.response).toEqual({
        valid: true,
        checks: { api: true, connectionVariable: true, authorizer: true, cognitoPool: true },
      });
    });

    test('should only run the checks that were requested', async () => {
      const result = await validateConfiguration(
        request({ restApiId: MOCK_CONSTANTS.restApiId, connectionVariable: 'vpcLinkId' }),
      );

      expect(result.response?.checks).toEqual({ api: true, connectionVariable: true });
      expect(apiGatewayMock.commandCalls(GetAuthorizersCommand)).toHaveLength(0);
      expect(cognitoMock.commandCalls(ListUserPoolsCommand)).toHaveLength(0);
    });

    test('should list the failed checks', async () => {
      const result = await validateConfiguration(
        request({
          restApiId: MOCK_CONSTANTS.restApiId,
          connectionVariable: 'backendHost',
          authorizerId: 'auth02',
          cognitoPool: 'customers',
        }),
      );

      expect(result.status).toBe(MODULE_STATE_CODE.FAILED);
      expect(result.summary).toBe(
        'Configuration of REST API a1b2c3d4e5 is invalid, failed checks: connectionVariable, authorizer',
      );
      expect(result.response?.valid).toBe(false);
    });

    test('should fail every API check when the REST API does not exist', async () => {
      apiGatewayMock
        .on(GetRestApiCommand)
        .rejects(new NotFoundException({ message: 'Invalid REST API identifier', $metadata: {} }));

      const result = await validateConfiguration(
        request({ restApiId: MOCK_CONSTANTS.restApiId, connectionVariable: 'vpcLinkId', authorizerId: 'auth01' }),
      );

      expect(result.response?.checks).toEqual({ api: false, connectionVariable: false, authorizer: false });
      expect(apiGatewayMock.commandCalls(GetStagesCommand)).toHaveLength(0);
      expect(apiGatewayMock.commandCalls(GetAuthorizersCommand)).toHaveLength(0);
    });

    test('should report unexpected errors', async () => {
      apiGatewayMock.on(GetStagesCommand).rejects(new Error('Service unavailable'));

      const result = await validateConfiguration(
        request({ restApiId: MOCK_CONSTANTS.restApiId, connectionVariable: 'vpcLinkId' }),
      );

      expect(result.status).toBe(MODULE_STATE_CODE.FAILED);
      expect(result.summary).toBe('Configuration validation failed with error : Service unavailable');
      expect(result.error).toEqual({ name: 'Error', message: 'Service unavailable' });
      expect(result.response).toBeUndefined();
    });
  });
});
