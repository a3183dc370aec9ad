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
  ConflictException,
  CreateResourceCommand,
  GetIntegrationCommand,
  GetResourcesCommand,
  NotFoundException,
  PutIntegrationCommand,
  PutMethodCommand,
} from '@aws-sdk/client-api-gateway';
import { createEndpoint } from '../../../lib/api-gateway/endpoint';
import { EndpointErrorCode, IEndpointConfiguration, IEndpointModuleRequest } from '../../../lib/api-gateway/interfaces';
import { MODULE_STATE_CODE } from '../../../lib/common/types';

vi.mock('../../../lib/common/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    processStart: vi.fn(),
    processEnd: vi.fn(),
    dryRun: vi.fn(),
    commandExecution: vi.fn(),
    commandSuccess: vi.fn(),
  })),
}));

const CONFIGURATION: IEndpointConfiguration = {
  restApiId: 'a1b2c3d4e5',
  fullBackendPath: '/discounts/v1/items/{itemId}',
  httpMethods: ['GET'],
  integration: { connectionVariable: 'vpcLinkId', backendHost: 'https://internal-nlb.example.com' },
  authentication: { authType: 'COGNITO_CUSTOMER', authorizerId: 'auth01' },
};

const MOCK_CONSTANTS = {
  configuration: CONFIGURATION,
  conflict: new ConflictException({ message: 'Already exists', $metadata: {} }),
};

function request(configuration: IEndpointConfiguration, dryRun = false): IEndpointModuleRequest {
  return {
    operation: 'create',
    partition: 'aws',
    region: 'us-east-1',
    globalRegion: 'us-east-1',
    invokingAccountId: '111111111111',
    dryRun,
    configuration,
  };
}

const apiGatewayMock = mockClient(APIGatewayClient);

describe('endpoint', () => {
  beforeEach(() => {
    apiGatewayMock.reset();
  });

  test('should create resources, methods, integrations and CORS', async () => {
    apiGatewayMock.on(GetResourcesCommand).resolves({
      items: [
        { id: 'root', path: '/' },
        { id: 'r1', path: '/v1' },
      ],
    });
    apiGatewayMock.on(CreateResourceCommand, { pathPart: 'items' }).resolves({ id: 'r2' });
    apiGatewayMock.on(CreateResourceCommand, { pathPart: '{itemId}' }).resolves({ id: 'r3' });
    apiGatewayMock.on(GetIntegrationCommand).resolves({ type: 'HTTP_PROXY' });

    const result = await createEndpoint(request(MOCK_CONSTANTS.configuration));

    expect(result.status).toBe(MODULE_STATE_CODE.SUCCESS);
    expect(result.moduleName).toBe('api-gateway-endpoint');
    expect(result.summary).toBe('Endpoint /v1/items/{itemId} created on REST API a1b2c3d4e5');
    expect(result.response).toEqual({
      resourceId: 'r3',
      apiGatewayPath: '/v1/items/{itemId}',
      steps: [
        { name: 'parse_path', status: 'ok' },
        { name: 'create_resources', status: 'ok', created: 2, skipped: 1 },
        { name: 'create_methods', status: 'ok', count: 1 },
        { name: 'configure_integrations', status: 'ok' },
        { name: 'create_cors', status: 'ok' },
        { name: 'verify', status: 'ok' },
      ],
      warnings: ['1 resources already existed'],
    });
    expect(apiGatewayMock.commandCalls(PutMethodCommand).map(call => call.args[0].input.httpMethod)).toEqual([
      'GET',
      'OPTIONS',
    ]);
    expect(apiGatewayMock.commandCalls(GetIntegrationCommand).map(call => call.args[0].input.httpMethod)).toEqual([
      'GET',
      'OPTIONS',
    ]);
  });

  test('should only read the REST API on dry run', async () => {
    apiGatewayMock.on(GetResourcesCommand).resolves({ items: [{ id: 'root', path: '/' }] });

    const result = await createEndpoint(request(MOCK_CONSTANTS.configuration, true));

    expect(result.status).toBe(MODULE_STATE_CODE.SUCCESS);
    expect(result.dryRun).toBe(true);
    expect(result.summary).toBe(
      '[DRY-RUN]: api-gateway-endpoint create (no actual changes were made)\nValidation: ✓ Successful\nStatus: Endpoint /v1/items/{itemId} would be created with 3 new resources',
    );
    expect(result.response?.resourceId).toBe('dry-run:/v1/items/{itemId}');
    expect(result.response?.steps.at(-1)).toEqual({ name: 'verify', status: 'skipped' });
    expect(apiGatewayMock.calls()).toHaveLength(1);
  });

  test('should reject an invalid configuration before calling the service', async () => {
    const result = await createEndpoint(request({ ...MOCK_CONSTANTS.configuration, httpMethods: [] }));

    expect(result.status).toBe(MODULE_STATE_CODE.FAILED);
    expect(result.error).toEqual({
      name: 'INVALID_PAYLOAD',
      message: 'Invalid endpoint configuration: httpMethods must contain at least one method',
    });
    expect(result.summary).toBe(
      'Endpoint creation failed with error : Invalid endpoint configuration: httpMethods must contain at least one method',
    );
    expect(result.response).toEqual({
      steps: [],
      warnings: [],
      errorCode: EndpointErrorCode.INVALID_PAYLOAD,
      failedStep: undefined,
    });
    expect(apiGatewayMock.calls()).toHaveLength(0);
  });

  test('should report a failed resource step', async () => {
    apiGatewayMock.on(GetResourcesCommand).rejects(new Error('User is not authorized to perform GET'));

    const result = await createEndpoint(request(MOCK_CONSTANTS.configuration));

    expect(result.status).toBe(MODULE_STATE_CODE.FAILED);
    expect(result.error).toEqual({
      name: 'RESOURCE_CREATION_FAILED',
      message: 'User is not authorized to perform GET',
    });
    expect(result.response?.steps).toEqual([
      { name: 'parse_path', status: 'ok' },
      { name: 'create_resources', status: 'failed' },
    ]);
    expect(result.response?.failedStep).toBe('create_resources');
  });

  test('should report a failed method step', async () => {
    apiGatewayMock.on(GetResourcesCommand).resolves({
      items: [
        { id: 'root', path: '/' },
        { id: 'r1', path: '/v1' },
        { id: 'r2', path: '/v1/items' },
        { id: 'r3', path: '/v1/items/{itemId}' },
      ],
    });
    apiGatewayMock.on(PutMethodCommand).rejects(new Error('Invalid authorizer id'));

    const result = await createEndpoint(request(MOCK_CONSTANTS.configuration));

    expect(result.error?.name).toBe(EndpointErrorCode.METHOD_CREATION_FAILED);
    expect(result.response?.failedStep).toBe('create_methods');
    expect(apiGatewayMock.commandCalls(PutIntegrationCommand)).toHaveLength(0);
  });

  test('should report a failed integration step', async () => {
    apiGatewayMock.on(GetResourcesCommand).resolves({
      items: [
        { id: 'root', path: '/' },
        { id: 'r1', path: '/v1' },
        { id: 'r2', path: '/v1/items' },
        { id: 'r3', path: '/v1/items/{itemId}' },
      ],
    });
    apiGatewayMock.on(PutIntegrationCommand).rejects(new Error('Invalid VPC Link identifier'));

    const result = await createEndpoint(request(MOCK_CONSTANTS.configuration));

    expect(result.status).toBe(MODULE_STATE_CODE.FAILED);
    expect(result.error).toEqual({ name: 'INTEGRATION_FAILED', message: 'Invalid VPC Link identifier' });
    expect(result.response?.errorCode).toBe(EndpointErrorCode.INTEGRATION_FAILED);
    expect(result.response?.failedStep).toBe('configure_integrations');
    expect(result.response?.steps).toEqual([
      { name: 'parse_path', status: 'ok' },
      { name: 'create_resources', status: 'ok', created: 0, skipped: 3 },
      { name: 'create_methods', status: 'ok', count: 1 },
      { name: 'configure_integrations', status: 'failed' },
    ]);
    expect(apiGatewayMock.commandCalls(PutMethodCommand).map(call => call.args[0].input.httpMethod)).toEqual(['GET']);
    expect(apiGatewayMock.commandCalls(GetIntegrationCommand)).toHaveLength(0);
  });

  test('should warn about resources, methods and integrations that already existed', async () => {
    apiGatewayMock.on(GetResourcesCommand).resolves({
      items: [
        { id: 'root', path: '/' },
        { id: 'r1', path: '/v1' },
        { id: 'r2', path: '/v1/items' },
        { id: 'r3', path: '/v1/items/{itemId}' },
      ],
    });
    apiGatewayMock.on(PutMethodCommand).rejects(MOCK_CONSTANTS.conflict);
    apiGatewayMock.on(PutIntegrationCommand).rejects(MOCK_CONSTANTS.conflict);
    apiGatewayMock.on(GetIntegrationCommand).resolves({ type: 'HTTP_PROXY' });

    const result = await createEndpoint(request({ ...MOCK_CONSTANTS.configuration, cors: { enabled: false } }));

    expect(result.status).toBe(MODULE_STATE_CODE.SUCCESS);
    expect(result.response?.warnings).toEqual([
      '3 resources already existed',
      'Method GET already existed',
      'Integration for GET already existed',
    ]);
    expect(result.response?.steps).toContainEqual({ name: 'create_cors', status: 'skipped' });
    expect(apiGatewayMock.commandCalls(GetIntegrationCommand)).toHaveLength(1);
  });

  test('should keep going when CORS cannot be configured', async () => {
    apiGatewayMock.on(GetResourcesCommand).resolves({
      items: [
        { id: 'root', path: '/' },
        { id: 'r1', path: '/v1' },
        { id: 'r2', path: '/v1/items' },
        { id: 'r3', path: '/v1/items/{itemId}' },
      ],
    });
    apiGatewayMock.on(PutMethodCommand, { httpMethod: 'OPTIONS' }).rejects(new Error('Too many methods'));
    apiGatewayMock.on(GetIntegrationCommand).resolves({ type: 'HTTP_PROXY' });

    const result = await createEndpoint(request(MOCK_CONSTANTS.configuration));

    expect(result.status).toBe(MODULE_STATE_CODE.SUCCESS);
    expect(result.response?.steps).toContainEqual({ name: 'create_cors', status: 'failed' });
    expect(result.response?.warnings).toEqual([
      '3 resources already existed',
      'CORS configuration failed: Too many methods',
    ]);
  });

  test('should fail verification when an integration is missing', async () => {
    apiGatewayMock.on(GetResourcesCommand).resolves({
      items: [
        { id: 'root', path: '/' },
        { id: 'r1', path: '/v1' },
        { id: 'r2', path: '/v1/items' },
        { id: 'r3', path: '/v1/items/{itemId}' },
      ],
    });
    apiGatewayMock.on(GetIntegrationCommand).resolves({ type: 'HTTP_PROXY' });
    apiGatewayMock
      .on(GetIntegrationCommand, { httpMethod: 'OPTIONS' })
      .rejects(new NotFoundException({ message: 'No integration defined for method', $metadata: {} }));

    const result = await createEndpoint(request(MOCK_CONSTANTS.configuration));

    expect(result.status).toBe(MODULE_STATE_CODE.FAILED);
    expect(result.error).toEqual({
      name: 'VERIFICATION_FAILED',
      message: 'Integration verification failed, missing integrations for OPTIONS',
    });
    expect(result.response?.steps.at(-1)).toEqual({ name: 'verify', status: 'failed' });
    expect(result.response?.failedStep).toBe('verify');
  });

  test('should add CORS to every created resource on request', async () => {
    apiGatewayMock.on(GetResourcesCommand).resolves({ items: [{ id: 'root', path: '/' }] });
    apiGatewayMock.on(CreateResourceCommand, { pathPart: 'v1' }).resolves({ id: 'r1' });
    apiGatewayMock.on(CreateResourceCommand, { pathPart: 'items' }).resolves({ id: 'r2' });
    apiGatewayMock.on(GetIntegrationCommand).resolves({ type: 'HTTP_PROXY' });

    const result = await createEndpoint(
      request({
        ...MOCK_CONSTANTS.configuration,
        fullBackendPath: '/discounts/v1/items',
        cors: { preset: 'RESTRICTED', applyToCreatedResources: true },
      }),
    );

    expect(result.status).toBe(MODULE_STATE_CODE.SUCCESS);
    const optionsCalls = apiGatewayMock
      .commandCalls(PutMethodCommand)
      .filter(call => call.args[0].input.httpMethod === 'OPTIONS')
      .map(call => call.args[0].input.resourceId);
    expect(optionsCalls).toEqual(['r2', 'r1']);
  });
});
