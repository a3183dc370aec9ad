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
import { APIGatewayClient, GetAuthorizerCommand, NotFoundException } from '@aws-sdk/client-api-gateway';
import { AuthorizerCache } from '../../../lib/security-audit/authorizer-cache';

vi.mock('../../../lib/common/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    processStart: vi.fn(),
    processEnd: vi.fn(),
  })),
}));

const apiGatewayMock = mockClient(APIGatewayClient);

describe('AuthorizerCache', () => {
  beforeEach(() => {
    apiGatewayMock.reset();
    apiGatewayMock.on(GetAuthorizerCommand).resolves({ id: 'auth01', name: 'customers', type: 'COGNITO_USER_POOLS' });
  });

  test('should build keys from the API and authorizer ids', () => {
    expect(AuthorizerCache.key('api1', 'auth01')).toBe('api1/auth01');
  });

  test('should fetch each distinct reference once', async () => {
    const cache = new AuthorizerCache(new APIGatewayClient({}));

    const result = await cache.prefetch([
      { restApiId: 'api1', authorizerId: 'auth01' },
      { restApiId: 'api1', authorizerId: 'auth01' },
      { restApiId: 'api2', authorizerId: 'auth01' },
    ]);

    expect(result).toEqual({ fetched: 2, failed: [] });
    expect(cache.size).toBe(2);
    expect(apiGatewayMock.commandCalls(GetAuthorizerCommand).map(call => call.args[0].input)).toEqual([
      { restApiId: 'api1', authorizerId: 'auth01' },
      { restApiId: 'api2', authorizerId: 'auth01' },
    ]);
    expect(cache.get('api1', 'auth01')?.name).toBe('customers');
  });

  test('should not fetch references that are already cached', async () => {
    const cache = new AuthorizerCache(new APIGatewayClient({}));
    await cache.prefetch([{ restApiId: 'api1', authorizerId: 'auth01' }]);

    const result = await cache.prefetch([{ restApiId: 'api1', authorizerId: 'auth01' }]);

    expect(result).toEqual({ fetched: 0, failed: [] });
    expect(apiGatewayMock.commandCalls(GetAuthorizerCommand)).toHaveLength(1);
  });

  test('should cache a missing authorizer as null', async () => {
    apiGatewayMock
      .on(GetAuthorizerCommand, { authorizerId: 'gone' })
      .rejects(new NotFoundException({ message: 'Invalid authorizer identifier', $metadata: {} }));
    const cache = new AuthorizerCache(new APIGatewayClient({}));

    const result = await cache.prefetch([{ restApiId: 'api1', authorizerId: 'gone' }]);

    expect(result).toEqual({ fetched: 1, failed: [] });
    expect(cache.get('api1', 'gone')).toBeNull();
    expect(cache.get('api1', 'never-fetched')).toBeUndefined();
  });

  test('should report references that could not be read and leave them uncached', async () => {
    apiGatewayMock.on(GetAuthorizerCommand, { restApiId: 'api2' }).rejects(new Error('Access denied'));
    const cache = new AuthorizerCache(new APIGatewayClient({}));

    const result = await cache.prefetch([
      { restApiId: 'api1', authorizerId: 'auth01' },
      { restApiId: 'api2', authorizerId: 'auth01' },
    ]);

    expect(result).toEqual({
      fetched: 1,
      failed: [{ reference: { restApiId: 'api2', authorizerId: 'auth01' }, error: 'Access denied' }],
    });
    expect(cache.size).toBe(1);
    expect(cache.get('api1', 'auth01')?.name).toBe('customers');
    expect(cache.get('api2', 'auth01')).toBeUndefined();
  });

  test('should report a reference whose lookup times out', async () => {
    apiGatewayMock
      .on(GetAuthorizerCommand)
      .callsFake(() => new Promise(resolve => setTimeout(() => resolve({ id: 'auth01' }), 300)));
    const cache = new AuthorizerCache(new APIGatewayClient({}), { operationTimeoutMs: 50 });

    const result = await cache.prefetch([{ restApiId: 'api1', authorizerId: 'auth01' }]);

    expect(result.failed).toEqual([
      {
        reference: { restApiId: 'api1', authorizerId: 'auth01' },
        error: 'authorizer prefetch item 1 timeout after 50ms',
      },
    ]);
    expect(cache.size).toBe(0);
  });
});
