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

import { describe, expect, test, vi } from 'vitest';
import {
  describeHeaderOptions,
  getCorsHeaders,
  getHeaderOptions,
  getIntegrationConfigOptions,
  isHeaderOptionFilter,
  resolveAuthHeaders,
} from '../../../lib/api-gateway/header-options';
import { MODULE_STATE_CODE } from '../../../lib/common/types';
import { HeaderOptionFilter } from '../../../lib/api-gateway/interfaces';

vi.mock('../../../lib/common/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

describe('header-options', () => {
  describe('getHeaderOptions', () => {
    test('should return every section by default', () => {
      expect(Object.keys(getHeaderOptions())).toEqual(['auth_headers', 'cors_headers', 'integration_config']);
    });

    test('should return only the requested section', () => {
      const options = getHeaderOptions('cors_headers');

      expect(Object.keys(options)).toEqual(['cors_headers']);
      expect(Object.keys(options.cors_headers ?? {})).toEqual(['DEFAULT', 'RESTRICTED']);
    });

    test('should return a copy of the catalogue', () => {
      const options = getHeaderOptions('integration_config');
      if (options.integration_config) {
        options.integration_config.timeout_ms.default = 1000;
      }

      expect(getIntegrationConfigOptions().timeout_ms.default).toBe(29000);
    });

    test('should reject an unknown filter', () => {
      expect(() => getHeaderOptions('headers')).toThrow(
        'InvalidInputException: Invalid filter: headers. Allowed values are auth_headers, cors_headers, integration_config, all',
      );
    });
  });

  describe('isHeaderOptionFilter', () => {
    test('should accept known filters only', () => {
      expect(isHeaderOptionFilter('auth_headers')).toBe(true);
      expect(isHeaderOptionFilter('auth')).toBe(false);
    });
  });

  describe('resolveAuthHeaders', () => {
    test('should return the required customer headers without the pool entry', () => {
      expect(resolveAuthHeaders('COGNITO_CUSTOMER')).toEqual({
        'Claim-Email': 'context.authorizer.claims.email',
        'Claim-User-Id': 'context.authorizer.claims.custom:customer_id',
        'KNOWN-TOKEN-KEY': 'stageVariables.knownTokenKey',
      });
    });

    test('should add optional headers on request', () => {
      expect(resolveAuthHeaders('COGNITO_ADMIN', { cognitoPool: 'back-office', includeOptional: true })).toEqual({
        'Claim-Email': 'context.authorizer.claims.email',
        'Claim-User-Id': 'context.authorizer.claims.custom:admin_id',
        'KNOWN-TOKEN-KEY': 'stageVariables.knownTokenKey',
        'X-Amzn-Request-Id': 'context.requestId',
      });
    });

    test('should return no required headers for public endpoints', () => {
      expect(resolveAuthHeaders('NO_AUTH')).toEqual({});
      expect(resolveAuthHeaders('API_KEY')).toEqual({});
    });
  });

  describe('getCorsHeaders', () => {
    test('should return the default preset', () => {
      expect(getCorsHeaders()).toEqual({
        'Access-Control-Allow-Headers': "'Content-Type,Authorization,X-Amz-Date,X-Api-Key,X-Amz-Security-Token,X-Api-Version'",
        'Access-Control-Allow-Methods': "'DELETE,GET,HEAD,OPTIONS,PATCH,POST,PUT'",
        'Access-Control-Allow-Origin': "'*'",
      });
    });

    test('should return the restricted preset', () => {
      expect(getCorsHeaders('RESTRICTED')).toEqual({
        'Access-Control-Allow-Headers': "'Content-Type,Authorization'",
        'Access-Control-Allow-Methods': "'GET,POST,OPTIONS'",
        'Access-Control-Allow-Origin': "'https://example.com'",
      });
    });
  });

  describe('describeHeaderOptions', () => {
    test('should summarise the returned categories', async () => {
      const result = await describeHeaderOptions({ filter: 'auth_headers' });

      expect(result.status).toBe(MODULE_STATE_CODE.SUCCESS);
      expect(result.summary).toBe('Returned 1 option categories');
      expect(result.moduleName).toBe('api-gateway-header-options');
      expect(Object.keys(result.response?.auth_headers ?? {})).toEqual([
        'COGNITO_ADMIN',
        'COGNITO_CUSTOMER',
        'NO_AUTH',
        'API_KEY',
      ]);
    });

    test('should default to every category', async () => {
      const result = await describeHeaderOptions({});

      expect(result.summary).toBe('Returned 3 option categories');
    });

    test('should fail on an unknown filter', async () => {
      const filter: string = 'headers';
      const result = await describeHeaderOptions({ filter: filter as HeaderOptionFilter });

      expect(result.status).toBe(MODULE_STATE_CODE.FAILED);
      expect(result.summary).toBe(
        'Header options lookup failed with error : InvalidInputException: Invalid filter: headers. Allowed values are auth_headers, cors_headers, integration_config, all',
      );
      expect(result.response).toBeUndefined();
    });
  });
});
