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

import { describe, expect, test } from 'vitest';
import {
  buildCumulativePaths,
  deriveApiGatewayPath,
  getPathParameters,
  hasPathParameters,
  isValidPath,
  parsePathSegments,
} from '../../../lib/api-gateway/path-parser';

describe('path-parser', () => {
  describe('parsePathSegments', () => {
    test('should split a path into segments', () => {
      expect(parsePathSegments('/v1/items/{itemId}')).toEqual(['v1', 'items', '{itemId}']);
    });

    test('should ignore leading and trailing slashes', () => {
      expect(parsePathSegments('//v1/items/')).toEqual(['v1', 'items']);
    });

    test('should return no segments for the root path', () => {
      expect(parsePathSegments('/')).toEqual([]);
      expect(parsePathSegments('')).toEqual([]);
    });
  });

  describe('getPathParameters', () => {
    test('should return placeholder names in order', () => {
      expect(getPathParameters('/v1/stores/{storeId}/items/{itemId}')).toEqual(['storeId', 'itemId']);
    });

    test('should return an empty list without placeholders', () => {
      expect(getPathParameters('/v1/items')).toEqual([]);
      expect(hasPathParameters('/v1/items')).toBe(false);
      expect(hasPathParameters('/v1/items/{itemId}')).toBe(true);
    });
  });

  describe('isValidPath', () => {
    test.each(['/v1', '/v1/items/{itemId}', '/discounts/v1/item-list', '/v1/items/'])('should accept %s', value => {
      expect(isValidPath(value)).toBe(true);
    });

    test.each(['', 'v1/items', '/v1//items', '/v1/items?x=1', '/v1/it ems', '/'])('should reject "%s"', value => {
      expect(isValidPath(value)).toBe(false);
    });
  });

  describe('buildCumulativePaths', () => {
    test('should build one path per segment', () => {
      expect(buildCumulativePaths(['v1', 'items', '{itemId}'])).toEqual(['/v1', '/v1/items', '/v1/items/{itemId}']);
    });
  });

  describe('deriveApiGatewayPath', () => {
    test('should drop the service prefix', () => {
      expect(deriveApiGatewayPath('/discounts/v1/items/{itemId}')).toBe('/v1/items/{itemId}');
    });

    test('should keep a single segment path', () => {
      expect(deriveApiGatewayPath('/discounts')).toBe('/discounts');
    });
  });
});
