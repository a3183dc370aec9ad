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
 * @fileoverview Resource path helpers
 *
 * A path such as `/v1/items/{itemId}` maps segment by segment onto API Gateway resources:
 * `/v1`, `/v1/items` and `/v1/items/{itemId}`.
 */

const PATH_PARAMETER_PATTERN = /\{(\w+)\}/g;
const VALID_PATH_PATTERN = /^\/[\w\-/{}]+$/;

/**
 * Splits a path into its segments, ignoring leading and trailing slashes
 */
export function parsePathSegments(path: string): string[] {
  const cleanPath = path.replace(/^\/+|\/+$/g, '');
  if (!cleanPath) {
    return [];
  }
  return cleanPath.split('/');
}

/**
 * Returns the names of the `{param}` placeholders in a path
 */
export function getPathParameters(path: string): string[] {
  return Array.from(path.matchAll(PATH_PARAMETER_PATTERN), match => match[1]);
}

export function hasPathParameters(path: string): boolean {
  return getPathParameters(path).length > 0;
}

/**
 * Checks that a path starts with `/`, only holds word characters, dashes, slashes and braces,
 * and has no empty segment
 */
export function isValidPath(path: string): boolean {
  if (!path || !path.startsWith('/')) {
    return false;
  }
  if (!VALID_PATH_PATTERN.test(path)) {
    return false;
  }
  return !path.replace(/\/+$/, '').slice(1).split('/').includes('');
}

/**
 * Builds the cumulative resource path of every segment
 *
 * @example
 * ```typescript
 * buildCumulativePaths(['v1', 'items']); // ['/v1', '/v1/items']
 * ```
 */
export function buildCumulativePaths(segments: string[]): string[] {
  return segments.map((_, index) => `/${segments.slice(0, index + 1).join('/')}`);
}

/**
 * Derives the API Gateway resource path from a backend path by dropping the service prefix
 *
 * @example
 * ```typescript
 * deriveApiGatewayPath('/discounts/v1/items'); // '/v1/items'
 * deriveApiGatewayPath('/discounts');          // '/discounts'
 * ```
 */
export function deriveApiGatewayPath(fullBackendPath: string): string {
  const segments = parsePathSegments(fullBackendPath);
  if (segments.length > 1) {
    return `/${segments.slice(1).join('/')}`;
  }
  return fullBackendPath;
}
