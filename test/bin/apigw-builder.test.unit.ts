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
import { formatOutput } from '../../bin/apigw-builder';
import { IModuleResponse } from '../../lib/common/interfaces';
import { MODULE_STATE_CODE } from '../../lib/common/types';

const MOCK_CONSTANTS: { response: IModuleResponse<{ groups: string[] }> } = {
  response: {
    status: MODULE_STATE_CODE.SUCCESS,
    summary: 'Found 1 API groups',
    timestamp: '2024-05-01T10:30:45.000Z',
    moduleName: 'api-groups',
    dryRun: false,
    response: { groups: ['orders-api'] },
  },
};

describe('formatOutput', () => {
  test('should return strings unchanged', () => {
    expect(formatOutput('Invalid command "delete"', 'table')).toBe('Invalid command "delete"');
  });

  test('should default to JSON', () => {
    expect(formatOutput(MOCK_CONSTANTS.response)).toBe(JSON.stringify(MOCK_CONSTANTS.response, null, 2));
  });

  test('should format text output', () => {
    expect(formatOutput(MOCK_CONSTANTS.response, 'text')).toBe(
      'api-groups\tsuccess\tFound 1 API groups\nResponse:\n{\n  "groups": [\n    "orders-api"\n  ]\n}',
    );
  });

  test('should omit the response section when there is none', () => {
    const { response: _response, ...withoutResponse } = MOCK_CONSTANTS.response;
    expect(formatOutput(withoutResponse, 'text')).toBe('api-groups\tsuccess\tFound 1 API groups');
  });

  test('should format table output', () => {
    const lines = formatOutput(MOCK_CONSTANTS.response, 'table').split('\n');

    expect(lines[0]).toBe('MODULE\t\t\t\tSTATUS\t\tSUMMARY');
    expect(lines[2]).toBe(`${'api-groups'.padEnd(30)}\t${'success'.padEnd(10)}\tFound 1 API groups`);
    expect(lines[4]).toBe('Detailed Response:');
  });
});
