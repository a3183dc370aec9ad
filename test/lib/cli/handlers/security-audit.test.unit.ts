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

import { describe, expect, test, vi, beforeEach, afterEach } from 'vitest';
import { SecurityAuditCommand } from '../../../../lib/cli/handlers/security-audit';
import { getCurrentSessionDetails } from '../../../../lib/common/sts-functions';

vi.mock('../../../../lib/security-audit/audit', () => ({
  auditApiSecurity: vi.fn(),
}));
vi.mock('../../../../lib/common/sts-functions', () => ({
  getCurrentSessionDetails: vi.fn(),
}));
vi.mock('../../../../lib/common/logger', () => ({
  createLogger: vi.fn(() => ({ info: vi.fn() })),
}));

const MOCK_CONSTANTS = {
  session: { invokingAccountId: '111111111111', region: 'us-east-1', globalRegion: 'us-east-1', partition: 'aws' },
};

function params(args: Record<string, unknown>) {
  return { moduleName: 'security', commandName: 'audit', args: { _: ['audit', 'security'], ...args } };
}

describe('SecurityAuditCommand', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(getCurrentSessionDetails).mockResolvedValue(MOCK_CONSTANTS.session);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('should audit every API with defaults', async () => {
    const result = await SecurityAuditCommand.getParams(params({}));

    expect(result).toEqual({
      ...MOCK_CONSTANTS.session,
      moduleName: 'security',
      operation: 'audit',
      dryRun: false,
      configuration: { skipReport: false },
    });
  });

  test('should split the API ids and pass the report options', async () => {
    const result = await SecurityAuditCommand.getParams(
      params({ 'api-ids': 'a1b2c3d4e5, f6g7h8i9j0,,', report: 'findings.csv', 'max-concurrency': 4 }),
    );

    expect(result.configuration).toEqual({
      restApiIds: ['a1b2c3d4e5', 'f6g7h8i9j0'],
      reportPath: 'findings.csv',
      skipReport: false,
      concurrency: { maxConcurrentRequests: 4 },
    });
  });

  test('should skip the report on request', async () => {
    const result = await SecurityAuditCommand.getParams(params({ 'skip-report': true, 'dry-run': true }));

    expect(result.dryRun).toBe(true);
    expect(result.configuration.skipReport).toBe(true);
  });

  test('should exit on an invalid concurrency', async () => {
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(SecurityAuditCommand.getParams(params({ 'max-concurrency': 0 }))).rejects.toThrow('process.exit');

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      'apigw-builder: error: An error occurred (InvalidParameter): max-concurrency must be a positive integer',
    );
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(getCurrentSessionDetails).not.toHaveBeenCalled();
  });
});
