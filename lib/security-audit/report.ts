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

import { createObjectCsvWriter } from 'csv-writer';
import { ISecurityFinding } from './interfaces';

export const REPORT_HEADER: { id: keyof ISecurityFinding; title: string }[] = [
  { id: 'apiId', title: 'ApiId' },
  { id: 'apiName', title: 'ApiName' },
  { id: 'resourcePath', title: 'ResourcePath' },
  { id: 'httpMethod', title: 'HttpMethod' },
  { id: 'ruleId', title: 'RuleId' },
  { id: 'severity', title: 'Severity' },
  { id: 'authorizationType', title: 'AuthorizationType' },
  { id: 'authorizerId', title: 'AuthorizerId' },
  { id: 'authorizerName', title: 'AuthorizerName' },
  { id: 'description', title: 'Description' },
];

/**
 * Report file name for a point in time, `security_report_20240501_103045.csv`
 */
export function buildReportFileName(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `security_report_${day}_${time}.csv`;
}

/**
 * Writes the findings as CSV, one row per finding
 */
export async function writeFindingsReport(reportPath: string, findings: ISecurityFinding[]): Promise<void> {
  const csvWriter = createObjectCsvWriter({ path: reportPath, header: REPORT_HEADER });
  await csvWriter.writeRecords(findings);
}
