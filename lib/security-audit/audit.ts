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
 * @fileoverview Security Audit Module - Read-only review of REST API authorization settings
 *
 * Runs in two phases over the bounded worker pool:
 * 1. resources of every target API are fetched with their methods embedded
 * 2. every distinct authorizer the methods reference is fetched once into an {@link AuthorizerCache}
 *
 * The rules are then applied to every method and the findings are written to a CSV report.
 * An API that cannot be scanned, or whose authorizer cannot be read, is reported in `failedApis`
 * and does not stop the audit. Per task timeouts count as such failures.
 */

import { APIGatewayClient, Resource, RestApi } from '@aws-sdk/client-api-gateway';
import path from 'path';
import { createLogger, createStatusLogger } from '../common/logger';
import { IModuleResponse, ModuleName } from '../common/interfaces';
import { MODULE_STATE_CODE } from '../common/types';
import { getErrorDetails, setRetryStrategy } from '../common/utility';
import { processBatchSettled } from '../common/batch-processor';
import { getRestApi, listResources, listRestApis } from '../api-gateway/functions';
import { AuthorizerCache } from './authorizer-cache';
import { evaluateMethod } from './rules';
import { buildReportFileName, writeFindingsReport } from './report';
import {
  FindingSeverity,
  IAuthorizerReference,
  IFailedApi,
  ISecurityAuditModuleRequest,
  ISecurityAuditResponse,
  ISecurityFinding,
} from './interfaces';

const logger = createLogger([path.parse(path.basename(__filename)).name]);
const statusLogger = createStatusLogger([path.parse(path.basename(__filename)).name]);

interface IScannedApi {
  id: string;
  name: string;
  resources: Resource[];
}

/**
 * Resolves the APIs to audit, recording requested ids that do not exist
 */
async function resolveTargetApis(
  client: APIGatewayClient,
  props: ISecurityAuditModuleRequest,
  failedApis: IFailedApi[],
  logPrefix: string,
): Promise<RestApi[]> {
  const restApiIds = props.configuration.restApiIds;
  if (!restApiIds || restApiIds.length === 0) {
    return listRestApis(client, logPrefix);
  }

  const lookups = await processBatchSettled(
    'REST API lookup',
    restApiIds,
    restApiId => getRestApi(client, restApiId, restApiId),
    props.configuration.concurrency,
  );

  const found: RestApi[] = [];
  lookups.forEach((lookup, index) => {
    if (lookup.status === 'rejected') {
      failedApis.push({ apiId: restApiIds[index], error: getErrorDetails(lookup.reason).message });
    } else if (lookup.value) {
      found.push(lookup.value);
    } else {
      failedApis.push({ apiId: restApiIds[index], error: 'REST API not found' });
    }
  });
  return found;
}

/**
 * Audits the authorization settings of REST APIs
 *
 * @param props {@link ISecurityAuditModuleRequest}
 * @returns Scan counters, findings and the report location
 */
export async function auditApiSecurity(
  props: ISecurityAuditModuleRequest,
): Promise<IModuleResponse<ISecurityAuditResponse>> {
  const moduleName = props.moduleName ?? ModuleName.API_GATEWAY_SECURITY_AUDIT;
  const dryRun = props.dryRun ?? false;
  const logPrefix = `${props.invokingAccountId}:${props.region}`;
  const concurrency = props.configuration.concurrency;

  try {
    logger.processStart(`Starting security audit`, logPrefix);

    const client = new APIGatewayClient({
      region: props.region,
      customUserAgent: props.solutionId,
      retryStrategy: setRetryStrategy(),
      credentials: props.credentials,
    });

    const failedApis: IFailedApi[] = [];
    const targetApis = await resolveTargetApis(client, props, failedApis, logPrefix);

    // Phase 1: resources with embedded methods
    const discovery = await processBatchSettled(
      'resource discovery',
      targetApis,
      restApi => listResources(client, restApi.id ?? '', restApi.id ?? '', true),
      concurrency,
    );
    const scannedApis: IScannedApi[] = [];
    discovery.forEach((outcome, index) => {
      const apiId = targetApis[index].id ?? '';
      if (outcome.status === 'fulfilled') {
        scannedApis.push({ id: apiId, name: targetApis[index].name ?? '', resources: outcome.value });
        return;
      }
      const { message } = getErrorDetails(outcome.reason);
      logger.warn(`Resource discovery failed: ${message}`, apiId);
      failedApis.push({ apiId, error: message });
    });

    // Phase 2: authorizers referenced by the methods
    const references: IAuthorizerReference[] = [];
    for (const api of scannedApis) {
      for (const resource of api.resources) {
        for (const method of Object.values(resource.resourceMethods ?? {})) {
          if (method.authorizerId) {
            references.push({ restApiId: api.id, authorizerId: method.authorizerId });
          }
        }
      }
    }
    const authorizerCache = new AuthorizerCache(client, concurrency);
    const prefetch = await authorizerCache.prefetch(references);
    const authorizersFetched = prefetch.fetched;
    for (const { reference, error } of prefetch.failed) {
      logger.warn(`Authorizer ${reference.authorizerId} lookup failed: ${error}`, reference.restApiId);
      failedApis.push({ apiId: reference.restApiId, error: `Authorizer ${reference.authorizerId}: ${error}` });
    }

    let resourcesScanned = 0;
    let methodsScanned = 0;
    const findings: ISecurityFinding[] = [];
    for (const api of scannedApis) {
      for (const resource of api.resources) {
        resourcesScanned++;
        for (const [httpMethod, method] of Object.entries(resource.resourceMethods ?? {})) {
          methodsScanned++;
          findings.push(
            ...evaluateMethod({
              apiId: api.id,
              apiName: api.name,
              resourcePath: resource.path ?? '',
              httpMethod,
              method,
              authorizer: method.authorizerId ? authorizerCache.get(api.id, method.authorizerId) : undefined,
            }),
          );
        }
      }
    }

    const severityCounts: Record<FindingSeverity, number> = { HIGH: 0, MEDIUM: 0, LOW: 0 };
    for (const finding of findings) {
      severityCounts[finding.severity]++;
    }

    let reportPath: string | undefined;
    const reportWanted = props.configuration.reportPath !== undefined || findings.length > 0;
    if (!props.configuration.skipReport && reportWanted) {
      reportPath = props.configuration.reportPath ?? buildReportFileName(new Date());
      if (dryRun) {
        logger.dryRun('writeFindingsReport', { reportPath, findings: findings.length }, logPrefix);
      } else {
        await writeFindingsReport(reportPath, findings);
        statusLogger.info(`Report written to ${reportPath}`, logPrefix);
      }
    }

    const severitySummary = `HIGH ${severityCounts.HIGH}, MEDIUM ${severityCounts.MEDIUM}, LOW ${severityCounts.LOW}`;
    const summary = `Audited ${scannedApis.length} REST APIs, ${methodsScanned} methods: ${findings.length} findings (${severitySummary})`;
    logger.processEnd(summary, logPrefix);

    return {
      status: MODULE_STATE_CODE.COMPLETED,
      summary,
      timestamp: new Date().toISOString(),
      moduleName,
      dryRun,
      response: {
        apisScanned: scannedApis.length,
        resourcesScanned,
        methodsScanned,
        authorizersFetched,
        findings,
        severityCounts,
        failedApis,
        reportPath: dryRun ? undefined : reportPath,
      },
    };
  } catch (error: unknown) {
    const errorDetails = getErrorDetails(error);
    const summary = `Security audit failed with error : ${errorDetails.message}`;
    logger.error(summary, logPrefix);
    return {
      error: errorDetails,
      status: MODULE_STATE_CODE.FAILED,
      summary,
      timestamp: new Date().toISOString(),
      moduleName,
      dryRun,
    };
  }
}
