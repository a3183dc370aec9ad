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

import { APIGatewayClient, Resource } from '@aws-sdk/client-api-gateway';
import path from 'path';
import { createLogger } from '../common/logger';
import { MODULE_EXCEPTIONS } from '../common/types';
import { ICreatedResource, IResourceHierarchyResult } from './interfaces';
import { buildCumulativePaths, parsePathSegments } from './path-parser';
import { createResource, getRootResourceId, listResources } from './functions';
import { DRY_RUN_RESOURCE_ID_PREFIX } from './constants';

const logger = createLogger([path.parse(path.basename(__filename)).name]);

function toPathMap(resources: Resource[]): Map<string, string> {
  const pathMap = new Map<string, string>();
  for (const resource of resources) {
    if (resource.path && resource.id) {
      pathMap.set(resource.path, resource.id);
    }
  }
  return pathMap;
}

/**
 * Makes sure every segment of `resourcePath` exists, creating the missing ones root first
 *
 * Existing resources are looked up once. A segment created concurrently by someone else
 * (ConflictException) is picked up from a fresh listing. On dry run missing segments get
 * `dry-run:<path>` placeholder ids.
 *
 * @param client - API Gateway client
 * @param restApiId - REST API id
 * @param resourcePath - API Gateway resource path, e.g. `/v1/items/{itemId}`
 * @param dryRun - Log the creations instead of running them
 * @param logPrefix - Prefix for logging messages
 */
export async function ensureResourceHierarchy(
  client: APIGatewayClient,
  restApiId: string,
  resourcePath: string,
  dryRun: boolean,
  logPrefix: string,
): Promise<IResourceHierarchyResult> {
  const resources = await listResources(client, restApiId, logPrefix);
  let pathMap = toPathMap(resources);
  let parentId = getRootResourceId(resources, restApiId);

  const segments = parsePathSegments(resourcePath);
  const cumulativePaths = buildCumulativePaths(segments);
  const created: ICreatedResource[] = [];
  let skipped = 0;

  for (const [index, segment] of segments.entries()) {
    const currentPath = cumulativePaths[index];
    const existingId = pathMap.get(currentPath);
    if (existingId) {
      logger.info(`Resource ${currentPath} already exists (${existingId})`, logPrefix);
      parentId = existingId;
      skipped++;
      continue;
    }

    const resource = await createResource(client, { restApiId, parentId, pathPart: segment }, dryRun, logPrefix);

    if (dryRun) {
      const placeholderId = `${DRY_RUN_RESOURCE_ID_PREFIX}${currentPath}`;
      created.push({ id: placeholderId, path: currentPath, parentId });
      parentId = placeholderId;
      continue;
    }

    if (resource?.id) {
      logger.info(`Created resource ${currentPath} (${resource.id})`, logPrefix);
      created.push({ id: resource.id, path: currentPath, parentId });
      parentId = resource.id;
      continue;
    }

    pathMap = toPathMap(await listResources(client, restApiId, logPrefix));
    const concurrentId = pathMap.get(currentPath);
    if (!concurrentId) {
      throw new Error(`${MODULE_EXCEPTIONS.SERVICE_EXCEPTION}: Resource ${currentPath} could not be created`);
    }
    logger.warn(`Resource ${currentPath} was created concurrently, reusing ${concurrentId}`, logPrefix);
    parentId = concurrentId;
    skipped++;
  }

  return { resourceId: parentId, created, skipped };
}
