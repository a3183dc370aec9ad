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

import { APIGatewayClient, Authorizer } from '@aws-sdk/client-api-gateway';
import { IConcurrencySettings } from '../common/interfaces';
import { processBatchSettled } from '../common/batch-processor';
import { getErrorDetails } from '../common/utility';
import { getAuthorizer } from '../api-gateway/functions';
import { IAuthorizerPrefetchResult, IAuthorizerReference } from './interfaces';

/**
 * Authorizers keyed by `<restApiId>/<authorizerId>`, every reference is fetched at most once
 *
 * A missing authorizer is cached as `null`.
 */
export class AuthorizerCache {
  private readonly entries = new Map<string, Authorizer | null>();

  constructor(
    private readonly client: APIGatewayClient,
    private readonly concurrency?: IConcurrencySettings,
  ) {}

  static key(restApiId: string, authorizerId: string): string {
    return `${restApiId}/${authorizerId}`;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Fetches the references that are not cached yet, in parallel
   *
   * A reference whose read fails or times out is reported in `failed` and left uncached.
   */
  async prefetch(references: IAuthorizerReference[]): Promise<IAuthorizerPrefetchResult> {
    const pending = new Map<string, IAuthorizerReference>();
    for (const reference of references) {
      const key = AuthorizerCache.key(reference.restApiId, reference.authorizerId);
      if (!this.entries.has(key)) {
        pending.set(key, reference);
      }
    }
    if (pending.size === 0) {
      return { fetched: 0, failed: [] };
    }

    const pendingReferences = [...pending.values()];
    const settled = await processBatchSettled(
      'authorizer prefetch',
      pendingReferences,
      reference =>
        getAuthorizer(this.client, reference.restApiId, reference.authorizerId, reference.restApiId),
      this.concurrency,
    );

    const result: IAuthorizerPrefetchResult = { fetched: 0, failed: [] };
    settled.forEach((outcome, index) => {
      const reference = pendingReferences[index];
      if (outcome.status === 'fulfilled') {
        this.entries.set(AuthorizerCache.key(reference.restApiId, reference.authorizerId), outcome.value ?? null);
        result.fetched++;
      } else {
        result.failed.push({ reference, error: getErrorDetails(outcome.reason).message });
      }
    });
    return result;
  }

  /**
   * @returns The authorizer, null when it does not exist, undefined when it was never fetched
   */
  get(restApiId: string, authorizerId: string): Authorizer | null | undefined {
    return this.entries.get(AuthorizerCache.key(restApiId, authorizerId));
  }
}
