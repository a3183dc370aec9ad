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
 * @fileoverview Batch Processor - Bounded worker pool for independent API calls
 *
 * Used by the security audit to fan out resource and authorizer reads across many REST APIs
 * without exceeding the API Gateway control plane rate limits.
 */

import { createLogger } from './logger';
import { IConcurrencySettings } from './interfaces';
import { DEFAULT_MAX_CONCURRENT_REQUESTS, DEFAULT_OPERATION_TIMEOUT_MS } from './constants';

const logger = createLogger(['batch-processor']);

/**
 * Handler invoked once per batch item
 * @template TItem - Item type
 * @template TResult - Handler result type
 */
export type BatchItemHandler<TItem, TResult> = (item: TItem, index: number) => Promise<TResult>;

/**
 * Runs one handler per item through the worker pool, applying the per task timeout
 *
 * @param name - Batch name used in log lines and timeout errors
 * @param items - Items to process
 * @param handler - Handler called for every item
 * @param concurrency - Optional pool width and timeout overrides
 * @returns Handler results in the order of `items`
 */
export async function processBatch<TItem, TResult>(
  name: string,
  items: TItem[],
  handler: BatchItemHandler<TItem, TResult>,
  concurrency?: IConcurrencySettings,
): Promise<TResult[]> {
  const concurrencySettings = resolveConcurrencySettings(concurrency);

  logger.processStart(
    `Starting ${name} for ${items.length} items with max ${concurrencySettings.maxConcurrentRequests} concurrent`,
  );

  const tasks = items.map(
    (item, index) => () =>
      withTimeout(handler(item, index), concurrencySettings.operationTimeoutMs, `${name} item ${index + 1}`),
  );

  const results = await processWithWorkerPool(tasks, concurrencySettings.maxConcurrentRequests);

  logger.processEnd(`Successfully completed ${name} for ${items.length} items`);
  return results;
}

/**
 * Like {@link processBatch}, but a handler error or timeout settles that item instead of rejecting the batch
 *
 * @returns One settled result per item, in the order of `items`
 */
export async function processBatchSettled<TItem, TResult>(
  name: string,
  items: TItem[],
  handler: BatchItemHandler<TItem, TResult>,
  concurrency?: IConcurrencySettings,
): Promise<PromiseSettledResult<TResult>[]> {
  const concurrencySettings = resolveConcurrencySettings(concurrency);

  logger.processStart(
    `Starting ${name} for ${items.length} items with max ${concurrencySettings.maxConcurrentRequests} concurrent`,
  );

  const tasks = items.map(
    (item, index) => () =>
      withTimeout(handler(item, index), concurrencySettings.operationTimeoutMs, `${name} item ${index + 1}`).then(
        (value): PromiseSettledResult<TResult> => ({ status: 'fulfilled', value }),
        (reason: unknown): PromiseSettledResult<TResult> => ({ status: 'rejected', reason }),
      ),
  );

  const results = await processWithWorkerPool(tasks, concurrencySettings.maxConcurrentRequests);

  const failed = results.filter(result => result.status === 'rejected').length;
  logger.processEnd(`Completed ${name} for ${items.length} items, ${failed} failed`);
  return results;
}

/**
 * Races a promise against a timer, clearing the timer once the promise settles
 * @param promise - Promise to wrap
 * @param timeoutMs - Timeout in milliseconds
 * @param operation - Operation description used in the timeout error
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<T>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error(`${operation} timeout after ${timeoutMs}ms`)), timeoutMs);
  });

  return Promise.race([promise.finally(() => clearTimeout(timeoutId)), timeoutPromise]);
}

/**
 * Fills in defaults for missing concurrency settings
 */
export function resolveConcurrencySettings(concurrency?: IConcurrencySettings): Required<IConcurrencySettings> {
  return {
    maxConcurrentRequests: concurrency?.maxConcurrentRequests ?? DEFAULT_MAX_CONCURRENT_REQUESTS,
    operationTimeoutMs: concurrency?.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS,
  };
}

/**
 * Executes task factories with at most `maxConcurrency` running at once.
 *
 * Results keep the order of `taskFactories`. The first rejection rejects the pool; tasks already
 * running are left to settle on their own.
 *
 * @param taskFactories - Functions that start a task when called
 * @param maxConcurrency - Maximum number of tasks in flight
 * @throws Error when maxConcurrency is not positive
 */
export async function processWithWorkerPool<T>(
  taskFactories: (() => Promise<T>)[],
  maxConcurrency: number,
): Promise<T[]> {
  if (maxConcurrency <= 0) {
    throw new Error('maxConcurrency must be greater than 0');
  }
  if (taskFactories.length === 0) {
    return [];
  }

  const results: T[] = new Array(taskFactories.length);
  const executing = new Set<Promise<void>>();
  let taskIndex = 0;

  while (taskIndex < taskFactories.length || executing.size > 0) {
    while (executing.size < maxConcurrency && taskIndex < taskFactories.length) {
      const currentIndex = taskIndex++;

      if (taskFactories.length > maxConcurrency && taskIndex === maxConcurrency) {
        logger.info(
          `Queue: ${executing.size + 1}/${maxConcurrency} running, ${taskFactories.length - taskIndex} remaining`,
        );
      }

      const promise: Promise<void> = taskFactories[currentIndex]()
        .then(result => {
          results[currentIndex] = result;
        })
        .finally(() => {
          executing.delete(promise);
        });

      executing.add(promise);
    }

    if (executing.size > 0) {
      await Promise.race(executing);
    }
  }

  return results;
}
