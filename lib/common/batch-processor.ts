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
 * @fileoverview Concurrency primitives for region collection, attachment lookups and staged execution
 *
 * - {@link processWithWorkerPool} runs a fixed list of task factories with at most N in flight
 * - {@link Semaphore} bounds work whose tasks are discovered while running
 * - {@link KeyedLock} serializes work per key, used as the per-rule-set lock
 */

import { createLogger } from '../../common/logger';

const logger = createLogger(['batch-processor']);

/**
 * Processes tasks using a worker pool pattern with maximum concurrency control.
 * Results keep the order of the task factories.
 *
 * @throws {Error} When maxConcurrency is not greater than 0, or when a task rejects
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
          `Queue: ${executing.size}/${maxConcurrency} running, ${taskFactories.length - taskIndex} remaining`,
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

/**
 * Counting semaphore for concurrency control
 */
export class Semaphore {
  private permits: number;
  private readonly waiting: Array<() => void> = [];

  constructor(permits: number) {
    if (permits <= 0) {
      throw new Error('Semaphore permits must be greater than 0');
    }
    this.permits = permits;
  }

  /**
   * Runs the task once a permit is available and releases the permit when it settles
   */
  public async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>(resolve => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    this.permits++;
  }
}

/**
 * Mutual exclusion per key. Tasks for one key run one at a time in call order; tasks for
 * different keys do not wait on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  public async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let releaseLock: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      releaseLock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether a task currently holds or waits for the key
   */
  public isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
