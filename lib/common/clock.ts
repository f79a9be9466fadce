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
 * Time source for transition timestamps, settle waits and health check timeouts
 */
export interface IClock {
  now(): Date;
  /**
   * Resolves after `ms` milliseconds, or as soon as `signal` aborts. Never rejects.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Wall clock backed by timers
 */
export class SystemClock implements IClock {
  public now(): Date {
    return new Date();
  }

  public sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>(resolve => {
      if (ms <= 0 || signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * Races a promise against a clock timeout
 *
 * @throws {Error} `${operation} timeout after ${timeoutMs}ms` when the clock wins
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  clock: IClock,
): Promise<T> {
  const controller = new AbortController();
  const timeoutPromise = new Promise<never>((_, reject) => {
    void clock.sleep(timeoutMs, controller.signal).then(() => {
      if (!controller.signal.aborted) {
        reject(new Error(`${operation} timeout after ${timeoutMs}ms`));
      }
    });
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    controller.abort();
  }
}
