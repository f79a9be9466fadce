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
 * @fileoverview Provider Throttling and Retry Utilities
 *
 * Retries provider operations with exponential backoff when they fail with a throttling or transient error.
 * Both raw AWS SDK v3 errors (matched by `name`) and the engine's own {@link ProviderError} are recognised, so the
 * same helper guards SDK reads inside the AWS providers and rule mutations inside the staged executor.
 *
 * @example
 * ```typescript
 * const response = await throttlingBackOff(() => client.send(new DescribeSecurityGroupsCommand({ GroupIds: [id] })));
 *
 * // Bounded retries for a mutation
 * await throttlingBackOff(() => provider.addRule(region, ruleSetId, rule), { numOfAttempts: 5, startingDelay: 200 });
 * ```
 */

import { backOff, IBackOffOptions } from 'exponential-backoff';
import { ProviderError, ProviderErrorKind } from '../lib/common/errors';

/**
 * Error names that indicate throttling or a transient service fault
 */
const RETRYABLE_ERROR_NAMES = new Set<string>([
  'RequestLimitExceeded', // EC2
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
  'RequestThrottled',
  'RequestThrottledException',
  'InternalError',
  'InternalErrorException',
  'InternalFailure',
  'ServiceUnavailable',
  'Unavailable',
  'ECONNRESET',
  'EPIPE',
  'ENOTFOUND',
  'ETIMEDOUT',
]);

/**
 * Executes a provider operation with exponential backoff retry logic for throttling errors.
 *
 * @remarks
 * Default retry configuration:
 * - Starting delay: 150ms with exponential increase
 * - Maximum attempts: 10
 * - Jitter: Full jitter
 * - Retry condition: {@link isThrottlingError}
 */
export function throttlingBackOff<T>(
  request: () => Promise<T>,
  options?: Partial<Omit<IBackOffOptions, 'retry'>>,
): Promise<T> {
  return backOff(request, {
    startingDelay: 150,
    numOfAttempts: 10,
    jitter: 'full',
    retry: isThrottlingError,
    ...options,
  });
}

/**
 * Determines whether an error should trigger a retry attempt.
 */
export const isThrottlingError = (e: unknown): boolean => {
  if (e instanceof ProviderError) {
    return e.kind === ProviderErrorKind.THROTTLED;
  }
  if (typeof e !== 'object' || e === null) {
    return false;
  }
  if ('retryable' in e && e.retryable === true) {
    return true;
  }
  if ('name' in e && typeof e.name === 'string' && RETRYABLE_ERROR_NAMES.has(e.name)) {
    return true;
  }
  return 'code' in e && typeof e.code === 'string' && RETRYABLE_ERROR_NAMES.has(e.code);
};
