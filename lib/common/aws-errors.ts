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
import { isThrottlingError } from '../../common/throttle';
import { ProviderError, ProviderErrorKind } from './errors';

const DENIED_ERROR_NAMES = new Set<string>([
  'UnauthorizedOperation',
  'AuthFailure',
  'AccessDenied',
  'AccessDeniedException',
  'OptInRequired',
  'Blocked',
  'InvalidClientTokenId',
  'ExpiredToken',
  'UnrecognizedClientException',
]);

const NOT_FOUND_ERROR_NAMES = new Set<string>([
  'InvalidGroup.NotFound',
  'InvalidGroupId.NotFound',
  'InvalidPermission.NotFound',
  'ResourceNotFound',
  'ResourceNotFoundException',
  'LoadBalancerNotFound',
  'DBInstanceNotFound',
  'DBClusterNotFoundFault',
]);

const CONFLICT_ERROR_NAMES = new Set<string>([
  'InvalidPermission.Duplicate',
  'DependencyViolation',
  'CannotDelete',
  'InvalidGroup.InUse',
  'InvalidGroup.Reserved',
]);

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

/**
 * Maps an AWS SDK v3 service error onto a {@link ProviderError}
 *
 * @param operation Failing SDK command, e.g. `RevokeSecurityGroupIngress`
 */
export function toProviderError(operation: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  const name = errorName(error) ?? 'UnknownError';
  const message = error instanceof Error ? error.message : String(error);

  let kind = ProviderErrorKind.UNKNOWN;
  if (isThrottlingError(error)) {
    kind = ProviderErrorKind.THROTTLED;
  } else if (DENIED_ERROR_NAMES.has(name)) {
    kind = ProviderErrorKind.DENIED;
  } else if (NOT_FOUND_ERROR_NAMES.has(name)) {
    kind = ProviderErrorKind.NOT_FOUND;
  } else if (CONFLICT_ERROR_NAMES.has(name)) {
    kind = ProviderErrorKind.CONFLICT;
  }

  return new ProviderError(kind, operation, `${operation} failed with ${name}: ${message}`, { cause: error });
}
