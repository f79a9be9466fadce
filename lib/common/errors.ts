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
 * @fileoverview Tagged error types shared by the collector, analyzer, planner and executor.
 *
 * Providers fail with {@link ProviderError}; the engine records per-action failures with a
 * {@link RemediationErrorKind} and only throws {@link RemediationError} for invalid configuration.
 */

/**
 * Failure kinds recorded against actions, rule sets and regions
 */
export enum RemediationErrorKind {
  PROVIDER_THROTTLED = 'ProviderThrottled',
  PROVIDER_DENIED = 'ProviderDenied',
  PROVIDER_NOT_FOUND = 'ProviderNotFound',
  /** Provider failed with an error that is neither throttling, denial nor not-found */
  PROVIDER_FAILED = 'ProviderFailed',
  DRIFT_DETECTED = 'DriftDetected',
  HEALTH_CHECK_FAILED = 'HealthCheckFailed',
  ROLLBACK_FAILED = 'RollbackFailed',
  DEPENDENCY_UNKNOWN = 'DependencyUnknown',
  INVALID_CONFIGURATION = 'InvalidConfiguration',
  CANCELLED = 'Cancelled',
}

/**
 * Error kinds a rule or attachment provider reports
 */
export enum ProviderErrorKind {
  THROTTLED = 'Throttled',
  DENIED = 'Denied',
  NOT_FOUND = 'NotFound',
  /** The provider rejected the change because it already exists or conflicts with current state */
  CONFLICT = 'Conflict',
  UNKNOWN = 'Unknown',
}

/**
 * Engine error tagged with a {@link RemediationErrorKind}
 */
export class RemediationError extends Error {
  public readonly kind: RemediationErrorKind;

  constructor(kind: RemediationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemediationError';
    this.kind = kind;
  }
}

/**
 * Provider error tagged with a {@link ProviderErrorKind} and the failing operation
 */
export class ProviderError extends Error {
  public readonly kind: ProviderErrorKind;
  public readonly operation: string;

  constructor(kind: ProviderErrorKind, operation: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProviderError';
    this.kind = kind;
    this.operation = operation;
  }
}

/**
 * Maps a provider failure onto the remediation taxonomy
 */
export function toRemediationErrorKind(error: unknown): RemediationErrorKind {
  if (!(error instanceof ProviderError)) {
    return RemediationErrorKind.PROVIDER_FAILED;
  }
  switch (error.kind) {
    case ProviderErrorKind.THROTTLED:
      return RemediationErrorKind.PROVIDER_THROTTLED;
    case ProviderErrorKind.DENIED:
      return RemediationErrorKind.PROVIDER_DENIED;
    case ProviderErrorKind.NOT_FOUND:
      return RemediationErrorKind.PROVIDER_NOT_FOUND;
    case ProviderErrorKind.CONFLICT:
      return RemediationErrorKind.DRIFT_DETECTED;
    case ProviderErrorKind.UNKNOWN:
      return RemediationErrorKind.PROVIDER_FAILED;
  }
}

/**
 * Renders any thrown value as `name: message`
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
