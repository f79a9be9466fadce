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
import { ConfiguredRetryStrategy } from '@aws-sdk/util-retry';
import { MODULE_EXCEPTIONS } from './enums';
import { IModuleCommonParameter, IModuleDefaultParameter } from './resources';
import { DEFAULT_SDK_MAX_ATTEMPTS } from '../lib/common/constants';
import { RemediationError, RemediationErrorKind } from '../lib/common/errors';

const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;

/**
 * Function to generate dry run response
 * @param moduleName string
 * @param operation string
 * @param message string
 * @returns string
 */
export function generateDryRunResponse(moduleName: string, operation: string, message: string): string {
  const statusPrefix = `[DRY-RUN]: ${moduleName} ${operation} (no actual changes were made)\nValidation: ✓ Successful\nStatus: `;
  return `${statusPrefix}${message}`;
}

/**
 * Function to get default parameters for module
 * @param moduleName string
 * @param props {@link IModuleCommonParameter}
 * @returns props  {@link IModuleDefaultParameter}
 */
export function getModuleDefaultParameters(moduleName: string, props: IModuleCommonParameter): IModuleDefaultParameter {
  return {
    moduleName: props.moduleName ?? moduleName,
    dryRun: props.dryRun ?? false,
  };
}

/**
 * SDK client retry strategy. Attempts come from `SG_REMEDIATION_SDK_MAX_ATTEMPTS`.
 */
export function setRetryStrategy() {
  const numberOfRetries = Number(process.env['SG_REMEDIATION_SDK_MAX_ATTEMPTS'] ?? DEFAULT_SDK_MAX_ATTEMPTS);
  return new ConfiguredRetryStrategy(numberOfRetries, (attempt: number) => 100 + attempt * 1000);
}

/**
 * Function to validate a region list
 * @param regions string[]
 * @returns regions string[]
 *
 * @throws {@link RemediationError} with kind InvalidConfiguration when the list is empty, malformed or has duplicates
 */
export function validateRegions(regions: readonly string[]): string[] {
  if (regions.length === 0) {
    throw new RemediationError(
      RemediationErrorKind.INVALID_CONFIGURATION,
      `${MODULE_EXCEPTIONS.INVALID_INPUT}: At least one region is required`,
    );
  }

  const invalid = regions.filter(region => !REGION_PATTERN.test(region));
  if (invalid.length > 0) {
    throw new RemediationError(
      RemediationErrorKind.INVALID_CONFIGURATION,
      `${MODULE_EXCEPTIONS.INVALID_INPUT}: Invalid region name(s): ${invalid.join(', ')}`,
    );
  }

  const duplicates = regions.filter((region, index) => regions.indexOf(region) !== index);
  if (duplicates.length > 0) {
    throw new RemediationError(
      RemediationErrorKind.INVALID_CONFIGURATION,
      `${MODULE_EXCEPTIONS.INVALID_INPUT}: Duplicate region(s): ${[...new Set(duplicates)].join(', ')}`,
    );
  }

  return [...regions];
}
