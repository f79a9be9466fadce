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
import { IModuleCommonParameter } from '../../common/resources';
import {
  IAttachmentProvider,
  IHealthCheckProvider,
  IRiskClassifierConfiguration,
  IRuleProvider,
  RiskLevel,
} from '../../lib/security-group-remediation/interfaces';

/**
 * Security group audit and remediation configuration
 *
 * @description
 * Every property is optional; defaults come from `lib/common/constants.ts`.
 *
 * @example
 *
 * ```
 * {
 *   regions: ['us-east-1', 'eu-west-1'],
 *   riskThreshold: 'HIGH',
 *   exclusions: ['legacy-*'],
 *   adminRuleSets: { 'us-east-1': 'sg-0a1b2c3d4e5f60718' },
 *   approvedCidrs: ['10.0.0.0/8'],
 *   settleIntervalSeconds: 300,
 *   healthCheck: { alarmNames: ['api-5xx'] },
 * }
 * ```
 */
export interface ISecurityGroupRemediationConfiguration {
  /**
   * Regions to scan. Defaults to the session region.
   */
  readonly regions?: string[];
  readonly riskThreshold?: RiskLevel;
  /**
   * Security group ids or names to leave untouched, `*` and `?` globs allowed
   */
  readonly exclusions?: string[];
  /**
   * Region to security group id granted access in place of removed open rules
   */
  readonly adminRuleSets?: Record<string, string>;
  /**
   * CIDRs granted access in place of removed open rules when a region has no admin security group
   */
  readonly approvedCidrs?: string[];
  /**
   * Plan deletion of security groups with no attachments and no references
   *
   * @default
   * false
   */
  readonly deleteUnusedRuleSets?: boolean;
  readonly classifier?: Partial<IRiskClassifierConfiguration>;
  /**
   * Wait between a change and its health check
   *
   * @default
   * 300
   */
  readonly settleIntervalSeconds?: number;
  /**
   * @default
   * 60
   */
  readonly healthCheckTimeoutSeconds?: number;
  /**
   * Attempts per change, first attempt included
   *
   * @default
   * 5
   */
  readonly maxAttempts?: number;
  readonly healthCheck?: {
    /**
     * CloudWatch alarms that must stay out of `ALARM` after every change
     */
    readonly alarmNames?: string[];
  };
  readonly concurrency?: {
    readonly maxConcurrentRuleSets?: number;
    readonly maxConcurrentRegions?: number;
  };
}

/**
 * Security group remediation module handler parameter
 */
export interface ISecurityGroupRemediationHandlerParameter extends IModuleCommonParameter {
  configuration: ISecurityGroupRemediationConfiguration;
}

/**
 * Providers backing the engine. The modules build the AWS providers when none are given.
 */
export interface IRemediationProviders {
  readonly ruleProvider: IRuleProvider;
  readonly attachmentProviders: readonly IAttachmentProvider[];
  readonly healthCheck: IHealthCheckProvider;
}
