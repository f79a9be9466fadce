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
 * @fileoverview Shared wiring for the security group remediation modules
 */

import { IAwsProviderProps } from '../common/regional-clients';
import { MODULE_STATE_CODE } from '../common/types';
import { IRegionFailure } from './interfaces';
import { ExecuteSettings, PlanSettings, SecurityGroupRemediationEngine } from './engine';
import { RiskClassifier } from './risk-classifier';
import { Ec2RuleProvider } from '../amazon-ec2/ec2-rule-provider';
import { InstanceAttachmentProvider, NetworkInterfaceAttachmentProvider } from '../amazon-ec2/ec2-attachment-providers';
import { LoadBalancerAttachmentProvider } from '../elastic-load-balancing/load-balancer-attachment-provider';
import { DatabaseAttachmentProvider } from '../amazon-rds/database-attachment-provider';
import { CloudWatchAlarmHealthCheckProvider } from '../amazon-cloudwatch/alarm-health-check-provider';
import {
  IRemediationProviders,
  ISecurityGroupRemediationConfiguration,
  ISecurityGroupRemediationHandlerParameter,
} from '../../interfaces/security-group-remediation/configuration';

/**
 * AWS backed providers: EC2 security groups, attachments from EC2, Elastic Load Balancing and RDS, and
 * CloudWatch alarms as health check
 */
export function createRemediationProviders(props: ISecurityGroupRemediationHandlerParameter): IRemediationProviders {
  const awsProps: IAwsProviderProps = { solutionId: props.solutionId, credentials: props.credentials };
  return {
    ruleProvider: new Ec2RuleProvider(awsProps),
    attachmentProviders: [
      new InstanceAttachmentProvider(awsProps),
      new NetworkInterfaceAttachmentProvider(awsProps),
      new LoadBalancerAttachmentProvider(awsProps),
      new DatabaseAttachmentProvider(awsProps),
    ],
    healthCheck: new CloudWatchAlarmHealthCheckProvider({
      ...awsProps,
      alarmNames: props.configuration.healthCheck?.alarmNames ?? [],
    }),
  };
}

export function createEngine(
  configuration: ISecurityGroupRemediationConfiguration,
  providers: IRemediationProviders,
): SecurityGroupRemediationEngine {
  return new SecurityGroupRemediationEngine({
    ...providers,
    classifier: new RiskClassifier(configuration.classifier ?? {}),
    maxConcurrentRegions: configuration.concurrency?.maxConcurrentRegions,
  });
}

/**
 * Configured regions, else the session region
 */
export function resolveRegions(props: ISecurityGroupRemediationHandlerParameter): string[] {
  return props.configuration.regions ?? [props.region];
}

export function getPlanSettings(configuration: ISecurityGroupRemediationConfiguration, dryRun: boolean): PlanSettings {
  return {
    adminRuleSets: configuration.adminRuleSets,
    approvedCidrs: configuration.approvedCidrs,
    deleteUnusedRuleSets: configuration.deleteUnusedRuleSets ?? false,
    dryRun,
  };
}

export function getExecuteSettings(
  configuration: ISecurityGroupRemediationConfiguration,
  signal?: AbortSignal,
): ExecuteSettings {
  return {
    healthCheckTimeoutMs: toMilliseconds(configuration.healthCheckTimeoutSeconds),
    maxAttempts: configuration.maxAttempts,
    maxConcurrentRuleSets: configuration.concurrency?.maxConcurrentRuleSets,
    signal,
  };
}

export function toMilliseconds(seconds?: number): number | undefined {
  return seconds === undefined ? undefined : seconds * 1000;
}

/**
 * FAILED when no region could be read
 */
export function getCollectionStatus(
  regions: readonly string[],
  skippedRegions: readonly IRegionFailure[],
): MODULE_STATE_CODE {
  return regions.length > 0 && skippedRegions.length >= regions.length
    ? MODULE_STATE_CODE.FAILED
    : MODULE_STATE_CODE.SUCCESS;
}

export function describeSkippedRegions(skippedRegions: readonly IRegionFailure[]): string {
  if (skippedRegions.length === 0) {
    return '';
  }
  return `, ${skippedRegions.length} region(s) skipped: ${skippedRegions.map(item => `${item.region} (${item.kind})`).join(', ')}`;
}
