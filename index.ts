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

//
// Common resources
//
export { MODULE_EXCEPTIONS } from './common/enums';
export { createLogger, createStatusLogger, setLogLevel } from './common/logger';
export type { IconLogger } from './common/logger';
export { ModuleName } from './common/resources';
export type { IAssumeRoleCredential, IModuleCommonParameter } from './common/resources';
export { MODULE_STATE_CODE } from './lib/common/types';
export type { IModuleResponse } from './lib/common/interfaces';
export {
  describeError,
  ProviderError,
  ProviderErrorKind,
  RemediationError,
  RemediationErrorKind,
} from './lib/common/errors';
export { SystemClock } from './lib/common/clock';
export type { IClock } from './lib/common/clock';

//
// Security group remediation engine
//
export { SecurityGroupRemediationEngine } from './lib/security-group-remediation/engine';
export type {
  ExecuteSettings,
  ISecurityGroupRemediationEngineProps,
  PlanSettings,
} from './lib/security-group-remediation/engine';
export { RiskClassifier } from './lib/security-group-remediation/risk-classifier';
export { DependencyAnalyzer } from './lib/security-group-remediation/dependency-analyzer';
export { InventoryCollector } from './lib/security-group-remediation/inventory-collector';
export { RemediationPlanner } from './lib/security-group-remediation/remediation-planner';
export { RemediationExecutor } from './lib/security-group-remediation/remediation-executor';
export { computeFingerprint, describeRule } from './lib/security-group-remediation/rules';
export {
  ActionState,
  ExecutionVerdict,
  RemediationActionKind,
  RiskLevel,
} from './lib/security-group-remediation/interfaces';
export type {
  IActionReport,
  IAttachmentProvider,
  IAttachmentRef,
  IAuditReport,
  IExecuteOptions,
  IExecutionReport,
  IHealthCheckContext,
  IHealthCheckProvider,
  IInventory,
  IPlanOptions,
  IRemediationAction,
  IRemediationSession,
  IRiskClassifierConfiguration,
  IRule,
  IRuleProvider,
  IRuleSet,
  IRuleSetState,
  RuleSource,
} from './lib/security-group-remediation/interfaces';

//
// AWS providers
//
export { Ec2RuleProvider } from './lib/amazon-ec2/ec2-rule-provider';
export {
  InstanceAttachmentProvider,
  NetworkInterfaceAttachmentProvider,
} from './lib/amazon-ec2/ec2-attachment-providers';
export { LoadBalancerAttachmentProvider } from './lib/elastic-load-balancing/load-balancer-attachment-provider';
export { DatabaseAttachmentProvider } from './lib/amazon-rds/database-attachment-provider';
export { CloudWatchAlarmHealthCheckProvider } from './lib/amazon-cloudwatch/alarm-health-check-provider';

//
// Security group remediation module resources
//
export type {
  IRemediationProviders,
  ISecurityGroupRemediationConfiguration,
  ISecurityGroupRemediationHandlerParameter,
} from './interfaces/security-group-remediation/configuration';
export type {
  IExecuteSecurityGroupRemediationHandlerParameter,
  ISecurityGroupRemediationExecution,
} from './interfaces/security-group-remediation/execute-security-group-remediation';
export {
  auditSecurityGroups,
  executeSecurityGroupRemediation,
  planSecurityGroupRemediation,
} from './executors/security-group-remediation';
