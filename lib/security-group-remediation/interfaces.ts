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
 * @fileoverview Security Group Remediation Interfaces - rule sets, risk, plans and execution reports
 *
 * A rule set is the engine's projection of a provider-owned firewall object (an EC2 security group).
 * Rules are immutable values: replacing a rule always means removing one rule and adding another.
 */

import { RemediationErrorKind } from '../common/errors';

/**
 * Exposure risk of a rule. Ordered LOW < MEDIUM < HIGH < CRITICAL.
 */
export enum RiskLevel {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL',
}

/**
 * Risk levels in ascending order
 */
export const RISK_LEVELS: readonly RiskLevel[] = [RiskLevel.LOW, RiskLevel.MEDIUM, RiskLevel.HIGH, RiskLevel.CRITICAL];

export type RuleDirection = 'ingress' | 'egress';

/**
 * Traffic source (ingress) or destination (egress) of a rule
 */
export type RuleSource =
  | { readonly type: 'cidr-ipv4'; readonly cidr: string }
  | { readonly type: 'cidr-ipv6'; readonly cidr: string }
  | { readonly type: 'rule-set'; readonly ruleSetId: string; readonly ownerId?: string }
  | { readonly type: 'prefix-list'; readonly prefixListId: string };

/**
 * Port range, or for ICMP the type (`fromPort`) and code (`toPort`, -1 for every code)
 */
export interface IPortRange {
  readonly fromPort: number;
  readonly toPort: number;
}

export interface IRule {
  readonly direction: RuleDirection;
  /**
   * `tcp`, `udp`, `icmp`, `icmpv6`, `-1` (all) or an IP protocol number as a string
   */
  readonly protocol: string;
  /**
   * Absent means all ports, or every ICMP type
   */
  readonly portRange?: IPortRange;
  readonly source: RuleSource;
  readonly description?: string;
}

export type AttachmentKind = 'instance' | 'load-balancer' | 'database' | 'network-interface';

/**
 * Weak reference to a resource using a rule set
 */
export interface IAttachmentRef {
  readonly kind: AttachmentKind;
  readonly resourceId: string;
  /**
   * Conservative placeholder recorded when the lookup for this kind failed
   */
  readonly unknown?: boolean;
}

/**
 * Rule set content as the rule provider reports it
 */
export interface IRuleSetState {
  readonly id: string;
  readonly name: string;
  readonly region: string;
  readonly vpcId?: string;
  readonly rules: readonly IRule[];
}

/**
 * Collected rule set with its attachment graph
 */
export interface IRuleSet extends IRuleSetState {
  readonly attachments: readonly IAttachmentRef[];
  /**
   * True when every attachment lookup succeeded
   */
  readonly attachmentsKnown: boolean;
  /**
   * Content hash over the rules, independent of rule order
   */
  readonly fingerprint: string;
}

export interface IRegionFailure {
  readonly region: string;
  readonly kind: RemediationErrorKind;
  readonly reason: string;
}

export interface IDependencyFailure {
  readonly region: string;
  readonly ruleSetId: string;
  readonly attachmentKind: AttachmentKind;
  readonly kind: RemediationErrorKind.DEPENDENCY_UNKNOWN;
  readonly reason: string;
}

export interface IAttachmentAnalysis {
  readonly attachments: IAttachmentRef[];
  readonly known: boolean;
  readonly failures: IDependencyFailure[];
}

export interface IInventory {
  /** ISO-8601 */
  readonly collectedAt: string;
  readonly regions: readonly string[];
  readonly ruleSets: readonly IRuleSet[];
  readonly skippedRegions: readonly IRegionFailure[];
  readonly dependencyFailures: readonly IDependencyFailure[];
}

export type SourceBreadth = 'universal' | 'broad' | 'narrow' | 'reference';

export interface IRiskClassifierConfiguration {
  readonly sensitivePorts: readonly number[];
  readonly sensitiveProtocols: readonly string[];
  readonly broadPrefixThresholdBits: number;
  readonly broadIpv6PrefixThresholdBits: number;
  /**
   * When false every egress rule is LOW
   */
  readonly evaluateEgress: boolean;
}

export interface IRuleAssessment {
  readonly ruleIndex: number;
  readonly rule: IRule;
  readonly riskLevel: RiskLevel;
  readonly breadth: SourceBreadth;
  readonly sensitivePortExposed: boolean;
  readonly reason: string;
}

export type RiskCounts = Record<RiskLevel, number>;

export interface IRuleSetClassification {
  readonly riskCounts: RiskCounts;
  readonly overallRisk: RiskLevel;
  readonly assessments: readonly IRuleAssessment[];
}

export enum RemediationActionKind {
  ADD_RESTRICTIVE_RULE = 'AddRestrictiveRule',
  REMOVE_OPEN_RULE = 'RemoveOpenRule',
  DELETE_UNUSED_RULE_SET = 'DeleteUnusedRuleSet',
}

export enum ActionState {
  PLANNED = 'PLANNED',
  STAGING = 'STAGING',
  VALIDATING = 'VALIDATING',
  COMMITTED = 'COMMITTED',
  ROLLING_BACK = 'ROLLING_BACK',
  ROLLED_BACK = 'ROLLED_BACK',
  ROLLBACK_FAILED = 'ROLLBACK_FAILED',
  INVALIDATED = 'INVALIDATED',
}

export interface IRemediationAction {
  /**
   * Deterministic: `${region}/${ruleSetId}/rule-${index}/add-${n}`, `.../rule-${index}/remove` or `${region}/${ruleSetId}/delete`
   */
  readonly id: string;
  readonly kind: RemediationActionKind;
  readonly region: string;
  readonly ruleSetId: string;
  readonly ruleSetName: string;
  /**
   * Rule to add or remove. Absent for rule set deletion.
   */
  readonly rule?: IRule;
  /**
   * Index of the open rule in the planned snapshot
   */
  readonly ruleIndex?: number;
  readonly riskLevel: RiskLevel;
  readonly justification: string;
  readonly dependsOn: readonly string[];
  readonly manualFollowUpRequired: boolean;
  readonly attachmentCount: number;
  state: ActionState;
  /**
   * Why a PLANNED action was not attempted
   */
  reason?: string;
}

export interface ISkippedRuleSet {
  readonly region: string;
  readonly ruleSetId: string;
  readonly ruleSetName: string;
  readonly reason: string;
}

/**
 * Rule set content the plan was computed against
 */
export interface IRuleSetSnapshot {
  readonly region: string;
  readonly ruleSetId: string;
  readonly ruleSetName: string;
  readonly rules: readonly IRule[];
  readonly fingerprint: string;
  readonly attachmentCount: number;
}

export interface IOutcomeLogEntry {
  readonly at: string;
  readonly actionId: string;
  readonly from: ActionState;
  readonly to: ActionState;
  readonly detail?: string;
}

export interface IRemediationSession {
  readonly sessionId: string;
  readonly createdAt: string;
  readonly regions: readonly string[];
  readonly skippedRegions: readonly IRegionFailure[];
  readonly riskThreshold: RiskLevel;
  readonly exclusions: readonly string[];
  readonly dryRun: boolean;
  readonly actions: IRemediationAction[];
  readonly skipped: readonly ISkippedRuleSet[];
  /**
   * Keyed by `${region}/${ruleSetId}`
   */
  readonly snapshots: Readonly<Record<string, IRuleSetSnapshot>>;
  /**
   * Number of actions that reached a terminal state
   */
  cursor: number;
  readonly outcomeLog: IOutcomeLogEntry[];
}

export interface IPlanOptions {
  readonly riskThreshold: RiskLevel;
  /**
   * Rule set ids or names; `*` and `?` globs are supported
   */
  readonly exclusions?: readonly string[];
  /**
   * Region to rule set id of the designated admin rule set used as replacement source
   */
  readonly adminRuleSets?: Readonly<Record<string, string>>;
  /**
   * Operator-approved replacement CIDRs, IPv4 and IPv6
   */
  readonly approvedCidrs?: readonly string[];
  readonly deleteUnusedRuleSets?: boolean;
  readonly dryRun?: boolean;
}

/**
 * Read/write access to rule sets. Failures are {@link ProviderError}.
 */
export interface IRuleProvider {
  listRuleSets(region: string): Promise<IRuleSetState[]>;
  describeRuleSet(region: string, ruleSetId: string): Promise<IRuleSetState>;
  addRule(region: string, ruleSetId: string, rule: IRule): Promise<void>;
  removeRule(region: string, ruleSetId: string, rule: IRule): Promise<void>;
  deleteRuleSet(region: string, ruleSetId: string): Promise<void>;
}

export interface IAttachmentProvider {
  readonly kind: AttachmentKind;
  listAttachments(region: string, ruleSetId: string): Promise<IAttachmentRef[]>;
}

export interface IHealthCheckContext {
  readonly sessionId: string;
  readonly actionId: string;
  readonly actionKind: RemediationActionKind;
  readonly region: string;
  readonly ruleSetId: string;
}

export interface IHealthCheckProvider {
  isHealthy(context: IHealthCheckContext): Promise<boolean>;
}

export enum ExecutionVerdict {
  SUCCESS = 'SUCCESS',
  DEGRADED = 'DEGRADED',
  FAILED = 'FAILED',
}

/**
 * `no-op`: staging never changed the rule set. `inverse`: the staged change was reverted.
 */
export type RollbackKind = 'no-op' | 'inverse';

export interface IStateTransition {
  readonly state: ActionState;
  readonly at: string;
}

export interface IActionFailure {
  readonly kind: RemediationErrorKind;
  readonly message: string;
}

export interface IActionReport {
  readonly actionId: string;
  readonly kind: RemediationActionKind;
  readonly region: string;
  readonly ruleSetId: string;
  readonly ruleSetName: string;
  readonly riskLevel: RiskLevel;
  readonly finalState: ActionState;
  readonly transitions: readonly IStateTransition[];
  readonly attempts: number;
  readonly retryCount: number;
  readonly failure?: IActionFailure;
  readonly rollbackKind?: RollbackKind;
  readonly manualFollowUpRequired: boolean;
  readonly dependsOn: readonly string[];
  readonly reason?: string;
}

export interface IExecutionFailure {
  readonly region: string;
  readonly ruleSetId?: string;
  readonly actionId?: string;
  readonly kind: RemediationErrorKind;
  readonly message: string;
}

export interface IExecutionSummary {
  readonly total: number;
  readonly committed: number;
  readonly rolledBack: number;
  readonly rollbackFailed: number;
  readonly invalidated: number;
  readonly notAttempted: number;
}

export interface IExecutionReport {
  readonly sessionId: string;
  readonly dryRun: boolean;
  readonly cancelled: boolean;
  readonly verdict: ExecutionVerdict;
  readonly degraded: boolean;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly actions: readonly IActionReport[];
  readonly failures: readonly IExecutionFailure[];
  readonly summary: IExecutionSummary;
}

export interface IExecuteOptions {
  readonly dryRun: boolean;
  /**
   * Wait between staging and the health check. 0 disables the wait.
   */
  readonly settleIntervalMs?: number;
  readonly healthCheckTimeoutMs?: number;
  /**
   * Staging attempts per action, first attempt included
   */
  readonly maxAttempts?: number;
  readonly retryStartingDelayMs?: number;
  readonly maxConcurrentRuleSets?: number;
  readonly signal?: AbortSignal;
}

export interface IAuditFinding {
  readonly ruleIndex: number;
  readonly rule: IRule;
  readonly riskLevel: RiskLevel;
  readonly breadth: SourceBreadth;
  readonly reason: string;
}

export interface IAuditRuleSetEntry {
  readonly id: string;
  readonly name: string;
  readonly region: string;
  readonly vpcId?: string;
  readonly attachmentCount: number;
  readonly attachmentsKnown: boolean;
  readonly riskCounts: RiskCounts;
  readonly overallRisk: RiskLevel;
  readonly findings: readonly IAuditFinding[];
}

export interface IAuditReport {
  readonly generatedAt: string;
  readonly regions: readonly string[];
  readonly riskThreshold: RiskLevel;
  readonly skippedRegions: readonly IRegionFailure[];
  readonly dependencyFailures: readonly IDependencyFailure[];
  /**
   * Rule sets with at least one finding at or above the threshold
   */
  readonly ruleSets: readonly IAuditRuleSetEntry[];
  readonly totals: {
    readonly ruleSetsScanned: number;
    readonly ruleSetsWithFindings: number;
    readonly findings: number;
    readonly byRiskLevel: RiskCounts;
  };
}
