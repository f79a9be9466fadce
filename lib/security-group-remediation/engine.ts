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
 * @fileoverview Security Group Remediation Engine - invocation surface of the core
 *
 * `audit` and `plan` are read-only. `execute` is the only operation that changes rule sets.
 */

import { MODULE_EXCEPTIONS } from '../../common/enums';
import { IClock, SystemClock } from '../common/clock';
import { RemediationError, RemediationErrorKind } from '../common/errors';
import { buildAuditReport } from './audit-report';
import { DependencyAnalyzer } from './dependency-analyzer';
import {
  IAttachmentProvider,
  IAuditReport,
  IExecuteOptions,
  IExecutionReport,
  IHealthCheckProvider,
  IPlanOptions,
  IRemediationSession,
  IRuleProvider,
  RiskLevel,
} from './interfaces';
import { InventoryCollector } from './inventory-collector';
import { RemediationExecutor } from './remediation-executor';
import { RemediationPlanner } from './remediation-planner';
import { isRiskLevel, RiskClassifier } from './risk-classifier';

export type PlanSettings = Omit<IPlanOptions, 'riskThreshold' | 'exclusions'>;

export type ExecuteSettings = Omit<IExecuteOptions, 'dryRun' | 'settleIntervalMs'>;

export interface ISecurityGroupRemediationEngineProps {
  readonly ruleProvider: IRuleProvider;
  readonly attachmentProviders: readonly IAttachmentProvider[];
  readonly healthCheck: IHealthCheckProvider;
  readonly classifier?: RiskClassifier;
  readonly clock?: IClock;
  readonly maxConcurrentRegions?: number;
  readonly maxConcurrentAttachmentLookups?: number;
}

export class SecurityGroupRemediationEngine {
  private readonly classifier: RiskClassifier;
  private readonly clock: IClock;
  private readonly collector: InventoryCollector;
  private readonly planner: RemediationPlanner;
  private readonly executor: RemediationExecutor;

  constructor(props: ISecurityGroupRemediationEngineProps) {
    this.classifier = props.classifier ?? new RiskClassifier();
    this.clock = props.clock ?? new SystemClock();

    const analyzer = new DependencyAnalyzer(props.attachmentProviders);
    this.collector = new InventoryCollector(props.ruleProvider, analyzer, {
      maxConcurrentRegions: props.maxConcurrentRegions,
      maxConcurrentAttachmentLookups: props.maxConcurrentAttachmentLookups,
      clock: this.clock,
    });
    this.planner = new RemediationPlanner(this.classifier, this.clock);
    this.executor = new RemediationExecutor({
      ruleProvider: props.ruleProvider,
      analyzer,
      healthCheck: props.healthCheck,
      clock: this.clock,
    });
  }

  /**
   * Classifies every rule set of the given regions. Never changes anything.
   */
  public async audit(regions: readonly string[], riskThreshold: RiskLevel): Promise<IAuditReport> {
    this.validateThreshold(riskThreshold);
    const inventory = await this.collector.collect(regions);
    return buildAuditReport(inventory, this.classifier, riskThreshold, this.clock.now().toISOString());
  }

  /**
   * Collects the regions and plans remediation. Never changes anything.
   */
  public async plan(
    regions: readonly string[],
    riskThreshold: RiskLevel,
    exclusions: readonly string[] = [],
    settings: PlanSettings = {},
  ): Promise<IRemediationSession> {
    this.validateThreshold(riskThreshold);
    const inventory = await this.collector.collect(regions);
    return this.planner.plan(inventory, { ...settings, riskThreshold, exclusions });
  }

  /**
   * Executes a planned session. `settleIntervalMs` defaults to five minutes.
   */
  public async execute(
    session: IRemediationSession,
    dryRun: boolean,
    settleIntervalMs?: number,
    settings: ExecuteSettings = {},
  ): Promise<IExecutionReport> {
    return this.executor.execute(session, { ...settings, dryRun, settleIntervalMs });
  }

  private validateThreshold(riskThreshold: RiskLevel): void {
    if (!isRiskLevel(riskThreshold)) {
      throw new RemediationError(
        RemediationErrorKind.INVALID_CONFIGURATION,
        `${MODULE_EXCEPTIONS.INVALID_INPUT}: Unknown risk threshold ${String(riskThreshold)}`,
      );
    }
  }
}
