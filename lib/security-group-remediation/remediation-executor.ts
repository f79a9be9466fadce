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
 * @fileoverview Staged Remediation Executor - applies a session one action at a time with health-gated rollback
 *
 * Each action runs through the state machine in {@link ALLOWED_TRANSITIONS}:
 * 1. Re-read the rule set and compare it with the expected content (planned snapshot plus changes committed
 *    earlier in this session). Any difference invalidates the action.
 * 2. Stage the change, retrying throttled provider calls with exponential backoff.
 * 3. Wait for the settle interval, then run the health check under a timeout.
 * 4. Commit when healthy, otherwise apply the inverse change.
 *
 * Actions on one rule set run in session order under a per-rule-set lock. Rule sets run concurrently up to
 * `maxConcurrentRuleSets`. Per-action failures are recorded in the report and never abort the session.
 */

import path from 'path';
import { createLogger, createStatusLogger } from '../../common/logger';
import { MODULE_EXCEPTIONS } from '../../common/enums';
import { throttlingBackOff } from '../../common/throttle';
import { KeyedLock, Semaphore } from '../common/batch-processor';
import { IClock, SystemClock, withTimeout } from '../common/clock';
import {
  DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_CONCURRENT_RULE_SETS,
  DEFAULT_RETRY_STARTING_DELAY_MS,
  DEFAULT_SETTLE_INTERVAL_MS,
} from '../common/constants';
import {
  describeError,
  ProviderError,
  ProviderErrorKind,
  RemediationError,
  RemediationErrorKind,
  toRemediationErrorKind,
} from '../common/errors';
import { canTransition, isTerminalState } from './action-state';
import { DependencyAnalyzer } from './dependency-analyzer';
import {
  ActionState,
  ExecutionVerdict,
  IActionFailure,
  IActionReport,
  IExecuteOptions,
  IExecutionFailure,
  IExecutionReport,
  IHealthCheckProvider,
  IRemediationAction,
  IRemediationSession,
  IRule,
  IRuleProvider,
  IRuleSetState,
  IStateTransition,
  RemediationActionKind,
  RollbackKind,
} from './interfaces';
import { snapshotKey } from './remediation-planner';
import { applyAction, computeFingerprint, describeRule } from './rules';

export interface IRemediationExecutorProps {
  readonly ruleProvider: IRuleProvider;
  readonly analyzer: DependencyAnalyzer;
  readonly healthCheck: IHealthCheckProvider;
  readonly clock?: IClock;
}

type ActionRun = {
  readonly action: IRemediationAction;
  state: ActionState;
  readonly transitions: IStateTransition[];
  attempts: number;
  retryCount: number;
  failure?: IActionFailure;
  rollbackKind?: RollbackKind;
  reason?: string;
  readonly done: Promise<void>;
  readonly settle: () => void;
};

type ExecutionContext = {
  readonly session: IRemediationSession;
  readonly dryRun: boolean;
  readonly settleIntervalMs: number;
  readonly healthCheckTimeoutMs: number;
  readonly maxAttempts: number;
  readonly retryStartingDelayMs: number;
  readonly signal?: AbortSignal;
  readonly runs: ReadonlyMap<string, ActionRun>;
  /**
   * Expected rule set content keyed by `${region}/${ruleSetId}`; deleted rule sets are removed
   */
  readonly expected: Map<string, readonly IRule[]>;
  readonly failures: IExecutionFailure[];
};

type ResolvedOptions = Required<Omit<IExecuteOptions, 'signal'>> & Pick<IExecuteOptions, 'signal'>;

export class RemediationExecutor {
  private readonly logger = createLogger([path.parse(path.basename(__filename)).name]);
  private readonly statusLogger = createStatusLogger([path.parse(path.basename(__filename)).name]);
  private readonly ruleProvider: IRuleProvider;
  private readonly analyzer: DependencyAnalyzer;
  private readonly healthCheck: IHealthCheckProvider;
  private readonly clock: IClock;
  /**
   * Per-rule-set lock shared by every execution of this executor
   */
  private readonly lock = new KeyedLock();

  constructor(props: IRemediationExecutorProps) {
    this.ruleProvider = props.ruleProvider;
    this.analyzer = props.analyzer;
    this.healthCheck = props.healthCheck;
    this.clock = props.clock ?? new SystemClock();
  }

  /**
   * Executes the session and returns the per-action outcome.
   *
   * @remarks
   * A dry run re-reads rule sets and re-checks attachments but never stages a change and leaves the session
   * untouched. Aborting `options.signal` ends the current settle wait early; actions already staged still reach a
   * terminal state and actions not yet started stay PLANNED.
   *
   * @throws {@link RemediationError} InvalidConfiguration for invalid options or a malformed or already executed session
   */
  public async execute(session: IRemediationSession, options: IExecuteOptions): Promise<IExecutionReport> {
    const settings = this.resolveOptions(options);
    this.validateSession(session, settings.dryRun);

    const startedAt = this.clock.now().toISOString();
    this.logger.processStart(
      `${settings.dryRun ? '[DRY-RUN] ' : ''}Executing session ${session.sessionId} with ${session.actions.length} action(s)`,
    );

    const runList = session.actions.map(action => this.createRun(action, startedAt));
    const runs = new Map(runList.map(run => [run.action.id, run]));
    const expected = new Map<string, readonly IRule[]>(
      Object.entries(session.snapshots).map(([key, snapshot]) => [key, snapshot.rules]),
    );
    const context: ExecutionContext = {
      session,
      dryRun: settings.dryRun,
      settleIntervalMs: settings.settleIntervalMs,
      healthCheckTimeoutMs: settings.healthCheckTimeoutMs,
      maxAttempts: settings.maxAttempts,
      retryStartingDelayMs: settings.retryStartingDelayMs,
      signal: settings.signal,
      runs,
      expected,
      failures: [],
    };

    const groups = new Map<string, ActionRun[]>();
    for (const run of runList) {
      const key = snapshotKey(run.action.region, run.action.ruleSetId);
      groups.set(key, [...(groups.get(key) ?? []), run]);
    }

    const semaphore = new Semaphore(settings.maxConcurrentRuleSets);
    await Promise.all([...groups].map(([key, group]) => this.processRuleSet(key, group, semaphore, context)));

    const report = this.buildReport(session, runList, context, startedAt);
    this.statusLogger.info(
      `Session ${session.sessionId}: ${report.verdict}${report.dryRun ? ' (dry run)' : ''}, ${report.summary.committed} committed, ${report.summary.rolledBack} rolled back, ${report.summary.rollbackFailed} rollback failed, ${report.summary.invalidated} invalidated, ${report.summary.notAttempted} not attempted`,
    );
    return report;
  }

  private async processRuleSet(
    key: string,
    group: readonly ActionRun[],
    semaphore: Semaphore,
    context: ExecutionContext,
  ): Promise<void> {
    for (const run of group) {
      try {
        await Promise.all(run.action.dependsOn.map(id => context.runs.get(id)?.done));
        await semaphore.run(() => this.lock.runExclusive(key, () => this.processAction(run, context)));
      } catch (e: unknown) {
        this.logger.error(`Unexpected failure processing ${run.action.id}: ${describeError(e)}`, this.prefix(run));
        this.recordFailure(run, context, RemediationErrorKind.PROVIDER_FAILED, describeError(e));
      } finally {
        run.settle();
      }
    }
  }

  private async processAction(run: ActionRun, context: ExecutionContext): Promise<void> {
    const { action } = run;
    const prefix = this.prefix(run);

    if (context.signal?.aborted) {
      run.reason = 'Cancelled before staging';
      this.recordFailure(run, context, RemediationErrorKind.CANCELLED, `${action.id} was not started`);
      this.logger.warn(`Cancelled, ${action.id} left ${ActionState.PLANNED}`, prefix);
      return;
    }

    if (!context.dryRun) {
      const blocking = action.dependsOn
        .map(id => context.runs.get(id))
        .find(prerequisite => prerequisite !== undefined && prerequisite.state !== ActionState.COMMITTED);
      if (blocking) {
        this.invalidate(
          run,
          context,
          blocking.failure?.kind ?? RemediationErrorKind.DRIFT_DETECTED,
          `Prerequisite ${blocking.action.id} ended ${blocking.state}`,
        );
        return;
      }
    }

    if (!(await this.verifyRuleSetContent(run, context))) {
      return;
    }
    if (action.kind === RemediationActionKind.DELETE_UNUSED_RULE_SET && !(await this.verifyUnused(run, context))) {
      return;
    }

    if (context.dryRun) {
      this.logger.dryRun(this.commandName(action), this.commandParameters(action), prefix);
      run.reason = `Dry run, ${action.kind} not applied`;
      return;
    }

    this.transition(run, ActionState.STAGING, context);
    if (!(await this.stage(run, context))) {
      return;
    }

    this.transition(run, ActionState.VALIDATING, context);
    if (context.settleIntervalMs > 0) {
      this.logger.info(`Waiting ${context.settleIntervalMs}ms before health check`, prefix);
      await this.clock.sleep(context.settleIntervalMs, context.signal);
    }

    const unhealthyReason = await this.checkHealth(run, context);
    if (unhealthyReason === undefined) {
      this.transition(run, ActionState.COMMITTED, context);
      this.recordCommitted(action, context);
      this.logger.processEnd(`Committed ${action.id}`, prefix);
      return;
    }

    await this.rollBack(run, context, unhealthyReason);
  }

  private async verifyRuleSetContent(run: ActionRun, context: ExecutionContext): Promise<boolean> {
    const { action } = run;
    const expected = context.expected.get(snapshotKey(action.region, action.ruleSetId));
    if (expected === undefined) {
      this.invalidate(run, context, RemediationErrorKind.DRIFT_DETECTED, 'Rule set was deleted earlier in this session');
      return false;
    }

    let current: IRuleSetState;
    try {
      current = await throttlingBackOff(() => this.ruleProvider.describeRuleSet(action.region, action.ruleSetId), {
        numOfAttempts: context.maxAttempts,
        startingDelay: context.retryStartingDelayMs,
      });
    } catch (e: unknown) {
      const kind =
        e instanceof ProviderError && e.kind === ProviderErrorKind.NOT_FOUND
          ? RemediationErrorKind.DRIFT_DETECTED
          : toRemediationErrorKind(e);
      this.invalidate(run, context, kind, `Unable to re-read rule set: ${describeError(e)}`);
      return false;
    }

    const expectedFingerprint = computeFingerprint(expected);
    const currentFingerprint = computeFingerprint(current.rules);
    if (expectedFingerprint !== currentFingerprint) {
      this.invalidate(
        run,
        context,
        RemediationErrorKind.DRIFT_DETECTED,
        `Rule set content changed since planning (expected ${expectedFingerprint.slice(0, 12)}, found ${currentFingerprint.slice(0, 12)})`,
      );
      return false;
    }
    return true;
  }

  private async verifyUnused(run: ActionRun, context: ExecutionContext): Promise<boolean> {
    const { action } = run;
    const analysis = await this.analyzer.listAttachments(action.region, action.ruleSetId);
    if (DependencyAnalyzer.isDeletionCandidate(analysis)) {
      return true;
    }
    if (analysis.known) {
      this.invalidate(
        run,
        context,
        RemediationErrorKind.DRIFT_DETECTED,
        `Rule set is attached to ${analysis.attachments.length} resource(s)`,
      );
    } else {
      this.invalidate(
        run,
        context,
        RemediationErrorKind.DEPENDENCY_UNKNOWN,
        `Attachment lookup incomplete: ${analysis.failures.map(failure => failure.reason).join('; ') || 'no attachment providers'}`,
      );
    }
    return false;
  }

  private async stage(run: ActionRun, context: ExecutionContext): Promise<boolean> {
    const { action } = run;
    const prefix = this.prefix(run);
    const commandName = this.commandName(action);
    const parameters = this.commandParameters(action);

    this.logger.commandExecution(commandName, parameters, prefix);
    try {
      await throttlingBackOff(
        () => {
          run.attempts += 1;
          return this.apply(action);
        },
        { numOfAttempts: context.maxAttempts, startingDelay: context.retryStartingDelayMs },
      );
      run.retryCount = run.attempts - 1;
      this.logger.commandSuccess(commandName, parameters, prefix);
      return true;
    } catch (e: unknown) {
      run.retryCount = Math.max(run.attempts - 1, 0);
      if (e instanceof ProviderError && (e.kind === ProviderErrorKind.NOT_FOUND || e.kind === ProviderErrorKind.CONFLICT)) {
        this.invalidate(run, context, RemediationErrorKind.DRIFT_DETECTED, `Provider rejected change: ${describeError(e)}`);
        return false;
      }

      run.rollbackKind = 'no-op';
      this.recordFailure(
        run,
        context,
        toRemediationErrorKind(e),
        `Staging failed after ${run.attempts} attempt(s): ${describeError(e)}`,
      );
      this.logger.warn(`No-op rollback of ${action.id}, staging made no change: ${describeError(e)}`, prefix);
      this.transition(run, ActionState.ROLLED_BACK, context, 'no-op rollback');
      return false;
    }
  }

  /**
   * Returns undefined when healthy, otherwise the reason
   */
  private async checkHealth(run: ActionRun, context: ExecutionContext): Promise<string | undefined> {
    const { action } = run;
    try {
      const healthy = await withTimeout(
        this.healthCheck.isHealthy({
          sessionId: context.session.sessionId,
          actionId: action.id,
          actionKind: action.kind,
          region: action.region,
          ruleSetId: action.ruleSetId,
        }),
        context.healthCheckTimeoutMs,
        `Health check for ${action.id}`,
        this.clock,
      );
      return healthy ? undefined : 'Health check reported unhealthy';
    } catch (e: unknown) {
      return `Health check failed: ${describeError(e)}`;
    }
  }

  private async rollBack(run: ActionRun, context: ExecutionContext, unhealthyReason: string): Promise<void> {
    const { action } = run;
    const prefix = this.prefix(run);

    this.transition(run, ActionState.ROLLING_BACK, context, unhealthyReason);
    run.rollbackKind = 'inverse';

    if (action.kind === RemediationActionKind.DELETE_UNUSED_RULE_SET) {
      this.rollbackFailed(run, context, `${unhealthyReason}. Rule set deletion cannot be reverted`);
      return;
    }

    try {
      await throttlingBackOff(() => this.revert(action), {
        numOfAttempts: context.maxAttempts,
        startingDelay: context.retryStartingDelayMs,
      });
    } catch (e: unknown) {
      const alreadyReverted =
        e instanceof ProviderError && (e.kind === ProviderErrorKind.NOT_FOUND || e.kind === ProviderErrorKind.CONFLICT);
      if (!alreadyReverted) {
        this.rollbackFailed(run, context, `${unhealthyReason}. Inverse change failed: ${describeError(e)}`);
        return;
      }
      this.logger.warn(`Inverse change of ${action.id} already in place: ${describeError(e)}`, prefix);
    }

    this.recordFailure(run, context, RemediationErrorKind.HEALTH_CHECK_FAILED, unhealthyReason);
    this.transition(run, ActionState.ROLLED_BACK, context);
    this.logger.warn(`Rolled back ${action.id}: ${unhealthyReason}`, prefix);
  }

  private rollbackFailed(run: ActionRun, context: ExecutionContext, message: string): void {
    this.recordFailure(run, context, RemediationErrorKind.ROLLBACK_FAILED, message);
    this.transition(run, ActionState.ROLLBACK_FAILED, context);
    this.statusLogger.error(
      `ROLLBACK FAILED for ${run.action.id} in session ${context.session.sessionId}, manual intervention required: ${message}`,
      this.prefix(run),
    );
  }

  private recordCommitted(action: IRemediationAction, context: ExecutionContext): void {
    const key = snapshotKey(action.region, action.ruleSetId);
    if (action.kind === RemediationActionKind.DELETE_UNUSED_RULE_SET) {
      context.expected.delete(key);
      return;
    }
    context.expected.set(key, applyAction(context.expected.get(key) ?? [], action));
  }

  private apply(action: IRemediationAction): Promise<void> {
    switch (action.kind) {
      case RemediationActionKind.ADD_RESTRICTIVE_RULE:
        return this.ruleProvider.addRule(action.region, action.ruleSetId, this.requireRule(action));
      case RemediationActionKind.REMOVE_OPEN_RULE:
        return this.ruleProvider.removeRule(action.region, action.ruleSetId, this.requireRule(action));
      case RemediationActionKind.DELETE_UNUSED_RULE_SET:
        return this.ruleProvider.deleteRuleSet(action.region, action.ruleSetId);
    }
  }

  private revert(action: IRemediationAction): Promise<void> {
    switch (action.kind) {
      case RemediationActionKind.ADD_RESTRICTIVE_RULE:
        return this.ruleProvider.removeRule(action.region, action.ruleSetId, this.requireRule(action));
      case RemediationActionKind.REMOVE_OPEN_RULE:
        return this.ruleProvider.addRule(action.region, action.ruleSetId, this.requireRule(action));
      case RemediationActionKind.DELETE_UNUSED_RULE_SET:
        return Promise.reject(new Error(`${MODULE_EXCEPTIONS.SERVICE_EXCEPTION}: Rule set deletion has no inverse`));
    }
  }

  private requireRule(action: IRemediationAction): IRule {
    if (!action.rule) {
      throw new Error(`${MODULE_EXCEPTIONS.SERVICE_EXCEPTION}: Action ${action.id} has no rule`);
    }
    return action.rule;
  }

  private commandName(action: IRemediationAction): string {
    switch (action.kind) {
      case RemediationActionKind.ADD_RESTRICTIVE_RULE:
        return 'addRule';
      case RemediationActionKind.REMOVE_OPEN_RULE:
        return 'removeRule';
      case RemediationActionKind.DELETE_UNUSED_RULE_SET:
        return 'deleteRuleSet';
    }
  }

  private commandParameters(action: IRemediationAction): Record<string, unknown> {
    return {
      actionId: action.id,
      ruleSetId: action.ruleSetId,
      ...(action.rule && { rule: describeRule(action.rule) }),
    };
  }

  private transition(run: ActionRun, to: ActionState, context: ExecutionContext, detail?: string): void {
    const from = run.state;
    if (!canTransition(from, to)) {
      throw new Error(`${MODULE_EXCEPTIONS.SERVICE_EXCEPTION}: Illegal transition ${from} -> ${to} for ${run.action.id}`);
    }
    const at = this.clock.now().toISOString();
    run.state = to;
    run.transitions.push({ state: to, at });

    if (context.dryRun) {
      return;
    }
    run.action.state = to;
    context.session.outcomeLog.push({ at, actionId: run.action.id, from, to, ...(detail !== undefined && { detail }) });
    if (isTerminalState(to)) {
      context.session.cursor += 1;
    }
  }

  private invalidate(run: ActionRun, context: ExecutionContext, kind: RemediationErrorKind, message: string): void {
    this.recordFailure(run, context, kind, message);
    this.transition(run, ActionState.INVALIDATED, context, message);
    this.logger.warn(`Invalidated ${run.action.id}: ${message}`, this.prefix(run));
  }

  private recordFailure(run: ActionRun, context: ExecutionContext, kind: RemediationErrorKind, message: string): void {
    run.failure = { kind, message };
    context.failures.push({
      region: run.action.region,
      ruleSetId: run.action.ruleSetId,
      actionId: run.action.id,
      kind,
      message,
    });
  }

  private createRun(action: IRemediationAction, startedAt: string): ActionRun {
    let settle: () => void = () => undefined;
    const done = new Promise<void>(resolve => {
      settle = resolve;
    });
    return {
      action,
      state: action.state,
      transitions: [{ state: action.state, at: startedAt }],
      attempts: 0,
      retryCount: 0,
      done,
      settle,
    };
  }

  private buildReport(
    session: IRemediationSession,
    runs: readonly ActionRun[],
    context: ExecutionContext,
    startedAt: string,
  ): IExecutionReport {
    const count = (state: ActionState) => runs.filter(run => run.state === state).length;
    const summary = {
      total: runs.length,
      committed: count(ActionState.COMMITTED),
      rolledBack: count(ActionState.ROLLED_BACK),
      rollbackFailed: count(ActionState.ROLLBACK_FAILED),
      invalidated: count(ActionState.INVALIDATED),
      notAttempted: count(ActionState.PLANNED),
    };
    const degraded = summary.rollbackFailed > 0;

    const attempted = runs.some(run => run.transitions.some(transition => transition.state === ActionState.STAGING));
    const allRegionsUnreachable =
      session.regions.length > 0 && session.skippedRegions.length >= session.regions.length;

    let verdict = ExecutionVerdict.SUCCESS;
    if (!context.dryRun) {
      if ((runs.length > 0 && !attempted) || allRegionsUnreachable) {
        verdict = ExecutionVerdict.FAILED;
      } else if (degraded) {
        verdict = ExecutionVerdict.DEGRADED;
      }
    }

    const actions: IActionReport[] = runs.map(run => ({
      actionId: run.action.id,
      kind: run.action.kind,
      region: run.action.region,
      ruleSetId: run.action.ruleSetId,
      ruleSetName: run.action.ruleSetName,
      riskLevel: run.action.riskLevel,
      finalState: run.state,
      transitions: run.transitions,
      attempts: run.attempts,
      retryCount: run.retryCount,
      ...(run.failure && { failure: run.failure }),
      ...(run.rollbackKind && { rollbackKind: run.rollbackKind }),
      manualFollowUpRequired: run.action.manualFollowUpRequired,
      dependsOn: run.action.dependsOn,
      ...(run.reason !== undefined && { reason: run.reason }),
    }));

    const regionFailures: IExecutionFailure[] = session.skippedRegions.map(item => ({
      region: item.region,
      kind: item.kind,
      message: item.reason,
    }));

    return {
      sessionId: session.sessionId,
      dryRun: context.dryRun,
      cancelled: context.signal?.aborted ?? false,
      verdict,
      degraded,
      startedAt,
      completedAt: this.clock.now().toISOString(),
      actions,
      failures: [...regionFailures, ...context.failures],
      summary,
    };
  }

  private resolveOptions(options: IExecuteOptions): ResolvedOptions {
    const settings: ResolvedOptions = {
      dryRun: options.dryRun,
      settleIntervalMs: options.settleIntervalMs ?? DEFAULT_SETTLE_INTERVAL_MS,
      healthCheckTimeoutMs: options.healthCheckTimeoutMs ?? DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
      maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      retryStartingDelayMs: options.retryStartingDelayMs ?? DEFAULT_RETRY_STARTING_DELAY_MS,
      maxConcurrentRuleSets: options.maxConcurrentRuleSets ?? DEFAULT_MAX_CONCURRENT_RULE_SETS,
      signal: options.signal,
    };

    const invalid: string[] = [];
    if (!Number.isFinite(settings.settleIntervalMs) || settings.settleIntervalMs < 0) {
      invalid.push('settleIntervalMs must be 0 or greater');
    }
    if (!Number.isFinite(settings.healthCheckTimeoutMs) || settings.healthCheckTimeoutMs <= 0) {
      invalid.push('healthCheckTimeoutMs must be greater than 0');
    }
    if (!Number.isInteger(settings.maxAttempts) || settings.maxAttempts < 1) {
      invalid.push('maxAttempts must be an integer of at least 1');
    }
    if (!Number.isFinite(settings.retryStartingDelayMs) || settings.retryStartingDelayMs < 0) {
      invalid.push('retryStartingDelayMs must be 0 or greater');
    }
    if (!Number.isInteger(settings.maxConcurrentRuleSets) || settings.maxConcurrentRuleSets < 1) {
      invalid.push('maxConcurrentRuleSets must be an integer of at least 1');
    }
    if (invalid.length > 0) {
      throw new RemediationError(
        RemediationErrorKind.INVALID_CONFIGURATION,
        `${MODULE_EXCEPTIONS.INVALID_INPUT}: ${invalid.join('; ')}`,
      );
    }
    return settings;
  }

  private validateSession(session: IRemediationSession, dryRun: boolean): void {
    const problems: string[] = [];
    const seen = new Set<string>();

    for (const action of session.actions) {
      if (seen.has(action.id)) {
        problems.push(`duplicate action id ${action.id}`);
      }
      for (const dependency of action.dependsOn) {
        if (!seen.has(dependency)) {
          problems.push(`${action.id} depends on ${dependency}, which is not an earlier action`);
        }
      }
      seen.add(action.id);

      if (!session.snapshots[snapshotKey(action.region, action.ruleSetId)]) {
        problems.push(`${action.id} has no planned snapshot`);
      }
      if (action.kind !== RemediationActionKind.DELETE_UNUSED_RULE_SET && !action.rule) {
        problems.push(`${action.id} has no rule`);
      }
      if (!dryRun && action.state !== ActionState.PLANNED) {
        problems.push(`${action.id} is ${action.state}, session was already executed`);
      }
    }

    if (problems.length > 0) {
      throw new RemediationError(
        RemediationErrorKind.INVALID_CONFIGURATION,
        `${MODULE_EXCEPTIONS.INVALID_INPUT}: Invalid session ${session.sessionId}: ${problems.join('; ')}`,
      );
    }
  }

  private prefix(run: ActionRun): string {
    return `${run.action.region}:${run.action.ruleSetId}`;
  }
}
