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
 * @fileoverview Remediation Planner - turns an inventory into an ordered, reversible remediation session
 *
 * For every rule at or above the risk threshold the planner prefers a replacement over a bare removal:
 * 1. `AddRestrictiveRule` for each replacement source (the region's admin rule set, else the approved CIDRs
 *    of the same address family), skipping replacements the rule set already has
 * 2. `RemoveOpenRule` depending on all of those additions
 *
 * When no replacement can be derived the removal is planned alone and flagged for manual follow-up.
 * Planning has no side effects and action ids are derived from the inventory, so planning the same
 * inventory twice yields the same actions.
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../../common/logger';
import { MODULE_EXCEPTIONS } from '../../common/enums';
import { IClock, SystemClock } from '../common/clock';
import { DEFAULT_RULE_SET_NAME } from '../common/constants';
import { RemediationError, RemediationErrorKind } from '../common/errors';
import { DependencyAnalyzer } from './dependency-analyzer';
import { findMatchingExclusion } from './exclusions';
import {
  ActionState,
  IInventory,
  IPlanOptions,
  IRemediationAction,
  IRemediationSession,
  IRule,
  IRuleAssessment,
  IRuleSet,
  IRuleSetSnapshot,
  ISkippedRuleSet,
  RemediationActionKind,
  RiskLevel,
  RuleSource,
} from './interfaces';
import {
  compareRiskLevels,
  isAtOrAbove,
  isRiskLevel,
  isValidIpv4Cidr,
  isValidIpv6Cidr,
  RiskClassifier,
} from './risk-classifier';
import { describeRule, formatSource, hasRule, ruleKey } from './rules';

const KIND_ORDER: Readonly<Record<RemediationActionKind, number>> = {
  [RemediationActionKind.ADD_RESTRICTIVE_RULE]: 0,
  [RemediationActionKind.REMOVE_OPEN_RULE]: 1,
  [RemediationActionKind.DELETE_UNUSED_RULE_SET]: 2,
};

/**
 * Mutable action under construction. Additions shared by several removals sort with the highest risk and
 * lowest rule index among them so they always precede every removal depending on them.
 */
type ActionDraft = {
  id: string;
  kind: RemediationActionKind;
  ruleSet: IRuleSet;
  rule?: IRule;
  ruleIndex?: number;
  riskLevel: RiskLevel;
  justification: string;
  dependsOn: string[];
  manualFollowUpRequired: boolean;
};

export function snapshotKey(region: string, ruleSetId: string): string {
  return `${region}/${ruleSetId}`;
}

export class RemediationPlanner {
  private readonly logger = createLogger([path.parse(path.basename(__filename)).name]);
  private readonly clock: IClock;

  constructor(
    private readonly classifier: RiskClassifier,
    clock?: IClock,
  ) {
    this.clock = clock ?? new SystemClock();
  }

  /**
   * Plans remediation for every rule at or above `options.riskThreshold`
   *
   * @throws {@link RemediationError} InvalidConfiguration for an unknown threshold or malformed approved CIDRs
   */
  public plan(inventory: IInventory, options: IPlanOptions): IRemediationSession {
    this.validate(options);

    const exclusions = options.exclusions ?? [];
    const drafts: ActionDraft[] = [];
    const skipped: ISkippedRuleSet[] = [];
    const snapshots: Record<string, IRuleSetSnapshot> = {};

    const ruleSets = [...inventory.ruleSets].sort(
      (a, b) => a.region.localeCompare(b.region) || a.id.localeCompare(b.id),
    );

    for (const ruleSet of ruleSets) {
      const exclusion = findMatchingExclusion(ruleSet, exclusions);
      if (exclusion !== undefined) {
        this.logger.info(`Excluded by pattern "${exclusion}"`, `${ruleSet.region}:${ruleSet.id}`);
        skipped.push({ region: ruleSet.region, ruleSetId: ruleSet.id, ruleSetName: ruleSet.name, reason: 'excluded' });
        continue;
      }

      const ruleSetDrafts = this.planRuleSet(ruleSet, ruleSets, options);
      if (ruleSetDrafts.length > 0) {
        drafts.push(...ruleSetDrafts);
        snapshots[snapshotKey(ruleSet.region, ruleSet.id)] = {
          region: ruleSet.region,
          ruleSetId: ruleSet.id,
          ruleSetName: ruleSet.name,
          rules: ruleSet.rules,
          fingerprint: ruleSet.fingerprint,
          attachmentCount: ruleSet.attachments.length,
        };
      }
    }

    const actions = this.order(drafts).map(draft => this.toAction(draft));

    this.logger.info(
      `Planned ${actions.length} action(s) across ${Object.keys(snapshots).length} rule set(s), ${skipped.length} rule set(s) excluded`,
    );

    return {
      sessionId: uuidv4(),
      createdAt: this.clock.now().toISOString(),
      regions: inventory.regions,
      skippedRegions: inventory.skippedRegions,
      riskThreshold: options.riskThreshold,
      exclusions: [...exclusions],
      dryRun: options.dryRun ?? false,
      actions,
      skipped,
      snapshots,
      cursor: 0,
      outcomeLog: [],
    };
  }

  private planRuleSet(ruleSet: IRuleSet, allRuleSets: readonly IRuleSet[], options: IPlanOptions): ActionDraft[] {
    const classification = this.classifier.classifyRuleSet(ruleSet);

    if (options.deleteUnusedRuleSets && this.isUnused(ruleSet, allRuleSets, options)) {
      return [
        {
          id: `${ruleSet.region}/${ruleSet.id}/delete`,
          kind: RemediationActionKind.DELETE_UNUSED_RULE_SET,
          ruleSet,
          riskLevel: classification.overallRisk,
          justification: `Rule set ${ruleSet.name} has no attachments and is not referenced by another rule set`,
          dependsOn: [],
          manualFollowUpRequired: false,
        },
      ];
    }

    const drafts: ActionDraft[] = [];
    const plannedAdditions = new Map<string, ActionDraft>();

    for (const assessment of classification.assessments) {
      if (!isAtOrAbove(assessment.riskLevel, options.riskThreshold)) {
        continue;
      }
      const rule = assessment.rule;
      if (rule.source.type !== 'cidr-ipv4' && rule.source.type !== 'cidr-ipv6') {
        this.logger.info(
          `Not remediating ${describeRule(rule)}, source is a reference`,
          `${ruleSet.region}:${ruleSet.id}`,
        );
        continue;
      }

      const replacementSources = this.replacementSources(ruleSet, rule.source, options);
      const openSource = formatSource(rule.source);
      if (replacementSources.some(source => source.type === rule.source.type && formatSource(source) === openSource)) {
        // Source is itself an approved replacement
        continue;
      }

      const prerequisites: string[] = [];
      for (const source of replacementSources) {
        const replacement = this.replacementRule(rule, source);
        if (hasRule(ruleSet.rules, replacement)) {
          continue;
        }
        const key = ruleKey(replacement);
        const existing = plannedAdditions.get(key);
        if (existing) {
          existing.riskLevel =
            compareRiskLevels(assessment.riskLevel, existing.riskLevel) > 0 ? assessment.riskLevel : existing.riskLevel;
          prerequisites.push(existing.id);
          continue;
        }
        const addition: ActionDraft = {
          id: `${ruleSet.region}/${ruleSet.id}/rule-${assessment.ruleIndex}/add-${prerequisites.length}`,
          kind: RemediationActionKind.ADD_RESTRICTIVE_RULE,
          ruleSet,
          rule: replacement,
          ruleIndex: assessment.ruleIndex,
          riskLevel: assessment.riskLevel,
          justification: `Replacement for ${describeRule(rule)}: ${describeRule(replacement)}`,
          dependsOn: [],
          manualFollowUpRequired: false,
        };
        plannedAdditions.set(key, addition);
        drafts.push(addition);
        prerequisites.push(addition.id);
      }

      drafts.push(this.removal(ruleSet, assessment, prerequisites, replacementSources.length === 0));
    }

    return drafts;
  }

  private removal(
    ruleSet: IRuleSet,
    assessment: IRuleAssessment,
    prerequisites: string[],
    manualFollowUpRequired: boolean,
  ): ActionDraft {
    const justification = manualFollowUpRequired
      ? `${assessment.riskLevel}: ${assessment.reason}. No replacement source available, access must be restored manually if required`
      : `${assessment.riskLevel}: ${assessment.reason}`;
    return {
      id: `${ruleSet.region}/${ruleSet.id}/rule-${assessment.ruleIndex}/remove`,
      kind: RemediationActionKind.REMOVE_OPEN_RULE,
      ruleSet,
      rule: assessment.rule,
      ruleIndex: assessment.ruleIndex,
      riskLevel: assessment.riskLevel,
      justification,
      dependsOn: prerequisites,
      manualFollowUpRequired,
    };
  }

  private replacementSources(ruleSet: IRuleSet, openSource: RuleSource, options: IPlanOptions): RuleSource[] {
    const adminRuleSetId = options.adminRuleSets?.[ruleSet.region];
    if (adminRuleSetId && adminRuleSetId !== ruleSet.id) {
      return [{ type: 'rule-set', ruleSetId: adminRuleSetId }];
    }

    const approvedCidrs = options.approvedCidrs ?? [];
    if (openSource.type === 'cidr-ipv6') {
      return approvedCidrs.filter(isValidIpv6Cidr).map(cidr => ({ type: 'cidr-ipv6', cidr }));
    }
    return approvedCidrs.filter(isValidIpv4Cidr).map(cidr => ({ type: 'cidr-ipv4', cidr }));
  }

  private replacementRule(rule: IRule, source: RuleSource): IRule {
    return {
      direction: rule.direction,
      protocol: rule.protocol,
      ...(rule.portRange && { portRange: rule.portRange }),
      source,
      description: `Restricted replacement for ${formatSource(rule.source)}`,
    };
  }

  /**
   * The region's admin rule set is never unused: replacements planned in this session reference it
   */
  private isUnused(ruleSet: IRuleSet, allRuleSets: readonly IRuleSet[], options: IPlanOptions): boolean {
    if (ruleSet.name === DEFAULT_RULE_SET_NAME || options.adminRuleSets?.[ruleSet.region] === ruleSet.id) {
      return false;
    }
    const candidate = { attachments: ruleSet.attachments, known: ruleSet.attachmentsKnown };
    if (!DependencyAnalyzer.isDeletionCandidate(candidate)) {
      return false;
    }
    return !allRuleSets.some(
      other =>
        other.region === ruleSet.region &&
        other.id !== ruleSet.id &&
        other.rules.some(rule => rule.source.type === 'rule-set' && rule.source.ruleSetId === ruleSet.id),
    );
  }

  private order(drafts: ActionDraft[]): ActionDraft[] {
    const byId = new Map(drafts.map(draft => [draft.id, draft]));
    // Shared additions take the highest risk of their dependents
    for (const draft of drafts) {
      for (const dependency of draft.dependsOn) {
        const prerequisite = byId.get(dependency);
        if (prerequisite && compareRiskLevels(draft.riskLevel, prerequisite.riskLevel) > 0) {
          prerequisite.riskLevel = draft.riskLevel;
        }
      }
    }

    return [...drafts].sort(
      (a, b) =>
        compareRiskLevels(b.riskLevel, a.riskLevel) ||
        a.ruleSet.attachments.length - b.ruleSet.attachments.length ||
        a.ruleSet.region.localeCompare(b.ruleSet.region) ||
        a.ruleSet.id.localeCompare(b.ruleSet.id) ||
        (a.ruleIndex ?? Number.MAX_SAFE_INTEGER) - (b.ruleIndex ?? Number.MAX_SAFE_INTEGER) ||
        KIND_ORDER[a.kind] - KIND_ORDER[b.kind] ||
        a.id.localeCompare(b.id),
    );
  }

  private toAction(draft: ActionDraft): IRemediationAction {
    return {
      id: draft.id,
      kind: draft.kind,
      region: draft.ruleSet.region,
      ruleSetId: draft.ruleSet.id,
      ruleSetName: draft.ruleSet.name,
      ...(draft.rule && { rule: draft.rule }),
      ...(draft.ruleIndex !== undefined && { ruleIndex: draft.ruleIndex }),
      riskLevel: draft.riskLevel,
      justification: draft.justification,
      dependsOn: [...draft.dependsOn],
      manualFollowUpRequired: draft.manualFollowUpRequired,
      attachmentCount: draft.ruleSet.attachments.length,
      state: ActionState.PLANNED,
    };
  }

  private validate(options: IPlanOptions): void {
    if (!isRiskLevel(options.riskThreshold)) {
      throw new RemediationError(
        RemediationErrorKind.INVALID_CONFIGURATION,
        `${MODULE_EXCEPTIONS.INVALID_INPUT}: Unknown risk threshold ${String(options.riskThreshold)}`,
      );
    }
    const invalidCidrs = (options.approvedCidrs ?? []).filter(
      cidr => !isValidIpv4Cidr(cidr) && !isValidIpv6Cidr(cidr),
    );
    if (invalidCidrs.length > 0) {
      throw new RemediationError(
        RemediationErrorKind.INVALID_CONFIGURATION,
        `${MODULE_EXCEPTIONS.INVALID_INPUT}: Invalid approved CIDR(s): ${invalidCidrs.join(', ')}`,
      );
    }
  }
}
