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
import { IAuditRuleSetEntry, IAuditReport, IInventory, RiskLevel } from './interfaces';
import { compareRiskLevels, emptyRiskCounts, isAtOrAbove, RiskClassifier } from './risk-classifier';

/**
 * Builds the read-only audit report. Only rule sets with a finding at or above the threshold are listed,
 * most severe first.
 */
export function buildAuditReport(
  inventory: IInventory,
  classifier: RiskClassifier,
  riskThreshold: RiskLevel,
  generatedAt: string,
): IAuditReport {
  const byRiskLevel = emptyRiskCounts();
  const ruleSets: IAuditRuleSetEntry[] = [];

  for (const ruleSet of inventory.ruleSets) {
    const classification = classifier.classifyRuleSet(ruleSet);
    const findings = classification.assessments
      .filter(assessment => isAtOrAbove(assessment.riskLevel, riskThreshold))
      .map(assessment => ({
        ruleIndex: assessment.ruleIndex,
        rule: assessment.rule,
        riskLevel: assessment.riskLevel,
        breadth: assessment.breadth,
        reason: assessment.reason,
      }));
    if (findings.length === 0) {
      continue;
    }
    for (const finding of findings) {
      byRiskLevel[finding.riskLevel] += 1;
    }
    ruleSets.push({
      id: ruleSet.id,
      name: ruleSet.name,
      region: ruleSet.region,
      ...(ruleSet.vpcId !== undefined && { vpcId: ruleSet.vpcId }),
      attachmentCount: ruleSet.attachments.length,
      attachmentsKnown: ruleSet.attachmentsKnown,
      riskCounts: classification.riskCounts,
      overallRisk: classification.overallRisk,
      findings,
    });
  }

  ruleSets.sort(
    (a, b) =>
      compareRiskLevels(b.overallRisk, a.overallRisk) ||
      a.region.localeCompare(b.region) ||
      a.id.localeCompare(b.id),
  );

  return {
    generatedAt,
    regions: inventory.regions,
    riskThreshold,
    skippedRegions: inventory.skippedRegions,
    dependencyFailures: inventory.dependencyFailures,
    ruleSets,
    totals: {
      ruleSetsScanned: inventory.ruleSets.length,
      ruleSetsWithFindings: ruleSets.length,
      findings: ruleSets.reduce((total, entry) => total + entry.findings.length, 0),
      byRiskLevel,
    },
  };
}
