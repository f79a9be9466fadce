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
 * @fileoverview Rule Inventory Collector - read-only snapshot of rule sets and their attachments per region
 *
 * Regions are collected concurrently through the worker pool. A region whose rule sets cannot be listed is
 * reported in `skippedRegions` and does not affect the others.
 */

import path from 'path';
import { createLogger } from '../../common/logger';
import { validateRegions } from '../../common/functions';
import { processWithWorkerPool } from '../common/batch-processor';
import { IClock, SystemClock } from '../common/clock';
import { DEFAULT_MAX_CONCURRENT_ATTACHMENT_LOOKUPS, DEFAULT_MAX_CONCURRENT_REGIONS } from '../common/constants';
import { describeError, toRemediationErrorKind } from '../common/errors';
import { DependencyAnalyzer } from './dependency-analyzer';
import { IDependencyFailure, IInventory, IRegionFailure, IRuleProvider, IRuleSet, IRuleSetState } from './interfaces';
import { computeFingerprint } from './rules';

export interface IInventoryCollectorOptions {
  readonly maxConcurrentRegions?: number;
  readonly maxConcurrentAttachmentLookups?: number;
  readonly clock?: IClock;
}

type RegionInventory = {
  ruleSets: IRuleSet[];
  dependencyFailures: IDependencyFailure[];
  failure?: IRegionFailure;
};

export class InventoryCollector {
  private readonly logger = createLogger([path.parse(path.basename(__filename)).name]);
  private readonly clock: IClock;
  private readonly maxConcurrentRegions: number;
  private readonly maxConcurrentAttachmentLookups: number;

  constructor(
    private readonly ruleProvider: IRuleProvider,
    private readonly analyzer: DependencyAnalyzer,
    options: IInventoryCollectorOptions = {},
  ) {
    this.clock = options.clock ?? new SystemClock();
    this.maxConcurrentRegions = options.maxConcurrentRegions ?? DEFAULT_MAX_CONCURRENT_REGIONS;
    this.maxConcurrentAttachmentLookups =
      options.maxConcurrentAttachmentLookups ?? DEFAULT_MAX_CONCURRENT_ATTACHMENT_LOOKUPS;
  }

  /**
   * Collects every rule set of the given regions
   *
   * @throws {@link RemediationError} InvalidConfiguration for an empty, malformed or duplicated region list
   */
  public async collect(regions: readonly string[]): Promise<IInventory> {
    const targetRegions = validateRegions(regions);
    const collectedAt = this.clock.now().toISOString();

    this.logger.processStart(`Collecting rule sets for ${targetRegions.length} region(s): ${targetRegions.join(', ')}`);

    const results = await processWithWorkerPool(
      targetRegions.map(region => () => this.collectRegion(region)),
      this.maxConcurrentRegions,
    );

    const ruleSets: IRuleSet[] = [];
    const skippedRegions: IRegionFailure[] = [];
    const dependencyFailures: IDependencyFailure[] = [];
    for (const result of results) {
      ruleSets.push(...result.ruleSets);
      dependencyFailures.push(...result.dependencyFailures);
      if (result.failure) {
        skippedRegions.push(result.failure);
      }
    }

    this.logger.processEnd(
      `Collected ${ruleSets.length} rule set(s), ${skippedRegions.length} region(s) skipped, ${dependencyFailures.length} unknown dependency lookup(s)`,
    );

    return { collectedAt, regions: targetRegions, ruleSets, skippedRegions, dependencyFailures };
  }

  private async collectRegion(region: string): Promise<RegionInventory> {
    let states: IRuleSetState[];
    try {
      states = await this.ruleProvider.listRuleSets(region);
    } catch (e: unknown) {
      const reason = describeError(e);
      this.logger.warn(`Skipping region, unable to list rule sets: ${reason}`, region);
      return { ruleSets: [], dependencyFailures: [], failure: { region, kind: toRemediationErrorKind(e), reason } };
    }

    const analyses = await processWithWorkerPool(
      states.map(state => () => this.analyzer.listAttachments(region, state.id)),
      this.maxConcurrentAttachmentLookups,
    );

    const ruleSets: IRuleSet[] = states
      .map((state, index) => ({
        ...state,
        attachments: analyses[index].attachments,
        attachmentsKnown: analyses[index].known,
        fingerprint: computeFingerprint(state.rules),
      }))
      .sort((a, b) => a.id.localeCompare(b.id));

    this.logger.info(`Collected ${ruleSets.length} rule set(s)`, region);

    return { ruleSets, dependencyFailures: analyses.flatMap(analysis => analysis.failures) };
  }
}
