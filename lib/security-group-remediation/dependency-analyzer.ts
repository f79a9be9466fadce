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
import path from 'path';
import { createLogger } from '../../common/logger';
import { describeError, RemediationErrorKind } from '../common/errors';
import { IAttachmentAnalysis, IAttachmentProvider, IAttachmentRef, IDependencyFailure } from './interfaces';

/**
 * Resolves which resources use a rule set, one attachment provider per resource kind.
 *
 * @remarks
 * A failed lookup never reads as "no attachments": it adds an `unknown` placeholder of the failed kind and a
 * DependencyUnknown record, so the rule set can not become a deletion candidate.
 */
export class DependencyAnalyzer {
  private readonly logger = createLogger([path.parse(path.basename(__filename)).name]);

  constructor(private readonly providers: readonly IAttachmentProvider[]) {}

  public async listAttachments(region: string, ruleSetId: string): Promise<IAttachmentAnalysis> {
    const results = await Promise.allSettled(
      this.providers.map(provider => provider.listAttachments(region, ruleSetId)),
    );

    const attachments: IAttachmentRef[] = [];
    const failures: IDependencyFailure[] = [];

    results.forEach((result, index) => {
      const kind = this.providers[index].kind;
      if (result.status === 'fulfilled') {
        attachments.push(...result.value);
        return;
      }
      const reason = describeError(result.reason);
      this.logger.warn(`Unable to list ${kind} attachments, treating as in use: ${reason}`, `${region}:${ruleSetId}`);
      attachments.push({ kind, resourceId: `unknown-${kind}`, unknown: true });
      failures.push({ region, ruleSetId, attachmentKind: kind, kind: RemediationErrorKind.DEPENDENCY_UNKNOWN, reason });
    });

    return {
      attachments,
      known: this.providers.length > 0 && failures.length === 0,
      failures,
    };
  }

  /**
   * Only a complete lookup with zero attachments permits deletion
   */
  public static isDeletionCandidate(analysis: { readonly attachments: readonly IAttachmentRef[]; readonly known: boolean }): boolean {
    return analysis.known && analysis.attachments.length === 0;
  }
}
