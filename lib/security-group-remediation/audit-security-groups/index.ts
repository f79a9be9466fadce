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
import { getModuleDefaultParameters } from '../../../common/functions';
import { createLogger } from '../../../common/logger';
import { ModuleName } from '../../../common/resources';
import { DEFAULT_RISK_THRESHOLD } from '../../common/constants';
import { IModuleResponse } from '../../common/interfaces';
import { IAuditReport } from '../interfaces';
import {
  createEngine,
  createRemediationProviders,
  describeSkippedRegions,
  getCollectionStatus,
  resolveRegions,
} from '../functions';
import { IAuditSecurityGroupsModule } from '../../../interfaces/security-group-remediation/audit-security-groups';
import {
  IRemediationProviders,
  ISecurityGroupRemediationHandlerParameter,
} from '../../../interfaces/security-group-remediation/configuration';

/**
 * AuditSecurityGroupsModule class to report risky security group rules without changing them
 */
export class AuditSecurityGroupsModule implements IAuditSecurityGroupsModule {
  private readonly logger = createLogger([path.basename(__dirname)]);

  /**
   * @param providers Defaults to the AWS providers built from the handler parameter
   */
  constructor(private readonly providers?: IRemediationProviders) {}

  /**
   * Handler function to audit security groups
   *
   * @param props {@link ISecurityGroupRemediationHandlerParameter}
   * @returns module response with the {@link IAuditReport}
   */
  public async handler(props: ISecurityGroupRemediationHandlerParameter): Promise<IModuleResponse<IAuditReport>> {
    const defaultProps = getModuleDefaultParameters(ModuleName.SECURITY_GROUP_REMEDIATION, props);
    const regions = resolveRegions(props);
    const riskThreshold = props.configuration.riskThreshold ?? DEFAULT_RISK_THRESHOLD;

    this.logger.processStart(`Auditing security groups in ${regions.join(', ')} at ${riskThreshold} or above`);

    const engine = createEngine(props.configuration, this.providers ?? createRemediationProviders(props));
    const report = await engine.audit(regions, riskThreshold);

    const summary = `Scanned ${report.totals.ruleSetsScanned} security group(s) in ${report.regions.length} region(s): ${report.totals.findings} finding(s) at ${riskThreshold} or above in ${report.totals.ruleSetsWithFindings} security group(s)${describeSkippedRegions(report.skippedRegions)}`;
    this.logger.processEnd(summary);

    return {
      status: getCollectionStatus(report.regions, report.skippedRegions),
      summary,
      timestamp: new Date().toISOString(),
      moduleName: defaultProps.moduleName,
      operation: props.operation,
      dryRun: defaultProps.dryRun,
      response: report,
    };
  }
}
