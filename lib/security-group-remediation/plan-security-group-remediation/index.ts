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
import { IRemediationSession } from '../interfaces';
import {
  createEngine,
  createRemediationProviders,
  describeSkippedRegions,
  getCollectionStatus,
  getPlanSettings,
  resolveRegions,
} from '../functions';
import {
  IPlanSecurityGroupRemediationModule,
} from '../../../interfaces/security-group-remediation/plan-security-group-remediation';
import {
  IRemediationProviders,
  ISecurityGroupRemediationHandlerParameter,
} from '../../../interfaces/security-group-remediation/configuration';

/**
 * PlanSecurityGroupRemediationModule class to compute the remediation session without applying it
 */
export class PlanSecurityGroupRemediationModule implements IPlanSecurityGroupRemediationModule {
  private readonly logger = createLogger([path.basename(__dirname)]);

  constructor(private readonly providers?: IRemediationProviders) {}

  /**
   * Handler function to plan security group remediation
   *
   * @param props {@link ISecurityGroupRemediationHandlerParameter}
   * @returns module response with the planned {@link IRemediationSession}
   */
  public async handler(
    props: ISecurityGroupRemediationHandlerParameter,
  ): Promise<IModuleResponse<IRemediationSession>> {
    const defaultProps = getModuleDefaultParameters(ModuleName.SECURITY_GROUP_REMEDIATION, props);
    const regions = resolveRegions(props);
    const riskThreshold = props.configuration.riskThreshold ?? DEFAULT_RISK_THRESHOLD;

    this.logger.processStart(`Planning remediation in ${regions.join(', ')} at ${riskThreshold} or above`);

    const engine = createEngine(props.configuration, this.providers ?? createRemediationProviders(props));
    const session = await engine.plan(
      regions,
      riskThreshold,
      props.configuration.exclusions ?? [],
      getPlanSettings(props.configuration, defaultProps.dryRun),
    );

    const manual = session.actions.filter(action => action.manualFollowUpRequired).length;
    const summary = `Planned ${session.actions.length} action(s) in session ${session.sessionId}, ${manual} requiring manual follow-up, ${session.skipped.length} security group(s) excluded${describeSkippedRegions(session.skippedRegions)}`;
    this.logger.processEnd(summary);

    return {
      status: getCollectionStatus(session.regions, session.skippedRegions),
      summary,
      timestamp: new Date().toISOString(),
      moduleName: defaultProps.moduleName,
      operation: props.operation,
      dryRun: defaultProps.dryRun,
      response: session,
    };
  }
}
