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
import { generateDryRunResponse, getModuleDefaultParameters } from '../../../common/functions';
import { createLogger } from '../../../common/logger';
import { ModuleName } from '../../../common/resources';
import { DEFAULT_RISK_THRESHOLD } from '../../common/constants';
import { IModuleResponse } from '../../common/interfaces';
import { MODULE_STATE_CODE } from '../../common/types';
import { ExecutionVerdict, IExecutionReport } from '../interfaces';
import {
  createEngine,
  createRemediationProviders,
  getExecuteSettings,
  getPlanSettings,
  resolveRegions,
  toMilliseconds,
} from '../functions';
import {
  IExecuteSecurityGroupRemediationHandlerParameter,
  IExecuteSecurityGroupRemediationModule,
  ISecurityGroupRemediationExecution,
} from '../../../interfaces/security-group-remediation/execute-security-group-remediation';
import { IRemediationProviders } from '../../../interfaces/security-group-remediation/configuration';

const VERDICT_STATUS: Readonly<Record<ExecutionVerdict, MODULE_STATE_CODE>> = {
  [ExecutionVerdict.SUCCESS]: MODULE_STATE_CODE.SUCCESS,
  [ExecutionVerdict.DEGRADED]: MODULE_STATE_CODE.DEGRADED,
  [ExecutionVerdict.FAILED]: MODULE_STATE_CODE.FAILED,
};

/**
 * ExecuteSecurityGroupRemediationModule class to plan and apply security group remediation with health-gated
 * rollback
 */
export class ExecuteSecurityGroupRemediationModule implements IExecuteSecurityGroupRemediationModule {
  private readonly logger = createLogger([path.basename(__dirname)]);

  constructor(private readonly providers?: IRemediationProviders) {}

  /**
   * Handler function to plan and execute security group remediation
   *
   * @param props {@link IExecuteSecurityGroupRemediationHandlerParameter}
   * @returns module response with the session and its {@link IExecutionReport}
   */
  public async handler(
    props: IExecuteSecurityGroupRemediationHandlerParameter,
  ): Promise<IModuleResponse<ISecurityGroupRemediationExecution>> {
    const defaultProps = getModuleDefaultParameters(ModuleName.SECURITY_GROUP_REMEDIATION, props);
    const regions = resolveRegions(props);
    const riskThreshold = props.configuration.riskThreshold ?? DEFAULT_RISK_THRESHOLD;

    this.logger.processStart(
      `Remediating security groups in ${regions.join(', ')} at ${riskThreshold} or above${defaultProps.dryRun ? ' (dry run)' : ''}`,
    );

    const engine = createEngine(props.configuration, this.providers ?? createRemediationProviders(props));
    const session = await engine.plan(
      regions,
      riskThreshold,
      props.configuration.exclusions ?? [],
      getPlanSettings(props.configuration, defaultProps.dryRun),
    );
    const report = await engine.execute(
      session,
      defaultProps.dryRun,
      toMilliseconds(props.configuration.settleIntervalSeconds),
      getExecuteSettings(props.configuration, props.signal),
    );

    const summary = defaultProps.dryRun
      ? generateDryRunResponse(
          defaultProps.moduleName,
          props.operation,
          `${report.summary.total} action(s) planned, ${report.summary.invalidated} would be invalidated`,
        )
      : this.summarize(report);
    this.logger.processEnd(`Session ${session.sessionId} finished with verdict ${report.verdict}`);

    return {
      status: VERDICT_STATUS[report.verdict],
      summary,
      timestamp: new Date().toISOString(),
      moduleName: defaultProps.moduleName,
      operation: props.operation,
      dryRun: defaultProps.dryRun,
      response: { session, report },
    };
  }

  private summarize(report: IExecutionReport): string {
    const { summary } = report;
    const parts = [
      `${summary.committed} committed`,
      `${summary.rolledBack} rolled back`,
      `${summary.rollbackFailed} rollback failed`,
      `${summary.invalidated} invalidated`,
      `${summary.notAttempted} not attempted`,
    ];
    return `${report.verdict}: ${summary.total} action(s), ${parts.join(', ')}${report.cancelled ? ' (cancelled)' : ''}`;
  }
}
