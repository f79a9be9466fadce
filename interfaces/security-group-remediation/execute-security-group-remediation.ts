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
import { IModuleResponse } from '../../lib/common/interfaces';
import { IExecutionReport, IRemediationSession } from '../../lib/security-group-remediation/interfaces';
import { ISecurityGroupRemediationHandlerParameter } from './configuration';

/**
 * Security group remediation execution handler parameter
 */
export interface IExecuteSecurityGroupRemediationHandlerParameter extends ISecurityGroupRemediationHandlerParameter {
  /**
   * Aborting stops the run after the actions already staged
   */
  signal?: AbortSignal;
}

/**
 * Planned session and its execution report
 */
export interface ISecurityGroupRemediationExecution {
  readonly session: IRemediationSession;
  readonly report: IExecutionReport;
}

/**
 * Security group remediation execution module interface
 */
export interface IExecuteSecurityGroupRemediationModule {
  /**
   * Handler function to plan and execute security group remediation in one run
   *
   * @param props {@link IExecuteSecurityGroupRemediationHandlerParameter}
   */
  handler(
    props: IExecuteSecurityGroupRemediationHandlerParameter,
  ): Promise<IModuleResponse<ISecurityGroupRemediationExecution>>;
}
