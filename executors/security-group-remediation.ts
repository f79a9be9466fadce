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
import { createLogger } from '../common/logger';
import { describeError } from '../lib/common/errors';
import { IModuleResponse } from '../lib/common/interfaces';
import { IAuditReport, IRemediationSession } from '../lib/security-group-remediation/interfaces';
import { AuditSecurityGroupsModule } from '../lib/security-group-remediation/audit-security-groups';
import { PlanSecurityGroupRemediationModule } from '../lib/security-group-remediation/plan-security-group-remediation';
import { ExecuteSecurityGroupRemediationModule } from '../lib/security-group-remediation/execute-security-group-remediation';
import {
  IRemediationProviders,
  ISecurityGroupRemediationHandlerParameter,
} from '../interfaces/security-group-remediation/configuration';
import {
  IExecuteSecurityGroupRemediationHandlerParameter,
  ISecurityGroupRemediationExecution,
} from '../interfaces/security-group-remediation/execute-security-group-remediation';

/**
 * Logger
 */
const logger = createLogger([path.parse(path.basename(__filename)).name]);

/**
 * Function to audit security groups
 * @param input {@link ISecurityGroupRemediationHandlerParameter}
 * @param providers Optional providers in place of the AWS ones
 * @returns module response with the audit report
 *
 * @description
 * Read-only. Lists every rule at or above the configured risk threshold.
 *
 * @example
 * ```
 * const input: ISecurityGroupRemediationHandlerParameter = {
 *   operation: 'audit',
 *   region: 'us-east-1',
 *   configuration: {
 *     regions: ['us-east-1', 'us-west-2'],
 *     riskThreshold: RiskLevel.MEDIUM,
 *   },
 * };
 *
 * const response = await auditSecurityGroups(input);
 * ```
 */
export async function auditSecurityGroups(
  input: ISecurityGroupRemediationHandlerParameter,
  providers?: IRemediationProviders,
): Promise<IModuleResponse<IAuditReport>> {
  try {
    return await new AuditSecurityGroupsModule(providers).handler(input);
  } catch (e: unknown) {
    logger.error(describeError(e));
    throw e;
  }
}

/**
 * Function to plan security group remediation
 * @param input {@link ISecurityGroupRemediationHandlerParameter}
 * @param providers Optional providers in place of the AWS ones
 * @returns module response with the planned session
 */
export async function planSecurityGroupRemediation(
  input: ISecurityGroupRemediationHandlerParameter,
  providers?: IRemediationProviders,
): Promise<IModuleResponse<IRemediationSession>> {
  try {
    return await new PlanSecurityGroupRemediationModule(providers).handler(input);
  } catch (e: unknown) {
    logger.error(describeError(e));
    throw e;
  }
}

/**
 * Function to plan and execute security group remediation
 * @param input {@link IExecuteSecurityGroupRemediationHandlerParameter}
 * @param providers Optional providers in place of the AWS ones
 * @returns module response with the session and execution report
 *
 * @description
 * Start with `dryRun: true`. Changes are applied one at a time and rolled back when the health check fails.
 *
 * @example
 * ```
 * const input: IExecuteSecurityGroupRemediationHandlerParameter = {
 *   operation: 'execute',
 *   region: 'us-east-1',
 *   dryRun: true,
 *   configuration: {
 *     approvedCidrs: ['10.0.0.0/8'],
 *     healthCheck: { alarmNames: ['api-5xx'] },
 *   },
 * };
 *
 * const response = await executeSecurityGroupRemediation(input);
 * ```
 */
export async function executeSecurityGroupRemediation(
  input: IExecuteSecurityGroupRemediationHandlerParameter,
  providers?: IRemediationProviders,
): Promise<IModuleResponse<ISecurityGroupRemediationExecution>> {
  try {
    return await new ExecuteSecurityGroupRemediationModule(providers).handler(input);
  } catch (e: unknown) {
    logger.error(describeError(e));
    throw e;
  }
}
