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
import { IAuditReport } from '../../lib/security-group-remediation/interfaces';
import { ISecurityGroupRemediationHandlerParameter } from './configuration';

/**
 * Security group audit module interface
 */
export interface IAuditSecurityGroupsModule {
  /**
   * Handler function to audit security groups. Read-only.
   *
   * @param props {@link ISecurityGroupRemediationHandlerParameter}
   */
  handler(props: ISecurityGroupRemediationHandlerParameter): Promise<IModuleResponse<IAuditReport>>;
}
