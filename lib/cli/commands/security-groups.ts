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
 * @fileoverview Security Groups CLI Command Definitions
 */

import { SecurityGroupsCommand } from '../handlers/security-groups';
import { CliCommandDetailsType, CliCommonOptions } from '../handlers/root';

/**
 * Available security group CLI commands with descriptions and handlers
 */
export const SecurityGroupsCommands: Record<'audit' | 'plan' | 'execute', CliCommandDetailsType> = {
  audit: {
    description: 'Report security group rules at or above the risk threshold without changing anything',
    options: CliCommonOptions,
    execute: SecurityGroupsCommand.audit,
  },
  plan: {
    description: 'Compute the ordered remediation actions without applying them',
    options: CliCommonOptions,
    execute: SecurityGroupsCommand.plan,
  },
  execute: {
    description: 'Plan and apply remediation one change at a time, rolling back changes that fail the health check',
    options: CliCommonOptions,
    execute: SecurityGroupsCommand.execute,
  },
};
