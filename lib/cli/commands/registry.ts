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
 * @fileoverview CLI Command Registry - maps command verbs to their resource handlers
 */

import { SecurityGroupsCommands } from './security-groups';
import { CliCommandDetailsType } from '../handlers/root';

/**
 * Type definition for command structure hierarchy
 */
type CommandStructure = {
  /** Description of the command verb */
  description: string;
  /** Map of resource names to their command definitions */
  resources: Record<string, CliCommandDetailsType>;
};

/**
 * Central registry of all available CLI commands organized by verb and resource
 */
export const Commands: Record<string, CommandStructure> = {
  audit: {
    description: 'Audit resources for risky configuration (read-only)',
    resources: {
      'security-groups': SecurityGroupsCommands.audit,
    },
  },
  plan: {
    description: 'Plan remediation of risky configuration (read-only)',
    resources: {
      'security-groups': SecurityGroupsCommands.plan,
    },
  },
  execute: {
    description: 'Apply remediation with health-gated rollback',
    resources: {
      'security-groups': SecurityGroupsCommands.execute,
    },
  },
};
