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
import { describe, expect, test } from 'vitest';
import { Commands } from '../../../../lib/cli/commands/registry';
import { SecurityGroupsCommands } from '../../../../lib/cli/commands/security-groups';
import { CliCommonOptions } from '../../../../lib/cli/handlers/root';
import { SecurityGroupsCommand } from '../../../../lib/cli/handlers/security-groups';

describe('Commands registry', () => {
  test('should register the audit, plan and execute verbs', () => {
    expect(Object.keys(Commands)).toEqual(['audit', 'plan', 'execute']);
  });

  test.each(['audit', 'plan', 'execute'] as const)('should route %s security-groups to its handler', verb => {
    expect(Commands[verb].resources['security-groups']).toBe(SecurityGroupsCommands[verb]);
    expect(SecurityGroupsCommands[verb].execute).toBe(SecurityGroupsCommand[verb]);
    expect(SecurityGroupsCommands[verb].options).toBe(CliCommonOptions);
  });
});
