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
import { describe, beforeEach, expect, test } from 'vitest';

import { ModuleName } from '../../../../common/resources';
import { MODULE_STATE_CODE } from '../../../../lib/common/types';
import {
  ExecuteSecurityGroupRemediationModule,
} from '../../../../lib/security-group-remediation/execute-security-group-remediation';
import {
  IExecuteSecurityGroupRemediationHandlerParameter,
} from '../../../../interfaces/security-group-remediation/execute-security-group-remediation';
import { MOCK_CONSTANTS } from '../../../mocked-resources';
import {
  InMemoryRuleProvider,
  ruleSetState,
  ScriptedHealthCheck,
  StaticAttachmentProvider,
} from '../../../utils/test-resources';

const { sshFromAnywhere, httpsFromAnywhere } = MOCK_CONSTANTS.rules;

describe('ExecuteSecurityGroupRemediationModule', () => {
  let ruleProvider: InMemoryRuleProvider;

  const input: IExecuteSecurityGroupRemediationHandlerParameter = {
    ...MOCK_CONSTANTS.runnerParameters,
    configuration: { settleIntervalSeconds: 0, healthCheckTimeoutSeconds: 1, maxAttempts: 1 },
  };

  beforeEach(() => {
    ruleProvider = new InMemoryRuleProvider([
      ruleSetState('sg-web', [sshFromAnywhere, httpsFromAnywhere]),
      ruleSetState('sg-unused', []),
    ]);
  });

  function createModule(healthy = true) {
    return new ExecuteSecurityGroupRemediationModule({
      ruleProvider,
      attachmentProviders: [new StaticAttachmentProvider('instance', { 'sg-web': ['i-0001'] })],
      healthCheck: new ScriptedHealthCheck(() => healthy),
    });
  }

  test('should plan and commit every action', async () => {
    const response = await createModule().handler(input);

    expect(response.status).toBe(MODULE_STATE_CODE.SUCCESS);
    expect(response.summary).toBe(
      'SUCCESS: 2 action(s), 2 committed, 0 rolled back, 0 rollback failed, 0 invalidated, 0 not attempted',
    );
    expect(response.response?.session.cursor).toBe(2);
    expect(ruleProvider.rules(MOCK_CONSTANTS.region, 'sg-web')).toEqual([]);
  });

  test('should leave rule sets untouched on a dry run', async () => {
    const response = await createModule().handler({ ...input, dryRun: true });

    expect(response.status).toBe(MODULE_STATE_CODE.SUCCESS);
    expect(response.dryRun).toBe(true);
    expect(response.summary).toMatch(
      MOCK_CONSTANTS.dryRunResponsePattern(
        ModuleName.SECURITY_GROUP_REMEDIATION,
        '2 action\\(s\\) planned, 0 would be invalidated',
      ),
    );
    expect(ruleProvider.callsOf('removeRule')).toEqual([]);
  });

  test('should report a degraded run when a deletion cannot be rolled back', async () => {
    const response = await createModule(false).handler({
      ...input,
      configuration: { ...input.configuration, deleteUnusedRuleSets: true },
    });

    expect(response.status).toBe(MODULE_STATE_CODE.DEGRADED);
    expect(response.summary).toBe(
      'DEGRADED: 3 action(s), 0 committed, 2 rolled back, 1 rollback failed, 0 invalidated, 0 not attempted',
    );
    expect(ruleProvider.rules(MOCK_CONSTANTS.region, 'sg-web')).toEqual([sshFromAnywhere, httpsFromAnywhere]);
  });

  test('should stop before staging when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const response = await createModule().handler({ ...input, signal: controller.signal });

    expect(response.status).toBe(MODULE_STATE_CODE.FAILED);
    expect(response.summary).toBe(
      'FAILED: 2 action(s), 0 committed, 0 rolled back, 0 rollback failed, 0 invalidated, 2 not attempted (cancelled)',
    );
  });
});
