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
import { describe, expect, test, vi, beforeEach, afterEach } from 'vitest';
import { main } from '../../../lib/cli/sg-guard-cli';
import { MODULE_STATE_CODE } from '../../../lib/common/types';

const { mockCommands, mockSetLogLevel } = vi.hoisted(() => ({
  mockSetLogLevel: vi.fn(),
  mockCommands: {
    audit: {
      description: 'Audit commands',
      resources: {
        'security-groups': {
          description: 'Audit security groups',
          options: [],
          execute: vi.fn(),
        },
      },
    },
  },
}));

vi.mock('../../../lib/cli/commands/registry', () => ({ Commands: mockCommands }));
vi.mock('../../../common/logger', () => ({ setLogLevel: mockSetLogLevel }));

const auditResponse = {
  status: MODULE_STATE_CODE.SUCCESS,
  summary: 'Scanned 0 security group(s)',
  timestamp: '2024-06-01T00:00:00.000Z',
  moduleName: 'security-groups',
  operation: 'audit',
  dryRun: false,
};

describe('sg-guard-cli', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.clearAllMocks();
    process.env = { ...originalEnv };
    delete process.env['LOG_LEVEL'];
    mockCommands.audit.resources['security-groups'].execute.mockResolvedValue(auditResponse);
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('main', () => {
    test('should return empty string for help flag', async () => {
      expect(await main({ _: [], help: true })).toBe('');
      expect(await main({ _: [], h: true })).toBe('');
    });

    test('should return usage message when command or resource is missing', async () => {
      expect(await main({ _: [] })).toBe('Usage: sg-guard <command> <resource> [options]');
      expect(await main({ _: ['audit'] })).toBe('Usage: sg-guard <command> <resource> [options]');
    });

    test('should return error for invalid command', async () => {
      expect(await main({ _: ['invalid', 'security-groups'] })).toBe('Invalid command "invalid"');
    });

    test('should not resolve inherited object members as commands', async () => {
      expect(await main({ _: ['toString', 'security-groups'] })).toBe('Invalid command "toString"');
      expect(await main({ _: ['audit', 'constructor'] })).toBe(
        'Invalid resource "constructor" for command "audit"',
      );
    });

    test('should return error for invalid resource', async () => {
      expect(await main({ _: ['audit', 'invalid'] })).toBe('Invalid resource "invalid" for command "audit"');
    });

    test('should handle numeric arguments', async () => {
      expect(await main({ _: [123, 456] })).toBe('Invalid command "123"');
    });

    test('should execute valid command and resource', async () => {
      const result = await main({ _: ['audit', 'security-groups'], configuration: '{}' });

      expect(mockCommands.audit.resources['security-groups'].execute).toHaveBeenCalledWith({
        moduleName: 'security-groups',
        commandName: 'audit',
        args: { _: ['audit', 'security-groups'], configuration: '{}' },
      });
      expect(result).toBe(auditResponse);
      expect(mockSetLogLevel).toHaveBeenCalledWith('warn');
    });

    test('should log at info level when verbose', async () => {
      await main({ _: ['audit', 'security-groups'], verbose: true });

      expect(mockSetLogLevel).toHaveBeenCalledWith('info');
    });

    test('should keep the LOG_LEVEL environment variable', async () => {
      process.env['LOG_LEVEL'] = 'debug';

      await main({ _: ['audit', 'security-groups'] });

      expect(mockSetLogLevel).toHaveBeenCalledWith('debug');
    });
  });
});
