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
import { describe, beforeEach, expect, test, afterAll, vi } from 'vitest';

const originalEnv = process.env;

const mockLoggerMethods = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const mockChild = vi.fn(() => mockLoggerMethods);

const mockLogger: { child: typeof mockChild; level?: string } = {
  child: mockChild,
};

vi.mock('winston', () => ({
  createLogger: vi.fn(() => mockLogger),
  format: {
    combine: vi.fn(() => 'mockedCombinedFormat'),
    colorize: vi.fn(() => 'mockedColorize'),
    timestamp: vi.fn(() => 'mockedTimestamp'),
    printf: vi.fn((formatter: (info: Record<string, string>) => string) => formatter),
    align: vi.fn(() => 'mockedAlign'),
  },
  transports: {
    Console: vi.fn(),
  },
  add: vi.fn(),
}));

describe('logger', () => {
  beforeEach(() => {
    vi.resetModules();
    vi.clearAllMocks();
    process.env = { ...originalEnv };
    delete mockLogger.level;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  describe('Logger initialization', () => {
    test('should create main logger with default settings', async () => {
      delete process.env['LOG_LEVEL'];
      const winston = await import('winston');

      await import('../../common/logger');

      expect(vi.mocked(winston.createLogger)).toHaveBeenCalledWith(
        expect.objectContaining({
          defaultMeta: { mainLabel: 'sg-guard' },
          level: 'info',
          format: 'mockedCombinedFormat',
        }),
      );
      expect(vi.mocked(winston.format.timestamp)).toHaveBeenCalledWith({ format: 'YYYY-MM-DD HH:mm:ss.SSS' });
      expect(vi.mocked(winston.add)).toHaveBeenCalledTimes(2);
    });

    test('should use LOG_LEVEL environment variable if set', async () => {
      process.env['LOG_LEVEL'] = 'debug';
      const winston = await import('winston');

      await import('../../common/logger');

      expect(vi.mocked(winston.createLogger)).toHaveBeenCalledWith(expect.objectContaining({ level: 'debug' }));
    });

    test('should format main log lines with the child label', async () => {
      const winston = await import('winston');

      await import('../../common/logger');

      const formatter = vi.mocked(winston.format.printf).mock.calls[0][0];
      expect(
        formatter({
          message: 'Collected 3 rule set(s)',
          timestamp: '2024-06-01 00:00:00.000',
          level: 'info',
          mainLabel: 'sg-guard',
          childLabel: 'inventory-collector',
        }),
      ).toBe('2024-06-01 00:00:00.000 | info | inventory-collector | Collected 3 rule set(s)');
    });
  });

  describe('createLogger', () => {
    test('should create a child logger with the joined labels', async () => {
      const { createLogger } = await import('../../common/logger');

      createLogger(['security-group-remediation', 'executor']);

      expect(mockChild).toHaveBeenCalledWith({ childLabel: 'security-group-remediation | executor' });
    });

    test('should prefix messages with icons and the context', async () => {
      const { createLogger } = await import('../../common/logger');
      const logger = createLogger(['remediation-executor']);

      logger.info('Rule set unchanged', 'us-east-1:sg-1');
      logger.warn('Invalidated action');
      logger.error('Unexpected failure', 'eu-west-1:sg-2');
      logger.processStart('Executing session');
      logger.processEnd('Committed action');

      expect(mockLoggerMethods.info).toHaveBeenNthCalledWith(1, '[us-east-1:sg-1] ℹ️  Rule set unchanged');
      expect(mockLoggerMethods.warn).toHaveBeenCalledWith('⚠️  Invalidated action');
      expect(mockLoggerMethods.error).toHaveBeenCalledWith('[eu-west-1:sg-2] ❌  Unexpected failure');
      expect(mockLoggerMethods.info).toHaveBeenNthCalledWith(2, '🚀  Executing session');
      expect(mockLoggerMethods.info).toHaveBeenNthCalledWith(3, '✅  Committed action');
    });

    test('should log commands and dry runs with their arguments', async () => {
      const { createLogger } = await import('../../common/logger');
      const logger = createLogger(['remediation-executor']);

      logger.commandExecution('addRule', { ruleSetId: 'sg-1' });
      logger.commandSuccess('addRule', { ruleSetId: 'sg-1' });
      logger.dryRun('removeRule', { ruleSetId: 'sg-1' }, 'us-east-1:sg-1');

      expect(mockLoggerMethods.info.mock.calls).toEqual([
        ['ℹ️  Executing addRule with arguments: {"ruleSetId":"sg-1"}'],
        ['ℹ️  Successfully executed addRule with arguments: {"ruleSetId":"sg-1"}'],
        ['[us-east-1:sg-1] 🔍  Dry run is true, so not executing removeRule'],
        ['[us-east-1:sg-1] 🔍  Would have executed removeRule with arguments: {"ruleSetId":"sg-1"}'],
      ]);
    });
  });

  describe('createStatusLogger', () => {
    test('should throw error when logInfo is empty', async () => {
      const { createStatusLogger } = await import('../../common/logger');

      expect(() => createStatusLogger([])).toThrow('createStatusLogger requires at least one log info item');
    });

    test('should create a status child logger', async () => {
      const { createStatusLogger } = await import('../../common/logger');

      createStatusLogger(['remediation-executor']).info('Session complete');

      expect(mockChild).toHaveBeenCalledWith({ childLabel: 'remediation-executor' });
      expect(mockLoggerMethods.info).toHaveBeenCalledWith('ℹ️  Session complete');
    });
  });

  describe('setLogLevel', () => {
    test('should change the main logger level', async () => {
      const { setLogLevel } = await import('../../common/logger');

      setLogLevel('warn');

      expect(mockLogger.level).toBe('warn');
    });
  });
});
