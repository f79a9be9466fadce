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
 * @fileoverview Logging Infrastructure - Winston-based logging with icons and structured output
 *
 * Two winston loggers back every module of the engine:
 * - the main logger, filtered by the `LOG_LEVEL` environment variable
 * - the status logger, which always prints and is reserved for run summaries and operator alerts
 *
 * Both are exposed through {@link IconLogger}, which prefixes each message with an icon and an optional
 * `region:rule-set` context so concurrent rule set work stays readable in a single stream.
 *
 * @example
 * ```typescript
 * const logger = createLogger(['remediation-executor']);
 *
 * logger.processStart('Executing remediation session 5c0f...');
 * logger.info('Rule set content matches planned snapshot', 'us-east-1:sg-0123');
 * logger.commandExecution('AuthorizeSecurityGroupIngress', { GroupId: 'sg-0123' }, 'us-east-1:sg-0123');
 * logger.dryRun('RevokeSecurityGroupIngress', { GroupId: 'sg-0123' });
 *
 * const statusLogger = createStatusLogger(['remediation-executor']);
 * statusLogger.error('Rollback failed, manual intervention required', 'us-east-1:sg-0123');
 * ```
 */

import * as winston from 'winston';

/**
 * Main Winston logger instance for general application logging.
 */
const Logger = winston.createLogger({
  defaultMeta: { mainLabel: 'sg-guard' },
  level: process.env['LOG_LEVEL'] ?? 'info',
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.printf(({ message, timestamp, level, mainLabel, childLabel }) => {
      return `${timestamp} | ${level} | ${childLabel || mainLabel} | ${message}`;
    }),
    winston.format.align(),
  ),
  transports: [new winston.transports.Console()],
});

winston.add(Logger);

/**
 * Status logger for high-priority messages, always logs at info level regardless of LOG_LEVEL.
 */
const StatusLogger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.printf(({ message, timestamp, childLabel }) => {
      return `${timestamp} | status | ${childLabel} | ${message}`;
    }),
    winston.format.align(),
  ),
  transports: [new winston.transports.Console()],
});

winston.add(StatusLogger);

/**
 * Icon-enabled logger interface. Every method accepts an optional prefix, typically `region:ruleSetId`.
 */
export interface IconLogger {
  /** Log informational message with info icon (ℹ️) */
  info(message: string, prefix?: string): void;
  /** Log warning message with warning icon (⚠️) */
  warn(message: string, prefix?: string): void;
  /** Log error message with error icon (❌) */
  error(message: string, prefix?: string): void;
  /** Log process start message with rocket icon (🚀) */
  processStart(message: string, prefix?: string): void;
  /** Log process completion message with checkmark icon (✅) */
  processEnd(message: string, prefix?: string): void;
  /** Log dry run operation with magnifying glass icon (🔍) */
  dryRun(commandName: string, parameters: Record<string, unknown>, prefix?: string): void;
  /** Log provider command execution with info icon (ℹ️) */
  commandExecution(commandName: string, parameters: Record<string, unknown>, prefix?: string): void;
  /** Log successful provider command completion with info icon (ℹ️) */
  commandSuccess(commandName: string, parameters: Record<string, unknown>, prefix?: string): void;
}

function logMessage(message: string, level: 'info' | 'warn' | 'error', logger: winston.Logger, prefix?: string): void {
  const formattedMessage = prefix ? `[${prefix}] ${message}` : message;
  logger[level](formattedMessage);
}

function createIconLogger(baseLogger: winston.Logger): IconLogger {
  return {
    info: (message: string, prefix?: string) => {
      logMessage(`ℹ️  ${message}`, 'info', baseLogger, prefix);
    },

    warn: (message: string, prefix?: string) => {
      logMessage(`⚠️  ${message}`, 'warn', baseLogger, prefix);
    },

    error: (message: string, prefix?: string) => {
      logMessage(`❌  ${message}`, 'error', baseLogger, prefix);
    },

    processStart: (message: string, prefix?: string) => {
      logMessage(`🚀  ${message}`, 'info', baseLogger, prefix);
    },

    processEnd: (message: string, prefix?: string) => {
      logMessage(`✅  ${message}`, 'info', baseLogger, prefix);
    },

    dryRun: (commandName: string, parameters: Record<string, unknown>, prefix?: string) => {
      const dryRunIcon = `🔍`;
      logMessage(`${dryRunIcon}  Dry run is true, so not executing ${commandName}`, 'info', baseLogger, prefix);
      logMessage(
        `${dryRunIcon}  Would have executed ${commandName} with arguments: ${JSON.stringify(parameters)}`,
        'info',
        baseLogger,
        prefix,
      );
    },

    commandExecution: (commandName: string, parameters: Record<string, unknown>, prefix?: string) => {
      logMessage(
        `ℹ️  Executing ${commandName} with arguments: ${JSON.stringify(parameters)}`,
        'info',
        baseLogger,
        prefix,
      );
    },

    commandSuccess: (commandName: string, parameters: Record<string, unknown>, prefix?: string) => {
      logMessage(
        `ℹ️  Successfully executed ${commandName} with arguments: ${JSON.stringify(parameters)}`,
        'info',
        baseLogger,
        prefix,
      );
    },
  };
}

/**
 * Creates an icon-enabled logger labelled with the given hierarchy.
 *
 * @param logInfo - Labels joined with ` | `, usually the module file name
 *
 * @example
 * ```typescript
 * const logger = createLogger(['risk-classifier']);
 * logger.info('Classified 42 rules', 'eu-west-1');
 * // 2024-11-01 10:30:45.123 | info | risk-classifier | ℹ️  [eu-west-1] Classified 42 rules
 * ```
 */
export const createLogger = (logInfo: string[]): IconLogger => {
  const logInfoString = logInfo.join(' | ');
  return createIconLogger(Logger.child({ childLabel: logInfoString }));
};

/**
 * Creates an icon-enabled status logger whose output bypasses LOG_LEVEL filtering.
 * Use it for session summaries and fatal operator alerts only.
 *
 * @throws {Error} When logInfo is empty
 */
export const createStatusLogger = (logInfo: string[]): IconLogger => {
  if (!logInfo || logInfo.length === 0) {
    throw new Error('createStatusLogger requires at least one log info item');
  }
  const logInfoString = logInfo.join(' | ');
  return createIconLogger(StatusLogger.child({ childLabel: logInfoString }));
};

/**
 * Changes the level of the main logger. The status logger is not affected.
 */
export function setLogLevel(level: string): void {
  Logger.level = level;
}
