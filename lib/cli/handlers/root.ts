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
 * @fileoverview CLI Root Handler - Common utilities and types for CLI operations
 *
 * Configuration parsing, the options shared by every command, and error reporting.
 */

import fs from 'fs';
import { IModuleResponse } from '../../common/interfaces';

/**
 * Parsed JSON configuration, validated field by field before use
 */
export type ConfigurationObjectType = Record<string, unknown>;

export type OutputFormat = 'json' | 'text' | 'table' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text', 'table', 'csv'];

/**
 * Type definition for CLI invocation arguments from yargs
 */
export type CliInvokeArgumentType = {
  /** Positional arguments */
  _: (string | number)[];
  /** Optional output format */
  output?: string;
  /** Additional named arguments */
  [x: string]: unknown;
};

/**
 * Type definition for CLI execution parameters passed to handlers
 */
export type CliExecutionParameterType = {
  /** Name of the resource the command acts on */
  moduleName: string;
  /** Name of the command being executed */
  commandName: string;
  /** Parsed CLI arguments */
  args: CliInvokeArgumentType;
};

/**
 * Type definition for CLI command options configuration
 */
export type CommandOptionsType = {
  [key: string]: {
    type: 'string' | 'boolean';
    description: string;
    alias?: string;
    default?: boolean;
    required?: boolean;
  };
};

/**
 * Type definition for CLI command details and execution
 */
export type CliCommandDetailsType = {
  description: string;
  options: CommandOptionsType[];
  execute(param: CliExecutionParameterType): Promise<IModuleResponse<unknown>>;
};

/**
 * Common CLI options available across all commands
 */
export const CliCommonOptions: CommandOptionsType[] = [
  {
    verbose: {
      alias: 'v',
      type: 'boolean',
      description: 'Run with verbose logging',
      default: false,
    },
  },
  {
    'dry-run': {
      type: 'boolean',
      description: 'Run the command in dry run mode',
      default: false,
    },
  },
  {
    region: {
      alias: 'r',
      type: 'string',
      description: 'AWS region for the session, also scanned when no region list is given',
    },
  },
  {
    configuration: {
      alias: 'c',
      type: 'string',
      description: 'Path to configuration file (file://) or JSON configuration string',
    },
  },
  {
    regions: {
      type: 'string',
      description: 'Comma separated regions to scan, overrides config.regions',
    },
  },
  {
    ports: {
      type: 'string',
      description: 'Comma separated sensitive ports, overrides config.classifier.sensitivePorts',
    },
  },
];

/**
 * Parses configuration from file path or JSON string
 * @param configArg - Configuration argument (file:// path or JSON string)
 * @returns Parsed configuration object
 */
export function getConfig(configArg: string): ConfigurationObjectType {
  let raw = configArg;
  if (configArg.startsWith('file://')) {
    const filePath = configArg.slice(7);
    if (!fs.existsSync(filePath)) {
      logErrorAndExit(`An error occurred (MissingConfigurationFile): The configuration file ${filePath} does not exists.`);
    }
    raw = fs.readFileSync(filePath, 'utf8');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    logErrorAndExit(
      `An error occurred (InvalidConfiguration): The configuration is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
  if (!isRecord(parsed)) {
    logErrorAndExit('An error occurred (InvalidConfiguration): The configuration must be a JSON object');
  }
  return parsed;
}

/**
 * Session region from `--region`, else `AWS_REGION`, else us-east-1
 */
export function getRegionFromArgs(param: CliExecutionParameterType): string {
  return typeof param.args['region'] === 'string' ? param.args['region'] : process.env['AWS_REGION'] || 'us-east-1';
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Splits a comma separated flag value, dropping empty items
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Logs error message to console with CLI prefix
 * @param message - Error message to log
 */
export function logError(message: string): void {
  console.error(`sg-guard: error: ${message}`);
}

/**
 * Logs error message and exits process with specified code
 * @param message - Error message to log
 * @param exitCode - Exit code (default: 1)
 */
export function logErrorAndExit(message: string, exitCode: number = 1): never {
  logError(message);
  process.exit(exitCode);
}
