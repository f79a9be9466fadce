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
 * @fileoverview CLI entry point - validates the command and resource and routes to the handler
 */

import { setLogLevel } from '../../common/logger';
import { IModuleResponse } from '../common/interfaces';
import { Commands } from './commands/registry';
import { CliInvokeArgumentType } from './handlers/root';

/**
 * Processes parsed command-line arguments and executes the matching handler
 * @param argv - Parsed command-line arguments from yargs
 * @returns module response, or a usage message
 */
export async function main(argv: CliInvokeArgumentType): Promise<string | IModuleResponse<unknown>> {
  if (argv['help'] || argv['h']) {
    return '';
  }

  const verbName = argv._[0]?.toString();
  const resourceName = argv._[1]?.toString();

  if (!verbName || !resourceName) {
    return 'Usage: sg-guard <command> <resource> [options]';
  }

  const verb = Object.prototype.hasOwnProperty.call(Commands, verbName) ? Commands[verbName] : undefined;
  if (!verb) {
    return `Invalid command "${verbName}"`;
  }

  const resource = Object.prototype.hasOwnProperty.call(verb.resources, resourceName)
    ? verb.resources[resourceName]
    : undefined;
  if (!resource) {
    return `Invalid resource "${resourceName}" for command "${verbName}"`;
  }

  setLogLevel(argv['verbose'] === true ? 'info' : (process.env['LOG_LEVEL'] ?? 'warn'));

  return resource.execute({
    moduleName: resourceName,
    commandName: verbName,
    args: argv,
  });
}
