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

import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import { exit } from 'process';
import { version } from '../package.json';
import { main } from '../lib/cli/sg-guard-cli';
import { CliInvokeArgumentType, CommandOptionsType, OUTPUT_FORMATS, OutputFormat } from '../lib/cli/handlers/root';
import { Commands } from '../lib/cli/commands/registry';
import { formatOutput } from '../lib/cli/output';
import { MODULE_STATE_CODE } from '../lib/common/types';

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export async function runSgGuardCli(): Promise<void> {
  try {
    let cli = yargs(hideBin(process.argv))
      .usage('Usage: $0 <command> <resource> [options]')
      .strict()
      .version(false)
      .command({
        command: 'version',
        describe: 'Show version number',
        handler: () => {
          console.log(`sg-guard: ${version}`);
          process.exit(0);
        },
      });

    // Dynamically register commands from Commands registry
    Object.entries(Commands).forEach(([verbName, verb]) => {
      cli = cli.command(verbName, verb.description, yargs => {
        Object.entries(verb.resources).forEach(([resourceName, resource]) => {
          yargs.command({
            command: resourceName,
            describe: resource.description,
            builder: resource.options.reduce<CommandOptionsType>((prev, curr) => ({ ...prev, ...curr }), {}),
            handler: async () => undefined,
          });
        });
        yargs.demandCommand(1, `Resource is required for ${verbName} command`);
      });
    });

    cli = cli.option('output', {
      alias: 'o',
      type: 'string',
      choices: OUTPUT_FORMATS,
      default: 'json',
      describe: 'Output format',
    });

    cli = cli
      .demandCommand(1, `too few arguments, command and resource are required`)
      .fail((msg, _, yargs) => {
        console.log(yargs.help());
        console.log(`sg-guard: error: ${msg}`);
        process.exit(1);
      })
      .help()
      .alias('help', 'h')
      .wrap(null)
      .example('$0 audit security-groups --regions us-east-1,eu-west-1', 'Report risky security group rules')
      .example('$0 plan security-groups -c file://sg-guard.json -o table', 'Show the remediation plan')
      .example('$0 execute security-groups -c file://sg-guard.json --dry-run', 'Validate the plan without changes');

    const argv: CliInvokeArgumentType = await cli.parseAsync();
    const result = await main(argv);
    console.log(formatOutput(result, isOutputFormat(argv.output) ? argv.output : 'json'));

    if (typeof result !== 'string' && result.status !== MODULE_STATE_CODE.SUCCESS) {
      exit(1);
    }
  } catch (err) {
    if (err instanceof Error) {
      console.error(`sg-guard: error: ${err.message}`);
    } else {
      console.error(`sg-guard: error: ${String(err)}`);
    }
    exit(1);
  }
}

void runSgGuardCli();
