#!/usr/bin/env node
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
import { version } from '../package.json';
import { main, toYargsOptions } from '../lib/cli/apigw-cli';
import { CliInvokeArgumentType } from '../lib/cli/handlers/root';
import { Commands } from '../lib/cli/commands/registry';
import { exit } from 'process';
import { IModuleResponse } from '../lib/common/interfaces';
import { MODULE_STATE_CODE } from '../lib/common/types';

export function formatOutput(data: string | IModuleResponse<unknown>, format: string = 'json'): string {
  if (typeof data === 'string') {
    return data;
  }

  switch (format) {
    case 'text': {
      let output = `${data.moduleName}\t${data.status}\t${data.summary}`;
      if (data.response !== undefined) {
        output += `\nResponse:\n${JSON.stringify(data.response, null, 2)}`;
      }
      return output;
    }

    case 'table': {
      const headers = 'MODULE\t\t\t\tSTATUS\t\tSUMMARY';
      const separator = '------\t\t\t\t------\t\t-------';
      let row = `${data.moduleName.padEnd(30)}\t${data.status.padEnd(10)}\t${data.summary}`;
      if (data.response !== undefined) {
        row += `\n\nDetailed Response:\n${JSON.stringify(data.response, null, 2)}`;
      }
      return [headers, separator, row].join('\n');
    }

    default: // json
      return JSON.stringify(data, null, 2);
  }
}

export async function runApigwBuilderCli(): Promise<void> {
  try {
    let cli = yargs(hideBin(process.argv))
      .usage('Usage: $0 <command> <resource> [options]')
      .strict()
      .version(false)
      .command({
        command: 'version',
        describe: 'Show version number',
        handler: () => {
          console.log(`apigw-builder: ${version}`);
          process.exit(0);
        },
      });

    Object.entries(Commands).forEach(([verbName, verb]) => {
      cli = cli.command(verbName, verb.description, yargs => {
        Object.entries(verb.resources).forEach(([resourceName, resource]) => {
          yargs.command({
            command: resourceName,
            describe: resource.description,
            builder: toYargsOptions(resource.options),
            handler: async () => undefined,
          });
        });
        yargs.demandCommand(1, `Resource is required for ${verbName} command`);
      });
    });

    cli = cli.option('output', {
      type: 'string',
      choices: ['json', 'text', 'table'],
      default: 'json',
      describe: 'Output format',
    });

    cli = cli
      .demandCommand(1, `too few arguments, command and resource are required`)
      .fail((msg, _, yargs) => {
        console.log(yargs.help());
        console.log(`apigw-builder: error: ${msg}`);
        process.exit(1);
      })
      .help()
      .alias('help', 'h')
      .wrap(null)
      .example('$0 create endpoint -c file://endpoint.json', 'Create the endpoint described in endpoint.json')
      .example('$0 create endpoint -c file://endpoint.json --dry-run', 'Show the API calls without making them')
      .example('$0 validate configuration -c file://checks.json', 'Check a REST API before adding endpoints')
      .example('$0 get header-options --filter cors_headers', 'Show the CORS header presets')
      .example('$0 list api-groups --region eu-west-1', 'List REST APIs grouped by environment')
      .example('$0 audit security --api-ids a1b2c3d4e5 --report findings.csv', 'Audit one REST API');

    const argv: CliInvokeArgumentType = await cli.parseAsync();
    const status = await main(argv);
    console.log(formatOutput(status, argv.output));
    if (typeof status !== 'string' && status.status === MODULE_STATE_CODE.FAILED) {
      exit(1);
    }
  } catch (err) {
    if (err instanceof Error) {
      console.error(`apigw-builder: error: ${err.message}`);
    } else {
      console.error(`apigw-builder: error: ${err}`);
    }
    exit(1);
  }
}

if (require.main === module) {
  void runApigwBuilderCli();
}
