#!/usr/bin/env node
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CLI for writing ISO 10303-21 files
 */

import { readFileSync, writeFileSync } from 'fs';
import { Command } from 'commander';
import { createLogger, DEBUG_ENV_VAR } from '@p21kit/data';
import { runWrite, type WriteCommandOptions } from './write-command.js';

const log = createLogger('CLI');

const program = new Command();

program
  .name('p21kit')
  .description('Write ISO 10303-21 (STEP) physical files from JSON entity documents')
  .version('0.1.0');

program
  .command('write')
  .description('Compile a JSON entity document into a STEP file')
  .argument('<input>', 'Path to the JSON entity document')
  .option('-o, --output <file>', 'Output file (default: stdout)')
  .option('-n, --name <name>', 'FILE_NAME.name')
  .option('-d, --description <text...>', 'FILE_DESCRIPTION.description')
  .option('-a, --author <name...>', 'FILE_NAME.author')
  .option('--organization <name...>', 'FILE_NAME.organization')
  .option('-s, --schema <id...>', 'FILE_SCHEMA.schema_identifiers')
  .option('--timestamp <iso>', 'FILE_NAME.time_stamp (default: now)')
  .option('--originating-system <name>', 'FILE_NAME.originating_system')
  .option('-v, --verbose', 'Verbose output', false)
  .action((input: string, options: WriteCommandOptions) => {
    if (options.verbose) {
      process.env[DEBUG_ENV_VAR] = 'true';
    }
    try {
      const result = runWrite(readFileSync(input, 'utf8'), options);
      if (options.output) {
        writeFileSync(options.output, result.content);
        log.info(`Wrote ${options.output}`, { operation: 'write', data: result.stats });
      } else {
        process.stdout.write(result.content);
      }
    } catch (error) {
      log.error('Write failed', error, { operation: 'write' });
      process.exit(1);
    }
  });

program.parse();
