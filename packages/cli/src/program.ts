/**
 * @module program
 * Builds the `accord` command tree.
 *
 * Kept apart from the bin entry so tests can drive the program in-process.
 */

import { Command } from 'commander';
import { registerMock } from './commands/mock.js';
import { registerVerify } from './commands/verify.js';
import { registerParse } from './commands/parse.js';
import { registerSchema } from './commands/schema.js';
import { registerValidate } from './commands/validate.js';

export interface ProgramOptions {
  /** Throw CommanderError instead of exiting the process. */
  exitOverride?: boolean;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();
  if (options.exitOverride) program.exitOverride();

  program
    .name('accord')
    .description('Consumer-driven contract testing: mock server, verifier and matcher tools')
    .version('0.1.0')
    .option('-c, --config <path>', 'path to accord.yaml')
    .option('--log-level <level>', 'lowest log level printed (error|warn|info|debug)');

  registerMock(program);
  registerVerify(program);
  registerParse(program);
  registerSchema(program);
  registerValidate(program);

  return program;
}
