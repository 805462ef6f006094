/**
 * accord schema - Write JSON Schemas for accord.yaml and pact files.
 */

import { Command } from 'commander';
import path from 'node:path';
import { generateSchemas } from 'accord-core';

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

export function registerSchema(program: Command): void {
  program
    .command('schema')
    .description('Generate JSON Schema files for IDE validation')
    .option('-o, --out <dir>', 'output directory', './schemas')
    .action(async (opts: { out: string }) => {
      let written: string[];
      try {
        written = await generateSchemas(path.resolve(opts.out));
      } catch (err) {
        return program.error(`${RED}Failed to write schemas: ${(err as Error).message}${RESET}`, { exitCode: 1 });
      }
      for (const file of written) {
        console.log(`${GREEN}✓${RESET} ${file}`);
      }
    });
}
