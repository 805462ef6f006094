/**
 * accord validate <pact> - Check a pact file against the pact schema and model.
 */

import { Command } from 'commander';
import fs from 'node:fs/promises';
import { readPact, validatePactDocument } from 'accord-core';

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

export function registerValidate(program: Command): void {
  program
    .command('validate <pact>')
    .description('Validate a pact file')
    .action(async (file: string) => {
      let document: unknown;
      try {
        document = JSON.parse(await fs.readFile(file, 'utf-8'));
      } catch (err) {
        return program.error(`${RED}✗ ${file}: ${(err as Error).message}${RESET}`, { exitCode: 1 });
      }

      const problems = validatePactDocument(document);
      if (problems.length > 0) {
        for (const problem of problems) console.log(`  ${RED}✗${RESET} ${problem}`);
        return program.error(`${RED}✗ ${file} is not a valid pact${RESET}`, { exitCode: 1 });
      }

      // Structurally valid documents can still carry bad rules or generators.
      const result = readPact(document);
      if (!result.ok) {
        console.log(`  ${RED}✗${RESET} ${result.error}`);
        return program.error(`${RED}✗ ${file} is not a valid pact${RESET}`, { exitCode: 1 });
      }
      const { pact } = result;
      console.log(`${GREEN}✓ ${file}${RESET} (${pact.consumer.name} -> ${pact.provider.name}, ${pact.interactions.length} interactions)`);
    });
}
