/**
 * accord parse <expression> - Show what a matcher expression parses to.
 */

import { Command } from 'commander';
import { parseMatcherDefinition } from 'accord-core';

const RED = '\x1b[31m';
const RESET = '\x1b[0m';

export function registerParse(program: Command): void {
  program
    .command('parse <expression>')
    .description("Parse a matcher expression such as \"matching(type, 'Name')\"")
    .action((expression: string) => {
      const result = parseMatcherDefinition(expression);
      if (result.error !== undefined) {
        return program.error(`${RED}${result.error}${RESET}`, { exitCode: 1 });
      }
      const rules = [...result.rules()].map((entry) =>
        entry.kind === 'rule' ? entry.json : { reference: entry.name },
      );
      console.log(JSON.stringify({
        value: result.value,
        valueType: result.valueType,
        rules,
        generator: result.generatorJson,
      }, null, 2));
    });
}
