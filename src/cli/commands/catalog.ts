import type { Command } from 'commander';
import { requireCompiler } from '../cli-shared.js';

export function registerCatalogCommand(program: Command): void {
  program
    .command('catalog')
    .description('Print the skill catalogue as markdown (for prompting a planner)')
    .action(() => {
      const { registry } = requireCompiler(program);
      process.stdout.write(registry.toCatalogText());
    });

  program
    .command('schema')
    .description('Print the JSON schema of every skill')
    .action(() => {
      const { registry } = requireCompiler(program);
      console.log(JSON.stringify(registry.toSchema(), null, 2));
    });
}
