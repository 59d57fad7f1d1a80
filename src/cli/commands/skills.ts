import type { Command } from 'commander';
import { isSkillCategory, SKILL_CATEGORIES, type SkillDefinition } from '../../skills/types.js';
import { exitWithError, requireCompiler } from '../cli-shared.js';

function printTable(skills: readonly SkillDefinition[]): void {
  if (!skills.length) {
    console.log('No skills found.');
    return;
  }
  const width = Math.max(...skills.map((s) => s.name.length));
  for (const s of skills) {
    console.log(`  ${s.name.padEnd(width)}  [${s.category}] ${s.description}`);
  }
}

function printSkill(def: SkillDefinition): void {
  console.log(`${def.name} (${def.category}, ${def.strategy.kind})`);
  console.log(`  ${def.description}`);
  if (def.aliases.length) console.log(`  Aliases: ${def.aliases.join(', ')}`);
  if (def.tags.length) console.log(`  Tags: ${def.tags.join(', ')}`);
  if (def.parameters.length) {
    console.log('  Parameters:');
    for (const spec of def.parameters) {
      const bits: string[] = [spec.type];
      if (spec.required) bits.push('required');
      if (spec.default !== undefined) bits.push(`default ${String(spec.default)}`);
      if (spec.min !== undefined) bits.push(`min ${spec.min}`);
      if (spec.max !== undefined) bits.push(`max ${spec.max}`);
      if (spec.choices?.length) bits.push(`one of ${spec.choices.join('|')}`);
      console.log(`    ${spec.name} (${bits.join(', ')})${spec.description ? `: ${spec.description}` : ''}`);
    }
  }
  if (def.strategy.kind === 'pipeline') {
    console.log(`  Expands to: ${def.strategy.steps.map((s) => s.skill).join(' -> ')}`);
  }
  for (const example of def.examples) console.log(`  Example: ${example}`);
}

export function registerSkillsCommand(program: Command): void {
  const skills = program.command('skills').description('Browse the skill catalogue');

  skills
    .command('list')
    .description('List skills')
    .option('--category <category>', `Only one category (${SKILL_CATEGORIES.join(', ')})`)
    .option('--tag <tag>', 'Only skills with this tag')
    .option('--json', 'Output as JSON', false)
    .action((opts: { category?: string; tag?: string; json?: boolean }) => {
      const { registry } = requireCompiler(program);
      let list = registry.list();
      if (opts.category !== undefined) {
        if (!isSkillCategory(opts.category)) {
          console.error(`Unknown category: ${opts.category}`);
          console.error('Categories:', SKILL_CATEGORIES.join(', '));
          process.exit(1);
        }
        list = registry.listByCategory(opts.category);
      }
      if (opts.tag !== undefined) {
        const tagged = new Set(registry.listByTag(opts.tag).map((s) => s.name));
        list = list.filter((s) => tagged.has(s.name));
      }
      if (opts.json) {
        console.log(JSON.stringify(list.map((s) => ({ name: s.name, category: s.category, description: s.description })), null, 2));
        return;
      }
      printTable(list);
    });

  skills
    .command('search <query>')
    .description('Search names, descriptions, tags and aliases')
    .action((query: string) => {
      const { registry } = requireCompiler(program);
      printTable(registry.search(query));
    });

  skills
    .command('show <name>')
    .description('Show one skill and its parameters')
    .action((name: string) => {
      const { registry } = requireCompiler(program);
      try {
        printSkill(registry.require(name));
      } catch (err) {
        exitWithError(err);
      }
    });
}
