#!/usr/bin/env node
import { Command } from 'commander';
import { collect } from './cli-shared.js';
import { registerCompileCommand } from './commands/compile.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerSkillsCommand } from './commands/skills.js';
import { registerCatalogCommand } from './commands/catalog.js';
import { registerServeCommand } from './commands/serve.js';

const program = new Command();

program
  .name('skillc')
  .description('skillc – compile declarative editing pipelines into ffmpeg commands')
  .version('0.1.0')
  .option('-c, --config <path>', 'Project config file (default: ./skillc.yaml)')
  .option('--skills <dir>', 'Extra skill directory (repeatable)', collect);

registerCompileCommand(program);
registerValidateCommand(program);
registerSkillsCommand(program);
registerCatalogCommand(program);
registerServeCommand(program);

program.parseAsync(process.argv).catch((err: Error) => {
  console.error('Error:', err.message);
  process.exit(1);
});
