import type { Command } from 'commander';
import type { ValidationReport } from '../../runtime/composer.js';
import { exitWithError, readJsonSource, requireCompiler } from '../cli-shared.js';
import { buildRequest, withContextOptions, type ContextFlags } from './compile.js';

interface ValidateFlags extends ContextFlags {
  json?: boolean;
}

export function registerValidateCommand(program: Command): void {
  withContextOptions(
    program
      .command('validate <pipeline>')
      .description('Check a pipeline and report every problem without emitting a command'),
  )
    .option('--json', 'Print the report as JSON', false)
    .action((source: string, opts: ValidateFlags) => {
      const { composer } = requireCompiler(program);
      let report: ValidationReport;
      try {
        report = composer.validate(buildRequest(readJsonSource(source), opts));
      } catch (err) {
        exitWithError(err);
      }

      if (opts.json) {
        console.log(JSON.stringify(report, null, 2));
      } else if (report.valid) {
        console.log('Pipeline is valid.');
      } else {
        console.log(`Pipeline has ${report.issues.length} problem(s):`);
        for (const issue of report.issues) console.log(`  - ${issue}`);
      }
      if (!report.valid) process.exit(1);
    });
}
