import { CompileInvariantViolation } from '../shared/errors.js';
import type { CommandDescriptor } from './types.js';

/**
 * Flatten a descriptor into argv, in the one order the tool accepts:
 * binary, global flags, each input's flags then `-i path`, the filter clause,
 * output flags, stream maps, output path.
 */
export function toArgv(cmd: CommandDescriptor): string[] {
  const argv = [cmd.binary, ...cmd.globalFlags];
  for (const input of cmd.inputs) {
    argv.push(...input.flags, '-i', input.path);
  }

  switch (cmd.filter.kind) {
    case 'graph':
      argv.push('-filter_complex', cmd.filter.graph);
      break;
    case 'chain':
      if (cmd.filter.video !== undefined) argv.push('-vf', cmd.filter.video);
      if (cmd.filter.audio !== undefined) argv.push('-af', cmd.filter.audio);
      break;
    case 'none':
      break;
  }

  if (cmd.outputFlags.includes('-i')) {
    throw new CompileInvariantViolation('an input flag ended up among the output flags');
  }
  argv.push(...cmd.outputFlags);
  for (const map of cmd.maps) argv.push('-map', map);
  argv.push(cmd.output);
  return argv;
}

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** POSIX single-quote an argument unless it is plainly safe. */
export function shellQuote(arg: string): string {
  if (arg !== '' && SAFE_WORD.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Display form of the command; the argv itself is what gets executed. */
export function toShellString(cmd: CommandDescriptor): string {
  return toArgv(cmd).map(shellQuote).join(' ');
}
