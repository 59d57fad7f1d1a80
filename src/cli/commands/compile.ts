import type { Command } from 'commander';
import { toArgv, toShellString } from '../../runtime/emitter.js';
import { ValidationError } from '../../shared/errors.js';
import { PipelineRequestSchema, type PipelineRequest } from '../../shared/schemas.js';
import {
  collect,
  exitWithError,
  isRecord,
  parseNumber,
  readJsonSource,
  readTextSource,
  requireCompiler,
} from '../cli-shared.js';

export interface ContextFlags {
  input?: string;
  output?: string;
  extra?: string[];
  duration?: number;
  fps?: number;
  width?: number;
  height?: number;
  audio?: boolean;
  text?: string[];
  overwrite?: boolean;
}

interface CompileFlags extends ContextFlags {
  json?: boolean;
  explain?: boolean;
}

/**
 * The pipeline file holds either a bare step list or a full
 * `{steps, context}` request; context flags fill in or override the context.
 */
export function buildRequest(doc: unknown, flags: ContextFlags): PipelineRequest {
  const steps = Array.isArray(doc) ? doc : isRecord(doc) ? doc['steps'] : undefined;
  const fileContext = isRecord(doc) && isRecord(doc['context']) ? doc['context'] : {};

  const context: Record<string, unknown> = { ...fileContext };
  if (flags.input !== undefined) context['input'] = flags.input;
  if (flags.output !== undefined) context['output'] = flags.output;
  if (flags.extra?.length) context['extra_inputs'] = flags.extra;
  if (flags.duration !== undefined) context['duration'] = flags.duration;
  if (flags.fps !== undefined) context['fps'] = flags.fps;
  if (flags.width !== undefined) context['width'] = flags.width;
  if (flags.height !== undefined) context['height'] = flags.height;
  if (flags.audio === false) context['has_audio'] = false;
  if (flags.text?.length) context['text_inputs'] = flags.text.map(readTextSource);
  if (flags.overwrite === false) context['overwrite'] = false;

  const parsed = PipelineRequestSchema.safeParse({ steps, context });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(request)'}: ${i.message}`);
    throw new ValidationError('Invalid pipeline request', { hint: 'pass --input and --output, or put them under "context"' }, issues);
  }
  return parsed.data;
}

/** Context options shared by `compile` and `validate`. */
export function withContextOptions(cmd: Command): Command {
  return cmd
    .option('-i, --input <path>', 'Primary input media file')
    .option('-o, --output <path>', 'Output file')
    .option('--extra <path>', 'Extra input (repeatable; index 1, 2, ... in order)', collect)
    .option('--duration <seconds>', 'Duration of the primary input', parseNumber)
    .option('--fps <rate>', 'Frame rate of the primary input', parseNumber)
    .option('--width <px>', 'Width of the primary input', parseNumber)
    .option('--height <px>', 'Height of the primary input', parseNumber)
    .option('--no-audio', 'The primary input has no audio stream')
    .option('--text <file>', 'Text input file, or - for stdin (repeatable)', collect)
    .option('--no-overwrite', 'Refuse to overwrite the output file');
}

export function registerCompileCommand(program: Command): void {
  withContextOptions(
    program
      .command('compile <pipeline>')
      .description('Compile a pipeline JSON file (or - for stdin) to an ffmpeg command'),
  )
    .option('--json', 'Print argv, command and warnings as JSON', false)
    .option('--explain', 'Describe each step before the command', false)
    .action((source: string, opts: CompileFlags) => {
      const { composer } = requireCompiler(program);
      try {
        const request = buildRequest(readJsonSource(source), opts);
        const descriptor = composer.compile(request);

        if (opts.json) {
          console.log(
            JSON.stringify(
              { argv: toArgv(descriptor), command: toShellString(descriptor), warnings: descriptor.warnings },
              null,
              2,
            ),
          );
          return;
        }
        if (opts.explain) {
          console.log(composer.explain(request.steps));
          console.log('');
        }
        for (const warning of descriptor.warnings) console.error(`Warning: ${warning}`);
        console.log(toShellString(descriptor));
      } catch (err) {
        exitWithError(err);
      }
    });
}
