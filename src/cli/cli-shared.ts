import { readFileSync } from 'node:fs';
import { InvalidArgumentError, type Command } from 'commander';
import { Composer } from '../runtime/composer.js';
import { createRegistry } from '../skills/builtin.js';
import type { Registry } from '../skills/registry.js';
import { contextDefaults, loadProjectConfig, type LoadedConfig } from '../shared/config.js';
import { errorMessage, isCompileError, ValidationError } from '../shared/errors.js';
import { isLogLevel, setLogLevel } from '../shared/logger.js';

export interface GlobalOptions {
  config?: string;
  skills?: string[];
}

export interface CompilerSetup {
  config: LoadedConfig;
  registry: Registry;
  composer: Composer;
}

/**
 * Load project config and the skill catalogue, or print the error and exit.
 * Use at the top of every command that compiles or inspects skills.
 */
export function requireCompiler(program: Command): CompilerSetup {
  const globals = program.opts<GlobalOptions>();
  try {
    const config = loadProjectConfig(globals.config !== undefined ? { path: globals.config } : {});
    // LOG_LEVEL from the environment wins over the config file.
    if (config.log_level && !isLogLevel(process.env['LOG_LEVEL'])) setLogLevel(config.log_level);
    const registry = createRegistry({ skillDirs: [...config.skill_dirs, ...(globals.skills ?? [])] });
    const composer = new Composer({ registry, defaults: contextDefaults(config) });
    return { config, registry, composer };
  } catch (err) {
    return exitWithError(err);
  }
}

export function exitWithError(err: unknown): never {
  console.error('Error:', errorMessage(err));
  if (isCompileError(err)) {
    if (err instanceof ValidationError && err.issues.length > 1) {
      for (const issue of err.issues) console.error(`  - ${issue}`);
    }
    if (err.hint) console.error(`Hint: ${err.hint}`);
  }
  process.exit(1);
}

/** Read a file as UTF-8 text, or stdin when the path is `-`. */
export function readTextSource(source: string): string {
  try {
    return readFileSync(source === '-' ? 0 : source, 'utf8');
  } catch (err) {
    throw new ValidationError(`Cannot read ${source === '-' ? 'stdin' : source}: ${errorMessage(err)}`);
  }
}

/** Read a JSON document from a file, or from stdin when the path is `-`. */
export function readJsonSource(source: string): unknown {
  const text = readTextSource(source);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`Invalid JSON in ${source === '-' ? 'stdin' : source}: ${errorMessage(err)}`);
  }
}

/** Commander accumulator for repeatable options. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) throw new InvalidArgumentError('Not a number.');
  return n;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
