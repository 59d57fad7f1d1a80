/**
 * Built-in catalogue and registry construction.
 *
 * Built-in definitions ship as YAML under `skills/builtin/`, one file per
 * category. Unlike user directories they load strictly: a broken built-in is
 * a packaging bug, not something to skip.
 */
import { readdirSync } from 'node:fs';
import { extname, join } from 'node:path';
import { hasHandler } from '../runtime/handlers/index.js';
import type { HandlerTable } from '../runtime/types.js';
import { ConfigurationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { loadSkillDirectory, loadSkillFile, type LoaderOptions } from './loader.js';
import { Registry } from './registry.js';

export const BUILTIN_SKILLS_DIR = join(__dirname, '..', '..', 'skills', 'builtin');

export interface CreateRegistryOptions {
  /** User skill directories, loaded after the built-ins. */
  skillDirs?: readonly string[];
  handlers?: HandlerTable;
  builtinDir?: string;
}

export function loaderOptions(handlers?: HandlerTable): LoaderOptions {
  return { hasHandler: (name) => hasHandler(name, handlers) };
}

export function loadBuiltinSkills(registry: Registry, opts: LoaderOptions, dir = BUILTIN_SKILLS_DIR): number {
  const files = readdirSync(dir)
    .filter((name) => ['.yaml', '.yml'].includes(extname(name).toLowerCase()))
    .sort();
  let count = 0;
  for (const file of files) {
    for (const def of loadSkillFile(join(dir, file), opts)) {
      registry.register({ ...def, source: 'builtin' });
      count += 1;
    }
  }
  return count;
}

export function createRegistry(opts: CreateRegistryOptions = {}): Registry {
  const registry = new Registry();
  const loader = loaderOptions(opts.handlers);
  const builtins = loadBuiltinSkills(registry, loader, opts.builtinDir);

  const broken = registry.verify();
  if (broken.length) {
    throw new ConfigurationError(`Built-in catalogue is inconsistent: ${broken.join('; ')}`);
  }

  for (const dir of opts.skillDirs ?? []) loadSkillDirectory(dir, registry, loader);
  for (const problem of registry.verify()) {
    logger.warn('Sub-pipeline will fail to compile', { problem });
  }

  logger.debug('Registry ready', { builtins, total: registry.size });
  return registry;
}
