import { existsSync, readFileSync } from 'node:fs';
import { delimiter, dirname, isAbsolute, resolve } from 'node:path';
import { load } from 'js-yaml';
import type { ContextDefaults } from '../runtime/composer.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { ProjectConfigSchema, type ProjectConfig } from './schemas.js';

export const CONFIG_FILE_NAME = 'skillc.yaml';

export interface LoadConfigOptions {
  /** Explicit path (the `--config` flag). */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig extends ProjectConfig {
  /** File the settings came from; undefined when running on defaults. */
  source?: string;
}

function locate(opts: LoadConfigOptions): { path: string; explicit: boolean } | undefined {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const explicit = opts.path ?? env['SKILLC_CONFIG'];
  if (explicit) return { path: resolve(cwd, explicit), explicit: true };
  const implicit = resolve(cwd, CONFIG_FILE_NAME);
  return existsSync(implicit) ? { path: implicit, explicit: false } : undefined;
}

function parseConfigFile(path: string): ProjectConfig {
  let doc: unknown;
  try {
    doc = load(readFileSync(path, 'utf8')) ?? {};
  } catch (err) {
    throw new ConfigurationError(`Failed to read ${path}: ${errorMessage(err)}`);
  }
  const parsed = ProjectConfigSchema.safeParse(doc);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration in ${path}: ${detail}`);
  }
  return parsed.data;
}

/**
 * Project settings: `skillc.yaml` in the working directory, or the file named
 * by `--config` / `SKILLC_CONFIG`. Skill directories are resolved against the
 * config file; `SKILLC_SKILL_DIRS` appends more.
 */
export function loadProjectConfig(opts: LoadConfigOptions = {}): LoadedConfig {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const found = locate(opts);

  let config: LoadedConfig;
  if (!found) {
    config = ProjectConfigSchema.parse({});
  } else if (!existsSync(found.path)) {
    if (found.explicit) throw new ConfigurationError(`Config file not found: ${found.path}`);
    config = ProjectConfigSchema.parse({});
  } else {
    const base = dirname(found.path);
    const fromFile = parseConfigFile(found.path);
    config = {
      ...fromFile,
      skill_dirs: fromFile.skill_dirs.map((d) => (isAbsolute(d) ? d : resolve(base, d))),
      source: found.path,
    };
  }

  const extraDirs = (env['SKILLC_SKILL_DIRS'] ?? '')
    .split(delimiter)
    .filter((d) => d.trim() !== '')
    .map((d) => resolve(cwd, d));
  return { ...config, skill_dirs: [...config.skill_dirs, ...extraDirs] };
}

export function contextDefaults(config: ProjectConfig): ContextDefaults {
  return {
    fps: config.defaults.fps,
    width: config.defaults.width,
    height: config.defaults.height,
    stillDuration: config.defaults.still_duration,
  };
}
