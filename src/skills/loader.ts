/**
 * YAML skill loading.
 *
 * A skill directory holds top-level `*.yaml` / `*.yml` files and skill packs:
 *
 *     skills/
 *     ├── warm_glow.yaml          # one definition, or a list
 *     └── retro-pack/
 *         ├── pack.yaml           # optional: name, version, description
 *         └── skills/             # or YAML files at the pack root
 *             └── vhs_pro.yaml
 */
import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { load } from 'js-yaml';
import type { ZodError } from 'zod';
import { ConfigurationError, errorMessage, isCompileError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { PackYamlSchema, SkillFileSchema, SkillYamlSchema, type SkillYaml } from '../shared/schemas.js';
import { validateValue } from './params.js';
import type { Registry } from './registry.js';
import {
  isSkillCategory,
  type ParamType,
  type ParameterSpec,
  type SkillCall,
  type SkillDefinition,
  type SkillStrategy,
} from './types.js';

export interface LoaderOptions {
  /** Whether a procedural handler with this name exists. */
  hasHandler: (name: string) => boolean;
}

const TYPE_NAMES: Record<string, ParamType> = {
  int: 'int',
  integer: 'int',
  float: 'float',
  number: 'float',
  string: 'string',
  str: 'string',
  bool: 'bool',
  boolean: 'bool',
  enum: 'enum',
  choice: 'enum',
  time: 'time',
  color: 'color',
  colour: 'color',
};

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function placeholders(text: string): string[] {
  return [...text.matchAll(PLACEHOLDER)].map((m) => m[1] ?? '');
}

function formatZodError(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

function isYamlFile(name: string): boolean {
  const ext = extname(name).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

function toParameter(skill: string, name: string, raw: SkillYaml['parameters'][string], source: string): ParameterSpec {
  const type = TYPE_NAMES[raw.type.toLowerCase()];
  if (!type) {
    throw new ConfigurationError(`Skill '${skill}' parameter '${name}' has unknown type '${raw.type}'`, {
      skill,
      param: name,
      hint: `in ${source}`,
    });
  }
  if (type === 'enum' && !raw.choices?.length) {
    throw new ConfigurationError(`Skill '${skill}' enum parameter '${name}' declares no choices`, { skill, param: name });
  }
  const spec: ParameterSpec = {
    name,
    type,
    description: raw.description,
    required: raw.required,
    min: raw.min,
    max: raw.max,
    choices: raw.choices,
    aliases: raw.aliases ?? [],
  };
  if (raw.default === undefined) return spec;
  try {
    return { ...spec, default: validateValue(skill, spec, raw.default) };
  } catch (err) {
    throw new ConfigurationError(`Skill '${skill}' parameter '${name}' has an invalid default: ${errorMessage(err)}`, {
      skill,
      param: name,
    });
  }
}

function toStrategy(doc: SkillYaml, params: readonly ParameterSpec[], category: string, opts: LoaderOptions): SkillStrategy {
  const declared = new Set(params.map((p) => p.name));
  const unknownPlaceholder = (text: string): string | undefined => placeholders(text).find((p) => !declared.has(p));

  if (doc.template !== undefined) {
    const missing = unknownPlaceholder(doc.template);
    if (missing) {
      throw new ConfigurationError(`Skill '${doc.name}' template references undeclared parameter '{${missing}}'`, {
        skill: doc.name,
      });
    }
    const option = doc.option ?? doc.template.trimStart().startsWith('-');
    const target = option ? 'output' : (doc.stream ?? (category === 'audio' ? 'audio' : 'video'));
    return { kind: 'template', template: doc.template, target };
  }

  if (doc.pipeline !== undefined) {
    const steps: SkillCall[] = doc.pipeline.map((call) => {
      for (const value of Object.values(call.params)) {
        if (typeof value !== 'string') continue;
        const missing = unknownPlaceholder(value);
        if (missing) {
          throw new ConfigurationError(
            `Skill '${doc.name}' pipeline step '${call.skill}' references undeclared parameter '{${missing}}'`,
            { skill: doc.name },
          );
        }
      }
      return { skill: call.skill, params: call.params };
    });
    return { kind: 'pipeline', steps };
  }

  const handler = doc.handler ?? '';
  if (!opts.hasHandler(handler)) {
    throw new ConfigurationError(`Skill '${doc.name}' names unknown handler '${handler}'`, { skill: doc.name });
  }
  return { kind: 'handler', handler };
}

/** Turn one parsed YAML document into a definition. */
export function parseSkill(raw: unknown, source: string, opts: LoaderOptions): SkillDefinition {
  const parsed = SkillYamlSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid skill definition in ${source}: ${formatZodError(parsed.error)}`);
  }
  const doc = parsed.data;
  const categoryName = doc.category.toLowerCase();
  const category = isSkillCategory(categoryName) ? categoryName : 'custom';
  const parameters = Object.entries(doc.parameters).map(([name, p]) => toParameter(doc.name, name, p, source));

  return Object.freeze({
    name: doc.name,
    category,
    description: doc.description,
    parameters: Object.freeze(parameters),
    strategy: toStrategy(doc, parameters, category, opts),
    tags: doc.tags,
    examples: doc.examples,
    aliases: doc.aliases,
    source,
  });
}

export function parseSkillDocument(text: string, source: string, opts: LoaderOptions): SkillDefinition[] {
  let doc: unknown;
  try {
    doc = load(text);
  } catch (err) {
    throw new ConfigurationError(`Failed to parse YAML in ${source}: ${errorMessage(err)}`);
  }
  const entries = SkillFileSchema.safeParse(doc);
  if (!entries.success) {
    throw new ConfigurationError(`${source}: top level must be a skill mapping or a list of skills`);
  }
  return entries.data.map((entry) => parseSkill(entry, source, opts));
}

export function loadSkillFile(path: string, opts: LoaderOptions): SkillDefinition[] {
  return parseSkillDocument(readFileSync(path, 'utf8'), path, opts);
}

function yamlFilesIn(dir: string): string[] {
  return readdirSync(dir)
    .filter((name) => isYamlFile(name))
    .sort()
    .map((name) => join(dir, name))
    .filter((path) => statSync(path).isFile());
}

function registerFile(path: string, registry: Registry, opts: LoaderOptions): number {
  try {
    const defs = loadSkillFile(path, opts);
    for (const def of defs) {
      registry.register(def);
      logger.info('Loaded custom skill', { skill: def.name, source: path });
    }
    return defs.length;
  } catch (err) {
    if (!isCompileError(err)) throw err;
    logger.warn('Skipping invalid skill file', { source: path, error: err.message });
    return 0;
  }
}

/** Name from a pack.yaml, or undefined (with a warning) when the file is unusable. */
function readPackName(packFile: string): string | undefined {
  let doc: unknown;
  try {
    doc = load(readFileSync(packFile, 'utf8'));
  } catch (err) {
    logger.warn('Ignoring unreadable pack.yaml', { source: packFile, error: errorMessage(err) });
    return undefined;
  }
  const meta = PackYamlSchema.safeParse(doc);
  if (!meta.success) {
    logger.warn('Ignoring invalid pack.yaml', { source: packFile, error: formatZodError(meta.error) });
    return undefined;
  }
  return meta.data.name;
}

/** Load one skill pack directory. Returns the number of skills registered. */
export function loadSkillPack(packDir: string, registry: Registry, opts: LoaderOptions): number {
  const packFile = ['pack.yaml', 'pack.yml'].map((f) => join(packDir, f)).find((f) => existsSync(f));
  const packName = (packFile ? readPackName(packFile) : undefined) ?? basename(packDir);

  const skillsDir = join(packDir, 'skills');
  const files = existsSync(skillsDir) && statSync(skillsDir).isDirectory()
    ? yamlFilesIn(skillsDir)
    : yamlFilesIn(packDir).filter((f) => !/^pack\.ya?ml$/.test(basename(f)));

  let loaded = 0;
  for (const file of files) loaded += registerFile(file, registry, opts);
  logger.debug('Loaded skill pack', { pack: packName, skills: loaded });
  return loaded;
}

/**
 * Register every skill found in a user directory. Invalid files are logged
 * and skipped. User skills overwrite built-ins of the same name.
 */
export function loadSkillDirectory(dir: string, registry: Registry, opts: LoaderOptions): number {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    logger.warn('Skill directory not found', { dir });
    return 0;
  }

  let total = 0;
  for (const file of yamlFilesIn(dir)) total += registerFile(file, registry, opts);

  const packs = readdirSync(dir)
    .filter((name) => !name.startsWith('.'))
    .sort()
    .map((name) => join(dir, name))
    .filter((path) => statSync(path).isDirectory());
  for (const pack of packs) total += loadSkillPack(pack, registry, opts);

  if (total > 0) logger.info('Loaded custom skills', { dir, count: total });
  return total;
}
