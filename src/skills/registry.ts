/**
 * Skill registry.
 *
 * Constructed explicitly, filled during a loading phase, then read-mostly.
 * Catalog text and JSON schema are memoised and dropped on every write,
 * never on read. `update()` builds the next index off to the side and swaps
 * it in with a single assignment, so a compile running between two awaits
 * sees either the old registry or the new one.
 */
import { ConfigurationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import {
  SKILL_CATEGORIES,
  type ParamValue,
  type ParameterSpec,
  type SkillCategory,
  type SkillDefinition,
} from './types.js';

export interface ParamSchema {
  type: string | string[];
  description: string;
  minimum?: number;
  maximum?: number;
  enum?: string[];
  pattern?: string;
  default?: ParamValue;
}

export interface SkillSchema {
  type: 'object';
  description: string;
  properties: Record<string, ParamSchema>;
  required: string[];
  additionalProperties: false;
}

export interface PipelineSchema {
  type: 'object';
  properties: {
    skill: { type: 'string'; enum: string[] };
    params: { oneOf: Array<{ $ref: string }> };
  };
  definitions: Record<string, SkillSchema>;
  required: ['skill', 'params'];
}

class RegistryIndex {
  readonly skills = new Map<string, SkillDefinition>();
  readonly aliases = new Map<string, string>();
  readonly byCategory = new Map<SkillCategory, Set<string>>();
  readonly byTag = new Map<string, Set<string>>();
  readonly searchBlobs = new Map<string, string>();

  add(def: SkillDefinition): void {
    const previous = this.skills.get(def.name);
    if (previous) this.remove(previous);

    this.skills.set(def.name, def);
    this.indexInto(this.byCategory, def.category, def.name);
    for (const tag of def.tags) this.indexInto(this.byTag, tag.toLowerCase(), def.name);
    for (const alias of def.aliases) this.aliases.set(alias, def.name);
    this.searchBlobs.set(
      def.name,
      [def.name, def.description, ...def.tags, ...def.aliases].join('\n').toLowerCase(),
    );
  }

  clone(): RegistryIndex {
    const next = new RegistryIndex();
    for (const def of this.skills.values()) next.add(def);
    return next;
  }

  private remove(def: SkillDefinition): void {
    this.byCategory.get(def.category)?.delete(def.name);
    for (const tag of def.tags) this.byTag.get(tag.toLowerCase())?.delete(def.name);
    for (const alias of def.aliases) {
      if (this.aliases.get(alias) === def.name) this.aliases.delete(alias);
    }
    this.searchBlobs.delete(def.name);
    this.skills.delete(def.name);
  }

  private indexInto<K>(index: Map<K, Set<string>>, key: K, name: string): void {
    let names = index.get(key);
    if (!names) {
      names = new Set();
      index.set(key, names);
    }
    names.add(name);
  }
}

export class Registry {
  private index = new RegistryIndex();
  private catalogCache: string | undefined;
  private schemaCache: PipelineSchema | undefined;
  private readonly acyclic = new Set<string>();
  private revisionCounter = 0;

  /** Insert or overwrite by name (last writer wins). */
  register(def: SkillDefinition): void {
    if (this.index.skills.has(def.name)) {
      logger.debug('Overwriting skill definition', { skill: def.name, source: def.source });
    }
    this.index.add(def);
    this.invalidate();
  }

  /** Atomic batch insert/overwrite for hot reload. */
  update(defs: readonly SkillDefinition[]): void {
    const next = this.index.clone();
    for (const def of defs) next.add(def);
    this.index = next;
    this.invalidate();
    logger.info('Registry updated', { skills: defs.length, total: next.skills.size });
  }

  /** Bumped on every write; lets callers detect a reload. */
  get revision(): number {
    return this.revisionCounter;
  }

  get size(): number {
    return this.index.skills.size;
  }

  get(name: string): SkillDefinition | undefined {
    const { skills, aliases } = this.index;
    const direct = skills.get(name);
    if (direct) return direct;
    const target = aliases.get(name);
    return target === undefined ? undefined : skills.get(target);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** Like `get`, but an unknown name is a ConfigurationError with suggestions. */
  require(name: string): SkillDefinition {
    const def = this.get(name);
    if (def) return def;
    const suggestions = this.search(name.replace(/[_-]+/g, ' ').split(' ')[0] ?? name)
      .slice(0, 5)
      .map((s) => s.name);
    throw new ConfigurationError(`Unknown skill '${name}'`, {
      skill: name,
      hint: suggestions.length ? `did you mean: ${suggestions.join(', ')}?` : 'run `skillc skills list` to see available skills',
    });
  }

  list(): SkillDefinition[] {
    return [...this.index.skills.values()];
  }

  names(): string[] {
    return [...this.index.skills.keys()];
  }

  listByCategory(category: SkillCategory): SkillDefinition[] {
    return this.resolveNames(this.index.byCategory.get(category));
  }

  listByTag(tag: string): SkillDefinition[] {
    return this.resolveNames(this.index.byTag.get(tag.toLowerCase()));
  }

  /** Case-insensitive substring match over name, description, tags and aliases. */
  search(query: string): SkillDefinition[] {
    const needle = query.trim().toLowerCase();
    if (!needle) return [];
    const { searchBlobs, skills } = this.index;
    const results: SkillDefinition[] = [];
    for (const [name, blob] of searchBlobs) {
      const def = skills.get(name);
      if (def && blob.includes(needle)) results.push(def);
    }
    return results;
  }

  toCatalogText(): string {
    if (this.catalogCache === undefined) {
      this.catalogCache = renderCatalog(this);
    }
    return this.catalogCache;
  }

  toSchema(): PipelineSchema {
    if (this.schemaCache === undefined) {
      this.schemaCache = renderSchema(this.list());
    }
    return this.schemaCache;
  }

  /**
   * Throws ConfigurationError when `name` (transitively) expands into itself
   * or references an unknown skill.
   */
  assertAcyclic(name: string): void {
    const stack: string[] = [];
    const visit = (current: string): void => {
      const def = this.require(current);
      if (def.strategy.kind !== 'pipeline' || this.acyclic.has(def.name)) return;
      if (stack.includes(def.name)) {
        throw new ConfigurationError(`Cyclic sub-pipeline: ${[...stack, def.name].join(' -> ')}`, {
          skill: def.name,
          hint: 'a sub-pipeline may not expand into itself',
        });
      }
      stack.push(def.name);
      for (const step of def.strategy.steps) visit(step.skill);
      stack.pop();
      this.acyclic.add(def.name);
    };
    visit(name);
  }

  /** Check every sub-pipeline. Returns one message per broken skill. */
  verify(): string[] {
    const problems: string[] = [];
    for (const def of this.list()) {
      if (def.strategy.kind !== 'pipeline') continue;
      try {
        this.assertAcyclic(def.name);
      } catch (err) {
        if (!(err instanceof ConfigurationError)) throw err;
        problems.push(`${def.name}: ${err.message}`);
      }
    }
    return problems;
  }

  private resolveNames(names: Set<string> | undefined): SkillDefinition[] {
    if (!names) return [];
    const out: SkillDefinition[] = [];
    for (const name of names) {
      const def = this.index.skills.get(name);
      if (def) out.push(def);
    }
    return out;
  }

  private invalidate(): void {
    this.catalogCache = undefined;
    this.schemaCache = undefined;
    this.acyclic.clear();
    this.revisionCounter += 1;
  }
}

function formatDefault(value: ParamValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function describeParam(spec: ParameterSpec): string {
  const req = spec.required && spec.default === undefined
    ? 'required'
    : spec.default === undefined
      ? 'optional'
      : `optional, default=${formatDefault(spec.default)}`;
  const extras: string[] = [];
  if (spec.choices?.length) extras.push(`choices: ${spec.choices.join(', ')}`);
  if (spec.min !== undefined || spec.max !== undefined) {
    extras.push(`range: ${spec.min ?? '-inf'}..${spec.max ?? 'inf'}`);
  }
  const suffix = extras.length ? ` (${extras.join('; ')})` : '';
  return `  - ${spec.name} (${spec.type}): ${spec.description}${suffix} [${req}]`;
}

function renderCatalog(registry: Registry): string {
  const lines = ['# Available Skills'];
  for (const category of SKILL_CATEGORIES) {
    const skills = registry.listByCategory(category);
    if (skills.length === 0) continue;
    const title = category
      .split('_')
      .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
      .join(' ');
    lines.push('', `## ${title}`);
    for (const skill of skills) {
      lines.push('', `### ${skill.name}`, skill.description);
      if (skill.parameters.length) {
        lines.push('Parameters:');
        for (const spec of skill.parameters) lines.push(describeParam(spec));
      }
      if (skill.examples.length) {
        lines.push('Examples:');
        for (const ex of skill.examples) lines.push(`  - ${ex}`);
      }
    }
  }
  return lines.join('\n') + '\n';
}

function paramSchema(spec: ParameterSpec): ParamSchema {
  const prop: ParamSchema = { type: 'string', description: spec.description };
  switch (spec.type) {
    case 'int':
      prop.type = 'integer';
      break;
    case 'float':
      prop.type = 'number';
      break;
    case 'bool':
      prop.type = 'boolean';
      break;
    case 'enum':
      prop.enum = [...(spec.choices ?? [])];
      break;
    case 'time':
      prop.type = ['number', 'string'];
      prop.description += ' (seconds or [HH:]MM:SS)';
      break;
    case 'color':
      prop.pattern = '^([A-Za-z]+|#[0-9A-Fa-f]{6,8}|0x[0-9A-Fa-f]{6,8})(@[0-9.]+)?$';
      break;
    case 'string':
      break;
  }
  if (spec.type === 'int' || spec.type === 'float' || spec.type === 'time') {
    if (spec.min !== undefined) prop.minimum = spec.min;
    if (spec.max !== undefined) prop.maximum = spec.max;
  }
  if (spec.default !== undefined) prop.default = spec.default;
  return prop;
}

function renderSchema(skills: readonly SkillDefinition[]): PipelineSchema {
  const definitions: Record<string, SkillSchema> = {};
  for (const skill of skills) {
    const properties: Record<string, ParamSchema> = {};
    const required: string[] = [];
    for (const spec of skill.parameters) {
      properties[spec.name] = paramSchema(spec);
      if (spec.required && spec.default === undefined) required.push(spec.name);
    }
    definitions[skill.name] = {
      type: 'object',
      description: skill.description,
      properties,
      required,
      additionalProperties: false,
    };
  }
  const names = Object.keys(definitions);
  return {
    type: 'object',
    properties: {
      skill: { type: 'string', enum: names },
      params: { oneOf: names.map((name) => ({ $ref: `#/definitions/${name}` })) },
    },
    definitions,
    required: ['skill', 'params'],
  };
}
