/**
 * Parameter validation, coercion and enum autocorrection.
 *
 * `normalizeParams` mutates the caller's raw map in place (alias renames,
 * filled defaults, corrected enum values) so anything reading the step
 * afterwards sees the same values the compiler used.
 */
import { escapeFilterValue, float as floatText, type SafeText } from '../security/escape.js';
import { CompileInvariantViolation, ValidationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ParameterSpec, ParamValue, RawParams, SkillDefinition } from './types.js';

const TIME_PATTERN = /^(?:(\d+):)?(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/;
const COLOR_PATTERN = /^(?:[A-Za-z]+|#[0-9A-Fa-f]{6}(?:[0-9A-Fa-f]{2})?|0x[0-9A-Fa-f]{6}(?:[0-9A-Fa-f]{2})?)(?:@(?:0(?:\.\d+)?|1(?:\.0+)?|\.\d+))?$/;
const TRUE_WORDS = new Set(['true', '1', 'yes', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'off']);

export interface TimeValue {
  seconds: number;
  /** The representation the caller supplied, used verbatim in flags. */
  text: string;
}

/**
 * Three tiers, each accepted only when exactly one choice survives:
 * case-insensitive exact, unique prefix, unique substring.
 */
export function fuzzyMatchChoice(value: string, choices: readonly string[]): string | undefined {
  const needle = value.trim().toLowerCase();
  if (!needle) return undefined;
  const tiers: Array<(choice: string) => boolean> = [
    (c) => c.toLowerCase() === needle,
    (c) => c.toLowerCase().startsWith(needle),
    (c) => c.toLowerCase().includes(needle),
  ];
  for (const test of tiers) {
    const hits = choices.filter(test);
    if (hits.length === 1) return hits[0];
  }
  return undefined;
}

export function parseTime(value: string): number | undefined {
  const trimmed = value.trim();
  if (/^\d+(?:\.\d+)?$/.test(trimmed)) return Number(trimmed);
  const m = TIME_PATTERN.exec(trimmed);
  if (!m) return undefined;
  const hours = m[1] ? Number(m[1]) : 0;
  const minutes = Number(m[2]);
  const seconds = Number(m[3]);
  if (minutes >= 60 || seconds >= 60) return undefined;
  return hours * 3600 + minutes * 60 + seconds;
}

function fail(skill: string, spec: ParameterSpec, message: string, hint?: string): never {
  throw new ValidationError(`Skill '${skill}': parameter '${spec.name}' ${message}`, {
    skill,
    param: spec.name,
    hint,
  });
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function checkBounds(skill: string, spec: ParameterSpec, n: number): void {
  if (spec.min !== undefined && n < spec.min) fail(skill, spec, `must be >= ${spec.min} (got ${n})`);
  if (spec.max !== undefined && n > spec.max) fail(skill, spec, `must be <= ${spec.max} (got ${n})`);
}

/** Validate and coerce one present value. Throws ValidationError. */
export function validateValue(skill: string, spec: ParameterSpec, value: unknown): ParamValue {
  switch (spec.type) {
    case 'int': {
      const n = toNumber(value);
      if (n === undefined || !Number.isInteger(n)) fail(skill, spec, `must be an integer (got ${JSON.stringify(value)})`);
      checkBounds(skill, spec, n);
      return n;
    }
    case 'float': {
      const n = toNumber(value);
      if (n === undefined) fail(skill, spec, `must be a number (got ${JSON.stringify(value)})`);
      checkBounds(skill, spec, n);
      return n;
    }
    case 'time': {
      if (typeof value === 'number') {
        if (!Number.isFinite(value) || value < 0) fail(skill, spec, `must be a non-negative number of seconds`);
        checkBounds(skill, spec, value);
        return value;
      }
      if (typeof value === 'string') {
        const seconds = parseTime(value);
        if (seconds === undefined) fail(skill, spec, `must be seconds or [HH:]MM:SS (got "${value}")`);
        checkBounds(skill, spec, seconds);
        return value.trim();
      }
      return fail(skill, spec, 'must be a time value');
    }
    case 'bool': {
      if (typeof value === 'boolean') return value;
      const word = String(value).trim().toLowerCase();
      if (TRUE_WORDS.has(word)) return true;
      if (FALSE_WORDS.has(word)) return false;
      return fail(skill, spec, `must be a boolean (got ${JSON.stringify(value)})`);
    }
    case 'string': {
      if (typeof value === 'string') return value;
      if (typeof value === 'number' || typeof value === 'boolean') return String(value);
      return fail(skill, spec, 'must be a string');
    }
    case 'color': {
      const text = typeof value === 'string' ? value.trim() : '';
      if (!COLOR_PATTERN.test(text)) {
        fail(skill, spec, `must be a colour name or hex value (got ${JSON.stringify(value)})`, 'e.g. "white", "#FF8800", "black@0.5"');
      }
      return text;
    }
    case 'enum': {
      const choices = spec.choices ?? [];
      if (typeof value !== 'string' && typeof value !== 'number') {
        return fail(skill, spec, `must be one of: ${choices.join(', ')}`);
      }
      const text = String(value);
      if (choices.includes(text)) return text;
      const corrected = fuzzyMatchChoice(text, choices);
      if (corrected === undefined) {
        return fail(skill, spec, `has invalid value "${text}"`, `valid choices: ${choices.join(', ')}`);
      }
      logger.warn('Autocorrected enum parameter', { skill, param: spec.name, from: text, to: corrected });
      return corrected;
    }
  }
}

/**
 * Validate a step's raw parameter map against its skill. Mutates `raw`.
 */
export function normalizeParams(skill: SkillDefinition, raw: RawParams): Params {
  const byName = new Map<string, ParameterSpec>();
  const byAlias = new Map<string, ParameterSpec>();
  for (const spec of skill.parameters) {
    byName.set(spec.name, spec);
    for (const alias of spec.aliases) byAlias.set(alias, spec);
  }

  for (const key of Object.keys(raw)) {
    if (byName.has(key)) continue;
    const spec = byAlias.get(key);
    if (!spec) {
      const valid = skill.parameters.map((p) => p.name);
      throw new ValidationError(`Skill '${skill.name}': unknown parameter '${key}'`, {
        skill: skill.name,
        param: key,
        hint: valid.length ? `valid parameters: ${valid.join(', ')}` : 'this skill takes no parameters',
      });
    }
    if (Object.prototype.hasOwnProperty.call(raw, spec.name)) {
      throw new ValidationError(`Skill '${skill.name}': both '${key}' and its canonical name '${spec.name}' were given`, {
        skill: skill.name,
        param: spec.name,
      });
    }
    raw[spec.name] = raw[key];
    delete raw[key];
  }

  const values = new Map<string, ParamValue>();
  for (const spec of skill.parameters) {
    const value = raw[spec.name];
    if (value === undefined || value === null) {
      if (spec.default !== undefined) {
        raw[spec.name] = spec.default;
        values.set(spec.name, spec.default);
      } else if (spec.required) {
        throw new ValidationError(`Skill '${skill.name}': missing required parameter '${spec.name}'`, {
          skill: skill.name,
          param: spec.name,
          hint: spec.description,
        });
      } else {
        delete raw[spec.name];
      }
      continue;
    }
    const normalized = validateValue(skill.name, spec, value);
    raw[spec.name] = normalized;
    values.set(spec.name, normalized);
  }

  return new Params(skill, values);
}

/** Typed, read-only view over validated parameters. */
export class Params {
  constructor(
    private readonly skill: SkillDefinition,
    private readonly values: ReadonlyMap<string, ParamValue>,
  ) {}

  get skillName(): string {
    return this.skill.name;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  raw(name: string): ParamValue | undefined {
    return this.values.get(name);
  }

  entries(): Array<[string, ParamValue]> {
    return [...this.values.entries()];
  }

  toRecord(): Record<string, ParamValue> {
    return Object.fromEntries(this.values);
  }

  spec(name: string): ParameterSpec | undefined {
    return this.skill.parameters.find((p) => p.name === name);
  }

  private read(name: string, fallback: ParamValue | undefined): ParamValue {
    const value = this.values.get(name) ?? fallback;
    if (value === undefined) {
      throw new CompileInvariantViolation(`Skill '${this.skill.name}' read parameter '${name}' with no value or default`);
    }
    return value;
  }

  float(name: string, fallback?: number): number {
    const value = this.read(name, fallback);
    if (typeof value !== 'number') {
      throw new CompileInvariantViolation(`Parameter '${name}' of '${this.skill.name}' is not numeric`);
    }
    return value;
  }

  int(name: string, fallback?: number): number {
    return Math.trunc(this.float(name, fallback));
  }

  bool(name: string, fallback?: boolean): boolean {
    const value = this.read(name, fallback);
    if (typeof value !== 'boolean') {
      throw new CompileInvariantViolation(`Parameter '${name}' of '${this.skill.name}' is not boolean`);
    }
    return value;
  }

  string(name: string, fallback?: string): string {
    return String(this.read(name, fallback));
  }

  /** Validated enum choice; always one of the declared choices. */
  choice(name: string, fallback?: string): string {
    return this.string(name, fallback);
  }

  time(name: string): TimeValue | undefined {
    const value = this.values.get(name);
    if (value === undefined) return undefined;
    if (typeof value === 'number') return { seconds: value, text: String(value) };
    const seconds = parseTime(String(value));
    if (seconds === undefined) {
      throw new CompileInvariantViolation(`Parameter '${name}' of '${this.skill.name}' is not a time value`);
    }
    return { seconds, text: String(value) };
  }

  /** Escaped text for embedding in filter option values. */
  text(name: string, fallback?: string): SafeText {
    return escapeFilterValue(this.string(name, fallback));
  }

  /** Float parameter rendered with a trailing `.0` when integral. */
  floatText(name: string, fallback?: number): SafeText {
    return floatText(this.float(name, fallback));
  }
}
