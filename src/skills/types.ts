export const PARAM_TYPES = ['int', 'float', 'string', 'bool', 'enum', 'time', 'color'] as const;
export type ParamType = (typeof PARAM_TYPES)[number];

export type ParamValue = string | number | boolean;
export type RawParams = Record<string, unknown>;

export interface ParameterSpec {
  readonly name: string;
  readonly type: ParamType;
  readonly description: string;
  readonly required: boolean;
  readonly default?: ParamValue;
  readonly min?: number;
  readonly max?: number;
  readonly choices?: readonly string[];
  readonly aliases: readonly string[];
}

export const SKILL_CATEGORIES = [
  'temporal',
  'spatial',
  'visual',
  'audio',
  'encoding',
  'text',
  'multi_input',
  'outcome',
  'custom',
] as const;
export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

/** One call inside a sub-pipeline. String values may hold `{outer}` placeholders. */
export interface SkillCall {
  readonly skill: string;
  readonly params: Readonly<Record<string, ParamValue>>;
}

export type TemplateTarget = 'video' | 'audio' | 'output';

export type SkillStrategy =
  | { readonly kind: 'template'; readonly template: string; readonly target: TemplateTarget }
  | { readonly kind: 'pipeline'; readonly steps: readonly SkillCall[] }
  | { readonly kind: 'handler'; readonly handler: string };

export interface SkillDefinition {
  readonly name: string;
  readonly category: SkillCategory;
  readonly description: string;
  readonly parameters: readonly ParameterSpec[];
  readonly strategy: SkillStrategy;
  readonly tags: readonly string[];
  readonly examples: readonly string[];
  readonly aliases: readonly string[];
  /** File the definition came from, or `builtin`. */
  readonly source: string;
}

export function isSkillCategory(value: string): value is SkillCategory {
  return SKILL_CATEGORIES.some((c) => c === value);
}
