export { Composer, DEFAULT_CONTEXT, compileTemplate, dedupeFlags } from './runtime/composer.js';
export type { ComposerOptions, ContextDefaults, ValidationReport } from './runtime/composer.js';
export { toArgv, toShellString, shellQuote } from './runtime/emitter.js';
export { GraphMerger } from './runtime/graph.js';
export { BUILTIN_HANDLERS, createHandlerTable } from './runtime/handlers/index.js';
export {
  FragmentBuilder,
  MAIN_AUDIO,
  MAIN_VIDEO,
  MAP_MAIN_AUDIO,
  MAP_MAIN_VIDEO,
  audio,
  input,
  label,
  mapInput,
  outputFlags,
  result,
  video,
} from './runtime/handlers/result.js';
export type * from './runtime/types.js';
export { Registry } from './skills/registry.js';
export { createRegistry, BUILTIN_SKILLS_DIR } from './skills/builtin.js';
export { loadSkillDirectory, loadSkillFile, parseSkillDocument } from './skills/loader.js';
export type { SkillDefinition, ParameterSpec, SkillCategory, SkillStrategy } from './skills/types.js';
export { escapeFilterValue, filter, float, type SafeText } from './security/escape.js';
export { loadProjectConfig } from './shared/config.js';
export { PipelineRequestSchema, type PipelineRequest } from './shared/schemas.js';
export * from './shared/errors.js';
export { createServer, startServer } from './api/server.js';
