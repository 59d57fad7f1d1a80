import type { HandlerTable, SkillHandler } from '../types.js';
import { AUDIO_HANDLERS } from './audio.js';
import { ENCODING_HANDLERS } from './encoding.js';
import { MULTI_INPUT_HANDLERS } from './multi-input.js';
import { SPATIAL_HANDLERS } from './spatial.js';
import { TEMPORAL_HANDLERS } from './temporal.js';
import { TEXT_HANDLERS } from './text.js';
import { VISUAL_HANDLERS } from './visual.js';

export const BUILTIN_HANDLERS: HandlerTable = new Map<string, SkillHandler>(
  Object.entries({
    ...TEMPORAL_HANDLERS,
    ...SPATIAL_HANDLERS,
    ...VISUAL_HANDLERS,
    ...AUDIO_HANDLERS,
    ...ENCODING_HANDLERS,
    ...TEXT_HANDLERS,
    ...MULTI_INPUT_HANDLERS,
  }),
);

/** Built-ins plus embedder-supplied handlers; later entries win. */
export function createHandlerTable(extra: Record<string, SkillHandler> = {}): HandlerTable {
  const table = new Map(BUILTIN_HANDLERS);
  for (const [name, handler] of Object.entries(extra)) table.set(name, handler);
  return table;
}

export function hasHandler(name: string, table: HandlerTable = BUILTIN_HANDLERS): boolean {
  return table.has(name);
}
