import type { MediaKind } from '../../security/paths.js';
import { CompileInvariantViolation, ValidationError } from '../../shared/errors.js';
import type { Params } from '../../skills/params.js';
import type { ExtraInput, HandlerContext } from '../types.js';

/** Extra inputs no other step has reserved, in command-line order. */
export function freeExtras(ctx: HandlerContext, kinds?: readonly MediaKind[]): ExtraInput[] {
  return ctx.extras.filter((e) => !ctx.reservedByOthers.has(e.index) && (!kinds || kinds.includes(e.kind)));
}

function missingExtra(skill: string, kinds: readonly MediaKind[]): ValidationError {
  return new ValidationError(`Skill '${skill}' needs an extra ${kinds.join(' or ')} input`, {
    skill,
    hint: 'add the file to the pipeline context extra inputs',
  });
}

/** The optional `input` parameter: an explicit extra input index. */
export function requestedInput(p: Params): number | undefined {
  return p.has('input') ? p.int('input') : undefined;
}

/**
 * Extra input for `reserveInputs`: the requested index when given, else the
 * first free extra of an accepted kind.
 */
export function claimExtra(
  ctx: HandlerContext,
  skill: string,
  kinds: readonly MediaKind[],
  requested?: number,
): number {
  if (requested !== undefined) {
    const extra = ctx.extras.find((e) => e.index === requested);
    if (!extra || !kinds.includes(extra.kind)) {
      throw new ValidationError(`Skill '${skill}': input ${requested} is not an extra ${kinds.join(' or ')} input`, {
        skill,
        param: 'input',
        hint: `extra inputs are numbered from 1; ${ctx.extras.length} given`,
      });
    }
    return requested;
  }
  const extra = freeExtras(ctx, kinds)[0];
  if (!extra) throw missingExtra(skill, kinds);
  return extra.index;
}

/** Up to `count` free extras, stills first. */
export function claimExtras(
  ctx: HandlerContext,
  skill: string,
  kinds: readonly MediaKind[],
  count: number,
): number[] {
  const pool = [...freeExtras(ctx, ['image']), ...freeExtras(ctx, kinds.filter((k) => k !== 'image'))].filter(
    (e) => kinds.includes(e.kind),
  );
  if (!pool.length) throw missingExtra(skill, kinds);
  return pool.slice(0, count).map((e) => e.index);
}

export function ownExtra(ctx: HandlerContext, skill: string): ExtraInput {
  const index = ctx.ownInputs[0];
  const extra = ctx.extras.find((e) => e.index === index);
  if (!extra) {
    throw new CompileInvariantViolation(`Skill '${skill}' compiled without its reserved input`);
  }
  return extra;
}

/** Seconds an extra contributes to a sequence: its own length, or a still's hold time. */
export function segmentDuration(ctx: HandlerContext, extra: ExtraInput, stillDuration: number): number {
  if (extra.kind === 'image') return stillDuration;
  return extra.duration ?? ctx.primary.duration ?? stillDuration;
}
