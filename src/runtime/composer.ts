/**
 * Pipeline compiler.
 *
 * One `compile()` call owns all of its state: steps are expanded into units
 * (sub-pipelines flatten in place), extra inputs are reserved in a pre-pass,
 * then every unit's HandlerResult is folded through a fresh GraphMerger and
 * the flag accumulators. Nothing is returned unless the whole pipeline
 * compiled.
 */
import { escapeFilterValue, float, formatNumber, renderTemplate, type FilterPart } from '../security/escape.js';
import { classifyMedia, validateOutputPath, validatePath } from '../security/paths.js';
import { CompileInvariantViolation, ConfigurationError, ValidationError, errorMessage, isCompileError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { jsonHash } from '../shared/redact.js';
import type { PipelineContextInput, PipelineRequest } from '../shared/schemas.js';
import { placeholders } from '../skills/loader.js';
import { normalizeParams, type Params } from '../skills/params.js';
import type { Registry } from '../skills/registry.js';
import type { ParamValue, RawParams, SkillDefinition, SkillStrategy } from '../skills/types.js';
import { GraphMerger, mapText, type MergedFilters } from './graph.js';
import { BUILTIN_HANDLERS } from './handlers/index.js';
import { audio, result, video } from './handlers/result.js';
import type {
  CommandDescriptor,
  HandlerContext,
  HandlerResult,
  HandlerTable,
  MapTarget,
  PipelineContext,
  PipelineStep,
  SkillHandler,
} from './types.js';

export interface ContextDefaults {
  fps: number;
  width: number;
  height: number;
  stillDuration: number;
}

export const DEFAULT_CONTEXT: ContextDefaults = { fps: 25, width: 1920, height: 1080, stillDuration: 4 };

export interface ComposerOptions {
  registry: Registry;
  handlers?: HandlerTable;
  defaults?: Partial<ContextDefaults>;
  binary?: string;
}

export interface ValidationReport {
  valid: boolean;
  issues: string[];
}

/** One compiled position in the flattened pipeline. */
interface Unit {
  /** Label prefix: `s3`, or `s3_2` for the second inner step of step 3. */
  id: string;
  def: SkillDefinition;
  params: Params;
  depth: number;
}

const EXACT_PLACEHOLDER = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/;
const EMBEDDED_PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

// Output flags that take no value.
const STANDALONE_FLAGS = new Set(['-an', '-vn', '-sn', '-dn', '-shortest', '-y', '-n', '-re']);
// Flags that may legitimately repeat.
const REPEATABLE_FLAGS = new Set(['-metadata', '-disposition', '-attach']);

/** `[flag, value?]` groups in order of appearance. */
export function groupFlags(flags: readonly string[]): string[][] {
  const groups: string[][] = [];
  for (let i = 0; i < flags.length; i++) {
    const flag = flags[i] ?? '';
    const next = flags[i + 1];
    if (flag.startsWith('-') && !STANDALONE_FLAGS.has(flag) && next !== undefined) {
      groups.push([flag, next]);
      i += 1;
    } else {
      groups.push([flag]);
    }
  }
  return groups;
}

/**
 * Later occurrences of a flag replace earlier ones, matching how the
 * tool itself treats repeated options. The survivor keeps its own position.
 */
export function dedupeFlags(flags: readonly string[]): string[] {
  const groups = groupFlags(flags);
  const last = new Map<string, number>();
  groups.forEach((group, i) => {
    const flag = group[0] ?? '';
    if (!REPEATABLE_FLAGS.has(flag)) last.set(flag, i);
  });
  return groups
    .filter((group, i) => {
      const flag = group[0] ?? '';
      return REPEATABLE_FLAGS.has(flag) || last.get(flag) === i;
    })
    .flat();
}

/**
 * Parameters for an inner sub-pipeline step. A value that is exactly one
 * placeholder forwards the outer value with its type (or is dropped when the
 * outer parameter is unset); embedded placeholders are substituted as text.
 */
export function resolvePlaceholders(inner: Readonly<Record<string, ParamValue>>, outer: Params): RawParams {
  const raw: RawParams = {};
  for (const [key, value] of Object.entries(inner)) {
    if (typeof value !== 'string') {
      raw[key] = value;
      continue;
    }
    const exact = EXACT_PLACEHOLDER.exec(value);
    if (exact) {
      const forwarded = outer.raw(exact[1] ?? '');
      if (forwarded !== undefined) raw[key] = forwarded;
      continue;
    }
    raw[key] = value.replace(EMBEDDED_PLACEHOLDER, (_m, name: string) => {
      const v = outer.raw(name);
      return v === undefined ? '' : String(v);
    });
  }
  return raw;
}

function templateValue(def: SkillDefinition, params: Params, name: string): FilterPart {
  const value = params.raw(name);
  if (value === undefined) {
    throw new ValidationError(`Skill '${def.name}': template needs parameter '${name}'`, {
      skill: def.name,
      param: name,
    });
  }
  const type = params.spec(name)?.type;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number') return type === 'float' ? float(value) : value;
  return escapeFilterValue(value);
}

function optionValue(def: SkillDefinition, params: Params, name: string): string {
  const value = params.raw(name);
  if (value === undefined) {
    throw new ValidationError(`Skill '${def.name}': option template needs parameter '${name}'`, {
      skill: def.name,
      param: name,
    });
  }
  if (typeof value === 'boolean') return value ? '1' : '0';
  return typeof value === 'number' ? formatNumber(value) : value;
}

export function compileTemplate(
  def: SkillDefinition,
  strategy: Extract<SkillStrategy, { kind: 'template' }>,
  params: Params,
): HandlerResult {
  if (strategy.target === 'output') {
    // Split before substituting so a value can never become extra argv entries.
    const tokens = strategy.template
      .trim()
      .split(/\s+/)
      .map((token) => token.replace(EMBEDDED_PLACEHOLDER, (_m, name: string) => optionValue(def, params, name)));
    return result({ outputFlags: tokens });
  }
  const values: Record<string, FilterPart> = {};
  for (const name of placeholders(strategy.template)) values[name] = templateValue(def, params, name);
  const text = renderTemplate(strategy.template, values);
  return strategy.target === 'audio' ? audio(text) : video(text);
}

function hasSimpleFilters(r: HandlerResult): boolean {
  return r.videoFilters.some((f) => !f.isEmpty) || r.audioFilters.some((f) => !f.isEmpty);
}

export class Composer {
  private readonly registry: Registry;
  private readonly handlers: HandlerTable;
  private readonly defaults: ContextDefaults;
  private readonly binary: string;

  constructor(opts: ComposerOptions) {
    this.registry = opts.registry;
    this.handlers = opts.handlers ?? BUILTIN_HANDLERS;
    this.defaults = { ...DEFAULT_CONTEXT, ...opts.defaults };
    this.binary = opts.binary ?? 'ffmpeg';
  }

  /** Validate paths and fill media facts the caller left out. */
  resolveContext(input: PipelineContextInput): PipelineContext {
    const extras = input.extra_inputs.map((path, i) => {
      const resolved = validatePath(path, 'media');
      const duration = input.extra_durations?.[i];
      return {
        index: i + 1,
        path: resolved,
        kind: input.extra_input_kinds?.[i] ?? classifyMedia(resolved) ?? 'video',
        ...(duration !== undefined ? { duration } : {}),
      };
    });
    return {
      input: validatePath(input.input, 'media'),
      output: validateOutputPath(input.output),
      extras,
      ...(input.duration !== undefined ? { duration: input.duration } : {}),
      fps: input.fps ?? this.defaults.fps,
      width: input.width ?? this.defaults.width,
      height: input.height ?? this.defaults.height,
      hasAudio: input.has_audio ?? true,
      textInputs: input.text_inputs,
      stillDuration: this.defaults.stillDuration,
      overwrite: input.overwrite ?? true,
    };
  }

  compile(request: PipelineRequest): CommandDescriptor {
    const steps: PipelineStep[] = request.steps.map((s) => ({ skill: s.skill, params: s.params }));
    logger.info('compile start', { steps: steps.length, pipeline: jsonHash(steps).slice(0, 12) });
    const context = this.resolveContext(request.context);
    const units = this.expand(steps);
    return this.assemble(units, context);
  }

  /** Every problem in the pipeline, instead of only the first. */
  validate(request: PipelineRequest): ValidationReport {
    const issues: string[] = [];
    request.steps.forEach((step, i) => {
      try {
        this.expandStep({ skill: step.skill, params: { ...step.params } }, `s${i + 1}`, 0, []);
      } catch (err) {
        if (!isCompileError(err)) throw err;
        issues.push(`step ${i + 1} (${step.skill}): ${err.message}`);
      }
    });
    if (!issues.length) {
      try {
        this.compile({ steps: request.steps.map((s) => ({ skill: s.skill, params: { ...s.params } })), context: request.context });
      } catch (err) {
        if (!isCompileError(err)) throw err;
        issues.push(err.message);
      }
    }
    return { valid: issues.length === 0, issues };
  }

  /** Numbered description of what each step does, with normalised parameters. */
  explain(steps: readonly PipelineStep[]): string {
    const units = this.expand(steps.map((s) => ({ skill: s.skill, params: { ...s.params } })), true);
    const lines: string[] = [];
    let top = 0;
    for (const unit of units) {
      const params = unit.params
        .entries()
        .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
        .join(', ');
      const suffix = params ? ` (${params})` : '';
      if (unit.depth === 0) {
        top += 1;
        lines.push(`${top}. ${unit.def.name}: ${unit.def.description}${suffix}`);
      } else {
        lines.push(`${'   '.repeat(unit.depth)}- ${unit.def.name}: ${unit.def.description}${suffix}`);
      }
    }
    return lines.join('\n');
  }

  private expand(steps: readonly PipelineStep[], keepContainers = false): Unit[] {
    const units: Unit[] = [];
    steps.forEach((step, i) => {
      units.push(...this.expandStep(step, `s${i + 1}`, 0, [], keepContainers));
    });
    return units;
  }

  private expandStep(step: PipelineStep, id: string, depth: number, trail: string[], keepContainers = false): Unit[] {
    const def = this.registry.require(step.skill);
    this.registry.assertAcyclic(def.name);
    const params = normalizeParams(def, step.params);
    logger.debug('Expanded step', { step: id, skill: def.name, via: trail.join(' > ') || undefined });

    if (def.strategy.kind !== 'pipeline') return [{ id, def, params, depth }];

    const units: Unit[] = keepContainers ? [{ id, def, params, depth }] : [];
    def.strategy.steps.forEach((call, j) => {
      const inner = { skill: call.skill, params: resolvePlaceholders(call.params, params) };
      units.push(...this.expandStep(inner, `${id}_${j + 1}`, depth + 1, [...trail, def.name], keepContainers));
    });
    return units;
  }

  private handlerFor(unit: Unit): SkillHandler | undefined {
    if (unit.def.strategy.kind !== 'handler') return undefined;
    const handler = this.handlers.get(unit.def.strategy.handler);
    if (!handler) {
      throw new ConfigurationError(`Skill '${unit.def.name}' names unknown handler '${unit.def.strategy.handler}'`, {
        skill: unit.def.name,
      });
    }
    return handler;
  }

  private handlerContext(ctx: PipelineContext, reservedByOthers: ReadonlySet<number>, ownInputs: readonly number[]): HandlerContext {
    return {
      primary: {
        path: ctx.input,
        ...(ctx.duration !== undefined ? { duration: ctx.duration } : {}),
        fps: ctx.fps,
        width: ctx.width,
        height: ctx.height,
        hasAudio: ctx.hasAudio,
      },
      extras: ctx.extras,
      reservedByOthers,
      ownInputs,
      textInputs: ctx.textInputs,
      stillDuration: ctx.stillDuration,
    };
  }

  /**
   * Pre-pass: which unit owns which extra input. Sequence handlers
   * (`reserveLast`) go second and only see what specific claims left free, so
   * two of them wanting the same extra collide here.
   */
  private reserve(units: readonly Unit[], ctx: PipelineContext): Map<string, number[]> {
    const owners = new Map<number, string>();
    const reservations = new Map<string, number[]>();
    const claimants = units.flatMap((unit) => {
      const handler = this.handlerFor(unit);
      return handler?.reserveInputs ? [{ unit, handler }] : [];
    });
    const ordered = [
      ...claimants.filter((c) => !c.handler.reserveLast),
      ...claimants.filter((c) => c.handler.reserveLast),
    ];
    let specific: ReadonlySet<number> | undefined;
    for (const { unit, handler } of ordered) {
      if (handler.reserveLast && specific === undefined) specific = new Set(owners.keys());
      const taken = specific ?? new Set(owners.keys());
      const claimed = handler.reserveInputs?.(unit.params, this.handlerContext(ctx, taken, [])) ?? [];
      for (const index of claimed) {
        const owner = owners.get(index);
        if (owner !== undefined) {
          throw new ValidationError(`Extra input ${index} is used by both '${owner}' and '${unit.def.name}'`, {
            skill: unit.def.name,
            param: 'input',
            hint: 'give each multi-input step its own extra input',
          });
        }
        owners.set(index, unit.def.name);
      }
      reservations.set(unit.id, claimed);
    }
    return reservations;
  }

  private compileUnit(unit: Unit, ctx: HandlerContext): HandlerResult {
    const strategy = unit.def.strategy;
    if (strategy.kind === 'template') return compileTemplate(unit.def, strategy, unit.params);
    const handler = this.handlerFor(unit);
    if (!handler) {
      throw new CompileInvariantViolation(`sub-pipeline '${unit.def.name}' reached the compile pass unexpanded`);
    }
    return handler.compile(unit.params, ctx);
  }

  private assemble(units: readonly Unit[], ctx: PipelineContext): CommandDescriptor {
    const reservations = this.reserve(units, ctx);
    const allReserved = [...reservations.values()].flat();
    const merger = new GraphMerger();
    const inputFlags: string[] = [];
    const outputFlags: string[] = [];
    const warnings: string[] = [];
    let explicitMaps: { maps: MapTarget[]; skill: string } | undefined;
    let producedAudio = false;
    let audioReplaced = false;

    for (const unit of units) {
      const own = reservations.get(unit.id) ?? [];
      const others = new Set(allReserved.filter((i) => !own.includes(i)));
      let r: HandlerResult;
      try {
        r = this.compileUnit(unit, this.handlerContext(ctx, others, own));
      } catch (err) {
        if (isCompileError(err)) throw err;
        throw new CompileInvariantViolation(`handler for '${unit.def.name}' failed: ${errorMessage(err)}`, {
          skill: unit.def.name,
        });
      }

      if (r.graph?.nodes.length) {
        if (hasSimpleFilters(r)) {
          throw new CompileInvariantViolation(`Skill '${unit.def.name}' returned both a graph fragment and simple filters`, {
            skill: unit.def.name,
          });
        }
        merger.addFragment(unit.id, r.graph);
        producedAudio ||= r.graph.audio !== undefined;
      } else {
        merger.addChains(r.videoFilters, r.audioFilters);
        producedAudio ||= r.audioFilters.some((f) => !f.isEmpty);
      }
      if (r.audioSource !== undefined) {
        if (!merger.replaceAudioSource(r.audioSource)) {
          warnings.push(`audio processed before '${unit.def.name}' is discarded`);
        }
        audioReplaced = true;
      }
      inputFlags.push(...r.inputFlags);
      outputFlags.push(...r.outputFlags);
      if (r.maps) {
        if (explicitMaps) {
          warnings.push(`stream mapping from '${explicitMaps.skill}' replaced by '${unit.def.name}'`);
        }
        explicitMaps = { maps: r.maps, skill: unit.def.name };
      }
    }

    const finalOutputFlags = dedupeFlags(outputFlags);
    const audioDisabled = finalOutputFlags.includes('-an');
    const keepAudio = (ctx.hasAudio || audioReplaced) && !audioDisabled;
    if (!keepAudio && producedAudio) {
      const reason = audioDisabled ? 'audio output is disabled (-an)' : 'the input has no audio';
      warnings.push(`audio filters discarded: ${reason}`);
      logger.warn('Discarding audio filters', { reason });
    }

    const merged = merger.finalize({ keepAudio });
    const maps = explicitMaps
      ? explicitMaps.maps
          .filter((m) => keepAudio || m.kind !== 'main' || m.media !== 'a')
          .map((m) => this.renderMap(m, merged))
      : this.defaultMaps(merged, keepAudio);
    if (new Set(maps).size !== maps.length) {
      throw new CompileInvariantViolation(`duplicate stream specifier in mapping list: ${maps.join(' ')}`);
    }
    for (const ref of [merged.video, merged.audio]) {
      if (ref.kind === 'label' && !maps.includes(mapText(ref))) {
        throw new CompileInvariantViolation(`filter graph output [${ref.name}] is missing from the mapping list`, {
          ...(explicitMaps ? { skill: explicitMaps.skill } : {}),
        });
      }
    }

    for (const warning of warnings) logger.warn(warning);
    logger.debug('compile done', { units: units.length, graph: merged.graphMode, maps: maps.length });

    return {
      binary: this.binary,
      globalFlags: ctx.overwrite ? ['-y'] : ['-n'],
      inputs: [
        { path: ctx.input, flags: dedupeFlags(inputFlags) },
        ...ctx.extras.map((e) => ({ path: e.path, flags: [] })),
      ],
      filter: merged.clause,
      outputFlags: finalOutputFlags,
      maps,
      output: ctx.output,
      warnings,
    };
  }

  private renderMap(target: MapTarget, merged: MergedFilters): string {
    if (target.kind === 'main') return mapText(target.media === 'v' ? merged.video : merged.audio);
    if (target.kind === 'subtitle') return `${target.index}:s:${target.track}`;
    return `${target.index}:${target.media}${target.optional ? '?' : ''}`;
  }

  private defaultMaps(merged: MergedFilters, keepAudio: boolean): string[] {
    if (!merged.graphMode) return [];
    const maps = [mapText(merged.video)];
    if (keepAudio) maps.push(merged.audio.kind === 'label' ? mapText(merged.audio) : '0:a?');
    return maps;
  }
}
