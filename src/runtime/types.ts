import type { MediaKind } from '../security/paths.js';
import type { SafeText } from '../security/escape.js';
import type { Params } from '../skills/params.js';
import type { RawParams } from '../skills/types.js';

export interface PipelineStep {
  skill: string;
  params: RawParams;
}

export interface ExtraInput {
  /** Position on the command line; the primary input is 0. */
  index: number;
  path: string;
  kind: MediaKind;
  /** Known duration in seconds, when the caller supplied one. */
  duration?: number;
}

/** Resolved, validated per-request context. */
export interface PipelineContext {
  input: string;
  output: string;
  extras: ExtraInput[];
  duration?: number;
  fps: number;
  width: number;
  height: number;
  hasAudio: boolean;
  textInputs: string[];
  stillDuration: number;
  overwrite: boolean;
}

export interface Pipeline {
  steps: PipelineStep[];
  context: PipelineContext;
}

// ── Handler IR ────────────────────────────────────────────────────────

export type Media = 'v' | 'a';

/**
 * A filter pad as a handler sees it. `main` is the running main stream at
 * the point the step runs; `label` names are local to the fragment.
 */
export type Pad =
  | { kind: 'main'; media: Media }
  | { kind: 'input'; index: number; media: Media }
  | { kind: 'label'; name: string };

export interface GraphNode {
  inputs: Pad[];
  filter: SafeText;
  outputs: string[];
}

export interface GraphFragment {
  nodes: GraphNode[];
  /** Local label that becomes the new main video stream. */
  video?: string;
  /** Local label that becomes the new main audio stream. */
  audio?: string;
}

export type MapTarget =
  | { kind: 'main'; media: Media }
  | { kind: 'input'; index: number; media: Media; optional?: boolean }
  | { kind: 'subtitle'; index: number; track: number };

export interface HandlerResult {
  videoFilters: SafeText[];
  audioFilters: SafeText[];
  outputFlags: string[];
  inputFlags: string[];
  graph?: GraphFragment;
  maps?: MapTarget[];
  /** Extra input whose audio becomes the main audio stream from this step on. */
  audioSource?: number;
}

/** What a handler may read about the request. */
export interface HandlerContext {
  readonly primary: {
    readonly path: string;
    readonly duration?: number;
    readonly fps: number;
    readonly width: number;
    readonly height: number;
    readonly hasAudio: boolean;
  };
  readonly extras: readonly ExtraInput[];
  /** Extra input indices claimed by other steps. */
  readonly reservedByOthers: ReadonlySet<number>;
  /** Indices this step reserved in the pre-pass. */
  readonly ownInputs: readonly number[];
  readonly textInputs: readonly string[];
  readonly stillDuration: number;
}

export interface SkillHandler {
  compile(params: Params, ctx: HandlerContext): HandlerResult;
  /** Extra input indices this step consumes exclusively. */
  reserveInputs?(params: Params, ctx: HandlerContext): number[];
  /**
   * Reserve after every other step: the handler takes the extras the rest of
   * the pipeline leaves over.
   */
  readonly reserveLast?: boolean;
}

export type HandlerTable = ReadonlyMap<string, SkillHandler>;

// ── Compiled artifact ─────────────────────────────────────────────────

export interface CommandInput {
  path: string;
  flags: string[];
}

export type FilterClause =
  | { kind: 'none' }
  | { kind: 'chain'; video?: string; audio?: string }
  | { kind: 'graph'; graph: string };

export interface CommandDescriptor {
  binary: string;
  globalFlags: string[];
  inputs: CommandInput[];
  filter: FilterClause;
  outputFlags: string[];
  maps: string[];
  output: string;
  warnings: string[];
}
