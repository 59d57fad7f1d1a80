/**
 * Merge engine for per-step results.
 *
 * Simple filters accumulate into one video chain and one audio chain. The
 * first graph fragment flips the merger into graph mode for good: pending
 * chains are folded onto the running main streams as numbered nodes
 * (`v0`, `a0`, ...) and every fragment label is renamed with its step prefix.
 */
import { joinFilters, type SafeText } from '../security/escape.js';
import { CompileInvariantViolation } from '../shared/errors.js';
import type { FilterClause, GraphFragment, Media, Pad } from './types.js';

export type MergeMode = 'accumulating' | 'chain' | 'graph' | 'finalized';

export type StreamRef = { kind: 'stream'; spec: string } | { kind: 'label'; name: string };

export interface MergedFilters {
  clause: FilterClause;
  graphMode: boolean;
  video: StreamRef;
  audio: StreamRef;
}

const MEDIA: readonly Media[] = ['v', 'a'];

export function padText(ref: StreamRef): string {
  return ref.kind === 'stream' ? `[${ref.spec}]` : `[${ref.name}]`;
}

/** `-map` argument for a stream reference. */
export function mapText(ref: StreamRef): string {
  return ref.kind === 'stream' ? ref.spec : `[${ref.name}]`;
}

export class GraphMerger {
  private mode: MergeMode = 'accumulating';
  private pending: Record<Media, SafeText[]> = { v: [], a: [] };
  private readonly main: Record<Media, StreamRef> = {
    v: { kind: 'stream', spec: '0:v' },
    a: { kind: 'stream', spec: '0:a' },
  };
  private readonly nodes: string[] = [];
  private readonly produced = new Set<string>();
  private readonly consumed = new Set<string>();
  private readonly counters: Record<Media, number> = { v: 0, a: 0 };

  get state(): MergeMode {
    return this.mode;
  }

  addChains(videoFilters: readonly SafeText[], audioFilters: readonly SafeText[]): void {
    this.assertOpen();
    const video = videoFilters.filter((f) => !f.isEmpty);
    const audio = audioFilters.filter((f) => !f.isEmpty);
    if (!video.length && !audio.length) return;
    if (this.mode === 'accumulating') this.mode = 'chain';
    this.pending.v.push(...video);
    this.pending.a.push(...audio);
  }

  addFragment(prefix: string, fragment: GraphFragment): void {
    this.assertOpen();
    if (!fragment.nodes.length) return;
    this.mode = 'graph';

    const reads = (media: Media): boolean =>
      fragment.nodes.some((n) => n.inputs.some((p) => p.kind === 'main' && p.media === media));
    const replaces = (media: Media): boolean => (media === 'v' ? fragment.video : fragment.audio) !== undefined;
    for (const media of MEDIA) {
      if (reads(media) || replaces(media)) this.fold(media);
    }

    const local = new Map<string, string>();
    for (const node of fragment.nodes) {
      for (const out of node.outputs) {
        if (local.has(out)) {
          throw new CompileInvariantViolation(`step ${prefix} produces label '${out}' twice`);
        }
        local.set(out, `${prefix}_${out}`);
      }
    }

    const resolve = (pad: Pad): StreamRef => {
      switch (pad.kind) {
        case 'main':
          return this.main[pad.media];
        case 'input':
          return { kind: 'stream', spec: `${pad.index}:${pad.media}` };
        case 'label': {
          const name = local.get(pad.name);
          if (name === undefined) {
            throw new CompileInvariantViolation(`step ${prefix} reads undeclared label '${pad.name}'`);
          }
          return { kind: 'label', name };
        }
      }
    };

    for (const node of fragment.nodes) {
      const inputs = node.inputs.map(resolve);
      for (const ref of inputs) {
        if (ref.kind === 'label') this.consume(ref.name);
      }
      const outputs = node.outputs.map((out) => local.get(out) ?? out);
      for (const name of outputs) this.produce(name);
      this.nodes.push(inputs.map(padText).join('') + node.filter.text + outputs.map((o) => `[${o}]`).join(''));
    }

    for (const media of MEDIA) {
      const out = media === 'v' ? fragment.video : fragment.audio;
      if (out !== undefined) {
        const name = local.get(out);
        if (name === undefined) {
          throw new CompileInvariantViolation(`step ${prefix} declares unknown output label '${out}'`);
        }
        const previous = this.main[media];
        if (!reads(media) && previous.kind === 'label') {
          // The replaced stream still needs a consumer.
          this.consume(previous.name);
          this.nodes.push(`${padText(previous)}${media === 'v' ? 'nullsink' : 'anullsink'}`);
        }
        this.main[media] = { kind: 'label', name };
      } else if (reads(media) && this.main[media].kind === 'label') {
        throw new CompileInvariantViolation(`step ${prefix} consumed the main ${media === 'v' ? 'video' : 'audio'} stream without replacing it`);
      }
    }
  }

  /**
   * Make an input's audio the main audio stream. Pending simple filters carry
   * over to it; audio already routed through the graph is sunk. Returns false
   * when that happened.
   */
  replaceAudioSource(index: number): boolean {
    this.assertOpen();
    const previous = this.main.a;
    this.main.a = { kind: 'stream', spec: `${index}:a` };
    if (previous.kind !== 'label') return true;
    this.consume(previous.name);
    this.nodes.push(`${padText(previous)}anullsink`);
    return false;
  }

  finalize(opts: { keepAudio: boolean }): MergedFilters {
    this.assertOpen();
    if (!opts.keepAudio) this.pending.a = [];

    let clause: FilterClause;
    const graphMode = this.mode === 'graph';
    if (graphMode) {
      this.fold('v');
      this.fold('a');
      const routedAudio = this.main.a;
      if (!opts.keepAudio && routedAudio.kind === 'label') {
        this.consume(routedAudio.name);
        this.nodes.push(`${padText(routedAudio)}anullsink`);
        this.main.a = { kind: 'stream', spec: '0:a' };
      }
      const finals = new Set(MEDIA.map((m) => this.main[m]).flatMap((r) => (r.kind === 'label' ? [r.name] : [])));
      for (const name of this.produced) {
        if (!this.consumed.has(name) && !finals.has(name)) {
          throw new CompileInvariantViolation(`filter graph label '${name}' is never consumed`);
        }
      }
      clause = { kind: 'graph', graph: this.nodes.join(';') };
    } else {
      const video = this.pending.v.length ? joinFilters(this.pending.v).text : undefined;
      const audio = this.pending.a.length ? joinFilters(this.pending.a).text : undefined;
      clause =
        video === undefined && audio === undefined
          ? { kind: 'none' }
          : {
              kind: 'chain',
              ...(video !== undefined ? { video } : {}),
              ...(audio !== undefined ? { audio } : {}),
            };
    }

    this.mode = 'finalized';
    return { clause, graphMode, video: this.main.v, audio: this.main.a };
  }

  private fold(media: Media): void {
    const filters = this.pending[media];
    if (!filters.length) return;
    const name = `${media}${this.counters[media]++}`;
    const source = this.main[media];
    if (source.kind === 'label') this.consume(source.name);
    this.produce(name);
    this.nodes.push(`${padText(source)}${joinFilters(filters).text}[${name}]`);
    this.main[media] = { kind: 'label', name };
    this.pending[media] = [];
  }

  private produce(name: string): void {
    if (this.produced.has(name)) {
      throw new CompileInvariantViolation(`filter graph label '${name}' is produced twice`);
    }
    this.produced.add(name);
  }

  private consume(name: string): void {
    if (this.consumed.has(name)) {
      throw new CompileInvariantViolation(`filter graph label '${name}' is consumed twice`);
    }
    this.consumed.add(name);
  }

  private assertOpen(): void {
    if (this.mode === 'finalized') {
      throw new CompileInvariantViolation('merger is finalized; no further steps may be added');
    }
  }
}
