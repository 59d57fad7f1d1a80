import type { SafeText } from '../../security/escape.js';
import type { GraphFragment, GraphNode, HandlerResult, MapTarget, Media, Pad } from '../types.js';

export function result(partial: Partial<HandlerResult> = {}): HandlerResult {
  return {
    videoFilters: partial.videoFilters ?? [],
    audioFilters: partial.audioFilters ?? [],
    outputFlags: partial.outputFlags ?? [],
    inputFlags: partial.inputFlags ?? [],
    ...(partial.graph ? { graph: partial.graph } : {}),
    ...(partial.maps ? { maps: partial.maps } : {}),
    ...(partial.audioSource !== undefined ? { audioSource: partial.audioSource } : {}),
  };
}

export const video = (...filters: SafeText[]): HandlerResult => result({ videoFilters: filters });
export const audio = (...filters: SafeText[]): HandlerResult => result({ audioFilters: filters });
export const outputFlags = (...flags: string[]): HandlerResult => result({ outputFlags: flags });

export const MAIN_VIDEO: Pad = { kind: 'main', media: 'v' };
export const MAIN_AUDIO: Pad = { kind: 'main', media: 'a' };

export function input(index: number, media: Media): Pad {
  return { kind: 'input', index, media };
}

export function label(name: string): Pad {
  return { kind: 'label', name };
}

export function mapInput(index: number, media: Media, optional = false): MapTarget {
  return optional ? { kind: 'input', index, media, optional } : { kind: 'input', index, media };
}

export function mapSubtitle(index: number, track: number): MapTarget {
  return { kind: 'subtitle', index, track };
}

export const MAP_MAIN_VIDEO: MapTarget = { kind: 'main', media: 'v' };
export const MAP_MAIN_AUDIO: MapTarget = { kind: 'main', media: 'a' };

/** Collects the nodes of one self-scoped fragment. */
export class FragmentBuilder {
  private readonly nodes: GraphNode[] = [];

  node(inputs: Array<Pad | string>, filter: SafeText, outputs: string[]): this {
    this.nodes.push({
      inputs: inputs.map((p) => (typeof p === 'string' ? label(p) : p)),
      filter,
      outputs,
    });
    return this;
  }

  get size(): number {
    return this.nodes.length;
  }

  build(outputs: { video?: string; audio?: string }): GraphFragment {
    return { nodes: [...this.nodes], ...outputs };
  }
}
