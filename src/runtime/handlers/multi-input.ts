/**
 * Handlers that combine the main stream with extra inputs. Every one of them
 * emits a graph fragment; the main video enters as the symbolic main pad so
 * that earlier simple filters are folded in first.
 */
import { EMPTY, filter, float, formatFloat, joinFilters, type SafeText } from '../../security/escape.js';
import { ValidationError } from '../../shared/errors.js';
import type { Params } from '../../skills/params.js';
import type { ExtraInput, HandlerContext, HandlerResult, Pad, SkillHandler } from '../types.js';
import { claimExtra, claimExtras, freeExtras, ownExtra, requestedInput, segmentDuration } from './inputs.js';
import { FragmentBuilder, MAIN_AUDIO, MAIN_VIDEO, input, label, result } from './result.js';

const VISUAL_SOURCES = ['video', 'image'] as const;
const CORNER_CYCLE = ['top_left', 'top_right', 'bottom_right', 'bottom_left'] as const;

interface Segment {
  pad: Pad;
  /** Stills are looped into a finite clip. */
  still: boolean;
  extra?: ExtraInput;
}

interface Canvas {
  width: number;
  height: number;
  fps: number;
  background: SafeText;
}

/** Sequence skills own every visual extra no specific step claimed. */
const sequenceInputs: Pick<SkillHandler, 'reserveLast' | 'reserveInputs'> = {
  reserveLast: true,
  reserveInputs: (_p, ctx) => freeExtras(ctx, VISUAL_SOURCES).map((e) => e.index),
};

function segments(ctx: HandlerContext, includeMain: boolean): Segment[] {
  const list: Segment[] = includeMain ? [{ pad: MAIN_VIDEO, still: false }] : [];
  for (const index of ctx.ownInputs) {
    const extra = ctx.extras.find((e) => e.index === index);
    if (extra) list.push({ pad: input(extra.index, 'v'), still: extra.kind === 'image', extra });
  }
  return list;
}

function requireSegments(skill: string, list: Segment[], min: number): void {
  if (list.length < min) {
    throw new ValidationError(`Skill '${skill}' needs at least ${min} visual inputs (got ${list.length})`, {
      skill,
      hint: 'add video or image files to the pipeline context extra inputs',
    });
  }
}

function fitToCanvas(c: Canvas): SafeText {
  return filter`scale=${c.width}:${c.height}:force_original_aspect_ratio=decrease,pad=${c.width}:${c.height}:(ow-iw)/2:(oh-ih)/2:${c.background},setsar=1`;
}

/** Still image held for `seconds`, then fitted; video fitted and retimed. */
function prepareSegment(seg: Segment, c: Canvas, seconds: number, retime: SafeText): SafeText {
  if (seg.still) {
    const frames = Math.trunc(seconds * c.fps);
    return filter`loop=loop=${frames}:size=1:start=0,setpts=N/${c.fps}/TB,${fitToCanvas(c)}`;
  }
  return filter`${fitToCanvas(c)}${retime}`;
}

function canvas(p: Params, ctx: HandlerContext, widthParam = 'width', heightParam = 'height'): Canvas {
  return {
    width: p.int(widthParam, ctx.primary.width),
    height: p.int(heightParam, ctx.primary.height),
    fps: ctx.primary.fps,
    background: p.has('background') ? p.text('background') : filter`black`,
  };
}

/** Audio for one sequence segment: the stream's own track, or silence for stills. */
function segmentAudio(g: FragmentBuilder, seg: Segment, i: number, seconds: number): string {
  const name = `a${i}`;
  if (seg.still) {
    g.node([], filter`anullsrc=r=44100:cl=stereo,atrim=0:${float(seconds)},asetpts=PTS-STARTPTS`, [name]);
  } else {
    const source = seg.extra ? input(seg.extra.index, 'a') : MAIN_AUDIO;
    g.node([source], filter`aresample=44100,asetpts=PTS-STARTPTS`, [name]);
  }
  return name;
}

const concat: SkillHandler = {
  ...sequenceInputs,
  compile(p, ctx) {
    const list = segments(ctx, true);
    requireSegments('concat', list, 2);
    const c = canvas(p, ctx);
    const still = p.float('still_duration', ctx.stillDuration);
    const withAudio = ctx.primary.hasAudio;
    const g = new FragmentBuilder();
    const labels: string[] = [];
    list.forEach((seg, i) => {
      g.node([seg.pad], prepareSegment(seg, c, still, filter`,setpts=PTS-STARTPTS,fps=${c.fps}`), [`v${i}`]);
      labels.push(`v${i}`);
      if (withAudio) labels.push(segmentAudio(g, seg, i, still));
    });
    const outputs = withAudio ? ['outv', 'outa'] : ['outv'];
    g.node(labels.map(label), filter`concat=n=${list.length}:v=1:a=${withAudio ? 1 : 0}`, outputs);
    return result({ graph: g.build(withAudio ? { video: 'outv', audio: 'outa' } : { video: 'outv' }) });
  },
};

/** Offsets accumulate: each transition starts `duration` before the running end. */
export function xfadeOffsets(durations: readonly number[], transition: number): number[] {
  const offsets: number[] = [];
  let cumulative = durations[0] ?? 0;
  for (let i = 1; i < durations.length; i++) {
    offsets.push(Math.max(0, cumulative - transition));
    cumulative += (durations[i] ?? 0) - transition;
  }
  return offsets;
}

const xfade: SkillHandler = {
  ...sequenceInputs,
  compile(p, ctx) {
    const list = segments(ctx, true);
    requireSegments('xfade', list, 2);
    const c = canvas(p, ctx);
    const d = p.float('duration');
    const still = p.float('still_duration', ctx.stillDuration);
    const transition = p.text('transition');
    const durations = list.map((seg) =>
      seg.extra ? segmentDuration(ctx, seg.extra, still) : (ctx.primary.duration ?? still),
    );
    const offsets = xfadeOffsets(durations, d);

    const g = new FragmentBuilder();
    list.forEach((seg, i) => {
      g.node([seg.pad], prepareSegment(seg, c, still, filter`,fps=${c.fps}`), [`v${i}`]);
    });
    let prev = 'v0';
    offsets.forEach((offset, k) => {
      const out = `x${k + 1}`;
      g.node([prev, `v${k + 1}`], filter`xfade=transition=${transition}:duration=${float(d)}:offset=${float(offset)}`, [out]);
      prev = out;
    });

    // Crossfade audio only when at least two segments carry sound.
    const audible = list.filter((seg) => !seg.still);
    if (!ctx.primary.hasAudio || audible.length < 2) {
      return result({ graph: g.build({ video: prev }) });
    }
    audible.forEach((seg, i) => {
      const source = seg.extra ? input(seg.extra.index, 'a') : MAIN_AUDIO;
      g.node([source], filter`aresample=44100,asetpts=PTS-STARTPTS`, [`a${i}`]);
    });
    let prevAudio = 'a0';
    for (let i = 1; i < audible.length; i++) {
      const out = `ax${i}`;
      g.node([prevAudio, `a${i}`], filter`acrossfade=d=${float(d)}:c1=tri:c2=tri`, [out]);
      prevAudio = out;
    }
    return result({ graph: g.build({ video: prev, audio: prevAudio }) });
  },
};

const grid: SkillHandler = {
  ...sequenceInputs,
  compile(p, ctx) {
    const list = segments(ctx, p.bool('include_video'));
    requireSegments('grid', list, 2);
    const columns = p.int('columns');
    const gap = p.int('gap');
    const duration = p.float('duration');
    const c = canvas(p, ctx, 'cell_width', 'cell_height');
    const g = new FragmentBuilder();
    const layout: SafeText[] = [];
    list.forEach((seg, i) => {
      g.node([seg.pad], prepareSegment(seg, c, duration, filter`,fps=${c.fps}`), [`g${i}`]);
      // xstack wants literal pixel offsets
      layout.push(filter`${(i % columns) * (c.width + gap)}_${Math.floor(i / columns) * (c.height + gap)}`);
    });
    g.node(
      list.map((_, i) => label(`g${i}`)),
      filter`xstack=inputs=${list.length}:layout=${joinFilters(layout, '|')}:fill=${c.background}`,
      ['out'],
    );
    return result({ graph: g.build({ video: 'out' }), outputFlags: ['-t', formatFloat(duration)] });
  },
};

const slideshow: SkillHandler = {
  ...sequenceInputs,
  compile(p, ctx) {
    const list = segments(ctx, p.bool('include_video'));
    requireSegments('slideshow', list, 1);
    const c = canvas(p, ctx);
    const hold = p.float('duration_per_image');
    const fade = p.choice('transition') === 'fade' && list.length > 1;
    const fadeLength = p.float('transition_duration');
    if (fade && fadeLength >= hold) {
      throw new ValidationError(
        `Skill 'slideshow': transition_duration (${fadeLength}) must be shorter than duration_per_image (${hold})`,
        { skill: 'slideshow', param: 'transition_duration' },
      );
    }
    const g = new FragmentBuilder();
    list.forEach((seg, i) => {
      let chain = prepareSegment(seg, c, hold, filter`,setpts=PTS-STARTPTS,fps=${c.fps}`);
      if (fade && i > 0) chain = filter`${chain},fade=t=in:st=0:d=${float(fadeLength)}`;
      // A video's length is unknown here; the next slide's fade-in covers the cut.
      if (fade && i < list.length - 1 && seg.still) {
        chain = filter`${chain},fade=t=out:st=${float(hold - fadeLength)}:d=${float(fadeLength)}`;
      }
      g.node([seg.pad], chain, [`s${i}`]);
    });
    g.node(
      list.map((_, i) => label(`s${i}`)),
      filter`concat=n=${list.length}:v=1:a=0`,
      ['out'],
    );
    return result({ graph: g.build({ video: 'out' }) });
  },
};

function corner(position: string, m: number): SafeText {
  switch (position) {
    case 'top_left':
      return filter`${m}:${m}`;
    case 'top_right':
      return filter`W-w-${m}:${m}`;
    case 'bottom_left':
      return filter`${m}:H-h-${m}`;
    case 'center':
      return filter`(W-w)/2:(H-h)/2`;
    default:
      return filter`W-w-${m}:H-h-${m}`;
  }
}

function cornerFor(position: string, i: number, count: number): string {
  if (count === 1) return position;
  const start = Math.max(0, CORNER_CYCLE.findIndex((c) => c === position));
  return CORNER_CYCLE[(start + i) % CORNER_CYCLE.length] ?? position;
}

function reserveOverlays(skill: string) {
  return (p: Params, ctx: HandlerContext): number[] => {
    const requested = requestedInput(p);
    if (requested !== undefined) return [claimExtra(ctx, skill, VISUAL_SOURCES, requested)];
    return claimExtras(ctx, skill, VISUAL_SOURCES, p.int('count'));
  };
}

function overlayImages(p: Params, ctx: HandlerContext): HandlerResult {
  const scale = p.float('scale');
  const opacity = p.float('opacity');
  const margin = p.int('margin');
  const position = p.choice('position');
  const sources = ctx.ownInputs;
  const g = new FragmentBuilder();
  let prev: Pad = MAIN_VIDEO;
  sources.forEach((index, i) => {
    const fade = opacity < 1 ? filter`,colorchannelmixer=aa=${float(opacity)}` : EMPTY;
    g.node([input(index, 'v')], filter`format=rgba,scale=iw*${float(scale)}:ih*${float(scale)}${fade}`, [`ovl${i}`]);
    const out = i === sources.length - 1 ? 'out' : `tmp${i}`;
    const xy = corner(cornerFor(position, i, sources.length), margin);
    g.node([prev, label(`ovl${i}`)], filter`overlay=${xy}`, [out]);
    prev = label(out);
  });
  return result({ graph: g.build({ video: 'out' }) });
}

const overlayImage: SkillHandler = {
  reserveInputs: reserveOverlays('overlay_image'),
  compile: overlayImages,
};

const watermark: SkillHandler = {
  reserveInputs: reserveOverlays('watermark'),
  compile: overlayImages,
};

const splitScreen: SkillHandler = {
  ...sequenceInputs,
  compile(p, ctx) {
    const list = segments(ctx, true);
    requireSegments('split_screen', list, 2);
    const duration = p.float('duration');
    const c = canvas(p, ctx);
    const g = new FragmentBuilder();
    list.forEach((seg, i) => {
      g.node([seg.pad], prepareSegment(seg, c, duration > 0 ? duration : ctx.stillDuration, filter``), [`c${i}`]);
    });
    const stack = p.choice('layout') === 'vertical' ? filter`vstack` : filter`hstack`;
    g.node(
      list.map((_, i) => label(`c${i}`)),
      filter`${stack}=inputs=${list.length}`,
      ['out'],
    );
    return result({
      graph: g.build({ video: 'out' }),
      outputFlags: duration > 0 ? ['-t', formatFloat(duration)] : [],
    });
  },
};

function pipPosition(position: string, m: number): SafeText {
  switch (position) {
    case 'bottom_left':
      return filter`${m}:main_h-overlay_h-${m}`;
    case 'top_right':
      return filter`main_w-overlay_w-${m}:${m}`;
    case 'top_left':
      return filter`${m}:${m}`;
    case 'center':
      return filter`(main_w-overlay_w)/2:(main_h-overlay_h)/2`;
    default:
      return filter`main_w-overlay_w-${m}:main_h-overlay_h-${m}`;
  }
}

const pip: SkillHandler = {
  reserveInputs(p, ctx) {
    const requested = requestedInput(p);
    if (requested !== undefined) return [claimExtra(ctx, 'pip', VISUAL_SOURCES, requested)];
    const videos = freeExtras(ctx, ['video']);
    return [videos[0]?.index ?? claimExtra(ctx, 'pip', VISUAL_SOURCES)];
  },
  compile(p, ctx) {
    const index = ownExtra(ctx, 'pip').index;
    const g = new FragmentBuilder()
      .node([input(index, 'v')], filter`scale=iw*${float(p.float('scale'))}:-1`, ['pip'])
      .node([MAIN_VIDEO, label('pip')], filter`overlay=${pipPosition(p.choice('position'), p.int('margin'))}:shortest=1`, ['out']);
    return result({ graph: g.build({ video: 'out' }) });
  },
};

/** Double exposure: an extra input scaled to the canvas and blended over the main video. */
const blend: SkillHandler = {
  reserveInputs(p, ctx) {
    return [claimExtra(ctx, 'blend', VISUAL_SOURCES, requestedInput(p))];
  },
  compile(p, ctx) {
    const extra = ownExtra(ctx, 'blend');
    const layer = extra.kind === 'image' ? filter`loop=loop=-1:size=1:start=0,` : EMPTY;
    const g = new FragmentBuilder()
      .node([input(extra.index, 'v')], filter`${layer}scale=${ctx.primary.width}:${ctx.primary.height},setsar=1`, ['top'])
      .node(
        [MAIN_VIDEO, label('top')],
        filter`blend=all_mode=${p.text('mode')}:all_opacity=${float(p.float('opacity'))}:shortest=1`,
        ['out'],
      );
    return result({ graph: g.build({ video: 'out' }) });
  },
};

export const MULTI_INPUT_HANDLERS: Record<string, SkillHandler> = {
  concat,
  xfade,
  grid,
  slideshow,
  overlay_image: overlayImage,
  watermark,
  split_screen: splitScreen,
  pip,
  blend,
};
