import { EMPTY, escapeFilterValue, filter, fixed, float, type SafeText } from '../../security/escape.js';
import { validatePath } from '../../security/paths.js';
import type { Params } from '../../skills/params.js';
import { ValidationError } from '../../shared/errors.js';
import type { HandlerContext, HandlerResult, SkillHandler } from '../types.js';
import { FragmentBuilder, MAIN_VIDEO, result, video } from './result.js';

const DENOISE: Record<string, SafeText> = {
  light: filter`hqdn3d=2:2:3:3`,
  medium: filter`hqdn3d=4:3:6:4`,
  strong: filter`hqdn3d=6:4:9:6`,
};

const GRADES: Record<string, SafeText> = {
  teal_orange: filter`eq=saturation=1.3:contrast=1.1,hue=h=-10`,
  warm: filter`eq=saturation=1.15:contrast=1.05,colorbalance=rs=0.1:gs=0.05:bs=-0.1`,
  cool: filter`eq=saturation=1.1:contrast=1.05,colorbalance=rs=-0.1:gs=0.0:bs=0.15`,
  desaturated: filter`eq=saturation=0.6:contrast=1.2:brightness=0.02`,
  high_contrast: filter`eq=contrast=1.4:saturation=1.15:brightness=-0.05`,
};

const MONOCHROME: Record<string, { cb: number; cr: number }> = {
  neutral: { cb: 0, cr: 0 },
  warm: { cb: -0.1, cr: 0.2 },
  cool: { cb: 0.2, cr: -0.1 },
  sepia_tone: { cb: -0.2, cr: 0.15 },
  blue_tone: { cb: 0.3, cr: -0.05 },
  green_tone: { cb: 0.1, cr: -0.2 },
};

const SKETCH: Record<string, SafeText> = {
  pencil: filter`edgedetect=low=0.1:high=0.3,negate`,
  ink: filter`edgedetect=low=0.08:high=0.4,negate`,
  color: filter`edgedetect=low=0.1:high=0.3:mode=colormix`,
};

const PALETTES: Record<string, SafeText> = {
  heat: filter`pseudocolor=c0='if(lt(val,128),val*2,255)':c1='if(lt(val,128),0,(val-128)*2)':c2='if(lt(val,64),255-val*4,0)'`,
  thermal: filter`pseudocolor=c0='if(lt(val,85),0,if(lt(val,170),(val-85)*3,255))':c1='if(lt(val,85),val*3,if(lt(val,170),255,255-(val-170)*3))':c2='if(lt(val,85),255,if(lt(val,170),255-(val-85)*3,0))'`,
  electric: filter`pseudocolor=c0='if(lt(val,128),0,(val-128)*2)':c1='val':c2='255-val'`,
  blues: filter`pseudocolor=c0='val/3':c1='val/2':c2='val'`,
  rainbow: filter`pseudocolor=preset=spectral`,
};

const CHANNEL_SWAPS: Record<string, SafeText> = {
  swap_rb: filter`colorchannelmixer=rr=0:rb=1:br=1:bb=0`,
  swap_rg: filter`colorchannelmixer=rr=0:rg=1:gr=1:gg=0`,
  swap_gb: filter`colorchannelmixer=gg=0:gb=1:bg=1:bb=0`,
  nightvision: filter`colorchannelmixer=rr=0.2:rg=0.4:rb=0.1:gr=0.3:gg=0.9:gb=0.2:br=0.1:bg=0.2:bb=0.1`,
  matrix: filter`colorchannelmixer=rr=0.1:rg=0.3:rb=0:gr=0.2:gg=1:gb=0.1:br=0:bg=0.2:bb=0.1`,
};

const SEPIA_MATRIX: ReadonlyArray<readonly [number, number, number]> = [
  [0.393, 0.769, 0.189],
  [0.349, 0.686, 0.168],
  [0.272, 0.534, 0.131],
];

interface ComicStyle {
  levels: number;
  edges: SafeText;
  finish: SafeText;
}

const CLASSIC_COMIC: ComicStyle = {
  levels: 6,
  edges: filter`edgedetect=low=0.1:high=0.4`,
  finish: filter`eq=saturation=1.5:contrast=1.3`,
};

const COMIC_STYLES: Record<string, ComicStyle> = {
  classic: CLASSIC_COMIC,
  manga: { levels: 4, edges: filter`edgedetect=low=0.05:high=0.3`, finish: filter`hue=s=0,eq=contrast=1.6` },
  pop_art: { levels: 3, edges: filter`edgedetect=low=0.15:high=0.5`, finish: filter`eq=saturation=2.2:contrast=1.4` },
};

function lookup(table: Record<string, SafeText>, key: string, fallback: SafeText): SafeText {
  return table[key] ?? fallback;
}

/** Key the main video, then flatten it over a solid background unless transparency is kept. */
function keyed(key: SafeText, background: string): HandlerResult {
  if (background === 'transparent') return video(key);
  const g = new FragmentBuilder()
    .node([MAIN_VIDEO], filter`split`, ['fg', 'bg'])
    .node(['fg'], key, ['keyed'])
    .node(['bg'], filter`drawbox=c=${escapeFilterValue(background)}:t=fill`, ['solid'])
    .node(['solid', 'keyed'], filter`overlay=format=auto`, ['out']);
  return result({ graph: g.build({ video: 'out' }) });
}

/** A fade-out ends with the clip, so its start depends on the clip length. */
export function fadeOutStart(skill: string, ctx: HandlerContext, length: number): number {
  const total = ctx.primary.duration;
  if (total === undefined) {
    throw new ValidationError(`Skill '${skill}' needs the input duration to place its fade-out`, {
      skill,
      hint: 'set duration in the pipeline context (--duration)',
    });
  }
  return Math.max(0, total - length);
}

function fadePair(p: Params, ctx: HandlerContext, suffix: SafeText): HandlerResult {
  const filters: SafeText[] = [];
  const fadeIn = p.float('in_duration');
  const fadeOut = p.float('out_duration');
  if (fadeIn > 0) filters.push(filter`fade=t=in:st=0:d=${float(fadeIn)}${suffix}`);
  if (fadeOut > 0) {
    const st = fadeOutStart(p.skillName, ctx, fadeOut);
    filters.push(filter`fade=t=out:st=${float(st)}:d=${float(fadeOut)}${suffix}`);
  }
  return video(...filters);
}

export const VISUAL_HANDLERS: Record<string, SkillHandler> = {
  brightness: { compile: (p) => video(filter`eq=brightness=${p.float('value')}`) },
  contrast: { compile: (p) => video(filter`eq=contrast=${p.float('value')}`) },
  saturation: { compile: (p) => video(filter`eq=saturation=${p.float('value')}`) },
  hue: { compile: (p) => video(filter`hue=h=${p.float('value')}`) },
  sharpen: { compile: (p) => video(filter`unsharp=5:5:${p.float('amount')}:5:5:0`) },
  blur: {
    compile(p) {
      const r = p.int('radius');
      return video(filter`boxblur=${r}:${r}`);
    },
  },
  denoise: { compile: (p) => video(lookup(DENOISE, p.choice('strength'), filter`hqdn3d=4:3:6:4`)) },
  vignette: {
    compile(p) {
      // intensity 0..1 maps onto angle PI/6..PI/2
      const angle = Math.PI / 6 + p.float('intensity') * (Math.PI / 2 - Math.PI / 6);
      return video(filter`vignette=angle=${fixed(angle, 4)}`);
    },
  },
  fade: {
    compile(p, ctx) {
      const d = float(p.float('duration'));
      const type = p.choice('type');
      if (type === 'both') {
        const st = fadeOutStart('fade', ctx, p.float('duration'));
        return video(filter`fade=t=in:st=0:d=${d}`, filter`fade=t=out:st=${float(st)}:d=${d}`);
      }
      return video(filter`fade=t=${type === 'out' ? filter`out` : filter`in`}:st=${float(p.float('start'))}:d=${d}`);
    },
  },
  color_grade: { compile: (p) => video(lookup(GRADES, p.choice('style'), filter`eq=saturation=1.3:contrast=1.1,hue=h=-10`)) },
  chromakey: {
    compile(p) {
      const key = filter`colorkey=color=${p.text('color')}:similarity=${float(p.float('similarity'))}:blend=${float(p.float('blend'))}`;
      return keyed(key, p.string('background'));
    },
  },
  lumakey: {
    compile(p) {
      const key = filter`lumakey=threshold=${float(p.float('threshold'))}:tolerance=${float(p.float('tolerance'))}:softness=${float(p.float('softness'))}`;
      return keyed(key, p.string('background'));
    },
  },
  selective_color: {
    compile(p) {
      const cmyk = filter`${p.float('cyan')} ${p.float('magenta')} ${p.float('yellow')} ${p.float('black')}`;
      return video(filter`selectivecolor=${p.text('color_range')}='${cmyk}'`);
    },
  },
  monochrome: {
    compile(p) {
      const tone = MONOCHROME[p.choice('preset')] ?? { cb: 0, cr: 0 };
      return video(filter`monochrome=cb=${float(tone.cb)}:cr=${float(tone.cr)}:size=${float(p.float('size'))}`);
    },
  },
  color_temperature: {
    compile: (p) => video(filter`colortemperature=temperature=${p.int('temperature')}:mix=${float(p.float('mix'))}`),
  },
  pixelate: {
    compile(p) {
      const f = p.int('factor');
      return video(filter`scale=iw/${f}:ih/${f},scale=iw*${f}:ih*${f}:flags=neighbor`);
    },
  },
  posterize: {
    compile(p) {
      const step = Math.max(1, Math.floor(256 / p.int('levels')));
      const expr = filter`trunc(val/${step})*${step}`;
      return video(filter`lutrgb=r='${expr}':g='${expr}':b='${expr}'`);
    },
  },
  glow: {
    compile(p) {
      const strength = Math.max(0.1, Math.min(0.8, p.float('strength')));
      const g = new FragmentBuilder()
        .node([MAIN_VIDEO], filter`split`, ['base', 'halo'])
        .node(['halo'], filter`gblur=sigma=${float(p.float('radius'))}`, ['soft'])
        .node(['base', 'soft'], filter`blend=all_mode=screen:all_opacity=${float(strength)}`, ['out']);
      return result({ graph: g.build({ video: 'out' }) });
    },
  },
  lut_apply: {
    compile(p) {
      const intensity = p.float('intensity');
      const lut = filter`lut3d=file=${escapeFilterValue(validatePath(p.string('path'), 'lut'))}`;
      if (intensity <= 0) return result();
      if (intensity >= 1) return video(lut);
      const g = new FragmentBuilder()
        .node([MAIN_VIDEO], filter`split`, ['orig', 'src'])
        .node(['src'], lut, ['graded'])
        .node(['orig', 'graded'], filter`blend=all_mode=normal:all_opacity=${float(intensity)}`, ['out']);
      return result({ graph: g.build({ video: 'out' }) });
    },
  },
  fade_to_black: { compile: (p, ctx) => fadePair(p, ctx, EMPTY) },
  fade_to_white: { compile: (p, ctx) => fadePair(p, ctx, filter`:c=white`) },
  flash: {
    compile(p) {
      const t = p.float('time');
      const half = p.float('duration') / 2;
      return video(filter`fade=t=out:st=${float(t)}:d=${float(half)}:c=white,fade=t=in:st=${float(t + half)}:d=${float(half)}:c=white`);
    },
  },
  deband: {
    compile(p) {
      const thr = float(p.float('threshold'));
      return video(filter`deband=1thr=${thr}:2thr=${thr}:3thr=${thr}:4thr=${thr}:range=${p.int('range')}:blur=${p.bool('blur') ? 1 : 0}`);
    },
  },
  chromatic_aberration: {
    compile(p) {
      const a = p.int('amount');
      const half = Math.floor(a / 2);
      return video(filter`rgbashift=rh=-${a}:bh=${a}:rv=${half}:bv=-${half}`);
    },
  },
  sketch: { compile: (p) => video(lookup(SKETCH, p.choice('mode'), filter`edgedetect=low=0.1:high=0.3,negate`)) },
  ghost_trail: {
    compile: (p) => video(filter`lagfun=decay=${Math.max(0.9, Math.min(0.995, p.float('decay')))}`),
  },
  mask_blur: {
    compile(p) {
      const x = p.int('x');
      const y = p.int('y');
      const w = p.int('w');
      const h = p.int('h');
      const g = new FragmentBuilder()
        .node([MAIN_VIDEO], filter`split`, ['base', 'region'])
        .node(['region'], filter`crop=${w}:${h}:${x}:${y},boxblur=${p.int('strength')}`, ['blurred'])
        .node(['base', 'blurred'], filter`overlay=${x}:${y}:shortest=1`, ['out']);
      return result({ graph: g.build({ video: 'out' }) });
    },
  },
  datamosh: {
    compile(p) {
      return result({
        videoFilters: [filter`codecview=mv=${p.text('mode')}`],
        inputFlags: ['-flags2', '+export_mvs'],
      });
    },
  },
  sepia: {
    compile(p) {
      const i = p.float('intensity');
      // blend the identity matrix toward the sepia matrix
      const mix = (r: number, c: number): SafeText => fixed((r === c ? 1 - i : 0) + i * (SEPIA_MATRIX[r]?.[c] ?? 0), 3);
      return video(
        filter`colorchannelmixer=rr=${mix(0, 0)}:rg=${mix(0, 1)}:rb=${mix(0, 2)}:gr=${mix(1, 0)}:gg=${mix(1, 1)}:gb=${mix(1, 2)}:br=${mix(2, 0)}:bg=${mix(2, 1)}:bb=${mix(2, 2)}`,
      );
    },
  },
  tilt_shift: {
    compile(p) {
      const focus = p.float('focus_position');
      const low = fixed(Math.max(0, focus - 0.15), 2);
      const high = fixed(Math.min(1, focus + 0.15), 2);
      const g = new FragmentBuilder()
        .node([MAIN_VIDEO], filter`split`, ['sharp', 'soft'])
        .node(['soft'], filter`gblur=sigma=${float(p.float('blur_amount'))}`, ['blurred'])
        .node(['sharp', 'blurred'], filter`blend=all_expr='if(between(Y/H\\,${low}\\,${high})\\,A\\,B)'`, ['out']);
      return result({ graph: g.build({ video: 'out' }) });
    },
  },
  halftone: {
    compile(p) {
      const f = fixed((2 * Math.PI) / p.int('dot_size'), 4);
      return video(filter`format=gray,geq=lum='if(gt(lum(X\\,Y)\\,128+127*sin(X*${f})*sin(Y*${f}))\\,255\\,0)'`);
    },
  },
  false_color: { compile: (p) => video(lookup(PALETTES, p.choice('palette'), filter`pseudocolor=preset=spectral`)) },
  color_channel_swap: {
    compile: (p) => video(lookup(CHANNEL_SWAPS, p.choice('preset'), filter`colorchannelmixer=rr=0:rb=1:br=1:bb=0`)),
  },
  colorhold: {
    compile: (p) =>
      video(filter`colorhold=color=${p.text('color')}:similarity=${float(p.float('similarity'))}:blend=${float(p.float('blend'))}`),
  },
  despill: {
    compile: (p) =>
      video(
        filter`despill=type=${p.text('type')}:mix=${float(p.float('mix'))}:expand=${float(p.float('expand'))}:brightness=${float(p.float('brightness'))}`,
      ),
  },
  comic_book: {
    compile(p) {
      const style = COMIC_STYLES[p.choice('style')] ?? CLASSIC_COMIC;
      const step = Math.floor(256 / style.levels);
      const expr = filter`trunc(val/${step})*${step}`;
      const g = new FragmentBuilder()
        .node([MAIN_VIDEO], filter`split`, ['base', 'lines'])
        .node(['lines'], filter`${style.edges},negate`, ['ink'])
        .node(['base'], filter`lutrgb=r='${expr}':g='${expr}':b='${expr}',${style.finish}`, ['flat'])
        .node(['flat', 'ink'], filter`blend=all_mode=multiply`, ['out']);
      return result({ graph: g.build({ video: 'out' }) });
    },
  },
};