import { filter, fixed, float, type SafeText } from '../../security/escape.js';
import { ValidationError } from '../../shared/errors.js';
import type { SkillHandler } from '../types.js';
import { FragmentBuilder, MAIN_VIDEO, result, video } from './result.js';

function corners(preset: string, s: SafeText): SafeText {
  switch (preset) {
    case 'tilt_back':
      return filter`x0=0:y0=0:x1=W:y1=0:x2=0+${s}:y2=H:x3=W-${s}:y3=H`;
    case 'lean_left':
      return filter`x0=0:y0=0+${s}:x1=W:y1=0:x2=0:y2=H:x3=W:y3=H-${s}`;
    case 'lean_right':
      return filter`x0=0:y0=0:x1=W:y1=0+${s}:x2=0:y2=H-${s}:x3=W:y3=H`;
    default:
      return filter`x0=0+${s}:y0=0:x1=W-${s}:y1=0:x2=0:y2=H:x3=W:y3=H`;
  }
}

/** "16:9", "2.35:1" or a bare number. */
export function parseRatio(text: string): number | undefined {
  const parts = text.split(':');
  const value = parts.length === 2 ? Number(parts[0]) / Number(parts[1]) : Number(text);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

const resize: SkillHandler = {
  compile: (p) => video(filter`scale=${p.int('width')}:${p.int('height')}`),
};

const crop: SkillHandler = {
  compile: (p) => video(filter`crop=${p.text('width')}:${p.text('height')}:${p.text('x')}:${p.text('y')}`),
};

const pad: SkillHandler = {
  compile: (p) =>
    video(filter`pad=${p.text('width')}:${p.text('height')}:${p.text('x')}:${p.text('y')}:${p.text('color')}`),
};

const rotate: SkillHandler = {
  compile(p) {
    const angle = p.float('angle');
    if (angle === 90 || angle === -270) return video(filter`transpose=1`);
    if (angle === -90 || angle === 270) return video(filter`transpose=2`);
    if (Math.abs(angle) === 180) return video(filter`transpose=1,transpose=1`);
    return video(filter`rotate=${fixed((angle * Math.PI) / 180, 6)}:fillcolor=${p.text('fill')}`);
  },
};

const flip: SkillHandler = {
  compile: (p) => video(p.choice('direction') === 'vertical' ? filter`vflip` : filter`hflip`),
};

const zoom: SkillHandler = {
  compile(p) {
    const f = p.float('factor');
    const x = p.has('x') ? filter`iw*${p.float('x')}-iw/${f}/2` : filter`(iw-iw/${f})/2`;
    const y = p.has('y') ? filter`ih*${p.float('y')}-ih/${f}/2` : filter`(ih-ih/${f})/2`;
    return video(filter`crop=iw/${f}:ih/${f}:${x}:${y},scale=iw*${f}:ih*${f}`);
  },
};

const kenBurns: SkillHandler = {
  compile(p, ctx) {
    const amount = p.float('amount');
    const seconds = p.float('duration');
    const fps = ctx.primary.fps;
    const size = filter`s=${ctx.primary.width}x${ctx.primary.height}:fps=${fps}`;
    const even = filter`scale='trunc(iw/2)*2':'trunc(ih/2)*2'`;
    const center = filter`y='ih/2-(ih/zoom/2)'`;
    const rate = fixed(amount / seconds / fps, 6);
    const zf = 1 + amount;
    switch (p.choice('direction')) {
      case 'zoom_out':
        return video(
          filter`${even},zoompan=z='max(if(eq(on\\,1)\\,${zf}\\,zoom)-${rate}\\,1)':d=1:x='iw/2-(iw/zoom/2)':${center}:${size}`,
        );
      case 'pan_right':
        return video(
          filter`${even},zoompan=z='${zf}':d=1:x='min(on*${fixed(amount, 4)}*iw/${seconds}/${fps}\\,(iw-iw/${zf}))':${center}:${size}`,
        );
      case 'pan_left':
        return video(
          filter`${even},zoompan=z='${zf}':d=1:x='max((iw-iw/${zf})-on*${fixed(amount, 4)}*iw/${seconds}/${fps}\\,0)':${center}:${size}`,
        );
      default:
        return video(
          filter`${even},zoompan=z='min(max(zoom\\,pzoom)+${rate}\\,${zf})':d=1:x='iw/2-(iw/zoom/2)':${center}:${size}`,
        );
    }
  },
};

const drift: SkillHandler = {
  compile(p) {
    const amount = p.int('amount');
    const speed = amount > 10 ? Math.max(1, Math.floor(amount / 10)) : amount;
    switch (p.choice('direction')) {
      case 'left':
        return video(filter`pad=iw+${amount}:ih:${amount}:0:black,crop=iw-${amount}:ih:max(${amount}-${speed}*t\\,0):0`);
      case 'down':
        return video(filter`pad=iw:ih+${amount}:0:0:black,crop=iw:ih-${amount}:0:min(${speed}*t\\,${amount})`);
      case 'up':
        return video(filter`pad=iw:ih+${amount}:0:${amount}:black,crop=iw:ih-${amount}:0:max(${amount}-${speed}*t\\,0)`);
      default:
        return video(filter`pad=iw+${amount}:ih:0:0:black,crop=iw-${amount}:ih:min(${speed}*t\\,${amount}):0`);
    }
  },
};

const aspect: SkillHandler = {
  compile(p) {
    const r = parseRatio(p.string('ratio'));
    if (r === undefined) {
      throw new ValidationError(`Skill 'aspect': invalid ratio '${p.string('ratio')}'`, {
        skill: 'aspect',
        param: 'ratio',
        hint: 'use W:H such as 16:9, or a number such as 2.35',
      });
    }
    const wide = filter`gt(iw/ih\\,${r})`;
    switch (p.choice('mode')) {
      case 'crop':
        return video(filter`crop=if(${wide}\\,ih*${r}\\,iw):if(${wide}\\,ih\\,iw/${r})`);
      case 'stretch':
        return video(filter`scale=if(${wide}\\,iw\\,ih*${r}):if(${wide}\\,iw/${r}\\,ih)`);
      default:
        return video(filter`pad=if(${wide}\\,iw\\,ih*${r}):if(${wide}\\,iw/${r}\\,ih):(ow-iw)/2:(oh-ih)/2:${p.text('color')}`);
    }
  },
};

const mirror: SkillHandler = {
  compile(p) {
    const g = new FragmentBuilder();
    switch (p.choice('mode')) {
      case 'vertical':
        g.node([MAIN_VIDEO], filter`crop=iw:ih/2:0:0,split`, ['top', 'bottom'])
          .node(['bottom'], filter`vflip`, ['flipped'])
          .node(['top', 'flipped'], filter`vstack`, ['out']);
        break;
      case 'quad':
        g.node([MAIN_VIDEO], filter`crop=iw/2:ih/2:0:0,split=4`, ['a', 'b', 'c', 'd'])
          .node(['b'], filter`hflip`, ['bh'])
          .node(['c'], filter`vflip`, ['cv'])
          .node(['d'], filter`hflip,vflip`, ['dh'])
          .node(['a', 'bh'], filter`hstack`, ['upper'])
          .node(['cv', 'dh'], filter`hstack`, ['lower'])
          .node(['upper', 'lower'], filter`vstack`, ['out']);
        break;
      default:
        g.node([MAIN_VIDEO], filter`crop=iw/2:ih:0:0,split`, ['left', 'right'])
          .node(['right'], filter`hflip`, ['flipped'])
          .node(['left', 'flipped'], filter`hstack`, ['out']);
    }
    return result({ graph: g.build({ video: 'out' }) });
  },
};

const captionSpace: SkillHandler = {
  compile(p) {
    const h = p.int('height');
    const y = p.choice('position') === 'top' ? h : 0;
    return video(filter`pad=iw:ih+${h}:0:${y}:${p.text('color')}`);
  },
};

const perspective: SkillHandler = {
  compile(p) {
    // offset is strength * W/4 pixels
    const expr = corners(p.choice('preset'), filter`W*${p.float('strength')}/4`);
    return video(filter`perspective=${expr}:interpolation=linear:sense=source`);
  },
};

const lensCorrection: SkillHandler = {
  compile: (p) => video(filter`lenscorrection=k1=${float(p.float('k1'))}:k2=${float(p.float('k2'))}:i=bilinear`),
};

const SHAKE_OFFSET: Record<string, number> = { light: 5, medium: 12, heavy: 25 };
const FILL_MODES: Record<string, number> = { smear: 0, mirror: 1, fixed: 2, reflect: 3, wrap: 4, fade: 5 };
const DESHAKE_EDGES: Record<string, number> = { blank: 0, original: 1, clamp: 2, mirror: 3 };

const spin: SkillHandler = {
  compile(p) {
    const rate = (p.float('speed') * Math.PI) / 180;
    const signed = p.choice('direction') === 'ccw' ? -rate : rate;
    return video(filter`rotate=${fixed(signed, 6)}*t:fillcolor=${p.text('fill')}`);
  },
};

const shake: SkillHandler = {
  compile(p) {
    const a = SHAKE_OFFSET[p.choice('intensity')] ?? 12;
    return video(filter`crop=iw-${2 * a}:ih-${2 * a}:${a}+${a}*random(1):${a}+${a}*random(2),scale=iw+${2 * a}:ih+${2 * a}`);
  },
};

const pulse: SkillHandler = {
  compile(p, ctx) {
    const fps = ctx.primary.fps;
    const amount = fixed(p.float('amount'), 3);
    const z = filter`1+${amount}*(1+sin(2*PI*${float(p.float('rate'))}*on/${fps}))/2`;
    return video(
      filter`scale='trunc(iw/2)*2':'trunc(ih/2)*2',zoompan=z='${z}':d=1:x='iw/2-(iw/zoom/2)':y='ih/2-(ih/zoom/2)':s=${ctx.primary.width}x${ctx.primary.height}:fps=${fps}`,
    );
  },
};

const bounce: SkillHandler = {
  compile(p) {
    const h = p.int('height');
    return video(filter`pad=iw:ih+${2 * h}:0:${h}:black,crop=iw:ih-${2 * h}:0:${h}*abs(sin(${float(p.float('speed'))}*PI*t))`);
  },
};

/** Keep pixels where `cond` holds, black elsewhere. */
function revealMask(cond: SafeText): SafeText {
  return filter`geq=lum='if(${cond},lum(X,Y),0)':cb='if(${cond},cb(X,Y),128)':cr='if(${cond},cr(X,Y),128)'`;
}

const irisReveal: SkillHandler = {
  compile(p) {
    const d = float(p.float('duration'));
    return video(revealMask(filter`lte(hypot(X-W/2,Y-H/2),hypot(W/2,H/2)*min(T/${d},1))`));
  },
};

const wipe: SkillHandler = {
  compile(p) {
    const progress = filter`min(T/${float(p.float('duration'))},1)`;
    switch (p.choice('direction')) {
      case 'right':
        return video(revealMask(filter`gte(X,W*(1-${progress}))`));
      case 'down':
        return video(revealMask(filter`lte(Y,H*${progress})`));
      case 'up':
        return video(revealMask(filter`gte(Y,H*(1-${progress}))`));
      default:
        return video(revealMask(filter`lte(X,W*${progress})`));
    }
  },
};

const slideIn: SkillHandler = {
  compile(p) {
    const done = filter`min(t/${float(p.float('duration'))}\\,1)`;
    switch (p.choice('direction')) {
      case 'right':
        return video(filter`pad=iw*2:ih:iw:0:black,crop=iw/2:ih:iw/2*${done}:0`);
      case 'down':
        return video(filter`pad=iw:ih*2:0:0:black,crop=iw:ih/2:0:ih/2*(1-${done})`);
      case 'up':
        return video(filter`pad=iw:ih*2:0:ih:black,crop=iw:ih/2:0:ih/2*${done}`);
      default:
        return video(filter`pad=iw*2:ih:0:0:black,crop=iw/2:ih:iw/2*(1-${done}):0`);
    }
  },
};

const scroll: SkillHandler = {
  compile(p) {
    const s = p.float('speed');
    switch (p.choice('direction')) {
      case 'down':
        return video(filter`scroll=vertical=${float(s)}`);
      case 'left':
        return video(filter`scroll=horizontal=${float(s)}`);
      case 'right':
        return video(filter`scroll=horizontal=${float(-s)}`);
      default:
        return video(filter`scroll=vertical=${float(-s)}`);
    }
  },
};

const fillBorders: SkillHandler = {
  compile: (p) =>
    video(
      filter`fillborders=left=${p.int('left')}:right=${p.int('right')}:top=${p.int('top')}:bottom=${p.int('bottom')}:mode=${FILL_MODES[p.choice('mode')] ?? 0}`,
    ),
};

const deshake: SkillHandler = {
  compile: (p) =>
    video(filter`deshake=rx=${p.int('rx')}:ry=${p.int('ry')}:edge=${DESHAKE_EDGES[p.choice('edge')] ?? 1}`),
};

export const SPATIAL_HANDLERS: Record<string, SkillHandler> = {
  resize,
  crop,
  pad,
  rotate,
  flip,
  zoom,
  ken_burns: kenBurns,
  drift,
  aspect,
  mirror,
  caption_space: captionSpace,
  perspective,
  lens_correction: lensCorrection,
  spin,
  shake,
  pulse,
  bounce,
  iris_reveal: irisReveal,
  wipe,
  slide_in: slideIn,
  scroll,
  fill_borders: fillBorders,
  deshake,
};
