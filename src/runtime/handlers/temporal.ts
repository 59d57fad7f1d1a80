import { escapeFilterValue, filter, float, formatFloat, type SafeText } from '../../security/escape.js';
import { ValidationError } from '../../shared/errors.js';
import type { SkillHandler } from '../types.js';
import { FragmentBuilder, MAIN_VIDEO, result, video } from './result.js';

/** atempo accepts 0.5..2.0 per instance; chain instances to reach the factor. */
export function atempoChain(factor: number): SafeText[] {
  const chain: SafeText[] = [];
  let remaining = factor;
  while (remaining < 0.5) {
    chain.push(filter`atempo=0.5`);
    remaining *= 2;
  }
  while (remaining > 2.0) {
    chain.push(filter`atempo=2.0`);
    remaining /= 2;
  }
  chain.push(filter`atempo=${float(remaining)}`);
  return chain;
}

const trim: SkillHandler = {
  compile(p) {
    const start = p.time('start');
    const end = p.time('end');
    const duration = p.time('duration');
    const inputFlags = start ? ['-ss', start.text] : [];
    const outputFlags: string[] = [];
    if (end) {
      const length = end.seconds - (start?.seconds ?? 0);
      if (length <= 0) {
        throw new ValidationError(`Skill 'trim': end (${end.text}) must be after start (${start?.text ?? '0'})`, {
          skill: 'trim',
          param: 'end',
        });
      }
      outputFlags.push('-t', formatFloat(length));
    } else if (duration) {
      outputFlags.push('-t', duration.text);
    }
    return result({ inputFlags, outputFlags });
  },
};

const speed: SkillHandler = {
  compile(p) {
    const factor = p.float('factor');
    return result({
      videoFilters: [filter`setpts=${float(1 / factor)}*PTS`],
      audioFilters: atempoChain(factor),
    });
  },
};

const reverse: SkillHandler = {
  compile() {
    return result({ videoFilters: [filter`reverse`], audioFilters: [filter`areverse`] });
  },
};

const loop: SkillHandler = {
  compile(p) {
    return result({ inputFlags: ['-stream_loop', String(p.int('count'))] });
  },
};

const boomerang: SkillHandler = {
  compile(p) {
    const loops = p.int('loops');
    const g = new FragmentBuilder()
      .node([MAIN_VIDEO], filter`split`, ['fwd', 'rev'])
      .node(['rev'], filter`reverse`, ['r'])
      .node(['fwd', 'r'], filter`concat=n=2:v=1:a=0,loop=loop=${loops - 1}:size=32767`, ['out']);
    // Reversed frames have no audio counterpart.
    return result({ graph: g.build({ video: 'out' }), outputFlags: ['-an'] });
  },
};

const jumpCut: SkillHandler = {
  compile(p) {
    return result({
      videoFilters: [filter`select='gt(scene,${p.float('threshold')})',setpts=N/FRAME_RATE/TB`],
      outputFlags: ['-an'],
    });
  },
};

const beatSync: SkillHandler = {
  compile(p) {
    const interval = Math.max(1, Math.trunc(1 / Math.max(p.float('threshold'), 0.01)));
    return result({
      videoFilters: [filter`select='not(mod(n,${interval}))',setpts=N/FRAME_RATE/TB`],
      outputFlags: ['-an'],
    });
  },
};

const freezeFrame: SkillHandler = {
  compile(p, ctx) {
    const at = p.time('time');
    const hold = p.time('duration');
    const fps = ctx.primary.fps;
    const startFrame = Math.round((at?.seconds ?? 0) * fps);
    const frames = Math.max(1, Math.round((hold?.seconds ?? 1) * fps));
    return video(filter`loop=loop=${frames}:size=1:start=${startFrame},setpts=N/FRAME_RATE/TB`);
  },
};

const frameInterpolation: SkillHandler = {
  compile: (p) => video(filter`minterpolate=fps=${p.int('fps')}:mi_mode=${p.text('mode')}`),
};

const frameBlend: SkillHandler = {
  compile(p) {
    const n = p.int('frames');
    const weights = escapeFilterValue(Array.from({ length: n }, () => '1').join(' '));
    return video(filter`tmix=frames=${n}:weights='${weights}'`);
  },
};

export const TEMPORAL_HANDLERS: Record<string, SkillHandler> = {
  trim,
  speed,
  reverse,
  loop,
  boomerang,
  jump_cut: jumpCut,
  beat_sync: beatSync,
  freeze_frame: freezeFrame,
  frame_interpolation: frameInterpolation,
  frame_blend: frameBlend,
};
