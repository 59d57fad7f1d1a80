import { filter, fixed, float } from '../../security/escape.js';
import { ValidationError } from '../../shared/errors.js';
import type { SkillHandler } from '../types.js';
import { FragmentBuilder, MAIN_VIDEO, mapSubtitle, outputFlags, result } from './result.js';

const CRF_BY_PRESET: Record<string, number> = { light: 20, medium: 23, heavy: 28 };

const VIDEO_ENCODERS: Record<string, string> = {
  h264: 'libx264',
  h265: 'libx265',
  vp9: 'libvpx-vp9',
  av1: 'libaom-av1',
  prores: 'prores_ks',
};

const AUDIO_ENCODERS: Record<string, string> = {
  aac: 'aac',
  mp3: 'libmp3lame',
  opus: 'libopus',
  vorbis: 'libvorbis',
  flac: 'flac',
};

const compress: SkillHandler = {
  compile(p) {
    const crf = CRF_BY_PRESET[p.choice('preset')] ?? 23;
    return outputFlags('-c:v', 'libx264', '-crf', String(crf), '-preset', 'medium');
  },
};

const convert: SkillHandler = {
  compile(p) {
    return outputFlags('-c:v', VIDEO_ENCODERS[p.choice('codec')] ?? 'libx264');
  },
};

const bitrate: SkillHandler = {
  compile(p) {
    const flags: string[] = [];
    if (p.has('video')) flags.push('-b:v', p.string('video'));
    if (p.has('audio')) flags.push('-b:a', p.string('audio'));
    return outputFlags(...flags);
  },
};

const quality: SkillHandler = {
  compile(p) {
    return outputFlags('-c:v', 'libx264', '-crf', String(p.int('crf')), '-preset', p.choice('preset'));
  },
};

const container: SkillHandler = {
  compile(p) {
    return outputFlags('-f', p.choice('format'));
  },
};

const audioCodec: SkillHandler = {
  compile(p) {
    const codec = p.choice('codec');
    if (codec === 'copy') return outputFlags('-c:a', 'copy');
    return outputFlags('-c:a', AUDIO_ENCODERS[codec] ?? codec, '-b:a', p.string('bitrate'));
  },
};

const hwaccel: SkillHandler = {
  compile(p) {
    return result({ inputFlags: ['-hwaccel', p.choice('type')] });
  },
};

const thumbnail: SkillHandler = {
  compile(p) {
    const width = p.int('width');
    const time = p.float('time');
    const scale = width > 0 ? filter`scale=${width}:-1` : undefined;
    const flags = ['-frames:v', '1', '-an'];
    if (time > 0) {
      // Seeking picks the frame; no selection filter needed.
      return result({ inputFlags: ['-ss', String(time)], videoFilters: scale ? [scale] : [], outputFlags: flags });
    }
    return result({ videoFilters: scale ? [filter`thumbnail`, scale] : [filter`thumbnail`], outputFlags: flags });
  },
};

const extractFrames: SkillHandler = {
  compile(p) {
    return result({ videoFilters: [filter`fps=${float(p.float('rate'))}`], outputFlags: ['-an'] });
  },
};

const gif: SkillHandler = {
  compile(p) {
    const g = new FragmentBuilder()
      .node([MAIN_VIDEO], filter`fps=${p.int('fps')},scale=${p.int('width')}:-1:flags=lanczos,split`, ['s0', 's1'])
      .node(['s0'], filter`palettegen`, ['pal'])
      .node(['s1', 'pal'], filter`paletteuse`, ['out']);
    return result({ graph: g.build({ video: 'out' }), outputFlags: ['-an'] });
  },
};

const SUBTITLE_CODECS: Record<string, string> = { srt: 'srt', ass: 'ass', vtt: 'webvtt' };

const extractSubtitles: SkillHandler = {
  compile(p) {
    return result({
      maps: [mapSubtitle(0, p.int('track'))],
      outputFlags: ['-c:s', SUBTITLE_CODECS[p.choice('format')] ?? 'srt'],
    });
  },
};

const spriteSheet: SkillHandler = {
  compile(p) {
    const tile = filter`tile=${p.int('columns')}x${p.int('rows')}`;
    return result({
      videoFilters: [filter`fps=1/${float(p.float('interval'))},scale=${p.int('width')}:-1,${tile}`],
      outputFlags: ['-frames:v', '1', '-an'],
    });
  },
};

const previewStrip: SkillHandler = {
  compile(p, ctx) {
    const frames = p.int('frames');
    const total = ctx.primary.duration;
    if (total === undefined) {
      throw new ValidationError(`Skill 'preview_strip' needs the input duration to space its frames`, {
        skill: 'preview_strip',
        hint: 'set duration in the pipeline context (--duration)',
      });
    }
    return result({
      videoFilters: [filter`fps=${fixed(frames / total, 4)},scale=${p.int('width')}:-1,tile=${frames}x1`],
      outputFlags: ['-frames:v', '1', '-an'],
    });
  },
};

export const ENCODING_HANDLERS: Record<string, SkillHandler> = {
  compress,
  convert,
  bitrate,
  quality,
  container,
  audio_codec: audioCodec,
  hwaccel,
  thumbnail,
  extract_frames: extractFrames,
  gif,
  extract_subtitles: extractSubtitles,
  sprite_sheet: spriteSheet,
  preview_strip: previewStrip,
};
