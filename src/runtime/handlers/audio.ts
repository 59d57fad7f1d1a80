import { filter, float } from '../../security/escape.js';
import type { SkillHandler } from '../types.js';
import { claimExtra, ownExtra, requestedInput } from './inputs.js';
import { FragmentBuilder, MAIN_AUDIO, MAP_MAIN_AUDIO, MAP_MAIN_VIDEO, audio, input, outputFlags, result } from './result.js';

const AUDIO_SOURCES = ['audio', 'video'] as const;

const volume: SkillHandler = {
  compile(p) {
    return audio(filter`volume=${float(p.float('level'))}`);
  },
};

const normalize: SkillHandler = {
  compile(p) {
    return audio(filter`loudnorm=I=${float(p.float('target'))}:TP=-1.5:LRA=11`);
  },
};

const fadeAudio: SkillHandler = {
  compile(p) {
    const type = p.choice('type') === 'out' ? filter`out` : filter`in`;
    return audio(filter`afade=t=${type}:st=${float(p.float('start'))}:d=${float(p.float('duration'))}`);
  },
};

const removeAudio: SkillHandler = {
  compile() {
    return outputFlags('-an');
  },
};

const extractAudio: SkillHandler = {
  compile() {
    return outputFlags('-vn', '-c:a', 'copy');
  },
};

const replaceAudio: SkillHandler = {
  reserveInputs(p, ctx) {
    return [claimExtra(ctx, 'replace_audio', AUDIO_SOURCES, requestedInput(p))];
  },
  compile(_p, ctx) {
    const source = ownExtra(ctx, 'replace_audio');
    return result({
      outputFlags: ['-shortest'],
      maps: [MAP_MAIN_VIDEO, MAP_MAIN_AUDIO],
      audioSource: source.index,
    });
  },
};

const audioCrossfade: SkillHandler = {
  reserveInputs(p, ctx) {
    return [claimExtra(ctx, 'audio_crossfade', AUDIO_SOURCES, requestedInput(p))];
  },
  compile(p, ctx) {
    const source = ownExtra(ctx, 'audio_crossfade');
    const curve = p.text('curve');
    const g = new FragmentBuilder().node(
      [MAIN_AUDIO, input(source.index, 'a')],
      filter`acrossfade=d=${float(p.float('duration'))}:c1=${curve}:c2=${curve}`,
      ['out'],
    );
    return result({ graph: g.build({ audio: 'out' }) });
  },
};

const mixAudio: SkillHandler = {
  reserveInputs(p, ctx) {
    return [claimExtra(ctx, 'mix_audio', AUDIO_SOURCES, requestedInput(p))];
  },
  compile(p, ctx) {
    const source = ownExtra(ctx, 'mix_audio');
    const g = new FragmentBuilder().node(
      [MAIN_AUDIO, input(source.index, 'a')],
      filter`amix=inputs=2:duration=${p.text('duration')}:dropout_transition=${float(p.float('dropout_transition'))}:weights='${p.float('weight')} ${p.float('extra_weight')}'`,
      ['out'],
    );
    return result({ graph: g.build({ audio: 'out' }) });
  },
};

export const AUDIO_HANDLERS: Record<string, SkillHandler> = {
  volume,
  normalize,
  fade_audio: fadeAudio,
  remove_audio: removeAudio,
  extract_audio: extractAudio,
  replace_audio: replaceAudio,
  audio_crossfade: audioCrossfade,
  mix_audio: mixAudio,
};
