import { EMPTY, escapeFilterValue, filter, fixed, type SafeText } from '../../security/escape.js';
import { allowedExtensions, validatePath } from '../../security/paths.js';
import { TextEnvelopeSchema, type TextEnvelope } from '../../shared/schemas.js';
import { logger } from '../../shared/logger.js';
import type { Params } from '../../skills/params.js';
import { ValidationError } from '../../shared/errors.js';
import type { SkillHandler } from '../types.js';
import { video } from './result.js';

export const TEXT_POSITIONS = [
  'center',
  'top',
  'bottom',
  'top_left',
  'top_right',
  'bottom_left',
  'bottom_right',
] as const;

export type TextPayload = { kind: 'literal'; text: string } | { kind: 'envelope'; envelope: TextEnvelope };

/**
 * First usable side-channel payload. A string that is not JSON is display
 * text; JSON that is not a recognised envelope is skipped.
 */
export function readTextPayload(inputs: readonly string[]): TextPayload | undefined {
  for (const raw of inputs) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return { kind: 'literal', text: raw };
    }
    const envelope = TextEnvelopeSchema.safeParse(parsed);
    if (envelope.success) return { kind: 'envelope', envelope: envelope.data };
    logger.debug('Ignoring text input without a known mode', { length: raw.length });
  }
  return undefined;
}

export function placement(position: string, margin: number): { x: SafeText; y: SafeText } {
  const centerX = filter`(w-text_w)/2`;
  const left = filter`${margin}`;
  const right = filter`w-text_w-${margin}`;
  const top = filter`${margin}`;
  const bottom = filter`h-text_h-${margin}`;
  switch (position) {
    case 'top':
      return { x: centerX, y: top };
    case 'bottom':
      return { x: centerX, y: bottom };
    case 'top_left':
      return { x: left, y: top };
    case 'top_right':
      return { x: right, y: top };
    case 'bottom_left':
      return { x: left, y: bottom };
    case 'bottom_right':
      return { x: right, y: bottom };
    default:
      return { x: centerX, y: filter`(h-text_h)/2` };
  }
}

function looksLikeFontFile(font: string): boolean {
  if (font.includes('/') || font.includes('\\')) return true;
  const lower = font.toLowerCase();
  return [...allowedExtensions('font')].some((ext) => lower.endsWith(ext));
}

/** `font=` for a family name, `fontfile=` for a validated font path. */
export function fontOption(font: string): SafeText {
  if (looksLikeFontFile(font)) {
    return filter`fontfile=${escapeFilterValue(validatePath(font, 'font'))}`;
  }
  return filter`font=${escapeFilterValue(font)}`;
}

function between(start: number, end: number): SafeText {
  return filter`:enable='between(t,${start},${end})'`;
}

const textOverlay: SkillHandler = {
  compile(p, ctx) {
    let text = p.string('text');
    let size = p.int('size');
    let color = p.string('color');
    let position = p.choice('position');
    let start = p.float('start');
    let duration = p.float('duration');

    const payload = readTextPayload(ctx.textInputs);
    if (payload?.kind === 'literal') {
      text = payload.text;
    } else if (payload?.kind === 'envelope') {
      const env = payload.envelope;
      text = env.text;
      if (env.font_size) size = Math.round(env.font_size);
      if (env.font_color) color = env.font_color;
      if (env.position && TEXT_POSITIONS.some((pos) => pos === env.position)) position = env.position;
      if (env.start_time !== undefined && env.start_time > 0) start = env.start_time;
      if (env.end_time !== undefined && env.end_time > 0 && env.end_time - (env.start_time ?? 0) > 0) {
        duration = env.end_time - (env.start_time ?? 0);
      }
    }

    const { x, y } = placement(position, p.int('margin'));
    const borderWidth = p.bool('border') ? 2 : 0;
    const box = p.has('background') ? filter`:box=1:boxcolor=${p.text('background')}:boxborderw=8` : EMPTY;
    const blink = p.float('blink');
    let enable = EMPTY;
    if (blink > 0) {
      enable = filter`:enable='lt(mod(t\\,${blink})\\,${blink / 2})'`;
    } else if (duration > 0) {
      enable = between(start, start + duration);
    } else if (start > 0) {
      enable = filter`:enable='gte(t,${start})'`;
    }

    return video(
      filter`drawtext=text=${escapeFilterValue(text)}:${fontOption(p.string('font'))}:fontsize=${size}:fontcolor=${escapeFilterValue(color)}:borderw=${borderWidth}:bordercolor=${p.text('border_color')}:x=${x}:y=${y}${box}${enable}`,
    );
  },
};

const lowerThird: SkillHandler = {
  compile(p) {
    const size = p.int('fontsize');
    const color = p.text('fontcolor');
    const bg = p.text('background');
    const start = p.float('start');
    const enable = between(start, start + p.float('duration'));
    const layers = [
      filter`drawtext=text=${p.text('text')}:fontsize=${size}:fontcolor=${color}:x=40:y=h-text_h-60:box=1:boxcolor=${bg}:boxborderw=12:borderw=1:bordercolor=black${enable}`,
    ];
    const subtext = p.string('subtext');
    if (subtext) {
      const subSize = Math.max(size - 10, 16);
      layers.push(
        filter`drawtext=text=${escapeFilterValue(subtext)}:fontsize=${subSize}:fontcolor=${color}@0.8:x=40:y=h-${subSize}-25:box=1:boxcolor=${bg}:boxborderw=8${enable}`,
      );
    }
    return video(...layers);
  },
};

const countdown: SkillHandler = {
  compile(p) {
    const from = p.int('start_from');
    return video(
      filter`drawtext=text='%{eif\\:${from}-t\\:d}':fontsize=${p.int('fontsize')}:fontcolor=${p.text('fontcolor')}:x=(w-text_w)/2:y=(h-text_h)/2:borderw=3:bordercolor=black:enable='lte(t,${from})'`,
    );
  },
};

const scrollingText: SkillHandler = {
  compile(p) {
    return video(
      filter`drawtext=text=${p.text('text')}:fontsize=${p.int('fontsize')}:fontcolor=${p.text('fontcolor')}:borderw=2:bordercolor=black:x=(w-text_w)/2:y=h-t*${p.int('speed')}`,
    );
  },
};

function typewriterLayers(p: Params, text: string): SafeText[] {
  const size = p.int('size');
  const color = p.text('color');
  const font = fontOption(p.string('font'));
  const { x, y } = placement(p.choice('position'), 24);
  const speed = p.float('speed');
  const start = p.float('start');
  const chars = [...text];
  const layers: SafeText[] = [];
  for (let n = 1; n <= chars.length; n++) {
    const prefix = escapeFilterValue(chars.slice(0, n).join(''));
    const from = fixed(start + (n - 1) / speed, 4);
    const enable =
      n < chars.length
        ? filter`:enable='between(t\\,${from}\\,${fixed(start + n / speed, 4)})'`
        : filter`:enable='gte(t\\,${from})'`;
    layers.push(
      filter`drawtext=text=${prefix}:${font}:fontsize=${size}:fontcolor=${color}:borderw=2:bordercolor=black:x=${x}:y=${y}${enable}`,
    );
  }
  return layers;
}

const typewriterText: SkillHandler = {
  compile(p) {
    return video(...typewriterLayers(p, p.string('text')));
  },
};

// ASS colours are &HAABBGGRR.
const ASS_COLOURS: Record<string, string> = {
  white: '&H00FFFFFF',
  black: '&H00000000',
  red: '&H000000FF',
  green: '&H0000FF00',
  blue: '&H00FF0000',
  yellow: '&H0000FFFF',
  cyan: '&H00FFFF00',
  magenta: '&H00FF00FF',
};

const burnSubtitles: SkillHandler = {
  compile(p) {
    const path = validatePath(p.string('path'), 'subtitle');
    const colour = escapeFilterValue(ASS_COLOURS[p.string('fontcolor').toLowerCase()] ?? '&H00FFFFFF');
    return video(
      filter`subtitles=${escapeFilterValue(path)}:force_style='FontSize=${p.int('fontsize')}\\,PrimaryColour=${colour}'`,
    );
  },
};

const animatedText: SkillHandler = {
  compile(p) {
    const start = p.float('start');
    const since = filter`(t-${start})`;
    let motion: SafeText;
    switch (p.choice('animation')) {
      case 'fade_in':
        motion = filter`y=(h-text_h)/2:alpha='min(${since},1)'`;
        break;
      case 'slide_up':
        motion = filter`y='max(h-${since}*${p.int('speed')},(h-text_h)/2)'`;
        break;
      case 'slide_down':
        motion = filter`y='min(${since}*${p.int('speed')}-text_h,(h-text_h)/2)'`;
        break;
      default:
        motion = filter`y=(h-text_h)/2`;
    }
    return video(
      filter`drawtext=text=${p.text('text')}:fontsize=${p.int('fontsize')}:fontcolor=${p.text('fontcolor')}:borderw=2:bordercolor=black:x=(w-text_w)/2:${motion}${between(start, start + p.float('duration'))}`,
    );
  },
};

const ticker: SkillHandler = {
  compile(p) {
    const size = p.int('fontsize');
    const y = p.choice('position') === 'top' ? filter`12` : filter`h-text_h-12`;
    return video(
      filter`drawtext=text=${p.text('text')}:fontsize=${size}:fontcolor=${p.text('fontcolor')}:box=1:boxcolor=${p.text('background')}:boxborderw=8:x=w-mod(t*${p.int('speed')}\\,w+text_w):y=${y}`,
    );
  },
};

const bounceText: SkillHandler = {
  compile(p) {
    const start = p.float('start');
    const since = filter`(t-${start})`;
    const height = p.int('height');
    // the bounce decays to rest within half a second
    const y = filter`(h-text_h)/2-abs(sin(${since}*5)*${height}*max(0,1-${since}*2))`;
    return video(
      filter`drawtext=text=${p.text('text')}:fontsize=${p.int('fontsize')}:fontcolor=${p.text('fontcolor')}:borderw=2:bordercolor=black:x=(w-text_w)/2:y='${y}'${between(start, start + p.float('duration'))}`,
    );
  },
};

const fadeText: SkillHandler = {
  compile(p) {
    const start = p.float('start');
    const end = start + p.float('duration');
    const fade = p.float('fade');
    if (fade * 2 > end - start) {
      throw new ValidationError(`Skill 'fade_text': fade (${fade}) must fit twice into duration (${end - start})`, {
        skill: 'fade_text',
        param: 'fade',
      });
    }
    const alpha = filter`if(lt(t,${start + fade}),(t-${start})/${fade},if(gt(t,${end - fade}),(${end}-t)/${fade},1))`;
    const { x, y } = placement(p.choice('position'), 24);
    return video(
      filter`drawtext=text=${p.text('text')}:fontsize=${p.int('fontsize')}:fontcolor=${p.text('fontcolor')}:borderw=2:bordercolor=black:x=${x}:y=${y}:alpha='${alpha}'${between(start, end)}`,
    );
  },
};

/** One base layer, then word prefixes in the fill colour lit one after another. */
const karaokeText: SkillHandler = {
  compile(p) {
    const words = p.string('text').split(/\s+/).filter(Boolean);
    const size = p.int('fontsize');
    const start = p.float('start');
    const end = start + p.float('duration');
    const step = (end - start) / Math.max(words.length, 1);
    // prefixes share the left edge of the full line
    const head = filter`fontsize=${size}:borderw=2:bordercolor=black:x=${p.int('x')}:y=h-${size}-${p.int('margin')}`;
    const layers = [
      filter`drawtext=text=${escapeFilterValue(words.join(' '))}:${head}:fontcolor=${p.text('base_color')}${between(start, end)}`,
    ];
    words.forEach((_word, i) => {
      const prefix = escapeFilterValue(words.slice(0, i + 1).join(' '));
      const from = fixed(start + i * step, 3);
      layers.push(
        filter`drawtext=text=${prefix}:${head}:fontcolor=${p.text('fill_color')}:enable='between(t,${from},${end})'`,
      );
    });
    return video(...layers);
  },
};

export const TEXT_HANDLERS: Record<string, SkillHandler> = {
  text_overlay: textOverlay,
  lower_third: lowerThird,
  countdown,
  scrolling_text: scrollingText,
  typewriter_text: typewriterText,
  burn_subtitles: burnSubtitles,
  animated_text: animatedText,
  ticker,
  bounce_text: bounceText,
  fade_text: fadeText,
  karaoke_text: karaokeText,
};
