import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { join } from 'node:path';
import { Composer } from '../runtime/composer.js';
import { BUILTIN_HANDLERS, createHandlerTable, hasHandler } from '../runtime/handlers/index.js';
import { xfadeOffsets } from '../runtime/handlers/multi-input.js';
import { atempoChain } from '../runtime/handlers/temporal.js';
import { placement, readTextPayload } from '../runtime/handlers/text.js';
import { video } from '../runtime/handlers/result.js';
import { filter } from '../security/escape.js';
import { createRegistry } from '../skills/builtin.js';
import { PipelineRequestSchema } from '../shared/schemas.js';
import { createTempDir, type TempDir } from './test-helpers.js';

describe('atempoChain', () => {
  it('splits factors outside 0.5..2 into several instances', () => {
    expect(atempoChain(4).map(String)).toEqual(['atempo=2.0', 'atempo=2.0']);
    expect(atempoChain(3).map(String)).toEqual(['atempo=2.0', 'atempo=1.5']);
    expect(atempoChain(0.25).map(String)).toEqual(['atempo=0.5', 'atempo=0.5']);
    expect(atempoChain(1).map(String)).toEqual(['atempo=1.0']);
  });
});

describe('xfadeOffsets', () => {
  it('starts each transition one overlap before the running end', () => {
    expect(xfadeOffsets([10, 5, 8], 1)).toEqual([9, 13]);
  });

  it('never goes negative', () => {
    expect(xfadeOffsets([0.5, 3], 1)).toEqual([0]);
  });
});

describe('text side channel', () => {
  it('treats non-JSON input as literal text', () => {
    expect(readTextPayload(['Hello there'])).toEqual({ kind: 'literal', text: 'Hello there' });
  });

  it('skips JSON without a known mode', () => {
    expect(readTextPayload(['{"mode":"karaoke","text":"x"}', '42'])).toBeUndefined();
  });

  it('accepts an envelope', () => {
    expect(readTextPayload(['{"mode":"overlay","text":"Hi","font_size":60}'])).toEqual({
      kind: 'envelope',
      envelope: { mode: 'overlay', text: 'Hi', font_size: 60 },
    });
  });

  it('places text by position name', () => {
    const { x, y } = placement('bottom_right', 10);
    expect(`${x}:${y}`).toBe('w-text_w-10:h-text_h-10');
  });
});

describe('handler table', () => {
  it('knows every built-in handler', () => {
    expect(hasHandler('xfade')).toBe(true);
    expect(hasHandler('teleport')).toBe(false);
    expect(BUILTIN_HANDLERS.size).toBeGreaterThan(50);
  });

  it('accepts additional handlers', () => {
    const table = createHandlerTable({ mirror: { compile: () => video(filter`hflip`) } });
    expect(hasHandler('mirror', table)).toBe(true);
    expect(hasHandler('xfade', table)).toBe(true);
  });
});

describe('handlers through the composer', () => {
  let tmp: TempDir;
  let composer: Composer;
  let input: string;
  let output: string;

  function vf(skill: string, params: Record<string, unknown> = {}, context: Record<string, unknown> = {}): string | undefined {
    const cmd = composer.compile(
      PipelineRequestSchema.parse({ steps: [{ skill, params }], context: { input, output, ...context } }),
    );
    return cmd.filter.kind === 'chain' ? cmd.filter.video : undefined;
  }

  beforeAll(() => {
    tmp = createTempDir();
    input = tmp.file('input.mp4');
    output = join(tmp.dir, 'out.mp4');
    composer = new Composer({ registry: createRegistry() });
  });

  afterAll(() => tmp.cleanup());

  it('escapes overlay text and uses a font family by name', () => {
    expect(vf('text_overlay', { text: 'Hi: there' })).toBe(
      'drawtext=text=Hi\\: there:font=Sans:fontsize=48:fontcolor=white:borderw=2:bordercolor=black:x=(w-text_w)/2:y=h-text_h-24',
    );
  });

  it('takes text and size from a side-channel envelope', () => {
    const text = vf('text', {}, { text_inputs: ['{"mode":"overlay","text":"From notes","font_size":60}'] });
    expect(text?.startsWith('drawtext=text=From notes:font=Sans:fontsize=60:')).toBe(true);
  });

  it('validates subtitle and LUT paths before embedding them', () => {
    const subs = tmp.file('talk.srt');
    const lut = tmp.file('film.cube');
    expect(vf('burn_subtitles', { path: subs })).toBe(
      `subtitles=${subs}:force_style='FontSize=24\\,PrimaryColour=&H00FFFFFF'`,
    );
    expect(vf('lut_apply', { path: lut })).toBe(`lut3d=file=${lut}`);
    expect(() => vf('lut_apply', { path: subs })).toThrow('is not allowed for lut files');
  });

  it('ends fade-outs with the clip', () => {
    expect(vf('fade', { type: 'both' }, { duration: 10 })).toBe('fade=t=in:st=0:d=1.0,fade=t=out:st=9.0:d=1.0');
    expect(vf('fade_to_white', { out_duration: 2 }, { duration: 10 })).toBe(
      'fade=t=in:st=0:d=1.0:c=white,fade=t=out:st=8.0:d=2.0:c=white',
    );
    expect(vf('fade_to_black', { in_duration: 0, out_duration: 3 }, { duration: 2 })).toBe('fade=t=out:st=0.0:d=3.0');
  });

  it('needs the input duration for a fade-out', () => {
    expect(() => vf('fade_to_black')).toThrow("Skill 'fade_to_black' needs the input duration to place its fade-out");
    expect(vf('fade_to_black', { out_duration: 0 })).toBe('fade=t=in:st=0:d=1.0');
  });

  it('turns speed into radians per second for spin', () => {
    expect(vf('spin', { speed: 180, direction: 'ccw' })).toBe('rotate=-3.141593*t:fillcolor=black');
  });

  it('jitters a cropped window for shake', () => {
    expect(vf('shake', { intensity: 'heavy' })).toBe(
      'crop=iw-50:ih-50:25+25*random(1):25+25*random(2),scale=iw+50:ih+50',
    );
  });

  it('slides the picture in over a doubled canvas', () => {
    expect(vf('slide_in', { direction: 'right' })).toBe('pad=iw*2:ih:iw:0:black,crop=iw/2:ih:iw/2*min(t/1.0\\,1):0');
  });

  it('weights every blended frame equally', () => {
    expect(vf('motion_blur', { frames: 3 })).toBe("tmix=frames=3:weights='1 1 1'");
  });

  it('mixes full sepia from the sepia matrix', () => {
    expect(vf('sepia', { intensity: 1 })).toBe(
      'colorchannelmixer=rr=0.393:rg=0.769:rb=0.189:gr=0.349:gg=0.686:gb=0.168:br=0.272:bg=0.534:bb=0.131',
    );
  });

  it('lights karaoke words one at a time', () => {
    const head = 'fontsize=48:borderw=2:bordercolor=black:x=60:y=h-48-60';
    expect(vf('karaoke_text', { text: 'la  la la', duration: 3 })).toBe(
      [
        `drawtext=text=la la la:${head}:fontcolor=white:enable='between(t,0,3)'`,
        `drawtext=text=la:${head}:fontcolor=yellow:enable='between(t,0.000,3)'`,
        `drawtext=text=la la:${head}:fontcolor=yellow:enable='between(t,1.000,3)'`,
        `drawtext=text=la la la:${head}:fontcolor=yellow:enable='between(t,2.000,3)'`,
      ].join(','),
    );
  });

  it('needs room for both text fades', () => {
    expect(() => vf('fade_text', { duration: 1, fade: 1 })).toThrow(
      "Skill 'fade_text': fade (1) must fit twice into duration (1)",
    );
  });

  it('spaces preview frames over the clip', () => {
    expect(vf('preview_strip', { frames: 5 }, { duration: 10 })).toBe('fps=0.5000,scale=320:-1,tile=5x1');
    expect(() => vf('preview_strip')).toThrow("Skill 'preview_strip' needs the input duration to space its frames");
  });

  it('renders named looks from their lookup tables', () => {
    expect(vf('denoise', { strength: 'strong' })).toBe('hqdn3d=6:4:9:6');
    expect(vf('grade', { look: 'cool' })).toBe('eq=saturation=1.1:contrast=1.05,colorbalance=rs=-0.1:gs=0.0:bs=0.15');
  });
});
