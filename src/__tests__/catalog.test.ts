import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { join } from 'node:path';
import { Composer } from '../runtime/composer.js';
import { toArgv } from '../runtime/emitter.js';
import { createRegistry } from '../skills/builtin.js';
import { PipelineRequestSchema } from '../shared/schemas.js';
import { createTempDir, type TempDir } from './test-helpers.js';

// Every built-in skill, compiled alone with its defaults.
describe('built-in catalogue', () => {
  const registry = createRegistry();
  const composer = new Composer({ registry });
  let tmp: TempDir;
  let input: string;
  let extras: string[];
  let required: Record<string, Record<string, string>>;

  beforeAll(() => {
    tmp = createTempDir();
    input = tmp.file('input.mp4');
    extras = [tmp.file('b.mp4'), tmp.file('logo.png'), tmp.file('music.mp3')];
    required = {
      burn_subtitles: { path: tmp.file('subs.srt', '1\n00:00:00,000 --> 00:00:01,000\nHi\n') },
      lut_apply: { path: tmp.file('look.cube', 'LUT_3D_SIZE 2\n') },
    };
  });

  afterAll(() => tmp.cleanup());

  it('loads cleanly', () => {
    expect(registry.verify()).toEqual([]);
    expect(registry.size).toBeGreaterThan(100);
  });

  it.each(registry.names())('compiles %s with default parameters', (name) => {
    const request = PipelineRequestSchema.parse({
      steps: [{ skill: name, params: required[name] ?? {} }],
      context: { input, output: join(tmp.dir, 'out.mp4'), extra_inputs: extras, duration: 10 },
    });
    const argv = toArgv(composer.compile(request));
    expect(argv[0]).toBe('ffmpeg');
    expect(argv).toContain(input);
  });

  it('has a schema entry per skill', () => {
    const schema = registry.toSchema();
    expect(Object.keys(schema.definitions)).toEqual(registry.names());
    expect(schema.properties.skill.enum).toEqual(registry.names());
    expect(schema.definitions['lut_apply']?.required).toEqual(['path']);
  });
});
