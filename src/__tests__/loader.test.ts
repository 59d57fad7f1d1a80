import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { join } from 'node:path';
import { loadSkillDirectory, parseSkillDocument, placeholders, type LoaderOptions } from '../skills/loader.js';
import { Registry } from '../skills/registry.js';
import { ConfigurationError } from '../shared/errors.js';
import { createTempDir, type TempDir } from './test-helpers.js';

const opts: LoaderOptions = { hasHandler: (name) => name === 'xfade' };

function parseOne(yaml: string) {
  const defs = parseSkillDocument(yaml, 'test.yaml', opts);
  expect(defs).toHaveLength(1);
  const [def] = defs;
  if (!def) throw new Error('no definition parsed');
  return def;
}

describe('parseSkillDocument', () => {
  it('parses a template skill', () => {
    const def = parseOne(`
name: warm_glow
category: visual
description: Warm tint
parameters:
  amount: { type: number, default: 0.3, min: 0, max: 1, aliases: strength }
template: "colorbalance=rs={amount}"
`);
    expect(def.strategy).toEqual({ kind: 'template', template: 'colorbalance=rs={amount}', target: 'video' });
    expect(def.parameters).toEqual([
      {
        name: 'amount',
        type: 'float',
        description: '',
        required: false,
        default: 0.3,
        min: 0,
        max: 1,
        choices: undefined,
        aliases: ['strength'],
      },
    ]);
  });

  it('targets audio for audio skills and output for option templates', () => {
    const [echo, fast] = parseSkillDocument(
      `
skills:
  - name: small_echo
    category: audio
    template: "aecho=0.8:0.9:40:0.3"
  - name: fast_start
    category: encoding
    template: "-movflags +faststart"
`,
      'test.yaml',
      opts,
    );
    expect(echo?.strategy).toEqual({ kind: 'template', template: 'aecho=0.8:0.9:40:0.3', target: 'audio' });
    expect(fast?.strategy).toEqual({ kind: 'template', template: '-movflags +faststart', target: 'output' });
  });

  it('maps unknown categories to custom', () => {
    expect(parseOne('name: odd\ncategory: Mystery\ntemplate: hflip').category).toBe('custom');
  });

  it('accepts shorthand pipeline steps', () => {
    const def = parseOne(`
name: moody
parameters:
  angle: { type: float, default: 0.5 }
pipeline:
  - hflip
  - skill: vignette
    params: { angle: "{angle}" }
`);
    expect(def.strategy).toEqual({
      kind: 'pipeline',
      steps: [
        { skill: 'hflip', params: {} },
        { skill: 'vignette', params: { angle: '{angle}' } },
      ],
    });
  });

  it('rejects undeclared template placeholders', () => {
    expect(() => parseOne('name: bad\ntemplate: "eq=gamma={gamma}"')).toThrow(
      "Skill 'bad' template references undeclared parameter '{gamma}'",
    );
  });

  it('rejects undeclared placeholders in pipeline steps', () => {
    expect(() => parseOne('name: bad\npipeline:\n  - skill: vignette\n    params: { angle: "{a}" }')).toThrow(
      "Skill 'bad' pipeline step 'vignette' references undeclared parameter '{a}'",
    );
  });

  it('requires exactly one strategy', () => {
    expect(() => parseOne('name: both\ntemplate: hflip\nhandler: xfade')).toThrow(
      'exactly one of template, pipeline or handler is required',
    );
    expect(() => parseOne('name: neither')).toThrow(ConfigurationError);
  });

  it('checks handler names', () => {
    expect(parseOne('name: blend\nhandler: xfade').strategy).toEqual({ kind: 'handler', handler: 'xfade' });
    expect(() => parseOne('name: spin\nhandler: spin')).toThrow("Skill 'spin' names unknown handler 'spin'");
  });

  it('validates defaults against their own bounds', () => {
    expect(() => parseOne('name: hot\nparameters:\n  v: { type: float, default: 5, max: 1 }\ntemplate: "eq=gamma={v}"')).toThrow(
      "Skill 'hot' parameter 'v' has an invalid default",
    );
  });

  it('rejects unknown parameter types and choiceless enums', () => {
    expect(() => parseOne('name: t\nparameters:\n  v: { type: vector }\ntemplate: "x={v}"')).toThrow("unknown type 'vector'");
    expect(() => parseOne('name: t\nparameters:\n  v: { type: enum }\ntemplate: "x={v}"')).toThrow('declares no choices');
  });

  it('rejects malformed names and YAML', () => {
    expect(() => parseOne('name: Bad-Name\ntemplate: hflip')).toThrow('skill names are lower_snake_case');
    expect(() => parseSkillDocument('name: [unclosed', 'broken.yaml', opts)).toThrow('Failed to parse YAML in broken.yaml');
  });
});

describe('placeholders', () => {
  it('lists placeholder names in order', () => {
    expect(placeholders('a={x}:b={y_2}:c={x}')).toEqual(['x', 'y_2', 'x']);
  });
});

describe('loadSkillDirectory', () => {
  let tmp: TempDir;
  let registry: Registry;

  beforeEach(() => {
    tmp = createTempDir();
    registry = new Registry();
  });

  afterEach(() => tmp.cleanup());

  it('loads top-level files and packs, skipping broken files', () => {
    tmp.file('mirror.yaml', 'name: mirror\ntemplate: hflip\n');
    tmp.file('broken.yml', 'name: broken\n');
    tmp.file('notes.txt', 'not a skill');
    tmp.file('retro/pack.yaml', 'name: retro\nversion: "1.0"\n');
    tmp.file('retro/skills/sepia_pro.yaml', 'name: sepia_pro\ncategory: visual\ntemplate: "colorchannelmixer=.393:.769:.189"\n');

    expect(loadSkillDirectory(tmp.dir, registry, opts)).toBe(2);
    expect(registry.names().sort()).toEqual(['mirror', 'sepia_pro']);
    expect(registry.get('sepia_pro')?.source).toBe(join(tmp.dir, 'retro', 'skills', 'sepia_pro.yaml'));
  });

  it('loads YAML at the pack root when there is no skills/ folder', () => {
    tmp.file('flat/pack.yaml', 'name: flat\n');
    tmp.file('flat/flip.yaml', 'name: flip\ntemplate: vflip\n');
    expect(loadSkillDirectory(tmp.dir, registry, opts)).toBe(1);
    expect(registry.has('flip')).toBe(true);
  });

  it('still loads a pack whose pack.yaml is malformed', () => {
    tmp.file('broken_pack/pack.yaml', 'name: [unclosed\n');
    tmp.file('broken_pack/skills/flop.yaml', 'name: flop\ntemplate: hflip\n');
    tmp.file('odd_pack/pack.yaml', 'version: 2\n');
    tmp.file('odd_pack/flap.yaml', 'name: flap\ntemplate: vflip\n');
    expect(loadSkillDirectory(tmp.dir, registry, opts)).toBe(2);
    expect(registry.names().sort()).toEqual(['flap', 'flop']);
  });

  it('returns 0 for a missing directory', () => {
    expect(loadSkillDirectory(join(tmp.dir, 'absent'), registry, opts)).toBe(0);
  });
});
