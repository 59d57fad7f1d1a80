import { describe, it, expect } from '@jest/globals';
import { createRegistry } from '../skills/builtin.js';
import { fuzzyMatchChoice, normalizeParams, parseTime, validateValue } from '../skills/params.js';
import type { RawParams } from '../skills/types.js';
import { ValidationError } from '../shared/errors.js';
import { makeSkill } from './test-helpers.js';

const xfade = makeSkill({
  name: 'xfade',
  category: 'multi_input',
  parameters: [
    { name: 'transition', type: 'enum', choices: ['fade', 'wipeleft', 'fadeblack'], default: 'fade', aliases: ['effect'] },
    { name: 'duration', type: 'float', default: 1, min: 0.1, max: 10 },
  ],
});

const mixed = makeSkill({
  name: 'mixed',
  parameters: [
    { name: 'count', type: 'int', min: 1 },
    { name: 'enabled', type: 'bool' },
    { name: 'start', type: 'time' },
    { name: 'tint', type: 'color' },
    { name: 'label', type: 'string', required: true },
  ],
});

describe('fuzzyMatchChoice', () => {
  const choices = ['fade', 'wipeleft', 'fadeblack'];

  it('prefers a case-insensitive exact match', () => {
    expect(fuzzyMatchChoice('FADE', choices)).toBe('fade');
  });

  it('accepts a unique prefix', () => {
    expect(fuzzyMatchChoice('wipe', choices)).toBe('wipeleft');
  });

  it('accepts a unique substring', () => {
    expect(fuzzyMatchChoice('black', choices)).toBe('fadeblack');
  });

  it('gives up when ambiguous', () => {
    expect(fuzzyMatchChoice('fa', choices)).toBeUndefined();
    expect(fuzzyMatchChoice('', choices)).toBeUndefined();
  });
});

describe('parseTime', () => {
  it('parses seconds and clock forms', () => {
    expect(parseTime('12.5')).toBe(12.5);
    expect(parseTime('1:30')).toBe(90);
    expect(parseTime('01:02:03.5')).toBe(3723.5);
  });

  it('rejects malformed values', () => {
    expect(parseTime('1:75')).toBeUndefined();
    expect(parseTime('abc')).toBeUndefined();
    expect(parseTime('-3')).toBeUndefined();
  });
});

describe('normalizeParams', () => {
  it('fills defaults and writes them back into the raw map', () => {
    const raw: RawParams = {};
    const params = normalizeParams(xfade, raw);
    expect(params.choice('transition')).toBe('fade');
    expect(params.float('duration')).toBe(1);
    expect(raw).toEqual({ transition: 'fade', duration: 1 });
  });

  it('renames aliases to canonical names', () => {
    const raw: RawParams = { effect: 'wipeleft' };
    normalizeParams(xfade, raw);
    expect(raw).toEqual({ transition: 'wipeleft', duration: 1 });
  });

  it('rejects an alias given next to its canonical name', () => {
    expect(() => normalizeParams(xfade, { effect: 'fade', transition: 'fade' })).toThrow(
      "Skill 'xfade': both 'effect' and its canonical name 'transition' were given",
    );
  });

  it('autocorrects enum values in place', () => {
    const raw: RawParams = { transition: 'Wipe' };
    const params = normalizeParams(xfade, raw);
    expect(params.choice('transition')).toBe('wipeleft');
    expect(raw['transition']).toBe('wipeleft');
  });

  it('rejects an enum value that matches nothing', () => {
    try {
      normalizeParams(xfade, { transition: 'spin' });
      throw new Error('expected a ValidationError');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.message).toBe(`Skill 'xfade': parameter 'transition' has invalid value "spin"`);
        expect(err.hint).toBe('valid choices: fade, wipeleft, fadeblack');
        expect(err.param).toBe('transition');
      }
    }
  });

  it('treats out-of-range values as errors', () => {
    expect(() => normalizeParams(xfade, { duration: 12 })).toThrow(
      "Skill 'xfade': parameter 'duration' must be <= 10 (got 12)",
    );
    expect(() => normalizeParams(xfade, { duration: 0 })).toThrow('must be >= 0.1');
  });

  it('rejects unknown parameters with the valid names as a hint', () => {
    try {
      normalizeParams(xfade, { speed: 2 });
      throw new Error('expected a ValidationError');
    } catch (err) {
      expect(err instanceof ValidationError ? err.hint : undefined).toBe('valid parameters: transition, duration');
    }
  });

  it('coerces strings to the declared types', () => {
    const raw: RawParams = { count: '3', enabled: 'yes', start: ' 00:05 ', tint: 'white@0.5', label: 42 };
    const params = normalizeParams(mixed, raw);
    expect(params.int('count')).toBe(3);
    expect(params.bool('enabled')).toBe(true);
    expect(params.time('start')).toEqual({ seconds: 5, text: '00:05' });
    expect(params.string('tint')).toBe('white@0.5');
    expect(params.string('label')).toBe('42');
  });

  it('rejects values of the wrong shape', () => {
    expect(() => normalizeParams(mixed, { label: 'x', count: 1.5 })).toThrow('must be an integer');
    expect(() => normalizeParams(mixed, { label: 'x', enabled: 'maybe' })).toThrow('must be a boolean');
    expect(() => normalizeParams(mixed, { label: 'x', tint: 'red;drawtext' })).toThrow('must be a colour');
    expect(() => normalizeParams(mixed, { label: 'x', start: '5 minutes' })).toThrow('must be seconds or [HH:]MM:SS');
  });

  it('requires required parameters and treats null as absent', () => {
    expect(() => normalizeParams(mixed, {})).toThrow("Skill 'mixed': missing required parameter 'label'");
    expect(() => normalizeParams(mixed, { label: null })).toThrow(ValidationError);
  });

  it('drops unset optional parameters', () => {
    const raw: RawParams = { label: 'x', count: undefined };
    const params = normalizeParams(mixed, raw);
    expect(params.has('count')).toBe(false);
    expect(Object.keys(raw)).toEqual(['label']);
  });

  it('renders escaped text and float text', () => {
    const params = normalizeParams(mixed, { label: 'a:b' });
    expect(params.text('label').text).toBe('a\\:b');
    expect(normalizeParams(xfade, {}).floatText('duration').text).toBe('1.0');
  });
});

describe('built-in enum parameters', () => {
  const cases = createRegistry()
    .list()
    .flatMap((def) =>
      def.parameters.flatMap((spec) =>
        spec.type === 'enum' ? (spec.choices ?? []).map((choice) => ({ skill: def.name, spec, choice })) : [],
      ),
    );

  it('exist', () => {
    expect(cases.length).toBeGreaterThan(100);
  });

  it.each(cases.map((c) => [`${c.skill}.${c.spec.name}=${c.choice}`, c] as const))(
    'accepts %s in upper case',
    (_title, { skill, spec, choice }) => {
      expect(validateValue(skill, spec, choice.toUpperCase())).toBe(choice);
    },
  );
});
