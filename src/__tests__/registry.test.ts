import { describe, it, expect, beforeEach } from '@jest/globals';
import { Registry } from '../skills/registry.js';
import { ConfigurationError } from '../shared/errors.js';
import { makeSkill } from './test-helpers.js';

const brightness = makeSkill({
  name: 'brightness',
  description: 'Adjust brightness',
  parameters: [{ name: 'value', type: 'float', default: 0.1, min: -1, max: 1 }],
  tags: ['Color'],
  aliases: ['bright_up'],
});
const volume = makeSkill({ name: 'volume', category: 'audio', description: 'Change loudness', tags: ['mix'] });

function pipeline(name: string, steps: string[]) {
  return makeSkill({
    name,
    category: 'custom',
    strategy: { kind: 'pipeline', steps: steps.map((skill) => ({ skill, params: {} })) },
  });
}

describe('Registry', () => {
  let registry: Registry;

  beforeEach(() => {
    registry = new Registry();
    registry.register(brightness);
    registry.register(volume);
  });

  it('resolves names and aliases', () => {
    expect(registry.get('brightness')).toBe(brightness);
    expect(registry.get('bright_up')).toBe(brightness);
    expect(registry.get('nope')).toBeUndefined();
    expect(registry.has('bright_up')).toBe(true);
  });

  it('suggests close names for unknown skills', () => {
    try {
      registry.require('bright');
      throw new Error('expected a ConfigurationError');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.message).toBe("Unknown skill 'bright'");
        expect(err.hint).toBe('did you mean: brightness?');
      }
    }
  });

  it('indexes by category and tag', () => {
    expect(registry.listByCategory('audio').map((s) => s.name)).toEqual(['volume']);
    expect(registry.listByCategory('text')).toEqual([]);
    expect(registry.listByTag('color').map((s) => s.name)).toEqual(['brightness']);
  });

  it('searches names, descriptions, tags and aliases', () => {
    expect(registry.search('LOUD').map((s) => s.name)).toEqual(['volume']);
    expect(registry.search('bright_up').map((s) => s.name)).toEqual(['brightness']);
    expect(registry.search('  ')).toEqual([]);
  });

  it('overwrites by name and drops stale aliases', () => {
    registry.register(makeSkill({ name: 'brightness', description: 'v2' }));
    expect(registry.get('brightness')?.description).toBe('v2');
    expect(registry.get('bright_up')).toBeUndefined();
    expect(registry.size).toBe(2);
  });

  it('rebuilds the catalogue after every write', () => {
    const before = registry.toCatalogText();
    expect(before).toContain('### brightness');
    expect(before).toContain('  - value (float):  (range: -1..1) [optional, default=0.1]');
    expect(before).not.toContain('### contrast');
    registry.register(makeSkill({ name: 'contrast' }));
    expect(registry.toCatalogText()).toContain('### contrast');
  });

  it('bumps the revision on writes only', () => {
    const rev = registry.revision;
    registry.toSchema();
    expect(registry.revision).toBe(rev);
    registry.update([makeSkill({ name: 'blur' }), makeSkill({ name: 'sharpen' })]);
    expect(registry.revision).toBe(rev + 1);
    expect(registry.names()).toEqual(['brightness', 'volume', 'blur', 'sharpen']);
  });

  it('describes every skill in the JSON schema', () => {
    const schema = registry.toSchema();
    expect(schema.properties.skill.enum).toEqual(['brightness', 'volume']);
    expect(schema.definitions['brightness']?.properties['value']).toEqual({
      type: 'number',
      description: '',
      minimum: -1,
      maximum: 1,
      default: 0.1,
    });
  });

  it('detects cyclic sub-pipelines', () => {
    registry.register(pipeline('loop_a', ['brightness', 'loop_b']));
    registry.register(pipeline('loop_b', ['loop_a']));
    expect(() => registry.assertAcyclic('loop_a')).toThrow('Cyclic sub-pipeline: loop_a -> loop_b -> loop_a');
  });

  it('reports broken sub-pipelines from verify', () => {
    registry.register(pipeline('look', ['brightness', 'volume']));
    expect(registry.verify()).toEqual([]);
    registry.register(pipeline('broken', ['ghost']));
    expect(registry.verify()).toEqual(["broken: Unknown skill 'ghost'"]);
  });
});
