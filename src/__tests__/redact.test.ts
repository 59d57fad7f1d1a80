import { describe, it, expect } from '@jest/globals';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { canonicalJson, jsonHash, redact } from '../shared/redact.js';

describe('Redaction', () => {
  it('replaces the home directory with ~', () => {
    const home = homedir();
    if (!home || home === '/') return;
    expect(redact(`reading ${join(home, 'clips', 'a.mp4')}`)).toBe(`reading ${join('~', 'clips', 'a.mp4')}`);
  });

  it('leaves other paths alone', () => {
    expect(redact('/srv/media/a.mp4')).toBe('/srv/media/a.mp4');
  });
});

describe('canonicalJson', () => {
  it('sorts keys at every depth and drops undefined', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: null }], c: undefined } })).toBe(
      '{"a":{"d":[2,{"y":null,"z":1}]},"b":1}',
    );
  });

  it('renders top-level undefined as null', () => {
    expect(canonicalJson(undefined)).toBe('null');
  });
});

describe('jsonHash', () => {
  it('ignores key order', () => {
    expect(jsonHash({ skill: 'trim', params: { start: 1, end: 2 } })).toBe(
      jsonHash({ params: { end: 2, start: 1 }, skill: 'trim' }),
    );
  });

  it('is a hex SHA-256 digest', () => {
    expect(jsonHash([])).toMatch(/^[0-9a-f]{64}$/);
    expect(jsonHash([1])).not.toBe(jsonHash([2]));
  });
});
