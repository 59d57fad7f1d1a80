import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import {
  allowedExtensions,
  classifyMedia,
  hasTraversal,
  validateOutputPath,
  validatePath,
} from '../security/paths.js';
import { SanitizationError } from '../shared/errors.js';
import { createTempDir, type TempDir } from './test-helpers.js';

describe('validatePath', () => {
  let tmp: TempDir;

  beforeAll(() => {
    tmp = createTempDir();
  });

  afterAll(() => tmp.cleanup());

  it('returns the absolute path of an existing file', () => {
    const clip = tmp.file('clip.mp4');
    expect(validatePath(clip, 'media')).toBe(resolve(clip));
  });

  it('rejects traversal segments', () => {
    expect(() => validatePath('../secret.mp4', 'media')).toThrow('directory traversal');
    expect(() => validatePath('a/../../b.mp4', 'media')).toThrow(SanitizationError);
  });

  it('rejects extensions outside the purpose allowlist', () => {
    const exe = tmp.file('tool.exe');
    expect(() => validatePath(exe, 'media')).toThrow('Extension ".exe" is not allowed for media files');
    const srt = tmp.file('subs.srt');
    expect(() => validatePath(srt, 'lut')).toThrow(SanitizationError);
    expect(validatePath(srt, 'subtitle')).toBe(resolve(srt));
  });

  it('requires files to exist by default', () => {
    const missing = join(tmp.dir, 'missing.mp4');
    expect(() => validatePath(missing, 'media')).toThrow(`File not found: ${missing}`);
    expect(validatePath(missing, 'media', { mustExist: false })).toBe(missing);
  });

  it('rejects directories', () => {
    const dir = join(tmp.dir, 'folder.mp4');
    mkdirSync(dir);
    expect(() => validatePath(dir, 'media')).toThrow('not a regular file');
  });

  it('rejects empty paths and NUL bytes', () => {
    expect(() => validatePath('  ', 'media')).toThrow('media path cannot be empty');
    expect(() => validatePath('a\0.mp4', 'media')).toThrow('NUL byte');
  });

  it('carries the offending path on the error', () => {
    try {
      validatePath('../x.mp4', 'media');
      throw new Error('expected a SanitizationError');
    } catch (err) {
      expect(err).toBeInstanceOf(SanitizationError);
      expect(err instanceof SanitizationError ? err.path : undefined).toBe('../x.mp4');
    }
  });
});

describe('validateOutputPath', () => {
  it('refuses system directories', () => {
    expect(() => validateOutputPath('/etc/out.mp4')).toThrow('Refusing to write output into a system directory');
    expect(() => validateOutputPath('/usr/local/out.mp4')).toThrow(SanitizationError);
  });

  it('does not require the output to exist', () => {
    expect(validateOutputPath('/tmp/skillc-not-created.mp4')).toBe('/tmp/skillc-not-created.mp4');
  });
});

describe('media helpers', () => {
  it('classifies by extension', () => {
    expect(classifyMedia('a.PNG')).toBe('image');
    expect(classifyMedia('b.wav')).toBe('audio');
    expect(classifyMedia('c.mkv')).toBe('video');
    expect(classifyMedia('d.txt')).toBeUndefined();
  });

  it('detects traversal on either separator', () => {
    expect(hasTraversal('a\\..\\b')).toBe(true);
    expect(hasTraversal('a/..b/c')).toBe(false);
  });

  it('exposes the allowlists', () => {
    expect(allowedExtensions('font').has('.ttf')).toBe(true);
    expect(allowedExtensions('lut').has('.cube')).toBe(true);
  });
});
