import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { join } from 'node:path';
import { buildRequest } from '../cli/commands/compile.js';
import { ValidationError } from '../shared/errors.js';
import { createTempDir, type TempDir } from './test-helpers.js';

describe('buildRequest', () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = createTempDir();
  });

  afterEach(() => tmp.cleanup());

  it('accepts a bare step list with context flags', () => {
    const request = buildRequest([{ skill: 'hflip' }], { input: 'in.mp4', output: 'out.mp4', duration: 12 });
    expect(request.steps).toEqual([{ skill: 'hflip', params: {} }]);
    expect(request.context.input).toBe('in.mp4');
    expect(request.context.duration).toBe(12);
  });

  it('lets flags override the file context', () => {
    const doc = { steps: [], context: { input: 'a.mp4', output: 'b.mp4', fps: 30 } };
    const request = buildRequest(doc, { output: 'c.mp4', audio: false });
    expect(request.context.output).toBe('c.mp4');
    expect(request.context.fps).toBe(30);
    expect(request.context.has_audio).toBe(false);
  });

  it('reads text inputs from their files', () => {
    const caption = tmp.file('caption.txt', 'Opening night');
    const envelope = tmp.file('title.json', '{"mode":"overlay","text":"Hi"}');
    const request = buildRequest([], { input: 'in.mp4', output: 'out.mp4', text: [caption, envelope] });
    expect(request.context.text_inputs).toEqual(['Opening night', '{"mode":"overlay","text":"Hi"}']);
  });

  it('reports a text file that cannot be read', () => {
    const missing = join(tmp.dir, 'gone.txt');
    expect(() => buildRequest([], { input: 'in.mp4', output: 'out.mp4', text: [missing] })).toThrow(ValidationError);
    expect(() => buildRequest([], { input: 'in.mp4', output: 'out.mp4', text: [missing] })).toThrow(`Cannot read ${missing}: `);
  });

  it('names what is missing from the request', () => {
    try {
      buildRequest([], {});
      throw new Error('expected a ValidationError');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) expect(err.message).toBe('Invalid pipeline request');
    }
  });
});
