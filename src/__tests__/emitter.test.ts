import { describe, it, expect } from '@jest/globals';
import { shellQuote, toArgv, toShellString } from '../runtime/emitter.js';
import type { CommandDescriptor } from '../runtime/types.js';
import { CompileInvariantViolation } from '../shared/errors.js';

function descriptor(overrides: Partial<CommandDescriptor> = {}): CommandDescriptor {
  return {
    binary: 'ffmpeg',
    globalFlags: ['-y'],
    inputs: [{ path: '/media/in.mp4', flags: ['-ss', '5'] }, { path: '/media/logo.png', flags: [] }],
    filter: { kind: 'graph', graph: '[0:v][1:v]overlay=W-w-20:20[s1_out]' },
    outputFlags: ['-c:v', 'libx264'],
    maps: ['[s1_out]', '0:a?'],
    output: '/media/out.mp4',
    warnings: [],
    ...overrides,
  };
}

describe('toArgv', () => {
  it('orders global flags, inputs, filters, output flags, maps and output', () => {
    expect(toArgv(descriptor())).toEqual([
      'ffmpeg', '-y',
      '-ss', '5', '-i', '/media/in.mp4',
      '-i', '/media/logo.png',
      '-filter_complex', '[0:v][1:v]overlay=W-w-20:20[s1_out]',
      '-c:v', 'libx264',
      '-map', '[s1_out]', '-map', '0:a?',
      '/media/out.mp4',
    ]);
  });

  it('emits -vf and -af for simple chains', () => {
    const argv = toArgv(descriptor({ filter: { kind: 'chain', video: 'hflip', audio: 'volume=2.0' }, maps: [] }));
    expect(argv.slice(8, 12)).toEqual(['-vf', 'hflip', '-af', 'volume=2.0']);
  });

  it('refuses an input flag among the output flags', () => {
    expect(() => toArgv(descriptor({ outputFlags: ['-i', '/etc/passwd'] }))).toThrow(CompileInvariantViolation);
  });
});

describe('shellQuote', () => {
  it('leaves plain words alone', () => {
    expect(shellQuote('libx264')).toBe('libx264');
    expect(shellQuote('/media/out.mp4')).toBe('/media/out.mp4');
  });

  it('single-quotes anything else', () => {
    expect(shellQuote('')).toBe("''");
    expect(shellQuote('[v0]')).toBe("'[v0]'");
    expect(shellQuote('0:a?')).toBe("'0:a?'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });

  it('renders a whole command', () => {
    expect(toShellString(descriptor({ filter: { kind: 'chain', video: "drawtext=text='Hi'" }, maps: [], inputs: [{ path: '/in.mp4', flags: [] }] }))).toBe(
      "ffmpeg -y -i /in.mp4 -vf 'drawtext=text='\\''Hi'\\''' -c:v libx264 /media/out.mp4",
    );
  });
});
