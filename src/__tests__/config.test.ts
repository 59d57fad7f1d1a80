import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { delimiter, join } from 'node:path';
import { contextDefaults, loadProjectConfig } from '../shared/config.js';
import { ConfigurationError } from '../shared/errors.js';
import { createTempDir, type TempDir } from './test-helpers.js';

describe('loadProjectConfig', () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = createTempDir();
  });

  afterEach(() => tmp.cleanup());

  it('falls back to defaults without a config file', () => {
    const config = loadProjectConfig({ cwd: tmp.dir, env: {} });
    expect(config.source).toBeUndefined();
    expect(config.skill_dirs).toEqual([]);
    expect(config.api).toEqual({ host: '127.0.0.1', port: 7900 });
    expect(contextDefaults(config)).toEqual({ fps: 25, width: 1920, height: 1080, stillDuration: 4 });
  });

  it('reads skillc.yaml from the working directory', () => {
    const path = tmp.file('skillc.yaml', 'skill_dirs: [my-skills]\nlog_level: warn\ndefaults:\n  fps: 30\n  still_duration: 2\n');
    const config = loadProjectConfig({ cwd: tmp.dir, env: {} });
    expect(config.source).toBe(path);
    expect(config.skill_dirs).toEqual([join(tmp.dir, 'my-skills')]);
    expect(config.log_level).toBe('warn');
    expect(contextDefaults(config)).toEqual({ fps: 30, width: 1920, height: 1080, stillDuration: 2 });
  });

  it('resolves skill directories against the config file, not the cwd', () => {
    tmp.file('conf/project.yaml', 'skill_dirs: [../looks, /abs/skills]\n');
    const config = loadProjectConfig({ cwd: tmp.dir, path: 'conf/project.yaml', env: {} });
    expect(config.skill_dirs).toEqual([join(tmp.dir, 'looks'), '/abs/skills']);
  });

  it('honours SKILLC_CONFIG and appends SKILLC_SKILL_DIRS', () => {
    tmp.file('alt.yaml', 'api:\n  port: 8123\n');
    const config = loadProjectConfig({
      cwd: tmp.dir,
      env: { SKILLC_CONFIG: 'alt.yaml', SKILLC_SKILL_DIRS: ['one', '', 'two'].join(delimiter) },
    });
    expect(config.api.port).toBe(8123);
    expect(config.skill_dirs).toEqual([join(tmp.dir, 'one'), join(tmp.dir, 'two')]);
  });

  it('fails on an explicit path that does not exist', () => {
    expect(() => loadProjectConfig({ cwd: tmp.dir, path: 'missing.yaml', env: {} })).toThrow(
      `Config file not found: ${join(tmp.dir, 'missing.yaml')}`,
    );
  });

  it('rejects unknown keys and bad values', () => {
    tmp.file('skillc.yaml', 'skill_dir: [typo]\n');
    expect(() => loadProjectConfig({ cwd: tmp.dir, env: {} })).toThrow(ConfigurationError);
    tmp.file('skillc.yaml', 'api:\n  port: 70000\n');
    expect(() => loadProjectConfig({ cwd: tmp.dir, env: {} })).toThrow('api.port');
  });

  it('reports YAML syntax errors with the file name', () => {
    const path = tmp.file('skillc.yaml', 'skill_dirs: [unclosed\n');
    expect(() => loadProjectConfig({ cwd: tmp.dir, env: {} })).toThrow(`Failed to read ${path}`);
  });
});
