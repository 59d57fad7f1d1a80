import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { setLogLevel } from '../shared/logger.js';
import type { ParameterSpec, SkillDefinition, SkillStrategy } from '../skills/types.js';

// Keep expected warnings out of test output.
setLogLevel('error');

export interface TempDir {
  dir: string;
  /** Create a (placeholder) file under the temp dir and return its absolute path. */
  file: (name: string, contents?: string) => string;
  cleanup: () => void;
}

export function createTempDir(prefix = 'skillc-test-'): TempDir {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return {
    dir,
    file: (name, contents = 'placeholder') => {
      const path = join(dir, name);
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, contents, 'utf8');
      return path;
    },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export type ParamFixture = Partial<ParameterSpec> & Pick<ParameterSpec, 'name' | 'type'>;

export function param(fixture: ParamFixture): ParameterSpec {
  return { description: '', required: false, aliases: [], ...fixture };
}

export interface SkillFixture {
  name: string;
  category?: SkillDefinition['category'];
  description?: string;
  parameters?: ParamFixture[];
  strategy?: SkillStrategy;
  tags?: string[];
  aliases?: string[];
  examples?: string[];
}

export function makeSkill(fixture: SkillFixture): SkillDefinition {
  return {
    name: fixture.name,
    category: fixture.category ?? 'visual',
    description: fixture.description ?? `${fixture.name} effect`,
    parameters: (fixture.parameters ?? []).map(param),
    strategy: fixture.strategy ?? { kind: 'template', template: fixture.name, target: 'video' },
    tags: fixture.tags ?? [],
    examples: fixture.examples ?? [],
    aliases: fixture.aliases ?? [],
    source: 'test',
  };
}
