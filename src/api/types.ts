import type { Composer } from '../runtime/composer.js';
import type { Registry } from '../skills/registry.js';

export interface RouteOpts {
  registry: Registry;
  composer: Composer;
}
