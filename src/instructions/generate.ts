import { BuildConfig, type BuildSettings } from './BuildConfig.js';
import { configureBuild, type GeneratorDeps } from './BuildInstructions.js';
import { createOutputMap, type OutputMap } from './OutputMap.js';

export interface InstructionsSettings {
  build?: Partial<BuildSettings>;
}

/**
 * Per-category instruction configuration. Only the build category exists.
 */
export class Instructions {
  readonly build: BuildConfig;

  constructor(settings: InstructionsSettings = {}) {
    this.build = new BuildConfig(settings.build);
  }
}

/**
 * Run every category generator once against a fresh output map.
 */
export function generateInstructions(
  instructions: Instructions = new Instructions(),
  deps: GeneratorDeps = {}
): OutputMap {
  const map = createOutputMap();
  configureBuild(instructions.build, map, deps);
  return map;
}
