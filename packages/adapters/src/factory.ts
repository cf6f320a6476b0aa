import type { ArtifactGenerator, GeneratorSet, GeneratorsConfig, Logger, Stage } from '@envforge/shared';
import type { CommandRunner } from '@envforge/exec';
import { CommandGenerator } from './command/generator';
import { StaticGenerator } from './static/generator';

export interface GeneratorFactoryOptions {
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Builds one generator per stage for the configured backend.
 */
export function createGenerators(
  config: GeneratorsConfig,
  options: GeneratorFactoryOptions = {},
): GeneratorSet {
  const make = (stage: Stage): ArtifactGenerator => {
    switch (config.backend) {
      case 'static':
        return new StaticGenerator(stage, config.static.dir);
      case 'command':
        return new CommandGenerator(stage, config.command, {
          runner: options.runner,
          logger: options.logger?.child({ stage }),
        });
    }
  };
  return {
    context: make('context'),
    test: make('test'),
    env: make('env'),
    run: make('run'),
  };
}
