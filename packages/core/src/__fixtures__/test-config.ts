import { ConfigSchema, type Config, type ConfigInput } from '@envforge/shared';

export function configForTest(overrides: ConfigInput = {}): Config {
  return ConfigSchema.parse({
    workers: 2,
    roundLimit: 3,
    minimalFix: { enabled: true, mutations: 2, seed: 7 },
    ...overrides,
  });
}

export const minimalConfigForTest: Config = configForTest();
