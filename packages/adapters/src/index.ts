export const name = '@envforge/adapters';

export { CommandGenerator } from './command/generator';
export type { CommandGeneratorConfig, CommandGeneratorOptions } from './command/generator';
export { StaticGenerator } from './static/generator';
export { createGenerators } from './factory';
export type { GeneratorFactoryOptions } from './factory';
export { GeneratorResponseSchema, encodeRequest } from './protocol';
export type { GeneratorResponse } from './protocol';
