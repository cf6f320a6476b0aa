export const name = '@envforge/shared';

export * from './errors';
export * from './redaction';
export * from './string-utils';
export * from './json-utils';
export * from './excerpt';
export * from './fs/io';
export * from './logger';
export * from './config/schema';
export * from './types/task';
export * from './types/artifacts';
export * from './types/validation';
export * from './types/conversation';
export * from './types/results';
export * from './types/generator';
export * from './types/events';
export * from './diff';
