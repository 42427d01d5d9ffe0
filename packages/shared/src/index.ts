export const name = '@buildprof/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './fs/path';
export * from './fs/io';
export * from './concurrency';
