export const name = '@buildprof/snapshot';

export * from './scanner';
export * from './diff';
export * from './store';
