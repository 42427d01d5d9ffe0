export const name = '@buildprof/exec';

export * from './runner/runner';
export * from './runner/types';
