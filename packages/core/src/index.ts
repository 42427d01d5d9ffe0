export const name = '@buildprof/core';

export * from './config/loader';
export * from './report/timestamp';
export * from './report/csv';
export * from './session/profile-session';
