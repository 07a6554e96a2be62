export const name = '@plugin-evals/shared';

export * from './types/events';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './eval';
export * from './config/environment';
export * from './fs/io';
