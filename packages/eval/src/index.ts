export * from './client/platform-client';
export * from './reconcile/timestamps';
export * from './criteria';
export * from './scoring';
export * from './comparator';
export * from './scenarios';
export * from './results';
export * from './runner';
export * from './session';
export * from './renderer';
