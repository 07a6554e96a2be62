export * from './runner/runner';
export * from './install/dependencies';
