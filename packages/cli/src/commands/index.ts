export { registerVerifyCommand, runVerify } from './verify';
export type { VerifyArgs, VerifyOptions, VerifyOutcome } from './verify';
export { registerRunCommand, runScenario, DEFAULT_RESULTS_DIR } from './run';
export type { RunArgs, RunOptions, RunOutcome } from './run';
export { registerCompareCommand, runCompare } from './compare';
export type { CompareArgs } from './compare';
export type { CliRun, CommandDeps, GlobalOptions } from './types';
