import type { ScenarioRunnerOptions } from '@plugin-evals/eval';
import type { OutputSink } from '../output';

export type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
  color?: boolean;
};

/** Collaborators a command uses; tests replace them, the binary takes the defaults. */
export interface CommandDeps
  extends Partial<Pick<ScenarioRunnerOptions, 'platformClient' | 'commandRunner' | 'install' | 'now'>> {
  env?: NodeJS.ProcessEnv;
  sink?: OutputSink;
}

/** Exit status a command reports back to the entry point. */
export interface CliRun {
  exitCode: number;
}
