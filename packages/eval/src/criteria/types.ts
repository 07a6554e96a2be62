import type {
  CheckOutcome,
  EvalEnvironment,
  Logger,
  SuccessCriterion,
} from '@plugin-evals/shared';
import type { CommandRunner, installDependencies } from '@plugin-evals/exec';
import type { PlatformClient } from '../client/platform-client';

/**
 * Everything a check needs besides its criterion. Collaborators are optional
 * so tests can substitute them.
 */
export interface CheckContext {
  projectDir: string;
  environment: EvalEnvironment;
  logger: Logger;
  /** Literal values scrubbed from captured output */
  secrets: readonly string[];
  platformClient?: PlatformClient;
  commandRunner?: Pick<CommandRunner, 'run'>;
  install?: typeof installDependencies;
  now?: () => Date;
}

/**
 * Runs one criterion. Executors never throw for an unmet condition or a
 * collaborator fault; both are reported on the outcome.
 */
export type CheckExecutor<C extends SuccessCriterion, O extends CheckOutcome> = (
  criterion: C,
  context: CheckContext,
) => Promise<O>;
