import {
  TimeoutError,
  errorMessage,
  redactString,
  type CodeRunsCriterion,
  type CodeRunsOutcome,
} from '@plugin-evals/shared';
import { CommandRunner, describeInstallFailure, installDependencies } from '@plugin-evals/exec';
import type { CheckExecutor } from './types';

/** Captured streams are cut to this many characters in the outcome. */
export const MAX_CAPTURED_CHARS = 2000;

/** A zero exit still fails when stderr mentions any of these. */
export const ERROR_INDICATORS = ['error', 'exception', 'traceback', 'failed'] as const;

export const SUPPRESSED_ERROR_WARNING = 'Exit code 0 but stderr contains error indicators';

// Scrub before cutting so a secret spanning the cut is still matched whole.
function capture(text: string, secrets: readonly string[]): string {
  return redactString(text, secrets).redacted.slice(0, MAX_CAPTURED_CHARS);
}

/**
 * Installs declared dependencies, then runs the command from the project
 * root with the project on PYTHONPATH.
 */
export const codeRuns: CheckExecutor<CodeRunsCriterion, CodeRunsOutcome> = async (
  criterion,
  context,
) => {
  const outcome: CodeRunsOutcome = {
    check: 'code_runs',
    description: criterion.description,
    command: criterion.command,
    passed: false,
    skipped: false,
    stdout: '',
    stderr: '',
  };
  const env = { PYTHONPATH: context.projectDir };
  const install = context.install ?? installDependencies;
  const runner = context.commandRunner ?? new CommandRunner();

  try {
    const installs = await install(context.projectDir, { logger: context.logger, env });
    const failedInstalls = installs.filter((report) => !report.ok);
    if (failedInstalls.length > 0) {
      outcome.install_failures = failedInstalls.map(
        (report) => `${report.command} (${describeInstallFailure(report)})`,
      );
    }

    const result = await runner.run({
      command: criterion.command,
      cwd: context.projectDir,
      env,
      timeoutMs: criterion.timeout * 1000,
    });

    await context.logger.debug(
      `${criterion.command} exited ${result.exitCode} after ${result.durationMs}ms`,
    );
    if (result.truncated) {
      await context.logger.warn(`Output of ${criterion.command} exceeded the capture limit and was cut`);
    }

    outcome.stdout = capture(result.stdout, context.secrets);
    outcome.stderr = capture(result.stderr, context.secrets);
    outcome.return_code = result.exitCode;

    const stderrLower = result.stderr.toLowerCase();
    const hasErrorIndicator = ERROR_INDICATORS.some((indicator) => stderrLower.includes(indicator));

    outcome.passed = result.exitCode === 0 && !hasErrorIndicator;
    if (result.exitCode === 0 && hasErrorIndicator) {
      outcome.warning = SUPPRESSED_ERROR_WARNING;
    }
  } catch (error) {
    outcome.error =
      error instanceof TimeoutError
        ? `Command timed out after ${criterion.timeout}s`
        : redactString(errorMessage(error), context.secrets).redacted;
  }

  return outcome;
};
