import {
  EVENT_SCHEMA_VERSION,
  errorMessage,
  secretsOf,
  type CheckOutcome,
  type EvalEnvironment,
  type Logger,
  type ResultDocument,
  type RunMode,
  type Scenario,
  type SuccessCriterion,
} from '@plugin-evals/shared';
import { executeCriterion, verdictOf, type CheckContext } from './criteria';
import { calculateScore } from './scoring';

export interface ScenarioRunnerOptions
  extends Pick<CheckContext, 'platformClient' | 'commandRunner' | 'install' | 'now'> {
  environment: EvalEnvironment;
  logger: Logger;
}

/** Outcome recorded when an executor throws instead of reporting. */
export function faultOutcome(criterion: SuccessCriterion, error: unknown): CheckOutcome {
  const base = {
    description: criterion.description,
    passed: false,
    skipped: false,
    error: errorMessage(error),
  };
  switch (criterion.type) {
    case 'file_contains':
      return {
        ...base,
        check: 'file_contains',
        file: criterion.file,
        patterns: criterion.patterns,
        found: [],
        missing: [],
      };
    case 'code_runs':
      return { ...base, check: 'code_runs', command: criterion.command, stdout: '', stderr: '' };
    case 'api_verify':
      return { ...base, check: 'api_verify', method: criterion.method };
    case 'unknown':
      return { ...base, check: 'unknown', declared_type: criterion.declared_type };
  }
}

/**
 * Runs a scenario's criteria in declared order against one project directory
 * and scores the outcomes. A failing check never stops the ones after it.
 */
export class ScenarioRunner {
  private readonly options: ScenarioRunnerOptions;

  constructor(options: ScenarioRunnerOptions) {
    this.options = options;
  }

  async run(scenario: Scenario, projectDir: string, mode: RunMode): Promise<ResultDocument> {
    const { environment } = this.options;
    const logger = this.options.logger.child({ scenario: scenario.name, mode });
    const startedAt = Date.now();

    await logger.log({
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      scenario: scenario.name,
      type: 'ScenarioStarted',
      payload: { mode, projectDir, criteriaCount: scenario.success_criteria.length },
    });

    const context: CheckContext = {
      projectDir,
      environment,
      logger,
      secrets: secretsOf(environment),
      platformClient: this.options.platformClient,
      commandRunner: this.options.commandRunner,
      install: this.options.install,
      now: this.options.now,
    };

    const checks: CheckOutcome[] = [];
    for (const [index, criterion] of scenario.success_criteria.entries()) {
      const checkStartedAt = Date.now();
      let outcome: CheckOutcome;
      try {
        outcome = await executeCriterion(criterion, context);
      } catch (error) {
        await logger.warn(`Check ${index + 1} (${criterion.type}) threw: ${errorMessage(error)}`);
        outcome = faultOutcome(criterion, error);
      }
      checks.push(outcome);

      await logger.log({
        schemaVersion: EVENT_SCHEMA_VERSION,
        timestamp: new Date().toISOString(),
        scenario: scenario.name,
        type: 'CheckFinished',
        payload: {
          index,
          check: outcome.check,
          method: outcome.check === 'api_verify' ? outcome.method : undefined,
          verdict: verdictOf(outcome),
          durationMs: Date.now() - checkStartedAt,
          error: outcome.error,
        },
      });
    }

    const score = calculateScore(scenario.scoring, checks);

    await logger.log({
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      scenario: scenario.name,
      type: 'ScenarioFinished',
      payload: {
        total: score.total,
        maxTotal: score.max_total,
        percentage: score.percentage,
        durationMs: Date.now() - startedAt,
      },
    });

    return {
      scenario: scenario.name,
      checks,
      score,
      mode,
      timestamp: new Date().toISOString(),
      project_dir: projectDir,
      timing: {
        start_time: environment.startTime ?? null,
        end_time: environment.endTime ?? null,
        duration_seconds: environment.durationSeconds,
      },
    };
  }
}

/** Exit status of a verify run: every check passed or was skipped. */
export function allChecksPassed(document: Pick<ResultDocument, 'checks'>): boolean {
  return document.checks.every((check) => verdictOf(check) !== 'fail');
}
