import { Command } from 'commander';
import path from 'path';
import {
  AssistantSession,
  DEFAULT_SCENARIOS_DIR,
  DEFAULT_SESSION_TIMEOUT_SECONDS,
  ScenarioRunner,
  allChecksPassed,
  createReportRenderer,
  listScenarios,
  loadScenario,
  prepareWorkspace,
  withSessionTiming,
  writeResultDocument,
} from '@plugin-evals/eval';
import {
  ConfigError,
  UsageError,
  loadEvalEnvironment,
  secretsOf,
  type ResultDocument,
  type RunMode,
} from '@plugin-evals/shared';
import { OutputRenderer } from '../output';
import { assertDirectory, createRunLogger } from './common';
import type { CliRun, CommandDeps, GlobalOptions } from './types';

export const DEFAULT_RESULTS_DIR = 'results';

export interface RunArgs {
  scenario?: string;
}

export interface RunOptions extends GlobalOptions {
  /** Runs in with-plugin mode and hands this directory to the assistant */
  pluginDir?: string;
  /** Overrides EVAL_AGENT_COMMAND */
  agent?: string;
  resultsDir?: string;
  scenariosDir?: string;
  events?: string;
}

export interface RunOutcome {
  exitCode: 0 | 1;
  document: ResultDocument;
  /** Temporary copy of the scenario project the assistant worked in; left in place */
  workspace: string;
  resultFile: string;
}

/**
 * Runs the assistant on a fresh copy of a scenario's project, then verifies
 * the copy against the session's time window and saves
 * `<resultsDir>/<scenario>-<mode>.json` beside the session log.
 */
export async function runScenario(
  args: RunArgs,
  options: RunOptions,
  deps: CommandDeps = {},
): Promise<RunOutcome> {
  const scenariosDir = options.scenariosDir ?? DEFAULT_SCENARIOS_DIR;
  if (!args.scenario) {
    const available = await listScenarios(scenariosDir);
    throw new UsageError(
      `Missing scenario. Available scenarios: ${available.length > 0 ? available.join(', ') : 'none'}`,
    );
  }

  let mode: RunMode = 'baseline';
  let pluginDir: string | undefined;
  if (options.pluginDir) {
    pluginDir = path.resolve(options.pluginDir);
    await assertDirectory(pluginDir, 'Plugin directory');
    mode = 'with-plugin';
  }

  const environment = loadEvalEnvironment(deps.env ?? process.env);
  const scenario = await loadScenario(args.scenario, scenariosDir);
  if (!scenario.user_prompt) {
    throw new ConfigError(`Scenario ${scenario.name} has no user_prompt to run`);
  }
  const timeoutSeconds = scenario.timeout ?? DEFAULT_SESSION_TIMEOUT_SECONDS;

  const workspace = await prepareWorkspace(scenario.name, scenariosDir);
  const resultsDir = path.resolve(options.resultsDir ?? DEFAULT_RESULTS_DIR);
  const resultFile = path.join(resultsDir, `${scenario.name}-${mode}.json`);
  const logFile = path.join(resultsDir, `${scenario.name}-${mode}.log`);

  const output = new OutputRenderer(!!options.json, deps.sink, { color: options.color });
  output.heading({
    'Running scenario': scenario.name,
    Mode: mode,
    Timeout: `${timeoutSeconds}s`,
    'Working directory': workspace,
    'Log file': logFile,
  });

  const logger = createRunLogger(options, environment);
  const session = new AssistantSession({
    agentCommand: options.agent ?? environment.agentCommand,
    logger,
    commandRunner: deps.commandRunner,
    now: deps.now,
  });
  const sessionResult = await session.run({
    projectDir: workspace,
    prompt: scenario.user_prompt,
    timeoutSeconds,
    pluginDir,
    logFile,
    secrets: secretsOf(environment),
  });
  output.log(
    sessionResult.timedOut
      ? `Assistant timed out after ${timeoutSeconds}s`
      : `Assistant finished in ${sessionResult.durationSeconds}s`,
  );

  const runner = new ScenarioRunner({
    environment: withSessionTiming(environment, sessionResult),
    logger,
    platformClient: deps.platformClient,
    commandRunner: deps.commandRunner,
    install: deps.install,
    now: deps.now,
  });
  const document = await runner.run(scenario, workspace, mode);

  output.render(document, createReportRenderer({ color: options.color }).renderResult(document));
  await writeResultDocument(resultFile, document);
  output.saved('Results', resultFile);
  output.log(`Working directory preserved at: ${workspace}`);

  return { exitCode: allChecksPassed(document) ? 0 : 1, document, workspace, resultFile };
}

export function registerRunCommand(program: Command, run: CliRun, deps: CommandDeps = {}) {
  program
    .command('run')
    .description('Run the assistant on a scenario project, then verify and save the result')
    .argument('[scenario]', 'Scenario name (omit to list the available ones)')
    .option('--plugin-dir <dir>', 'Load the plugin from this directory (with-plugin mode)')
    .option('--agent <command>', 'Assistant command line; the prompt is appended as its last argument')
    .option('--results-dir <dir>', 'Directory for result and log files', DEFAULT_RESULTS_DIR)
    .option('--scenarios-dir <dir>', 'Directory holding scenario definitions')
    .option('--events <file>', 'Append structured run events to a JSON Lines file')
    .action(
      async (
        scenario: string | undefined,
        options: Pick<RunOptions, 'pluginDir' | 'agent' | 'resultsDir' | 'scenariosDir' | 'events'>,
      ) => {
        const globalOpts = program.opts<GlobalOptions>();
        const { exitCode } = await runScenario({ scenario }, { ...globalOpts, ...options }, deps);
        run.exitCode = exitCode;
      },
    );
}
