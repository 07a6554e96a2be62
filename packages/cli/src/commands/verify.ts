import { Command } from 'commander';
import path from 'path';
import {
  DEFAULT_SCENARIOS_DIR,
  ScenarioRunner,
  allChecksPassed,
  createReportRenderer,
  loadScenario,
  writeResultDocument,
} from '@plugin-evals/eval';
import {
  RUN_MODES,
  UsageError,
  isRunMode,
  loadEvalEnvironment,
  type ResultDocument,
} from '@plugin-evals/shared';
import { OutputRenderer } from '../output';
import { assertDirectory, createRunLogger } from './common';
import type { CliRun, CommandDeps, GlobalOptions } from './types';

export interface VerifyArgs {
  scenario: string;
  projectDir: string;
  mode: string;
  output?: string;
}

export interface VerifyOptions extends GlobalOptions {
  scenariosDir?: string;
  events?: string;
}

export interface VerifyOutcome {
  exitCode: 0 | 1;
  document: ResultDocument;
}

/**
 * Scores one project directory against a scenario. Exit code 0 means every
 * check passed or was skipped.
 */
export async function runVerify(
  args: VerifyArgs,
  options: VerifyOptions,
  deps: CommandDeps = {},
): Promise<VerifyOutcome> {
  const { mode } = args;
  if (!isRunMode(mode)) {
    throw new UsageError(`Invalid mode "${mode}": expected one of ${RUN_MODES.join(', ')}`);
  }

  const projectDir = path.resolve(args.projectDir);
  await assertDirectory(projectDir, 'Project directory');

  const environment = loadEvalEnvironment(deps.env ?? process.env);
  const scenario = await loadScenario(args.scenario, options.scenariosDir ?? DEFAULT_SCENARIOS_DIR);

  const output = new OutputRenderer(!!options.json, deps.sink, { color: options.color });
  output.heading({
    'Verifying scenario': scenario.name,
    'Project directory': projectDir,
    Mode: mode,
  });

  const logger = createRunLogger(options, environment);

  const runner = new ScenarioRunner({
    environment,
    logger,
    platformClient: deps.platformClient,
    commandRunner: deps.commandRunner,
    install: deps.install,
    now: deps.now,
  });
  const document = await runner.run(scenario, projectDir, mode);

  output.render(document, createReportRenderer({ color: options.color }).renderResult(document));

  if (args.output) {
    await writeResultDocument(args.output, document);
    output.saved('Results', args.output);
  }

  return { exitCode: allChecksPassed(document) ? 0 : 1, document };
}

export function registerVerifyCommand(program: Command, run: CliRun, deps: CommandDeps = {}) {
  program
    .command('verify')
    .description('Run a scenario\'s success criteria against a project directory')
    .argument('<scenario>', 'Scenario name')
    .argument('<projectDir>', 'Project directory to verify')
    .argument('<mode>', `Run mode (${RUN_MODES.join(' | ')})`)
    .argument('[output]', 'Write the result document to this file')
    .option('--scenarios-dir <dir>', 'Directory holding scenario definitions')
    .option('--events <file>', 'Append structured run events to a JSON Lines file')
    .action(
      async (
        scenario: string,
        projectDir: string,
        mode: string,
        outputFile: string | undefined,
        options: Pick<VerifyOptions, 'scenariosDir' | 'events'>,
      ) => {
        const globalOpts = program.opts<GlobalOptions>();
        const { exitCode } = await runVerify(
          { scenario, projectDir, mode, output: outputFile },
          { ...globalOpts, ...options },
          deps,
        );
        run.exitCode = exitCode;
      },
    );
}
