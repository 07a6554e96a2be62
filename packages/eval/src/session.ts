import path from 'path';
import fs from 'fs-extra';
import { dir } from 'tmp-promise';
import {
  ConfigError,
  TimeoutError,
  redactString,
  type EvalEnvironment,
  type Logger,
} from '@plugin-evals/shared';
import { CommandRunner } from '@plugin-evals/exec';
import { formatLocalTimestamp } from './reconcile/timestamps';

/** Session limit when a scenario sets no `timeout`. */
export const DEFAULT_SESSION_TIMEOUT_SECONDS = 180;

/**
 * Copies `<scenariosDir>/<name>/project` into a fresh temporary directory.
 * The copy is left in place afterwards so the session can be inspected.
 */
export async function prepareWorkspace(name: string, scenariosDir: string): Promise<string> {
  const source = path.join(scenariosDir, name, 'project');
  if (!(await fs.pathExists(source))) {
    throw new ConfigError(`Scenario ${name} has no project directory (looked in ${source})`);
  }
  const workspace = await dir({ prefix: `plugin-evals-${name}-` });
  await fs.copy(source, workspace.path);
  return workspace.path;
}

export interface SessionRequest {
  projectDir: string;
  prompt: string;
  timeoutSeconds: number;
  /** Passed to the assistant as `--plugin-dir` */
  pluginDir?: string;
  /** Receives the assistant's combined output */
  logFile?: string;
  secrets?: readonly string[];
}

export interface SessionTiming {
  /** Local wall-clock text, the same form the platform reports */
  startTime: string;
  startEpoch: number;
  endTime: string;
  durationSeconds: number;
}

export interface SessionResult extends SessionTiming {
  /** Null when the session was stopped at its deadline or never started */
  exitCode: number | null;
  timedOut: boolean;
}

export interface AssistantSessionOptions {
  agentCommand: string;
  logger: Logger;
  commandRunner?: Pick<CommandRunner, 'run'>;
  now?: () => Date;
}

const epochSeconds = (date: Date) => Math.floor(date.getTime() / 1000);

/**
 * Runs the assistant once inside a project directory with the scenario prompt
 * and records the wall-clock window it ran in.
 */
export class AssistantSession {
  private readonly runner: Pick<CommandRunner, 'run'>;
  private readonly now: () => Date;

  constructor(private readonly options: AssistantSessionOptions) {
    this.runner = options.commandRunner ?? new CommandRunner();
    this.now = options.now ?? (() => new Date());
  }

  async run(request: SessionRequest): Promise<SessionResult> {
    const { logger } = this.options;
    const args = [request.prompt];
    if (request.pluginDir) {
      args.push('--plugin-dir', request.pluginDir);
    }

    const started = this.now();
    let exitCode: number | null = null;
    let timedOut = false;
    let output = '';

    try {
      const result = await this.runner.run({
        command: this.options.agentCommand,
        args,
        cwd: request.projectDir,
        timeoutMs: request.timeoutSeconds * 1000,
      });
      exitCode = result.exitCode;
      output = result.stdout + result.stderr;
      if (exitCode !== 0) {
        await logger.warn(`Assistant exited with code ${exitCode}`);
      }
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
      timedOut = true;
      await logger.warn(`Assistant session timed out after ${request.timeoutSeconds}s`);
    }

    const ended = this.now();

    if (request.logFile) {
      await fs.outputFile(request.logFile, redactString(output, request.secrets ?? []).redacted);
    }

    const startEpoch = epochSeconds(started);
    return {
      startTime: formatLocalTimestamp(started),
      startEpoch,
      endTime: formatLocalTimestamp(ended),
      durationSeconds: epochSeconds(ended) - startEpoch,
      exitCode,
      timedOut,
    };
  }
}

/** The environment a verification run sees after a session: its window and duration. */
export function withSessionTiming(
  environment: EvalEnvironment,
  timing: SessionTiming,
): EvalEnvironment {
  return {
    ...environment,
    startTime: timing.startTime,
    startEpoch: timing.startEpoch,
    endTime: timing.endTime,
    durationSeconds: timing.durationSeconds,
  };
}
