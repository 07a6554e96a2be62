import { Command, CommanderError } from 'commander';
import { readFileSync } from 'fs';
import { AppError, ConfigError, UsageError } from '@plugin-evals/shared';
import {
  registerCompareCommand,
  registerRunCommand,
  registerVerifyCommand,
  type CliRun,
  type CommandDeps,
  type GlobalOptions,
} from './commands';
import type { OutputSink } from './output';

export const name = '@plugin-evals/cli';

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf8'),
  );
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
    return String(manifest.version);
  }
  return '0.0.0';
}

export function createProgram(deps: CommandDeps = {}, run: CliRun = { exitCode: 0 }): Command {
  const sink = deps.sink ?? console;
  const program = new Command();

  program
    .name('plugin-evals')
    .description('Score prompt-management platform integrations')
    .version(readVersion())
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Enable verbose logging')
    .option('--no-color', 'Disable colored output')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => sink.log(text.trimEnd()),
      writeErr: (text) => sink.error(text.trimEnd()),
    });

  registerRunCommand(program, run, deps);
  registerVerifyCommand(program, run, deps);
  registerCompareCommand(program, run, deps);

  return program;
}

/** Usage and configuration mistakes exit 2; everything else that escapes exits 1. */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? 0 : 2;
  }
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}

function reportError(e: unknown, opts: GlobalOptions, sink: OutputSink): void {
  if (opts.json) {
    if (e instanceof AppError) {
      sink.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      sink.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  sink.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    sink.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    sink.error(`\nStack Trace:\n${e.stack}`);
  } else {
    sink.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/** Parses `argv`, runs the selected command and resolves to the process exit code. */
export async function main(argv: string[] = process.argv, deps: CommandDeps = {}): Promise<number> {
  const run: CliRun = { exitCode: 0 };
  const program = createProgram(deps, run);

  try {
    await program.parseAsync(argv);
    return run.exitCode;
  } catch (e) {
    // Commander has already printed its own usage message.
    if (!(e instanceof CommanderError)) {
      reportError(e, program.opts<GlobalOptions>(), deps.sink ?? console);
    }
    return exitCodeFor(e);
  }
}

export * from './commands';
export * from './output';
