import * as fs from 'fs/promises';
import path from 'path';
import {
  ConsoleLogger,
  JsonlLogger,
  UsageError,
  secretsOf,
  type EvalEnvironment,
  type Logger,
} from '@plugin-evals/shared';
import type { GlobalOptions } from './types';

export async function assertDirectory(dir: string, label: string): Promise<void> {
  const stat = await fs.stat(dir).catch(() => undefined);
  if (!stat?.isDirectory()) {
    throw new UsageError(`${label} not found: ${dir}`);
  }
}

/** Events go to `--events` as JSON Lines when given, else to the console under `--verbose`. */
export function createRunLogger(
  options: GlobalOptions & { events?: string },
  environment: EvalEnvironment,
): Logger {
  return options.events
    ? new JsonlLogger(path.resolve(options.events), { secrets: secretsOf(environment) })
    : new ConsoleLogger({ verbose: options.verbose });
}
