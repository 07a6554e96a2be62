import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import { loadEvalEnvironment, type EvalEnvironment, type Logger } from '@plugin-evals/shared';
import type { CheckContext } from '../src/criteria';

export function fakeLogger(): Logger {
  const logger: Logger = {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

export const PLATFORM_ENV = {
  PLATFORM_BASE_URL: 'http://platform.test',
  PLATFORM_API_KEY: 'test-secret',
  PLATFORM_PROJECT_ID: 'proj-1',
  EVAL_START_TIME: '2024-01-15 10:30:00',
  EVAL_START_EPOCH: '1705314600',
};

export const PROJECT_URL = 'http://platform.test/api/v2/projects/proj-1';

export function environmentOf(vars: NodeJS.ProcessEnv = {}): EvalEnvironment {
  return loadEvalEnvironment(vars);
}

export function contextFor(
  projectDir: string,
  overrides: Partial<CheckContext> = {},
): CheckContext {
  return {
    projectDir,
    environment: environmentOf(),
    logger: fakeLogger(),
    secrets: [],
    install: vi.fn().mockResolvedValue([]),
    ...overrides,
  };
}

export async function makeProject(files: Record<string, string>): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'evals-project-'));
  for (const [name, content] of Object.entries(files)) {
    await fs.mkdir(path.dirname(path.join(dir, name)), { recursive: true });
    await fs.writeFile(path.join(dir, name), content);
  }
  return dir;
}
