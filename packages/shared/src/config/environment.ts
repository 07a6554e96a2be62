import { z } from 'zod';
import { ConfigError } from '../errors';
import { formatIssues } from '../eval/schemas';

/** Fixed deadline for every platform request. */
export const PLATFORM_REQUEST_TIMEOUT_MS = 10_000;

export const DEFAULT_PLATFORM_BASE_URL = 'http://localhost:8080';

/** Assistant CLI driven by `run`; the scenario prompt is appended as the last argument. */
export const DEFAULT_AGENT_COMMAND =
  'claude --dangerously-skip-permissions --verbose --output-format stream-json -p';

export interface PlatformSettings {
  baseUrl: string;
  apiKey?: string;
  projectId?: string;
  /** When false, TLS certificates are not verified (local development only) */
  verifySsl: boolean;
  timeoutMs: number;
}

/**
 * Everything the harness reads from the process environment, resolved once and
 * handed to components explicitly.
 */
export interface EvalEnvironment {
  platform: PlatformSettings;
  /** Window start as supplied by the session runner, local wall-clock text */
  startTime?: string;
  /** Window start as epoch seconds, when the session runner recorded one */
  startEpoch?: number;
  endTime?: string;
  durationSeconds: number;
  /** Assistant command line used by `run` sessions */
  agentCommand: string;
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const OptionalText = z.preprocess(blankToUndefined, z.string().optional());
const OptionalCount = z.preprocess(
  blankToUndefined,
  z.coerce.number().int().nonnegative().optional(),
);

const EnvironmentSchema = z.object({
  PLATFORM_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default(DEFAULT_PLATFORM_BASE_URL),
  ),
  PLATFORM_API_KEY: OptionalText,
  PLATFORM_PROJECT_ID: OptionalText,
  PLATFORM_VERIFY_SSL: OptionalText,
  EVAL_START_TIME: OptionalText,
  EVAL_START_EPOCH: OptionalCount,
  EVAL_END_TIME: OptionalText,
  EVAL_DURATION_SECS: OptionalCount,
  EVAL_AGENT_COMMAND: OptionalText,
});

export function loadEvalEnvironment(env: NodeJS.ProcessEnv = process.env): EvalEnvironment {
  const result = EnvironmentSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Environment validation failed:\n${formatIssues(result.error)}`);
  }
  const vars = result.data;

  return {
    platform: {
      baseUrl: vars.PLATFORM_BASE_URL.replace(/\/+$/, ''),
      apiKey: vars.PLATFORM_API_KEY,
      projectId: vars.PLATFORM_PROJECT_ID,
      verifySsl: (vars.PLATFORM_VERIFY_SSL ?? 'true').toLowerCase() !== 'false',
      timeoutMs: PLATFORM_REQUEST_TIMEOUT_MS,
    },
    startTime: vars.EVAL_START_TIME,
    startEpoch: vars.EVAL_START_EPOCH,
    endTime: vars.EVAL_END_TIME,
    durationSeconds: vars.EVAL_DURATION_SECS ?? 0,
    agentCommand: vars.EVAL_AGENT_COMMAND ?? DEFAULT_AGENT_COMMAND,
  };
}

/** Literal secret values that must never reach logs or result documents. */
export function secretsOf(environment: EvalEnvironment): string[] {
  return environment.platform.apiKey ? [environment.platform.apiKey] : [];
}
