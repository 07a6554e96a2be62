// packages/shared/src/eval/schemas.ts

import { z } from 'zod';
import { RUN_MODES, isCheckKind, type UnknownCriterion } from './types';

const DescriptionSchema = z.string().default('');

const FileContainsCriterionSchema = z.object({
  type: z.literal('file_contains'),
  file: z.string().default(''),
  patterns: z.array(z.string()).default([]),
  description: DescriptionSchema,
});

const CodeRunsCriterionSchema = z.object({
  type: z.literal('code_runs'),
  command: z.string().default('python main.py'),
  timeout: z.number().positive().default(60),
  description: DescriptionSchema,
});

const ApiVerifyCriterionSchema = z.object({
  type: z.literal('api_verify'),
  method: z.string().default(''),
  prompt_name: z.string().optional(),
  variable_name: z.string().optional(),
  dataset_name: z.string().optional(),
  min_test_cases: z.number().int().nonnegative().optional(),
  min_sessions: z.number().int().nonnegative().optional(),
  description: DescriptionSchema,
});

// Criteria of an undeclared type are kept so the runner can report them;
// a known type with malformed parameters is rejected at load time instead.
const UnknownCriterionSchema = z
  .object({
    type: z.unknown(),
    description: DescriptionSchema,
  })
  .refine((raw) => !isCheckKind(raw.type), {
    message: 'Criterion parameters do not match its declared type',
    path: ['type'],
  })
  .transform(
    (raw): UnknownCriterion => ({
      type: 'unknown',
      declared_type: raw.type === undefined ? '' : String(raw.type),
      description: raw.description,
    }),
  );

export const SuccessCriterionSchema = z.union([
  FileContainsCriterionSchema,
  CodeRunsCriterionSchema,
  ApiVerifyCriterionSchema,
  UnknownCriterionSchema,
]);

export const ScoringRubricSchema = z.record(
  z.string(),
  z.object({
    points: z.number().int().nonnegative(),
    description: z.string().optional(),
  }),
);

export const ScenarioFileSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  user_prompt: z.string().optional(),
  timeout: z.number().positive().optional(),
  success_criteria: z.array(SuccessCriterionSchema).default([]),
  scoring: ScoringRubricSchema.default({}),
});

export type ScenarioFile = z.infer<typeof ScenarioFileSchema>;

const CategoryScoreSchema = z.object({
  passed: z.boolean().nullable(),
  skipped: z.boolean().default(false),
  reason: z.string().optional(),
  points: z.number(),
  max_points: z.number(),
});

export const ScoreResultSchema = z.object({
  categories: z.record(z.string(), CategoryScoreSchema),
  total: z.number(),
  max_total: z.number(),
  percentage: z.number(),
});

const PersistedOutcomeSchema = z
  .object({
    check: z.string(),
    description: z.string().default(''),
    passed: z.boolean().nullable(),
    skipped: z.boolean().default(false),
  })
  .passthrough();

export const PersistedResultSchema = z.object({
  scenario: z.string(),
  checks: z.array(PersistedOutcomeSchema),
  score: ScoreResultSchema,
  mode: z.enum(RUN_MODES),
  timestamp: z.string(),
  project_dir: z.string(),
  timing: z.object({
    start_time: z.string().nullable(),
    end_time: z.string().nullable(),
    duration_seconds: z.number(),
  }),
});

/** A result document as read back from disk. */
export type PersistedResult = z.infer<typeof PersistedResultSchema>;

/**
 * Renders zod issues as one `- path: message` line each.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `- ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}
