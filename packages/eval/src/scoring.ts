import type {
  CategoryScore,
  CheckOutcome,
  ScoreResult,
  ScoringRubric,
} from '@plugin-evals/shared';

/** Rubric category for each check kind, and for API checks each method. */
export const CATEGORY_BY_CHECK: Readonly<Record<string, string>> = {
  file_contains: 'code_modified',
  code_runs: 'code_runs',
  'api_verify:search_completions': 'completion_logged',
  'api_verify:check_prompt_exists': 'prompt_created',
  'api_verify:check_completion_has_prompt': 'completion_has_prompt',
  'api_verify:check_prompt_has_variable': 'prompt_has_variable',
  'api_verify:check_dataset_exists': 'dataset_created',
  'api_verify:check_dataset_has_test_cases': 'dataset_has_test_cases',
  'api_verify:check_test_run_exists': 'test_run_created',
  'api_verify:check_test_run_has_sessions': 'test_run_has_sessions',
};

export function categoryOf(outcome: CheckOutcome): string | undefined {
  const key = outcome.check === 'api_verify' ? `api_verify:${outcome.method}` : outcome.check;
  return Object.hasOwn(CATEGORY_BY_CHECK, key) ? CATEGORY_BY_CHECK[key] : undefined;
}

/** Rounds to one decimal place, halves away from zero. */
export function roundToTenth(value: number): number {
  const rounded = Math.sign(value) * (Math.round(Math.abs(value) * 10) / 10);
  return rounded === 0 ? 0 : rounded;
}

export function percentageOf(total: number, maxTotal: number): number {
  return maxTotal > 0 ? roundToTenth((total / maxTotal) * 100) : 0;
}

/**
 * Awards all or nothing per rubric category. Skipped outcomes score zero but
 * stay tri-state; outcomes without a rubric entry are left out. When several
 * outcomes map to one category the last one wins.
 */
export function calculateScore(rubric: ScoringRubric, outcomes: CheckOutcome[]): ScoreResult {
  const categories: Record<string, CategoryScore> = {};

  for (const outcome of outcomes) {
    const category = categoryOf(outcome);
    if (category === undefined || !Object.hasOwn(rubric, category)) continue;
    const maxPoints = rubric[category].points;

    if (outcome.skipped) {
      categories[category] = {
        passed: null,
        skipped: true,
        reason: outcome.reason,
        points: 0,
        max_points: maxPoints,
      };
    } else {
      const passed = outcome.passed === true;
      categories[category] = {
        passed,
        skipped: false,
        points: passed ? maxPoints : 0,
        max_points: maxPoints,
      };
    }
  }

  const scores = Object.values(categories);
  const total = scores.reduce((sum, score) => sum + score.points, 0);
  const maxTotal = scores.reduce((sum, score) => sum + score.max_points, 0);

  return {
    categories,
    total,
    max_total: maxTotal,
    percentage: percentageOf(total, maxTotal),
  };
}
