import type { CheckOutcome, SuccessCriterion, Verdict } from '@plugin-evals/shared';
import { apiVerify } from './api_verify';
import { codeRuns } from './code_runs';
import { fileContains } from './file_contains';
import type { CheckContext } from './types';

export { apiVerify, MISSING_CREDENTIALS_REASON } from './api_verify';
export { codeRuns, ERROR_INDICATORS, MAX_CAPTURED_CHARS, SUPPRESSED_ERROR_WARNING } from './code_runs';
export { fileContains } from './file_contains';
export type { CheckContext, CheckExecutor } from './types';

export function executeCriterion(
  criterion: SuccessCriterion,
  context: CheckContext,
): Promise<CheckOutcome> {
  switch (criterion.type) {
    case 'file_contains':
      return fileContains(criterion, context);
    case 'code_runs':
      return codeRuns(criterion, context);
    case 'api_verify':
      return apiVerify(criterion, context);
    case 'unknown':
      return Promise.resolve({
        check: 'unknown',
        declared_type: criterion.declared_type,
        description: criterion.description,
        passed: false,
        skipped: false,
        error: `Unknown check type: ${criterion.declared_type}`,
      });
  }
}

export function verdictOf(outcome: Pick<CheckOutcome, 'passed' | 'skipped'>): Verdict {
  if (outcome.skipped || outcome.passed === null) return 'skip';
  return outcome.passed ? 'pass' : 'fail';
}
