// packages/shared/src/eval/types.ts

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const CHECK_KINDS = ['file_contains', 'code_runs', 'api_verify'] as const;
export type CheckKind = (typeof CHECK_KINDS)[number];

export const API_VERIFY_METHODS = [
  'search_completions',
  'check_prompt_exists',
  'check_completion_has_prompt',
  'check_prompt_has_variable',
  'check_dataset_exists',
  'check_dataset_has_test_cases',
  'check_test_run_exists',
  'check_test_run_has_sessions',
] as const;
export type ApiVerifyMethod = (typeof API_VERIFY_METHODS)[number];

export const RUN_MODES = ['baseline', 'with-plugin'] as const;
export type RunMode = (typeof RUN_MODES)[number];

/**
 * Three-valued result of a check. A skip is neither a pass nor a fail and must
 * never be folded into either by scoring or comparison.
 */
export type Verdict = 'pass' | 'fail' | 'skip';

/** `null` is reserved for skipped checks. */
export type TriState = boolean | null;

export function isCheckKind(value: unknown): value is CheckKind {
  return typeof value === 'string' && CHECK_KINDS.some((kind) => kind === value);
}

export function isApiVerifyMethod(value: unknown): value is ApiVerifyMethod {
  return typeof value === 'string' && API_VERIFY_METHODS.some((method) => method === value);
}

export function isRunMode(value: unknown): value is RunMode {
  return typeof value === 'string' && RUN_MODES.some((mode) => mode === value);
}

// ---------------------------------------------------------------------------
// Scenario definitions
// ---------------------------------------------------------------------------

interface CriterionBase {
  description: string;
}

export interface FileContainsCriterion extends CriterionBase {
  type: 'file_contains';
  /** Path relative to the project root */
  file: string;
  patterns: string[];
}

export interface CodeRunsCriterion extends CriterionBase {
  type: 'code_runs';
  command: string;
  /** Seconds */
  timeout: number;
}

export interface ApiVerifyCriterion extends CriterionBase {
  type: 'api_verify';
  method: string;
  prompt_name?: string;
  variable_name?: string;
  dataset_name?: string;
  min_test_cases?: number;
  min_sessions?: number;
}

/** A criterion whose declared `type` is not one the harness knows how to run. */
export interface UnknownCriterion extends CriterionBase {
  type: 'unknown';
  declared_type: string;
}

export type SuccessCriterion =
  | FileContainsCriterion
  | CodeRunsCriterion
  | ApiVerifyCriterion
  | UnknownCriterion;

export interface RubricEntry {
  points: number;
  description?: string;
}

export type ScoringRubric = Record<string, RubricEntry>;

export interface Scenario {
  name: string;
  description?: string;
  user_prompt?: string;
  /** Seconds the assistant session may run before the project is verified */
  timeout?: number;
  success_criteria: SuccessCriterion[];
  scoring: ScoringRubric;
}

// ---------------------------------------------------------------------------
// Check outcomes
// ---------------------------------------------------------------------------

interface OutcomeBase {
  description: string;
  passed: TriState;
  skipped: boolean;
  reason?: string;
  error?: string;
}

export interface FileContainsOutcome extends OutcomeBase {
  check: 'file_contains';
  file: string;
  patterns: string[];
  found: string[];
  missing: string[];
}

export interface CodeRunsOutcome extends OutcomeBase {
  check: 'code_runs';
  command: string;
  stdout: string;
  stderr: string;
  return_code?: number;
  warning?: string;
  /** Install steps that failed before the command ran, e.g. `npm install --silent (exit 1)` */
  install_failures?: string[];
}

export interface CompletionSearchDetails {
  completion_count: number;
  total_returned: number;
  since: string;
}

export interface CompletionPromptDetails extends CompletionSearchDetails {
  has_prompt: boolean;
  prompt_template: JsonValue;
}

export interface PromptLookupDetails {
  prompt_name: string;
  template_count: number;
  found: boolean;
}

export interface PromptVariableDetails {
  prompt_name: string;
  variable_name: string;
  template_id: string | null;
  version_id: string | null;
  found: boolean;
}

export interface DatasetLookupDetails {
  dataset_name: string;
  dataset_count: number;
  found: boolean;
}

export interface DatasetTestCaseDetails {
  dataset_name: string | null;
  dataset_id: string | null;
  test_case_count: number;
  min_test_cases: number;
}

export interface TestRunWindowDetails {
  test_run_count: number;
  total_returned: number;
  since_epoch: number;
}

export interface TestRunSessionDetails {
  test_run_id: string | null;
  test_run_count: number;
  session_count: number;
  min_sessions: number;
}

export type ApiVerifyDetails =
  | CompletionSearchDetails
  | CompletionPromptDetails
  | PromptLookupDetails
  | PromptVariableDetails
  | DatasetLookupDetails
  | DatasetTestCaseDetails
  | TestRunWindowDetails
  | TestRunSessionDetails;

export interface ApiVerifyOutcome extends OutcomeBase {
  check: 'api_verify';
  method: string;
  api_reachable?: boolean;
  status_code?: number;
  details?: ApiVerifyDetails;
}

export interface UnknownCheckOutcome extends OutcomeBase {
  check: 'unknown';
  declared_type: string;
}

export type CheckOutcome =
  | FileContainsOutcome
  | CodeRunsOutcome
  | ApiVerifyOutcome
  | UnknownCheckOutcome;

// ---------------------------------------------------------------------------
// Scores and documents
// ---------------------------------------------------------------------------

export interface CategoryScore {
  passed: TriState;
  skipped: boolean;
  reason?: string;
  points: number;
  max_points: number;
}

export interface ScoreResult {
  categories: Record<string, CategoryScore>;
  total: number;
  max_total: number;
  percentage: number;
}

export interface RunTiming {
  start_time: string | null;
  end_time: string | null;
  duration_seconds: number;
}

export interface ResultDocument {
  scenario: string;
  checks: CheckOutcome[];
  score: ScoreResult;
  mode: RunMode;
  timestamp: string;
  project_dir: string;
  timing: RunTiming;
}

/** The parts of a result document the comparator reads. */
export type ComparableResult = Pick<ResultDocument, 'scenario' | 'mode' | 'timestamp' | 'score'>;

export interface CategoryDelta {
  category: string;
  baseline: number;
  with_plugin: number;
  delta: number;
}

export type UnchangedCategory =
  | { category: string; status: 'skipped'; reason: string | null }
  | { category: string; status: 'passed' | 'failed'; points: number };

export type ComparisonVerdict = 'improved' | 'reduced' | 'unchanged';

export interface ComparisonSummary {
  baseline_total: number;
  plugin_total: number;
  delta: number;
  baseline_percentage: number;
  plugin_percentage: number;
  percentage_delta: number;
  verdict: ComparisonVerdict;
}

export interface ComparisonSide {
  mode: RunMode;
  timestamp: string;
  score: ScoreResult;
}

export interface ComparisonReport {
  scenario: string;
  baseline: ComparisonSide;
  with_plugin: ComparisonSide;
  improvements: CategoryDelta[];
  regressions: CategoryDelta[];
  unchanged: UnchangedCategory[];
  summary: ComparisonSummary;
}
