import {
  PlatformRequestError,
  errorMessage,
  isApiVerifyMethod,
  type ApiVerifyCriterion,
  type ApiVerifyDetails,
  type ApiVerifyMethod,
  type ApiVerifyOutcome,
  type JsonValue,
} from '@plugin-evals/shared';
import {
  HttpPlatformClient,
  isRecord,
  listItems,
  type PlatformClient,
  type PlatformRecord,
  type PlatformResponse,
} from '../client/platform-client';
import {
  isEpochInWindow,
  reconcileWindow,
  resolveWindow,
  type EvalWindow,
} from '../reconcile/timestamps';
import type { CheckContext, CheckExecutor } from './types';

export const MISSING_CREDENTIALS_REASON = 'PLATFORM_API_KEY or PLATFORM_PROJECT_ID not set';

const DEFAULT_MIN_TEST_CASES = 1;
const DEFAULT_MIN_SESSIONS = 1;

interface MethodResult {
  passed: boolean;
  statusCode: number;
  details: ApiVerifyDetails;
  error?: string;
}

interface MethodScope {
  client: PlatformClient;
  window(): EvalWindow;
}

type MethodHandler = (criterion: ApiVerifyCriterion, scope: MethodScope) => Promise<MethodResult>;

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (isRecord(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) out[key] = toJsonValue(item);
    }
    return out;
  }
  return null;
}

/** Empty strings, arrays and objects count as absent. */
function isPresent(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === 0) return false;
  if (typeof value === 'string' || Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return true;
}

function idOf(record: PlatformRecord, field = 'id'): string | null {
  const value = record[field];
  if (typeof value === 'string' && value !== '') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

function nameOf(record: PlatformRecord): string | undefined {
  return typeof record.name === 'string' ? record.name : undefined;
}

async function searchWindowCompletions(scope: MethodScope) {
  const window = scope.window();
  const response = await scope.client.searchCompletions({
    field: 'start_time',
    operator: 'gte',
    value: window.startText,
  });
  return { window, response, reconciled: reconcileWindow(listItems(response.data), window) };
}

function countSessions(run: PlatformRecord): number {
  if (Array.isArray(run.sessions)) return run.sessions.length;
  for (const field of ['session_count', 'sessions_count']) {
    const value = run[field];
    if (typeof value === 'number') return value;
  }
  return 0;
}

function messageContents(version: unknown): string[] {
  if (!isRecord(version)) return [];
  const { content } = version;
  if (typeof content === 'string') return [content];
  if (!Array.isArray(content)) return [];
  return content.flatMap((message) =>
    isRecord(message) && typeof message.content === 'string' ? [message.content] : [],
  );
}

function inWindowTestRuns(runs: PlatformRecord[], window: EvalWindow): PlatformRecord[] {
  return runs.filter((run) => isEpochInWindow(run.created_at, window));
}

function createdAt(run: PlatformRecord): number {
  return typeof run.created_at === 'number' ? run.created_at : Number.NEGATIVE_INFINITY;
}

const METHODS: Record<ApiVerifyMethod, MethodHandler> = {
  async search_completions(_criterion, scope) {
    const { window, response, reconciled } = await searchWindowCompletions(scope);
    return {
      passed: reconciled.count > 0,
      statusCode: response.statusCode,
      details: {
        completion_count: reconciled.count,
        total_returned: reconciled.totalReturned,
        since: window.startText,
      },
    };
  },

  async check_prompt_exists(criterion, scope) {
    const promptName = criterion.prompt_name ?? '';
    const response = await scope.client.listPromptTemplates();
    const templates = listItems(response.data);
    const found = templates.some((template) => nameOf(template) === promptName);
    return {
      passed: found,
      statusCode: response.statusCode,
      details: { prompt_name: promptName, template_count: templates.length, found },
    };
  },

  async check_completion_has_prompt(_criterion, scope) {
    const { window, response, reconciled } = await searchWindowCompletions(scope);
    const withPrompt = reconciled.inWindow.find(
      (completion) =>
        isRecord(completion.completion_metadata) &&
        isPresent(completion.completion_metadata.prompt_template),
    );
    const template =
      withPrompt && isRecord(withPrompt.completion_metadata)
        ? toJsonValue(withPrompt.completion_metadata.prompt_template)
        : null;
    return {
      passed: withPrompt !== undefined,
      statusCode: response.statusCode,
      details: {
        completion_count: reconciled.count,
        total_returned: reconciled.totalReturned,
        since: window.startText,
        has_prompt: withPrompt !== undefined,
        prompt_template: template,
      },
    };
  },

  async check_prompt_has_variable(criterion, scope) {
    const promptName = criterion.prompt_name ?? '';
    const variableName = criterion.variable_name ?? '';
    const listing = await scope.client.listPromptTemplates();
    const template = listItems(listing.data).find((t) => nameOf(t) === promptName);
    const templateId = template ? idOf(template) : null;
    const versionId = template ? idOf(template, 'latest_template_version_id') : null;
    const details = {
      prompt_name: promptName,
      variable_name: variableName,
      template_id: templateId,
      version_id: versionId,
      found: false,
    };

    if (!template || templateId === null) {
      return {
        passed: false,
        statusCode: listing.statusCode,
        details,
        error: `Prompt template not found: ${promptName}`,
      };
    }
    if (versionId === null) {
      return {
        passed: false,
        statusCode: listing.statusCode,
        details,
        error: `Prompt template ${promptName} has no latest version`,
      };
    }

    const version = await scope.client.getPromptTemplateVersion(templateId, versionId);
    const placeholder = `{{${variableName}}}`;
    const found = messageContents(version.data).some((content) => content.includes(placeholder));
    return { passed: found, statusCode: version.statusCode, details: { ...details, found } };
  },

  async check_dataset_exists(criterion, scope) {
    const datasetName = criterion.dataset_name ?? '';
    const response = await scope.client.listDatasets();
    const datasets = listItems(response.data);
    const found = datasets.some((dataset) => nameOf(dataset) === datasetName);
    return {
      passed: found,
      statusCode: response.statusCode,
      details: { dataset_name: datasetName, dataset_count: datasets.length, found },
    };
  },

  async check_dataset_has_test_cases(criterion, scope) {
    const minTestCases = criterion.min_test_cases ?? DEFAULT_MIN_TEST_CASES;
    const listing = await scope.client.listDatasets();
    const datasets = listItems(listing.data);
    // Falls back to the first listed dataset, whose identity depends on platform ordering.
    const dataset =
      datasets.find((d) => criterion.dataset_name !== undefined && nameOf(d) === criterion.dataset_name) ??
      datasets[0];
    const datasetId = dataset ? idOf(dataset) : null;

    if (!dataset || datasetId === null) {
      return {
        passed: false,
        statusCode: listing.statusCode,
        details: {
          dataset_name: dataset ? (nameOf(dataset) ?? null) : null,
          dataset_id: null,
          test_case_count: 0,
          min_test_cases: minTestCases,
        },
        error: 'No dataset found',
      };
    }

    const testCases = await scope.client.getDatasetTestCases(datasetId);
    const count = listItems(testCases.data).length;
    return {
      passed: count >= minTestCases,
      statusCode: testCases.statusCode,
      details: {
        dataset_name: nameOf(dataset) ?? null,
        dataset_id: datasetId,
        test_case_count: count,
        min_test_cases: minTestCases,
      },
    };
  },

  async check_test_run_exists(_criterion, scope) {
    const window = scope.window();
    const response = await scope.client.listTestRuns();
    const runs = listItems(response.data);
    const recent = inWindowTestRuns(runs, window);
    return {
      passed: recent.length > 0,
      statusCode: response.statusCode,
      details: {
        test_run_count: recent.length,
        total_returned: runs.length,
        since_epoch: window.startEpoch,
      },
    };
  },

  async check_test_run_has_sessions(criterion, scope) {
    const minSessions = criterion.min_sessions ?? DEFAULT_MIN_SESSIONS;
    const window = scope.window();
    const listing = await scope.client.listTestRuns();
    const recent = inWindowTestRuns(listItems(listing.data), window);
    const latest = recent.reduce<PlatformRecord | undefined>(
      (best, run) => (best === undefined || createdAt(run) > createdAt(best) ? run : best),
      undefined,
    );
    const details = {
      test_run_id: latest ? idOf(latest) : null,
      test_run_count: recent.length,
      session_count: 0,
      min_sessions: minSessions,
    };

    if (!latest) {
      return { passed: false, statusCode: listing.statusCode, details };
    }
    if (details.test_run_id === null) {
      return {
        passed: false,
        statusCode: listing.statusCode,
        details,
        error: 'Latest test run has no id',
      };
    }

    let detail: PlatformResponse;
    try {
      detail = await scope.client.getTestRun(details.test_run_id);
    } catch (error) {
      throw new PlatformRequestError(
        `Failed to fetch test run ${details.test_run_id}: ${errorMessage(error)}`,
        error instanceof PlatformRequestError
          ? { reachable: error.reachable, statusCode: error.statusCode, cause: error }
          : { reachable: false, cause: error },
      );
    }

    const sessionCount = isRecord(detail.data) ? countSessions(detail.data) : 0;
    return {
      passed: sessionCount >= minSessions,
      statusCode: detail.statusCode,
      details: { ...details, session_count: sessionCount },
    };
  },
};

function resolveClient(context: CheckContext, apiKey: string, projectId: string): PlatformClient {
  return (
    context.platformClient ??
    new HttpPlatformClient({ ...context.environment.platform, apiKey, projectId })
  );
}

/**
 * Confirms through the platform API that the integration recorded what the
 * scenario asked for. Missing credentials skip the check.
 */
export const apiVerify: CheckExecutor<ApiVerifyCriterion, ApiVerifyOutcome> = async (
  criterion,
  context,
) => {
  const outcome: ApiVerifyOutcome = {
    check: 'api_verify',
    description: criterion.description,
    method: criterion.method,
    passed: false,
    skipped: false,
  };

  const { apiKey, projectId } = context.environment.platform;
  if (!apiKey || !projectId) {
    return { ...outcome, passed: null, skipped: true, reason: MISSING_CREDENTIALS_REASON };
  }

  if (!isApiVerifyMethod(criterion.method)) {
    outcome.error = `Unknown verification method: ${criterion.method}`;
    return outcome;
  }

  const scope: MethodScope = {
    client: resolveClient(context, apiKey, projectId),
    window: () => resolveWindow(context.environment, context.now?.()),
  };

  try {
    const result = await METHODS[criterion.method](criterion, scope);
    outcome.passed = result.passed;
    outcome.api_reachable = true;
    outcome.status_code = result.statusCode;
    outcome.details = result.details;
    if (result.error !== undefined) {
      outcome.error = result.error;
    }
  } catch (error) {
    if (error instanceof PlatformRequestError) {
      outcome.api_reachable = error.reachable;
      if (error.statusCode !== undefined) {
        outcome.status_code = error.statusCode;
      }
    }
    outcome.error = errorMessage(error);
  }

  return outcome;
};
