import { Agent, fetch as undiciFetch } from 'undici';
import { PlatformRequestError, errorMessage, type PlatformSettings } from '@plugin-evals/shared';

export type PlatformRecord = Record<string, unknown>;

export interface PlatformResponse {
  statusCode: number;
  data: unknown;
}

/** Server-side completion filter; honoured by the platform on a best-effort basis. */
export interface CompletionFilter {
  field: string;
  operator: 'gte' | 'lte' | 'eq';
  value: string;
}

/**
 * Read-only view of the prompt-management platform. Every call resolves
 * with the parsed body or rejects with a {@link PlatformRequestError}.
 */
export interface PlatformClient {
  searchCompletions(filters?: CompletionFilter): Promise<PlatformResponse>;
  listPromptTemplates(): Promise<PlatformResponse>;
  getPromptTemplateVersion(templateId: string, versionId: string): Promise<PlatformResponse>;
  listDatasets(): Promise<PlatformResponse>;
  getDatasetTestCases(datasetId: string): Promise<PlatformResponse>;
  listTestRuns(): Promise<PlatformResponse>;
  getTestRun(testRunId: string): Promise<PlatformResponse>;
}

interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

export function isRecord(value: unknown): value is PlatformRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Items of a `{ data: [...] }` list envelope; anything else is an empty list. */
export function listItems(body: unknown): PlatformRecord[] {
  if (!isRecord(body) || !Array.isArray(body.data)) {
    return [];
  }
  return body.data.filter(isRecord);
}

function defaultFetch(verifySsl: boolean): FetchLike {
  if (verifySsl) {
    return (url, init) => fetch(url, init);
  }
  const insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });
  return (url, init) => undiciFetch(url, { ...init, dispatcher: insecureAgent });
}

function describeTransportError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return `Request timed out after ${timeoutMs}ms`;
  }
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return errorMessage(error);
}

export interface HttpPlatformClientOptions {
  fetch?: FetchLike;
}

export class HttpPlatformClient implements PlatformClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly settings: PlatformSettings & { apiKey: string; projectId: string },
    options: HttpPlatformClientOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? defaultFetch(settings.verifySsl);
  }

  searchCompletions(filters?: CompletionFilter): Promise<PlatformResponse> {
    return this.makeRequest('/search/completions', 'POST', { filters: filters ?? {} });
  }

  listPromptTemplates(): Promise<PlatformResponse> {
    return this.makeRequest('/prompt-templates', 'GET');
  }

  getPromptTemplateVersion(templateId: string, versionId: string): Promise<PlatformResponse> {
    return this.makeRequest(
      `/prompt-templates/id/${encodeURIComponent(templateId)}/versions/${encodeURIComponent(versionId)}`,
      'GET',
    );
  }

  listDatasets(): Promise<PlatformResponse> {
    return this.makeRequest('/prompt-datasets', 'GET');
  }

  getDatasetTestCases(datasetId: string): Promise<PlatformResponse> {
    return this.makeRequest(`/prompt-datasets/id/${encodeURIComponent(datasetId)}/test-cases`, 'GET');
  }

  listTestRuns(): Promise<PlatformResponse> {
    return this.makeRequest('/test-runs', 'GET');
  }

  getTestRun(testRunId: string): Promise<PlatformResponse> {
    return this.makeRequest(`/test-runs/id/${encodeURIComponent(testRunId)}`, 'GET');
  }

  private async makeRequest(
    endpoint: string,
    method: 'GET' | 'POST',
    body?: unknown,
  ): Promise<PlatformResponse> {
    const url = `${this.settings.baseUrl}/api/v2/projects/${encodeURIComponent(this.settings.projectId)}${endpoint}`;

    let response: FetchResponse;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.settings.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });
    } catch (error) {
      throw new PlatformRequestError(describeTransportError(error, this.settings.timeoutMs), {
        reachable: false,
        cause: error,
        details: { method, endpoint },
      });
    }

    if (!response.ok) {
      throw new PlatformRequestError(`HTTP ${response.status} ${response.statusText}`.trim(), {
        reachable: true,
        statusCode: response.status,
        details: { method, endpoint },
      });
    }

    const text = await response.text();
    if (text.trim() === '') {
      return { statusCode: response.status, data: {} };
    }
    try {
      const data: unknown = JSON.parse(text);
      return { statusCode: response.status, data };
    } catch (error) {
      throw new PlatformRequestError(`Invalid JSON response from ${endpoint}`, {
        reachable: true,
        statusCode: response.status,
        cause: error,
      });
    }
  }
}
