import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, UsageError, type ResultDocument } from '@plugin-evals/shared';
import { readResultDocument, writeComparisonReport, writeResultDocument } from './results';
import { compareResults } from './comparator';

const document: ResultDocument = {
  scenario: 'integration-with-prompt',
  checks: [
    {
      check: 'api_verify',
      description: 'A completion was logged',
      method: 'search_completions',
      passed: null,
      skipped: true,
      reason: 'PLATFORM_API_KEY or PLATFORM_PROJECT_ID not set',
    },
  ],
  score: {
    categories: {
      completion_logged: {
        passed: null,
        skipped: true,
        reason: 'PLATFORM_API_KEY or PLATFORM_PROJECT_ID not set',
        points: 0,
        max_points: 30,
      },
    },
    total: 0,
    max_total: 30,
    percentage: 0,
  },
  mode: 'baseline',
  timestamp: '2026-01-01T00:00:00.000Z',
  project_dir: '/tmp/project',
  timing: { start_time: '2026-01-01 00:00:00', end_time: null, duration_seconds: 75 },
};

describe('result documents', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it('round-trips through disk with two-space indentation', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'evals-results-'));
    const file = path.join(tmpDir, 'results', 'baseline.json');

    await writeResultDocument(file, document);

    const text = await fs.readFile(file, 'utf8');
    expect(text.startsWith('{\n  "scenario": "integration-with-prompt",\n')).toBe(true);
    expect(await readResultDocument(file)).toEqual(document);
  });

  it('writes comparison reports', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'evals-results-'));
    const file = path.join(tmpDir, 'comparison.json');
    const report = compareResults(document, { ...document, mode: 'with-plugin' });

    await writeComparisonReport(file, report);

    expect(JSON.parse(await fs.readFile(file, 'utf8'))).toEqual(report);
  });

  it('raises a UsageError for a missing file', async () => {
    await expect(readResultDocument('/nonexistent/results.json')).rejects.toBeInstanceOf(UsageError);
  });

  it('raises a ConfigError for malformed documents', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'evals-results-'));
    const garbled = path.join(tmpDir, 'garbled.json');
    const invalid = path.join(tmpDir, 'invalid.json');
    await fs.writeFile(garbled, '{');
    await fs.writeFile(invalid, JSON.stringify({ ...document, mode: 'treatment' }));

    await expect(readResultDocument(garbled)).rejects.toBeInstanceOf(ConfigError);
    await expect(readResultDocument(invalid)).rejects.toThrow(/^Invalid result document /);
  });
});
