import { describe, it, expect } from 'vitest';
import type { ApiVerifyOutcome, CheckOutcome, FileContainsOutcome } from '@plugin-evals/shared';
import { calculateScore, categoryOf, percentageOf, roundToTenth } from './scoring';

const fileCheck = (passed: boolean): FileContainsOutcome => ({
  check: 'file_contains',
  description: '',
  file: 'main.py',
  patterns: ['gpt-4o-mini'],
  found: passed ? ['gpt-4o-mini'] : [],
  missing: passed ? [] : ['gpt-4o-mini'],
  passed,
  skipped: false,
});

const apiCheck = (method: string, passed: boolean | null): ApiVerifyOutcome => ({
  check: 'api_verify',
  description: '',
  method,
  passed,
  skipped: passed === null,
  reason: passed === null ? 'PLATFORM_API_KEY or PLATFORM_PROJECT_ID not set' : undefined,
});

describe('categoryOf', () => {
  it('maps check kinds and API methods to rubric categories', () => {
    expect(categoryOf(fileCheck(true))).toBe('code_modified');
    expect(categoryOf(apiCheck('check_dataset_has_test_cases', true))).toBe('dataset_has_test_cases');
    expect(categoryOf(apiCheck('check_test_run_has_sessions', true))).toBe('test_run_has_sessions');
  });

  it('has no category for unknown methods or inherited keys', () => {
    expect(categoryOf(apiCheck('check_everything', false))).toBeUndefined();
    expect(
      categoryOf({
        check: 'unknown',
        declared_type: 'toString',
        description: '',
        passed: false,
        skipped: false,
      }),
    ).toBeUndefined();
  });
});

describe('calculateScore', () => {
  it('awards full points when the file contains the pattern', () => {
    expect(calculateScore({ code_modified: { points: 10 } }, [fileCheck(true)])).toEqual({
      categories: {
        code_modified: { passed: true, skipped: false, points: 10, max_points: 10 },
      },
      total: 10,
      max_total: 10,
      percentage: 100,
    });
  });

  it('awards nothing when the pattern is missing', () => {
    const score = calculateScore({ code_modified: { points: 10 } }, [fileCheck(false)]);
    expect(score.total).toBe(0);
    expect(score.max_total).toBe(10);
    expect(score.percentage).toBe(0);
  });

  it('keeps skipped categories tri-state with zero points', () => {
    const score = calculateScore(
      { completion_logged: { points: 30 }, code_modified: { points: 10 } },
      [fileCheck(true), apiCheck('search_completions', null)],
    );
    expect(score.categories.completion_logged).toEqual({
      passed: null,
      skipped: true,
      reason: 'PLATFORM_API_KEY or PLATFORM_PROJECT_ID not set',
      points: 0,
      max_points: 30,
    });
    expect(score.total).toBe(10);
    expect(score.max_total).toBe(40);
    expect(score.percentage).toBe(25);
  });

  it('excludes outcomes without a rubric entry', () => {
    const outcomes: CheckOutcome[] = [fileCheck(true), apiCheck('check_prompt_exists', true)];
    const score = calculateScore({ prompt_created: { points: 5 } }, outcomes);
    expect(Object.keys(score.categories)).toEqual(['prompt_created']);
    expect(score.total).toBe(5);
  });

  it('lets a later outcome for the same category win', () => {
    const score = calculateScore({ code_modified: { points: 10 } }, [
      fileCheck(true),
      fileCheck(false),
    ]);
    expect(score.categories.code_modified.passed).toBe(false);
    expect(score.total).toBe(0);
  });

  it('reports zero percent when nothing is scored', () => {
    expect(calculateScore({}, [fileCheck(true)])).toEqual({
      categories: {},
      total: 0,
      max_total: 0,
      percentage: 0,
    });
  });

  it('rounds the percentage to one decimal', () => {
    const score = calculateScore(
      { code_modified: { points: 1 }, prompt_created: { points: 2 } },
      [fileCheck(true), apiCheck('check_prompt_exists', false)],
    );
    expect(score.percentage).toBe(33.3);
  });
});

describe('rounding helpers', () => {
  it('rounds halves away from zero', () => {
    expect(roundToTenth(66.66666)).toBe(66.7);
    expect(roundToTenth(-12.25)).toBe(-12.3);
    expect(roundToTenth(-0.01)).toBe(0);
  });

  it('never divides by zero', () => {
    expect(percentageOf(0, 0)).toBe(0);
    expect(percentageOf(2, 3)).toBe(66.7);
  });
});
