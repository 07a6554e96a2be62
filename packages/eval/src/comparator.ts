import {
  UsageError,
  type CategoryDelta,
  type CategoryScore,
  type ComparableResult,
  type ComparisonReport,
  type ComparisonVerdict,
  type UnchangedCategory,
} from '@plugin-evals/shared';
import { roundToTenth } from './scoring';

type CategoryView = Pick<CategoryScore, 'passed' | 'points'> & Partial<CategoryScore>;

const ABSENT: CategoryView = { passed: false, points: 0 };

function categoryKeys(baseline: ComparableResult, treatment: ComparableResult): string[] {
  const keys = Object.keys(baseline.score.categories);
  for (const key of Object.keys(treatment.score.categories)) {
    if (!keys.includes(key)) keys.push(key);
  }
  return keys;
}

function lookup(result: ComparableResult, category: string): CategoryView {
  return Object.hasOwn(result.score.categories, category)
    ? result.score.categories[category]
    : ABSENT;
}

function verdictFor(delta: number): ComparisonVerdict {
  if (delta > 0) return 'improved';
  if (delta < 0) return 'reduced';
  return 'unchanged';
}

/**
 * Classifies every scored category of two runs of one scenario as an
 * improvement, a regression or unchanged, and summarizes the totals.
 */
export function compareResults(
  baseline: ComparableResult,
  withPlugin: ComparableResult,
): ComparisonReport {
  if (baseline.scenario !== withPlugin.scenario) {
    throw new UsageError(
      `Cannot compare different scenarios: "${baseline.scenario}" and "${withPlugin.scenario}"`,
    );
  }

  const improvements: CategoryDelta[] = [];
  const regressions: CategoryDelta[] = [];
  const unchanged: UnchangedCategory[] = [];

  for (const category of categoryKeys(baseline, withPlugin)) {
    const before = lookup(baseline, category);
    const after = lookup(withPlugin, category);

    if (before.skipped && after.skipped) {
      unchanged.push({ category, status: 'skipped', reason: after.reason ?? null });
    } else if (before.passed === false && after.passed === true) {
      improvements.push({
        category,
        baseline: before.points,
        with_plugin: after.points,
        delta: after.points - before.points,
      });
    } else if (before.passed === true && after.passed === false) {
      regressions.push({
        category,
        baseline: before.points,
        with_plugin: after.points,
        delta: after.points - before.points,
      });
    } else if (before.skipped) {
      unchanged.push({ category, status: 'skipped', reason: before.reason ?? null });
    } else {
      unchanged.push({
        category,
        status: before.passed === true ? 'passed' : 'failed',
        points: before.points,
      });
    }
  }

  const delta = withPlugin.score.total - baseline.score.total;

  return {
    scenario: baseline.scenario,
    baseline: {
      mode: baseline.mode,
      timestamp: baseline.timestamp,
      score: baseline.score,
    },
    with_plugin: {
      mode: withPlugin.mode,
      timestamp: withPlugin.timestamp,
      score: withPlugin.score,
    },
    improvements,
    regressions,
    unchanged,
    summary: {
      baseline_total: baseline.score.total,
      plugin_total: withPlugin.score.total,
      delta,
      baseline_percentage: baseline.score.percentage,
      plugin_percentage: withPlugin.score.percentage,
      percentage_delta: roundToTenth(withPlugin.score.percentage - baseline.score.percentage),
      verdict: verdictFor(delta),
    },
  };
}
