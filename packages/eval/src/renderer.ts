import defaultChalk, { Chalk, type ChalkInstance } from 'chalk';
import Table from 'cli-table3';
import type {
  CategoryScore,
  CheckOutcome,
  ComparisonReport,
  ResultDocument,
} from '@plugin-evals/shared';
import { verdictOf } from './criteria';

function signed(value: number, suffix = ''): string {
  return `${value > 0 ? '+' : ''}${value}${suffix}`;
}

function signedTenth(value: number): string {
  return `${value > 0 ? '+' : ''}${value.toFixed(1)}`;
}

/** `Xm Ys`, or `Ys` under a minute. */
export function formatDuration(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

/** Renderer with colors forced off, or left to terminal detection. */
export function createReportRenderer(options: { color?: boolean } = {}): ReportRenderer {
  return new ReportRenderer(options.color === false ? new Chalk({ level: 0 }) : defaultChalk);
}

/**
 * Renders result documents and comparison reports for the terminal. Output
 * is returned as text so callers decide where it goes.
 */
export class ReportRenderer {
  constructor(private readonly chalk: ChalkInstance = defaultChalk) {}

  private mark(outcome: Pick<CheckOutcome, 'passed' | 'skipped'>): string {
    switch (verdictOf(outcome)) {
      case 'pass':
        return this.chalk.green('✓');
      case 'skip':
        return this.chalk.gray('⊘');
      case 'fail':
        return this.chalk.red('✗');
    }
  }

  renderChecks(checks: CheckOutcome[]): string[] {
    const lines = [this.chalk.bold('=== Check Results ===')];
    for (const check of checks) {
      lines.push(`${this.mark(check)} ${check.description || check.check}`);
      if (check.error) {
        lines.push(this.chalk.red(`  Error: ${check.error}`));
      }
      if (check.check === 'file_contains' && check.missing.length > 0) {
        lines.push(`  Missing patterns: ${check.missing.join(', ')}`);
      }
      if (check.check === 'code_runs' && check.warning) {
        lines.push(this.chalk.yellow(`  Warning: ${check.warning}`));
      }
      if (check.check === 'code_runs' && check.install_failures) {
        lines.push(this.chalk.yellow(`  Install failed: ${check.install_failures.join(', ')}`));
      }
      if (check.skipped) {
        lines.push(this.chalk.gray(`  Skipped: ${check.reason ?? 'no reason given'}`));
      }
    }
    return lines;
  }

  renderScore(categories: Record<string, CategoryScore>): string[] {
    const lines = [this.chalk.bold('=== Score ===')];
    for (const [category, score] of Object.entries(categories)) {
      lines.push(`${this.mark(score)} ${category}: ${score.points}/${score.max_points}`);
    }
    return lines;
  }

  renderResult(document: ResultDocument): string {
    const { score, timing } = document;
    const lines = [
      ...this.renderChecks(document.checks),
      '',
      ...this.renderScore(score.categories),
      '',
      this.chalk.bold(`Total: ${score.total}/${score.max_total} (${score.percentage}%)`),
    ];
    if (timing.duration_seconds > 0) {
      lines.push(`Duration: ${formatDuration(timing.duration_seconds)}`);
    }
    return lines.join('\n');
  }

  renderComparison(report: ComparisonReport): string {
    const { summary } = report;
    const rule = '='.repeat(60);
    const table = new Table({
      head: ['Metric', 'Baseline', 'With plugin', 'Delta'],
      colAligns: ['left', 'right', 'right', 'right'],
      style: { head: [], border: [] },
    });
    table.push(
      ['Total points', String(summary.baseline_total), String(summary.plugin_total), signed(summary.delta)],
      [
        'Percentage',
        `${summary.baseline_percentage}%`,
        `${summary.plugin_percentage}%`,
        `${signedTenth(summary.percentage_delta)}%`,
      ],
    );

    const lines = [rule, this.chalk.bold(`EVALUATION COMPARISON: ${report.scenario}`), rule, '', table.toString(), ''];

    if (report.improvements.length > 0) {
      lines.push(this.chalk.green('✓ IMPROVEMENTS (plugin passed where baseline failed)'));
      for (const item of report.improvements) {
        lines.push(`  • ${item.category}: ${item.baseline} → ${item.with_plugin} (${signed(item.delta)})`);
      }
      lines.push('');
    }

    if (report.regressions.length > 0) {
      lines.push(this.chalk.red('✗ REGRESSIONS (baseline passed where plugin failed)'));
      for (const item of report.regressions) {
        lines.push(`  • ${item.category}: ${item.baseline} → ${item.with_plugin} (${signed(item.delta)})`);
      }
      lines.push('');
    }

    if (report.unchanged.length > 0) {
      lines.push('= UNCHANGED');
      for (const item of report.unchanged) {
        if (item.status === 'skipped') {
          lines.push(`  ⊘ ${item.category}: skipped (${item.reason ?? 'unknown reason'})`);
        } else {
          lines.push(`  ${item.status === 'passed' ? '✓' : '✗'} ${item.category}: ${item.status}`);
        }
      }
      lines.push('');
    }

    lines.push(rule);
    if (summary.verdict === 'improved') {
      lines.push(
        this.chalk.green(
          `VERDICT: Plugin IMPROVED score by ${summary.delta} points (${signedTenth(summary.percentage_delta)}%)`,
        ),
      );
    } else if (summary.verdict === 'reduced') {
      lines.push(
        this.chalk.red(
          `VERDICT: Plugin REDUCED score by ${Math.abs(summary.delta)} points (${signedTenth(summary.percentage_delta)}%)`,
        ),
      );
    } else {
      lines.push('VERDICT: No change in score');
    }
    lines.push(rule);
    return lines.join('\n');
  }
}
