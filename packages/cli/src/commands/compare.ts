import { Command } from 'commander';
import {
  compareResults,
  createReportRenderer,
  readResultDocument,
  writeComparisonReport,
} from '@plugin-evals/eval';
import type { ComparisonReport } from '@plugin-evals/shared';
import { OutputRenderer } from '../output';
import type { CliRun, CommandDeps, GlobalOptions } from './types';

export interface CompareArgs {
  baseline: string;
  withPlugin: string;
  output?: string;
}

export async function runCompare(
  args: CompareArgs,
  options: GlobalOptions,
  deps: Pick<CommandDeps, 'sink'> = {},
): Promise<ComparisonReport> {
  const baseline = await readResultDocument(args.baseline);
  const withPlugin = await readResultDocument(args.withPlugin);
  const report = compareResults(baseline, withPlugin);

  const output = new OutputRenderer(!!options.json, deps.sink, { color: options.color });
  output.render(report, createReportRenderer({ color: options.color }).renderComparison(report));

  if (args.output) {
    await writeComparisonReport(args.output, report);
    output.saved('Comparison', args.output);
  }
  return report;
}

export function registerCompareCommand(program: Command, run: CliRun, deps: CommandDeps = {}) {
  program
    .command('compare')
    .description('Compare a baseline result document with a with-plugin one')
    .argument('<baseline>', 'Baseline result document')
    .argument('<withPlugin>', 'With-plugin result document')
    .argument('[output]', 'Write the comparison report to this file')
    .action(async (baseline: string, withPlugin: string, outputFile: string | undefined) => {
      await runCompare({ baseline, withPlugin, output: outputFile }, program.opts<GlobalOptions>(), deps);
      run.exitCode = 0;
    });
}
