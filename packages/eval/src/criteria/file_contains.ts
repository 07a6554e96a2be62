import * as fs from 'fs/promises';
import * as path from 'path';
import {
  errorMessage,
  type FileContainsCriterion,
  type FileContainsOutcome,
} from '@plugin-evals/shared';
import type { CheckExecutor } from './types';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Case-insensitive substring match of every pattern against one project file. */
export const fileContains: CheckExecutor<FileContainsCriterion, FileContainsOutcome> = async (
  criterion,
  context,
) => {
  const outcome: FileContainsOutcome = {
    check: 'file_contains',
    description: criterion.description,
    file: criterion.file,
    patterns: criterion.patterns,
    passed: false,
    skipped: false,
    found: [],
    missing: [],
  };

  let content: string;
  try {
    content = (await fs.readFile(path.join(context.projectDir, criterion.file), 'utf-8')).toLowerCase();
  } catch (error) {
    outcome.error = isMissingFile(error)
      ? `File not found: ${criterion.file}`
      : `Failed to read ${criterion.file}: ${errorMessage(error)}`;
    return outcome;
  }

  for (const pattern of criterion.patterns) {
    if (content.includes(pattern.toLowerCase())) {
      outcome.found.push(pattern);
    } else {
      outcome.missing.push(pattern);
    }
  }
  outcome.passed = outcome.missing.length === 0;
  return outcome;
};
