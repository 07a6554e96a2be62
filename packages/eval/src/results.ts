import fs from 'fs-extra';
import {
  ConfigError,
  PersistedResultSchema,
  UsageError,
  errorMessage,
  formatIssues,
  readJsonFile,
  writeJsonAtomic,
  type ComparisonReport,
  type PersistedResult,
  type ResultDocument,
} from '@plugin-evals/shared';

export async function writeResultDocument(filePath: string, document: ResultDocument): Promise<void> {
  await writeJsonAtomic(filePath, document);
}

export async function writeComparisonReport(
  filePath: string,
  report: ComparisonReport,
): Promise<void> {
  await writeJsonAtomic(filePath, report);
}

/** Reads and validates a result document written by a previous verify run. */
export async function readResultDocument(filePath: string): Promise<PersistedResult> {
  if (!(await fs.pathExists(filePath))) {
    throw new UsageError(`Result file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    throw new ConfigError(`Could not parse ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = PersistedResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid result document ${filePath}:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
