import { existsSync } from 'fs';
import { join } from 'path';
import { execa } from 'execa';
import type { Logger } from '@plugin-evals/shared';

export const INSTALL_TIMEOUT_MS = 120_000;

export interface InstallStep {
  /** Manifest file whose presence triggers the step */
  manifest: string;
  file: string;
  args: string[];
}

export const INSTALL_STEPS: readonly InstallStep[] = [
  {
    manifest: 'requirements.txt',
    file: 'python3',
    args: ['-m', 'pip', 'install', '-q', '-r', 'requirements.txt'],
  },
  { manifest: 'package.json', file: 'npm', args: ['install', '--silent'] },
];

export interface InstallReport {
  manifest: string;
  command: string;
  ok: boolean;
  exitCode?: number;
  timedOut: boolean;
}

/** `timed out`, `exit <code>`, or `did not start` when no exit code was seen. */
export function describeInstallFailure(report: Pick<InstallReport, 'exitCode' | 'timedOut'>): string {
  if (report.timedOut) return 'timed out';
  return report.exitCode === undefined ? 'did not start' : `exit ${report.exitCode}`;
}

export interface InstallOptions {
  logger?: Logger;
  env?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Installs a project's declared dependencies for every manifest present.
 * Failures are reported and logged, never thrown: the command under test
 * decides the verdict.
 */
export async function installDependencies(
  projectDir: string,
  options: InstallOptions = {},
): Promise<InstallReport[]> {
  const reports: InstallReport[] = [];

  for (const step of INSTALL_STEPS) {
    if (!existsSync(join(projectDir, step.manifest))) continue;

    const command = [step.file, ...step.args].join(' ');
    await options.logger?.debug(`Installing dependencies: ${command}`);

    const result = await execa(step.file, step.args, {
      cwd: projectDir,
      env: options.env,
      timeout: options.timeoutMs ?? INSTALL_TIMEOUT_MS,
      reject: false,
    });

    const report: InstallReport = {
      manifest: step.manifest,
      command,
      ok: !result.failed && result.exitCode === 0,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
    };
    if (!report.ok) {
      await options.logger?.warn(
        `Dependency install from ${step.manifest} failed (${describeInstallFailure(report)}); continuing`,
      );
    }
    reports.push(report);
  }

  return reports;
}
