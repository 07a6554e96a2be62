import { spawn, spawnSync } from 'child_process';
import { ProcessError, TimeoutError } from '@plugin-evals/shared';

/** Recorded output per stream is capped at this many bytes by default. */
export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM') {
  if (process.platform === 'win32') {
    // process.kill does not reach grandchildren on Windows.
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
  } else {
    // Negative PID signals the whole group; requires a detached spawn.
    try {
      process.kill(-pid, signal);
    } catch {
      // Already exited.
    }
  }
}

/**
 * Splits a command line on whitespace. Quoting is not interpreted and no
 * shell is involved.
 */
export function splitCommand(command: string): string[] {
  const trimmed = command.trim();
  return trimmed === '' ? [] : trimmed.split(/\s+/);
}

export interface CommandRequest {
  command: string;
  /** Passed verbatim after the split command, e.g. a prompt containing spaces */
  args?: string[];
  cwd: string;
  /** Merged over the current process environment */
  env?: Record<string, string>;
  timeoutMs: number;
  maxOutputBytes?: number;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  /** Set when either stream exceeded the recording limit */
  truncated: boolean;
}

class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private bytes = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    if (this.truncated) return;
    const room = this.limit - this.bytes;
    if (chunk.length > room) {
      this.truncated = true;
      this.chunks.push(chunk.subarray(0, Math.max(0, room)));
      this.bytes = this.limit;
      return;
    }
    this.chunks.push(chunk);
    this.bytes += chunk.length;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Runs a single command without a shell, bounded by a wall-clock timeout.
 * Output beyond the limit is dropped but the process keeps running.
 */
export class CommandRunner {
  async run(req: CommandRequest): Promise<CommandResult> {
    const [bin, ...commandArgs] = splitCommand(req.command);
    const args = [...commandArgs, ...(req.args ?? [])];
    if (!bin) {
      throw new ProcessError(`Could not parse command: "${req.command}"`);
    }

    const limit = req.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    const stdout = new OutputBuffer(limit);
    const stderr = new OutputBuffer(limit);
    const start = Date.now();

    return new Promise<CommandResult>((resolve, reject) => {
      let settled = false;
      const child = spawn(bin, args, {
        cwd: req.cwd,
        env: { ...process.env, ...req.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: process.platform !== 'win32',
      });

      const timeoutTimer = setTimeout(() => {
        if (settled) return;
        settled = true;
        if (child.pid) {
          killProcessTree(child.pid, 'SIGKILL');
        }
        reject(
          new TimeoutError(`Command timed out after ${req.timeoutMs}ms`, {
            details: {
              partialStdout: stdout.text().slice(0, 1000),
              partialStderr: stderr.text().slice(0, 1000),
            },
          }),
        );
      }, req.timeoutMs);

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (err) => {
        clearTimeout(timeoutTimer);
        if (settled) return;
        settled = true;
        reject(new ProcessError(`Failed to start process: ${err.message}`, { cause: err }));
      });

      child.on('close', (code) => {
        clearTimeout(timeoutTimer);
        if (settled) return;
        settled = true;
        resolve({
          exitCode: code ?? -1,
          stdout: stdout.text(),
          stderr: stderr.text(),
          durationMs: Date.now() - start,
          truncated: stdout.truncated || stderr.truncated,
        });
      });
    });
  }
}
