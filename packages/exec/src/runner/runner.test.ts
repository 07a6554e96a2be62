import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ProcessError, TimeoutError } from '@plugin-evals/shared';
import { CommandRunner, splitCommand } from './runner';

describe('splitCommand', () => {
  it('splits on any run of whitespace', () => {
    expect(splitCommand('  python   main.py\t--flag ')).toEqual(['python', 'main.py', '--flag']);
  });

  it('does not interpret quotes', () => {
    expect(splitCommand('echo "a b"')).toEqual(['echo', '"a', 'b"']);
  });

  it('returns nothing for a blank command', () => {
    expect(splitCommand('   ')).toEqual([]);
  });
});

describe('CommandRunner', () => {
  const runner = new CommandRunner();
  let tmpDir: string | undefined;

  async function projectWith(script: string): Promise<string> {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'evals-runner-test-'));
    await fs.writeFile(path.join(tmpDir, 'script.js'), script);
    return tmpDir;
  }

  afterEach(async () => {
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it('captures exit code and both streams', async () => {
    const cwd = await projectWith(
      "process.stdout.write('out'); process.stderr.write('err'); process.exit(3);",
    );

    const result = await runner.run({ command: 'node script.js', cwd, timeoutMs: 10_000 });

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe('out');
    expect(result.stderr).toBe('err');
    expect(result.truncated).toBe(false);
  });

  it('appends extra arguments without splitting them', async () => {
    const cwd = await projectWith('process.stdout.write(JSON.stringify(process.argv.slice(2)));');

    const result = await runner.run({
      command: 'node script.js --flag',
      args: ['two words', '--plugin-dir'],
      cwd,
      timeoutMs: 10_000,
    });

    expect(JSON.parse(result.stdout)).toEqual(['--flag', 'two words', '--plugin-dir']);
  });

  it('runs in the given directory with extra environment variables', async () => {
    const cwd = await projectWith(
      "process.stdout.write(process.cwd() + '|' + process.env.PYTHONPATH);",
    );

    const result = await runner.run({
      command: 'node script.js',
      cwd,
      env: { PYTHONPATH: cwd },
      timeoutMs: 10_000,
    });

    const realCwd = await fs.realpath(cwd);
    expect(result.stdout).toBe(`${realCwd}|${cwd}`);
  });

  it('stops recording output past the limit without killing the process', async () => {
    const cwd = await projectWith("process.stdout.write('x'.repeat(5000)); process.exit(0);");

    const result = await runner.run({
      command: 'node script.js',
      cwd,
      timeoutMs: 10_000,
      maxOutputBytes: 100,
    });

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('x'.repeat(100));
    expect(result.truncated).toBe(true);
  });

  it('rejects with a TimeoutError when the deadline passes', async () => {
    const cwd = await projectWith('setInterval(() => {}, 1000);');

    await expect(
      runner.run({ command: 'node script.js', cwd, timeoutMs: 300 }),
    ).rejects.toBeInstanceOf(TimeoutError);
  });

  it('rejects with a ProcessError when the binary does not exist', async () => {
    const cwd = await projectWith('');

    await expect(
      runner.run({ command: 'no-such-binary-for-evals', cwd, timeoutMs: 10_000 }),
    ).rejects.toBeInstanceOf(ProcessError);
  });

  it('rejects an empty command', async () => {
    await expect(runner.run({ command: ' ', cwd: os.tmpdir(), timeoutMs: 1000 })).rejects.toThrow(
      'Could not parse command: " "',
    );
  });
});
