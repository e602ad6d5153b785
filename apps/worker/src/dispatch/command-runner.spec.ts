import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { makeTempDir } from '../testing/fakes';
import { ExecaCommandRunner, toExecutionResult } from './command-runner';

describe('toExecutionResult', () => {
  const output = { stdout: 'out', stderr: 'err', timedOut: false };

  it('keeps the exit status of a finished process', () => {
    expect(toExecutionResult({ ...output, exitCode: 41 }, 1200)).toEqual({
      exitStatus: 41,
      stdout: 'out',
      stderr: 'err',
      durationMs: 1200,
      failure: null,
    });
  });

  it('reports success as exit status 0', () => {
    expect(toExecutionResult({ ...output, exitCode: 0 }, 10).exitStatus).toBe(0);
  });

  it('has no exit status when the process was killed by a signal', () => {
    expect(toExecutionResult({ ...output, signal: 'SIGKILL' }, 10)).toMatchObject({
      exitStatus: null,
      failure: 'signal:SIGKILL',
    });
  });

  it('reports a timeout', () => {
    expect(
      toExecutionResult({ ...output, timedOut: true, signal: 'SIGTERM' }, 10),
    ).toMatchObject({ exitStatus: null, failure: 'timed_out' });
  });

  it('describes a process that never started', () => {
    expect(
      toExecutionResult(
        { stdout: '', stderr: '', timedOut: false, shortMessage: 'Command failed with ENOENT' },
        3,
      ),
    ).toEqual({
      exitStatus: null,
      stdout: '',
      stderr: '',
      durationMs: 3,
      failure: 'Command failed with ENOENT',
    });
  });
});

describe('ExecaCommandRunner', () => {
  const runner = new ExecaCommandRunner();
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('captures the exit status and stdout of the job process', async () => {
    const result = await runner.run(
      { file: process.execPath, args: ['-e', 'process.stdout.write("blocked"); process.exit(41)'] },
      { cwd: dir },
    );

    expect(result).toMatchObject({ exitStatus: 41, stdout: 'blocked', failure: null });
  });

  it('runs the job in the configured working directory', async () => {
    const result = await runner.run(
      { file: process.execPath, args: ['-e', 'process.stdout.write(process.cwd())'] },
      { cwd: dir },
    );

    expect(result.exitStatus).toBe(0);
    expect(await fs.realpath(result.stdout)).toBe(await fs.realpath(dir));
  });

  it('reports an executable that cannot be started', async () => {
    const result = await runner.run(
      { file: path.join(dir, 'missing-crawl'), args: [] },
      { cwd: dir },
    );

    expect(result.exitStatus).toBeNull();
    expect(result.failure).toContain('ENOENT');
  });
});
