import execa from 'execa';
import type { Command } from './command';

export type ExecutionResult = {
  /** Null when the process never started, was signalled or timed out. */
  exitStatus: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  failure: string | null;
};

export type RunOptions = {
  cwd: string;
  timeoutMs?: number;
};

export interface CommandRunner {
  run(command: Command, options: RunOptions): Promise<ExecutionResult>;
}

export const COMMAND_RUNNER = Symbol('COMMAND_RUNNER');

/**
 * The parts of an execa result (or of the error it resolves with under
 * `reject: false`) a dispatch cares about.
 */
export type ProcessOutcome = {
  exitCode?: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  signal?: string;
  shortMessage?: string;
};

export function toExecutionResult(outcome: ProcessOutcome, durationMs: number): ExecutionResult {
  const base = { stdout: outcome.stdout, stderr: outcome.stderr, durationMs };
  if (outcome.timedOut) {
    return { ...base, exitStatus: null, failure: 'timed_out' };
  }
  if (outcome.signal) {
    return { ...base, exitStatus: null, failure: `signal:${outcome.signal}` };
  }
  if (typeof outcome.exitCode === 'number') {
    return { ...base, exitStatus: outcome.exitCode, failure: null };
  }
  return { ...base, exitStatus: null, failure: outcome.shortMessage ?? 'spawn_failed' };
}

/**
 * Runs the job executable and waits for it to exit. There is no time
 * limit unless `timeoutMs` is given.
 */
export class ExecaCommandRunner implements CommandRunner {
  async run(command: Command, options: RunOptions): Promise<ExecutionResult> {
    const start = Date.now();
    const outcome = await execa(command.file, command.args, {
      cwd: options.cwd,
      reject: false,
      windowsHide: true,
      ...(options.timeoutMs ? { timeout: options.timeoutMs } : {}),
    });
    return toExecutionResult(outcome, Date.now() - start);
  }
}
