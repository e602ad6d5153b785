import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Sleep } from '@dispatch/shared';
import pino, { type Logger } from 'pino';
import type {
  BusMessage,
  BusSubscription,
  MessageBus,
  SubscribeOptions,
} from '../bus/bus.types';
import type { WorkerConfig } from '../config/agent-config';
import type { Command } from '../dispatch/command';
import type { CommandRunner, ExecutionResult, RunOptions } from '../dispatch/command-runner';
import type { ErrorLogSink } from '../error-log/error-log.sink';
import type { ErrorGenre } from '../retry/failure-classifier';

export const silentLogger: Logger = pino({ level: 'silent' });

export async function makeTempDir(prefix = 'dispatch-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function workerConfig(root: string, overrides: Partial<WorkerConfig> = {}): WorkerConfig {
  return {
    subscriptionName: 'crawl-sub',
    workingDir: root,
    executablePath: '/usr/local/bin/crawl',
    baseArgs: ['--target', 'video-feed'],
    extraArgs: ['--headless'],
    stagingDir: path.join(root, 'queue', 'crawl-sub'),
    logDir: path.join(root, 'logs'),
    retryTopic: 'crawl-retry',
    maxRetries: 3,
    jobTimeoutSec: null,
    ...overrides,
  };
}

export class FakeDelivery implements BusMessage {
  acked = false;
  nacked = false;

  constructor(
    readonly id: string,
    readonly body: Buffer,
    readonly attributes: Record<string, string>,
  ) {}

  ack(): void {
    this.acked = true;
  }

  nack(): void {
    this.nacked = true;
  }
}

export type PublishedMessage = {
  topic: string;
  body: Buffer;
  attributes: Record<string, string>;
};

/**
 * MessageBus that keeps everything in memory. Deliveries are pushed with
 * `deliver`, publishes are recorded in `published`.
 */
export class InMemoryMessageBus implements MessageBus {
  readonly published: PublishedMessage[] = [];
  readonly subscribeOptions = new Map<string, SubscribeOptions>();
  publishError: Error | null = null;
  closed = false;
  private readonly handlers = new Map<string, (message: BusMessage) => void>();

  subscribe(
    name: string,
    options: SubscribeOptions,
    onMessage: (message: BusMessage) => void,
  ): BusSubscription {
    this.handlers.set(name, onMessage);
    this.subscribeOptions.set(name, options);
    return {
      close: async () => {
        this.handlers.delete(name);
      },
    };
  }

  async publish(
    topic: string,
    body: Buffer,
    attributes: Record<string, string>,
  ): Promise<string> {
    if (this.publishError) {
      throw this.publishError;
    }
    this.published.push({ topic, body, attributes });
    return `published-${this.published.length}`;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  isSubscribed(name: string): boolean {
    return this.handlers.has(name);
  }

  deliver(
    subscription: string,
    id: string,
    body: string,
    attributes: Record<string, string> = {},
  ): FakeDelivery {
    const handler = this.handlers.get(subscription);
    if (!handler) {
      throw new Error(`no subscriber for ${subscription}`);
    }
    const delivery = new FakeDelivery(id, Buffer.from(body, 'utf-8'), attributes);
    handler(delivery);
    return delivery;
  }
}

export type RunCall = { command: Command; options: RunOptions };

/**
 * CommandRunner returning scripted results in order; exit 0 once the
 * script runs out.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RunCall[] = [];
  onRun: ((call: RunCall) => Promise<void> | void) | null = null;
  private readonly script: Array<Partial<ExecutionResult>> = [];

  enqueue(...results: Array<Partial<ExecutionResult>>): this {
    this.script.push(...results);
    return this;
  }

  async run(command: Command, options: RunOptions): Promise<ExecutionResult> {
    const call = { command, options };
    this.calls.push(call);
    await this.onRun?.(call);
    return {
      exitStatus: 0,
      stdout: '',
      stderr: '',
      durationMs: 5,
      failure: null,
      ...this.script.shift(),
    };
  }
}

export type RecordedError = { subscription: string; genre: ErrorGenre; at: Date };

export class RecordingErrorLogSink implements ErrorLogSink {
  readonly records: RecordedError[] = [];
  closed = false;

  async record(subscription: string, genre: ErrorGenre, at: Date): Promise<boolean> {
    this.records.push({ subscription, genre, at });
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Sleep that returns immediately and remembers the requested delays.
 * Honors an already-aborted signal the way the real one does.
 */
export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  const sleep: Sleep = async (ms, signal) => {
    delays.push(ms);
    if (signal?.aborted) {
      const error = new Error('The operation was aborted');
      error.name = 'AbortError';
      throw error;
    }
  };
  return { sleep, delays };
}

export async function listDir(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch {
    return [];
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
