export class StageError extends Error {
  constructor(
    public readonly messageId: string,
    public readonly stagingDir: string,
    cause: unknown,
  ) {
    super(
      `Could not stage message ${messageId} in ${stagingDir}: ${describeCause(cause)}`,
      { cause },
    );
    this.name = 'StageError';
  }
}

export class MalformedStagedFileError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly reason: string,
  ) {
    super(`Malformed staged file ${filePath}: ${reason}`);
    this.name = 'MalformedStagedFileError';
  }
}

export type ConfigIssue = {
  path: string;
  message: string;
};

export class ConfigError extends Error {
  constructor(
    public readonly source: string,
    public readonly issues: ConfigIssue[],
  ) {
    super(
      `Invalid configuration in ${source}: ` +
        issues.map((issue) => `${issue.path}: ${issue.message}`).join('; '),
    );
    this.name = 'ConfigError';
  }
}

export class RetryPublishError extends Error {
  constructor(
    public readonly messageId: string,
    public readonly topic: string,
    cause: unknown,
  ) {
    super(
      `Retry publish of message ${messageId} to ${topic} failed: ${describeCause(cause)}`,
      { cause },
    );
    this.name = 'RetryPublishError';
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
