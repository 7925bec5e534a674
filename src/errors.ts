export const ExitCodes = {
  Success: 0,
  Failure: 1
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export class SyncError extends Error {
  public readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = ExitCodes.Failure) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class ConfigurationError extends SyncError {}

export class BuildChainError extends SyncError {}

export class MissingDestinationError extends SyncError {
  public readonly missing: string[];

  constructor(missing: string[]) {
    super(`${missing.length} destination file(s) do not exist`);
    this.missing = missing;
  }
}

export class CopyFailure extends SyncError {
  public readonly source: string;
  public readonly destination: string;
  public readonly copied: number;

  constructor(source: string, destination: string, copied: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to copy ${source} to ${destination}: ${reason}`);
    this.source = source;
    this.destination = destination;
    this.copied = copied;
  }
}
