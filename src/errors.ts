/**
 * Error classes for a squadtrace run. Every one of them ends the run.
 */

export class SquadtraceError extends Error {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'SquadtraceError';
    this.cause = cause;
  }
}

/**
 * A request failed or came back with a non-success status.
 */
export class TransportError extends SquadtraceError {
  constructor(
    public readonly url: string,
    public readonly status?: number,
    cause?: Error
  ) {
    const detail = status !== undefined ? `status ${status}` : cause?.message ?? 'no response';
    super(`Could not request ${url}: ${detail}`, cause);
    this.name = 'TransportError';
  }
}

/**
 * An expected pattern was not found in fetched content.
 */
export class ExtractionError extends SquadtraceError {
  constructor(
    public readonly field: string,
    public readonly source: string
  ) {
    super(`Could not extract ${field} from ${source}`);
    this.name = 'ExtractionError';
  }
}

export class ConfigurationError extends SquadtraceError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
