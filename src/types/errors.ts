export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// A read that kept failing on timeouts, connection errors, 429 or 5xx
export class TransientIOError extends Error {
  public readonly attempts: number;
  constructor(label: string, attempts: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${label} failed after ${attempts} attempt(s): ${detail}`, { cause });
    this.name = 'TransientIOError';
    this.attempts = attempts;
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class CommitError extends Error {
  public readonly trackIds: string[];
  constructor(trackIds: string[], cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to add ${trackIds.length} track(s) to the playlist: ${detail}`, { cause });
    this.name = 'CommitError';
    this.trackIds = trackIds;
  }
}
