export type SimErrorCode =
  | 'CONFIG_ERROR'
  | 'LOAD_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'CHALLENGE_ERROR';

export class SimError extends Error {
  constructor(
    message: string,
    public readonly code: SimErrorCode,
  ) {
    super(message);
    this.name = 'SimError';
  }
}

/** Bad or missing input from the caller; aborts only the requested operation. */
export class ConfigError extends SimError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class LoadError extends SimError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Couldn't load ${path}: ${reason}`, 'LOAD_ERROR');
    this.name = 'LoadError';
  }
}

export class PersistenceError extends SimError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Couldn't save ${path}: ${reason}`, 'PERSISTENCE_ERROR');
    this.name = 'PersistenceError';
  }
}

export class ChallengeError extends SimError {
  constructor(message: string) {
    super(message, 'CHALLENGE_ERROR');
    this.name = 'ChallengeError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
