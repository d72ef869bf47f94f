export type ConclaveErrorCode = 'CONFIG_INVALID' | 'PERSISTENCE_FAILURE' | 'QUOTA_MISUSE';

/** Base class for every error the engine throws on purpose. */
export class ConclaveError extends Error {
  readonly code: ConclaveErrorCode;

  constructor(code: ConclaveErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConclaveError';
    this.code = code;
  }
}

export class ConfigError extends ConclaveError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when run state cannot be durably written. Fatal: resume guarantees
 * no longer hold once a result is lost.
 */
export class PersistenceError extends ConclaveError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('PERSISTENCE_FAILURE', `Failed to persist ${path}: ${detail}`, { cause });
    this.name = 'PersistenceError';
    this.path = path;
  }
}

export class QuotaError extends ConclaveError {
  constructor(message: string) {
    super('QUOTA_MISUSE', message);
    this.name = 'QuotaError';
  }
}

export function isPersistenceError(err: unknown): err is PersistenceError {
  return err instanceof PersistenceError;
}
