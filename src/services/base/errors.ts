import type { AccountKind } from '../../lifecycle/types';

export class DataSourceError extends Error {
  constructor(
    message: string,
    public code: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'DataSourceError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConnectionError extends DataSourceError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

export class QueryError extends DataSourceError {
  constructor(message: string, cause?: Error) {
    super(message, 'QUERY_ERROR', cause);
    this.name = 'QueryError';
  }
}

/**
 * An account name did not resolve in the directory. Callers log and skip.
 */
export class AccountNotFoundError extends DataSourceError {
  constructor(public kind: AccountKind, public accountName: string) {
    super(`${kind} account '${accountName}' was not found in the directory`, 'LOOKUP_ERROR');
    this.name = 'AccountNotFoundError';
  }
}

/**
 * A disable, delete or archive against the directory or storage failed for one account.
 */
export class DirectoryWriteError extends DataSourceError {
  constructor(
    message: string,
    public accountName: string,
    public operation: 'disable' | 'delete' | 'archive',
    cause?: Error
  ) {
    super(message, 'WRITE_ERROR', cause);
    this.name = 'DirectoryWriteError';
  }
}

/**
 * The archive destination cannot be written. No removal may run.
 */
export class ArchiveUnavailableError extends DataSourceError {
  constructor(public destination: string, cause?: Error) {
    super(`Archive destination '${destination}' is not reachable`, 'PRECONDITION_ERROR', cause);
    this.name = 'ArchiveUnavailableError';
  }
}

export class ConfigurationError extends DataSourceError {
  constructor(message: string, public field?: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
