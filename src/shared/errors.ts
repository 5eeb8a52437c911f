export class ScoutError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ScoutError';
  }
}

export class ConfigError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

/** A listing page could not be obtained. Treated as a zero-delta round. */
export class CollectionError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'COLLECTION_ERROR', details);
    this.name = 'CollectionError';
  }
}

/** One candidate's fields could not be obtained. The candidate is dropped. */
export class DetailFetchError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DETAIL_FETCH_ERROR', details);
    this.name = 'DetailFetchError';
  }
}

export class StoreError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORE_ERROR', details);
    this.name = 'StoreError';
  }
}

export class ParseError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PARSE_ERROR', details);
    this.name = 'ParseError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class HttpError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'HTTP_ERROR', details);
    this.name = 'HttpError';
  }
}

export class SessionError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SESSION_ERROR', details);
    this.name = 'SessionError';
  }
}
