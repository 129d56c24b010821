// ============ Error Codes ============

export type StoreErrorCode =
  | 'CONFIG'
  | 'SERIALIZATION'
  | 'TRANSPORT'
  | 'API'
  | 'PARSE'
  | 'DOMAIN'
  | 'MEDIA_UNAVAILABLE'
  | 'UNSUPPORTED'
  | 'LOCK_BUSY';

export class StoreError extends Error {
  /** Step of the enclosing operation that failed, e.g. "query conversation". */
  stage: string | null = null;

  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

/** A required setting is missing or malformed. Raised before any request. */
export class StoreConfigError extends StoreError {
  constructor(message: string) {
    super('CONFIG', message);
    this.name = 'StoreConfigError';
  }
}

export class StoreSerializationError extends StoreError {
  constructor(message: string, cause?: unknown) {
    super('SERIALIZATION', message, { cause });
    this.name = 'StoreSerializationError';
  }
}

/**
 * The request never produced a response: it could not be built, the
 * network call failed or the timeout elapsed.
 */
export class StoreTransportError extends StoreError {
  constructor(
    message: string,
    public readonly transportCode: string | null,
    cause?: unknown,
  ) {
    super('TRANSPORT', message, { cause });
    this.name = 'StoreTransportError';
  }
}

/** The remote store answered with status >= 400. */
export class StoreApiError extends StoreError {
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super('API', `API error (status ${status}): ${body}`);
    this.name = 'StoreApiError';
  }
}

export class StoreParseError extends StoreError {
  constructor(message: string, cause?: unknown) {
    super('PARSE', message, { cause });
    this.name = 'StoreParseError';
  }
}

export class StoreDomainError extends StoreError {
  constructor(message: string) {
    super('DOMAIN', message);
    this.name = 'StoreDomainError';
  }
}

export class MediaInfoUnavailableError extends StoreError {
  constructor(
    public readonly messageId: string,
    public readonly chatJid: string,
    reason: string,
  ) {
    super(
      'MEDIA_UNAVAILABLE',
      `media info not available for ${messageId} in ${chatJid}: ${reason}`,
    );
    this.name = 'MediaInfoUnavailableError';
  }
}

/** The active backend cannot answer this operation at all (not "no data"). */
export class UnsupportedByBackendError extends StoreError {
  constructor(
    public readonly operation: string,
    public readonly backend: string,
  ) {
    super(
      'UNSUPPORTED',
      `${operation} is not supported by the ${backend} backend`,
    );
    this.name = 'UnsupportedByBackendError';
  }
}

export class ResolutionLockBusyError extends StoreError {
  constructor(public readonly lockKey: string) {
    super('LOCK_BUSY', `could not acquire resolution lock ${lockKey}`);
    this.name = 'ResolutionLockBusyError';
  }
}

/**
 * Tags a StoreError with the step that raised it and rethrows.
 * Other errors pass through untouched.
 */
export async function atStage<T>(stage: string, work: Promise<T>): Promise<T> {
  try {
    return await work;
  } catch (err) {
    if (err instanceof StoreError && err.stage === null) {
      err.stage = stage;
    }
    throw err;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof StoreError && err.stage) {
    return `failed to ${err.stage}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}
