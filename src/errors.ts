/**
 * Failure talking to the imaging service: auth, not-found, throttling or
 * network faults that survived the transport's own retries.
 */
export class RemoteFetchError extends Error {
  constructor(
    message: string,
    public readonly datastoreId: string,
    public readonly imageSetId: string,
    public readonly frameId?: string,
    cause?: unknown
  ) {
    super(message);
    this.name = "RemoteFetchError";
    this.cause = cause;
  }
}

/**
 * The metadata document could not be decompressed, parsed or did not have the
 * study/series/instance shape.
 */
export class DecodeError extends Error {
  constructor(
    message: string,
    public readonly imageSetId: string,
    cause?: unknown
  ) {
    super(message);
    this.name = "DecodeError";
    this.cause = cause;
  }
}

/** Output directory or frame file could not be written. */
export class PersistError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(message);
    this.name = "PersistError";
    this.cause = cause;
  }
}
