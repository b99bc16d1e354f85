/**
 * Schema source could not answer a query (connection, auth or introspection failure).
 */
export class SourceUnavailableError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "SourceUnavailableError";
    Error.captureStackTrace?.(this, SourceUnavailableError);
  }
}

/**
 * The active dialect cannot answer an introspection call, e.g. table comments.
 */
export class UnsupportedIntrospectionError extends Error {
  constructor(public readonly operation: string) {
    super(`Introspection operation not supported: ${operation}`);
    this.name = "UnsupportedIntrospectionError";
    Error.captureStackTrace?.(this, UnsupportedIntrospectionError);
  }
}

export class MalformedRecordError extends Error {
  constructor(
    public readonly field: string,
    public readonly recordIndex: number,
    detail?: string,
  ) {
    super(
      `Malformed schema record at index ${recordIndex}: missing or invalid field "${field}"` +
        (detail ? ` (${detail})` : ""),
    );
    this.name = "MalformedRecordError";
    Error.captureStackTrace?.(this, MalformedRecordError);
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ConfigError";
    Error.captureStackTrace?.(this, ConfigError);
  }
}
