/**
 * Base error class for remote model errors.
 */
export class RemoteModelError extends Error {
  constructor(message: string, public code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RemoteModelError';
  }
}

/**
 * Error thrown when a connection descriptor, TLS block or signature is invalid.
 * Always raised before any network activity.
 */
export class ConfigurationError extends RemoteModelError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIGURATION', options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the remote endpoint cannot be reached or the TLS handshake fails.
 */
export class ConnectionError extends RemoteModelError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONNECTION', options);
    this.name = 'ConnectionError';
  }
}

/**
 * Error thrown when a call exceeds its deadline.
 */
export class TimeoutError extends RemoteModelError {
  constructor(public timeoutMs: number | undefined, options?: ErrorOptions) {
    super(
      timeoutMs === undefined ? 'Call timed out' : `Call timed out after ${timeoutMs}ms`,
      'TIMEOUT',
      options
    );
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown when the server answers with an application-level failure.
 *
 * `status` is the gRPC status code or the HTTP status; `'decode'` marks a
 * response the client could not turn into the declared output type.
 */
export class RemoteError extends RemoteModelError {
  constructor(
    message: string,
    public status: number | 'decode',
    public statusName?: string,
    public payload?: unknown,
    options?: ErrorOptions
  ) {
    super(message, 'REMOTE', options);
    this.name = 'RemoteError';
  }
}

/**
 * Error thrown when a stream fails after it already delivered items.
 */
export class StreamError extends RemoteModelError {
  constructor(public delivered: number, cause: unknown) {
    super(
      `Stream failed after ${delivered} item(s): ${cause instanceof Error ? cause.message : String(cause)}`,
      'STREAM',
      { cause }
    );
    this.name = 'StreamError';
  }
}

/**
 * Error thrown when a call receives input of the wrong arity or an input batch over its bound.
 */
export class InvalidInputError extends RemoteModelError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

/**
 * Error thrown when a call is made on a closed remote model.
 */
export class ClientClosedError extends RemoteModelError {
  constructor(targetId: string) {
    super(`Remote model ${targetId} is closed`, 'CLIENT_CLOSED');
    this.name = 'ClientClosedError';
  }
}
