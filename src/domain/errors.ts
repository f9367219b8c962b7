/**
 * Error taxonomy shared by the store, the use cases and the HTTP layer.
 *
 * The HTTP error handler maps each class to a status code; nothing below
 * the interface layer knows about HTTP.
 */

/** Storage unreachable or schema corrupt during initialization. Fatal at startup. */
export class InitError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InitError';
  }
}

/** Storage failure while recording a pull event. */
export class WriteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WriteError';
  }
}

/** Storage failure while reading counters or events. */
export class ReadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ReadError';
  }
}

/** The store's schema has not been created yet. */
export class StoreNotInitializedError extends Error {
  constructor(message = 'Store has not been initialized') {
    super(message);
    this.name = 'StoreNotInitializedError';
  }
}

/** Malformed ingestion input. `field` names the offending input field. */
export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Invalid process configuration. `variables` lists the offending env vars. */
export class ConfigError extends Error {
  constructor(
    public readonly variables: readonly string[],
    message: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
