// Error types for frame decoding and startup config

/**
 * Frame is not JSON, or a required top-level field is missing or mistyped
 */
export class MalformedMessageError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'MalformedMessageError';
  }
}

/**
 * A required field on one event in the batch is missing or not a number string
 *
 * The whole frame is dropped, so we keep the event index around for the log.
 */
export class MalformedEventFieldError extends Error {
  constructor(
    public readonly eventIndex: number,
    public readonly field: string,
    detail: string,
  ) {
    super(`events[${eventIndex}].${field}: ${detail}`);
    this.name = 'MalformedEventFieldError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Feed dropped and every reconnect attempt failed
 */
export class ReconnectExhaustedError extends Error {
  constructor(public readonly adapter: string, public readonly attempts: number) {
    super(`${adapter}: gave up after ${attempts} reconnect attempts`);
    this.name = 'ReconnectExhaustedError';
  }
}

export type DecodeError = MalformedMessageError | MalformedEventFieldError;

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof MalformedMessageError || error instanceof MalformedEventFieldError;
}
