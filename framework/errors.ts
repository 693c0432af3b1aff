/**
 * Framework Errors
 *
 * Errors raised by the response layer. All of them signal programmer
 * misconfiguration and propagate synchronously to the caller.
 */

/**
 * A value passed to a response builder was missing or malformed
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * A turbo-stream action outside the known set
 */
export class InvalidActionError extends InvalidArgumentError {
  readonly action: unknown;

  constructor(action: unknown) {
    super(`Unknown turbo-stream action: ${String(action)}`);
    this.name = 'InvalidActionError';
    this.action = action;
  }
}

/**
 * A handler is missing configuration the framework needs.
 *
 * Dispatch recognises this error and reports it as a developer-facing
 * diagnostic instead of a generic failure.
 */
export class ImproperlyConfiguredError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImproperlyConfiguredError';
  }
}

/**
 * Content of a deferred response was read before it was rendered
 */
export class ContentNotRenderedError extends Error {
  constructor(message = 'The response content must be rendered before it can be accessed') {
    super(message);
    this.name = 'ContentNotRenderedError';
  }
}
