/**
 * Error kinds raised by the memory core and its configuration.
 *
 * Lookups and deletes report "not found" as a value (`false`, an empty
 * list, an empty stats result), so there is no error for it.
 */

/**
 * A required argument was missing or empty.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly field?: string,
    readonly issues: string[] = [message]
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * An adapter asked for an operation the core does not know.
 */
export class UnknownOperationError extends Error {
  constructor(readonly operation: string) {
    super(`Unknown operation: ${operation}`);
    this.name = 'UnknownOperationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = 'ConfigError';
  }
}
