/**
 * Error classes for the monitor pipeline
 */

/**
 * Thrown when the forum rejects the configured credentials
 */
export class AuthenticationError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = "AuthenticationError";
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Thrown when a forum page cannot be retrieved
 */
export class FetchError extends Error {
  constructor(message: string, public url: string, public originalError?: Error) {
    super(message);
    this.name = "FetchError";
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

/**
 * Thrown when a webhook call does not succeed
 */
export class NotifyError extends Error {
  constructor(message: string, public status?: number, public originalError?: Error) {
    super(message);
    this.name = "NotifyError";
    Object.setPrototypeOf(this, NotifyError.prototype);
  }
}

/**
 * Thrown when the cursor file cannot be read or written
 */
export class PersistenceError extends Error {
  constructor(message: string, public path: string, public originalError?: Error) {
    super(message);
    this.name = "PersistenceError";
    Object.setPrototypeOf(this, PersistenceError.prototype);
  }
}

/**
 * Thrown for a missing or invalid setting. Fatal only for the monitor it belongs to,
 * unless raised while loading the process configuration.
 */
export class ConfigurationError extends Error {
  constructor(message: string, public monitorId?: string) {
    super(message);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}

export function isNotifyError(error: unknown): error is NotifyError {
  return error instanceof NotifyError;
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
