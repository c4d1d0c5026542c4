/**
 * Error taxonomy for a turn.
 *
 * GenerationError and ValidationError stop a turn before any side effect.
 * ConfirmationDeclined is terminal for the plan. PersistenceFailure is
 * reported, never retried. RouterConfigurationError is fatal at startup.
 */

export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GenerationError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfirmationDeclined extends Error {
  constructor(public readonly requestId: string, reason: string) {
    super(reason);
    this.name = 'ConfirmationDeclined';
  }
}

export class RouterConfigurationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Router configuration invalid: ${problems.join('; ')}`);
    this.name = 'RouterConfigurationError';
  }
}

export class PersistenceFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PersistenceFailure';
  }
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
