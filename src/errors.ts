/** Raised when the agent cannot finish starting up (bad key, unreachable API). */
export class StartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StartupError';
  }
}

/**
 * Raised by a collaborator when retrying next cycle cannot help, e.g. the
 * browser binary is missing. Stops the scheduler.
 */
export class UnrecoverableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'UnrecoverableError';
  }
}
