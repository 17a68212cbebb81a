/**
 * Error kinds shared by the conversation engine and its collaborators.
 *
 * A UserFacingError is caused by the user's input: its message is the reply and
 * it is never logged as a fault. An InfrastructureError wraps a storage or
 * network failure: it is logged, and the user only sees its retry-oriented reply.
 */

export class UserFacingError extends Error {
  readonly kind = 'user' as const;

  constructor(message: string) {
    super(message);
    this.name = 'UserFacingError';
  }
}

export class InfrastructureError extends Error {
  readonly kind = 'infrastructure' as const;

  constructor(
    /** Safe to show to the user */
    readonly reply: string,
    options: { cause: unknown; operation: string }
  ) {
    super(`${options.operation} failed: ${describeError(options.cause)}`, {
      cause: options.cause,
    });
    this.name = 'InfrastructureError';
  }
}

/**
 * Raised by the fallback text capability when no API key is configured
 */
export class TextIntelligenceNotConfiguredError extends Error {
  constructor() {
    super('text intelligence client not configured');
    this.name = 'TextIntelligenceNotConfiguredError';
  }
}

export function isUserFacingError(error: unknown): error is UserFacingError {
  return error instanceof UserFacingError;
}

export function isInfrastructureError(error: unknown): error is InfrastructureError {
  return error instanceof InfrastructureError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
