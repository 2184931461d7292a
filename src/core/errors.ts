// ═══════════════════════════════════════════════════════════════════════════════
// CORE ERRORS — Failure Taxonomy for Context Assembly and Chat Turns
// ═══════════════════════════════════════════════════════════════════════════════
//
// Three distinct user-visible outcomes:
//   - NoPersonaError        → "generate a persona first"
//   - GenerationFailureError → "could not produce a response, try again"
//   - StoreUnavailableError  → transient, retry later
//
// ═══════════════════════════════════════════════════════════════════════════════

export type CoreErrorCode =
  | 'NOT_FOUND'
  | 'NO_PERSONA'
  | 'STORE_UNAVAILABLE'
  | 'GENERATION_FAILED';

export abstract class CoreError extends Error {
  abstract readonly code: CoreErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A requested record does not exist.
 */
export class NotFoundError extends CoreError {
  readonly code: CoreErrorCode = 'NOT_FOUND';

  constructor(
    readonly resource: string,
    readonly userId: string
  ) {
    super(`${resource} not found for user ${userId}`);
  }
}

/**
 * The user has not completed the quiz yet, so nothing can be personalized.
 */
export class NoPersonaError extends NotFoundError {
  override readonly code: CoreErrorCode = 'NO_PERSONA';

  constructor(userId: string) {
    super('Persona', userId);
    this.message = `No persona found for user ${userId}. Generate a persona first.`;
  }
}

/**
 * Any backing-store read or write failed.
 */
export class StoreUnavailableError extends CoreError {
  readonly code: CoreErrorCode = 'STORE_UNAVAILABLE';

  constructor(
    readonly operation: string,
    cause?: unknown
  ) {
    super(`Store operation failed: ${operation}`, { cause });
  }
}

/**
 * The generative collaborator failed or returned nothing usable.
 */
export class GenerationFailureError extends CoreError {
  readonly code: CoreErrorCode = 'GENERATION_FAILED';

  constructor(reason: string, cause?: unknown) {
    super(`Generation failed: ${reason}`, { cause });
  }
}

export function isCoreError(error: unknown): error is CoreError {
  return error instanceof CoreError;
}
