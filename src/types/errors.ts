/**
 * Error Types
 *
 * Typed failure classification for backend calls plus the errors raised
 * for invalid input documents and configuration.
 */

/**
 * Classification of a failed agent or backend call.
 */
export const AgentErrorKind = {
  /** Network failure or other transient backend problem */
  TRANSIENT: 'transient',
  /** The caller-supplied deadline elapsed */
  TIMEOUT: 'timeout',
  /** The response was not in the expected structured form */
  PARSE: 'parse',
  /** The backend refused or could not run the request */
  UNAVAILABLE: 'unavailable',
  /** The caller cancelled the call */
  CANCELLED: 'cancelled',
  /** One or more sub-items of a decomposed work item failed */
  SUBITEM_FAILED: 'subitem_failed',
} as const;

export type AgentErrorKind = (typeof AgentErrorKind)[keyof typeof AgentErrorKind];

/**
 * Error produced by a failed agent or backend call.
 */
export class AgentError extends Error {
  override readonly name = 'AgentError';
  readonly kind: AgentErrorKind;
  /** Raw backend text, kept for parse failures */
  readonly rawResponse: string | null;

  constructor(kind: AgentErrorKind, message: string, rawResponse: string | null = null) {
    super(message);
    this.kind = kind;
    this.rawResponse = rawResponse;
    Object.setPrototypeOf(this, AgentError.prototype);
  }

  /**
   * Wrap an unknown thrown value as a transient failure.
   */
  static from(error: unknown): AgentError {
    if (error instanceof AgentError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new AgentError(AgentErrorKind.TRANSIENT, message);
  }
}

/**
 * Error thrown when a specification document is missing required fields
 * or carries invalid values.
 */
export class SpecificationError extends Error {
  override readonly name = 'SpecificationError';
  readonly source: string | null;
  readonly issues: string[];

  constructor(issues: string[], source: string | null = null) {
    const location = source ? ` at ${source}` : '';
    super(`Invalid specification${location}: ${issues.join('; ')}`);
    this.source = source;
    this.issues = issues;
    Object.setPrototypeOf(this, SpecificationError.prototype);
  }
}

/**
 * Error thrown when configuration fails validation.
 */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed: ${issues.join('; ')}`);
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Error thrown when a mechanical check profile cannot be read or validated.
 */
export class CheckProfileError extends Error {
  override readonly name = 'CheckProfileError';
  readonly path: string | null;
  readonly issues: string[];

  constructor(issues: string[], path: string | null = null) {
    const location = path ? ` at ${path}` : '';
    super(`Invalid check profile${location}: ${issues.join('; ')}`);
    this.path = path;
    this.issues = issues;
    Object.setPrototypeOf(this, CheckProfileError.prototype);
  }
}
