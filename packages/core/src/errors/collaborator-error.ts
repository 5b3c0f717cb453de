/**
 * Error types for collaborators (catalogs, registries, resolvers, stores)
 * Actionable messages matter: they end up in audit trails and CLI output.
 */

export type ErrorCode =
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'UNAVAILABLE'
  | 'INVALID_RESPONSE'
  | 'CIRCUIT_OPEN'
  | 'READ_FAILED'
  | 'WRITE_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'UNKNOWN';

export interface CollaboratorErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Collaborator that raised the error (e.g. "catalog", "anthropic") */
  collaborator?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class CollaboratorError extends Error {
  readonly code: ErrorCode;
  readonly collaborator?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: CollaboratorErrorDetails) {
    super(details.message);
    this.name = 'CollaboratorError';
    this.code = details.code;
    this.collaborator = details.collaborator;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, new.target);
  }

  /**
   * Structured, actionable message for logs and review notes
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.collaborator) {
      parts.push(`Collaborator: ${this.collaborator}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      collaborator: this.collaborator,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Raised by semantic resolvers. TIMEOUT, RATE_LIMITED and UNAVAILABLE are
 * transient; everything else is not retried.
 */
export class ResolverError extends CollaboratorError {
  constructor(details: CollaboratorErrorDetails) {
    super(details);
    this.name = 'ResolverError';
  }
}

export interface WrapErrorOptions extends Omit<CollaboratorErrorDetails, 'message' | 'cause'> {
  /** Prepended to the original message as "prefix: message" */
  prefix?: string;
}

/**
 * Turn anything thrown at a collaborator boundary into a
 * CollaboratorError carrying it as `cause`. A CollaboratorError passes
 * through unchanged.
 */
export function wrapError(error: unknown, options: WrapErrorOptions): CollaboratorError {
  if (error instanceof CollaboratorError) {
    return error;
  }

  const { prefix, ...details } = options;
  const original = error instanceof Error ? error.message : String(error);

  return new CollaboratorError({
    ...details,
    message: prefix ? `${prefix}: ${original}` : original,
    cause: error instanceof Error ? error : undefined,
  });
}
