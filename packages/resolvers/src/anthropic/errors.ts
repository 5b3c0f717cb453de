import Anthropic from '@anthropic-ai/sdk';
import { ResolverError } from '@snowmatch/core';

const COLLABORATOR = 'anthropic';

/**
 * Map SDK failures onto resolver error codes. 429 and 5xx stay
 * transient so the guarded wrapper retries them.
 */
export function toResolverError(error: unknown, operation: string): ResolverError {
  if (error instanceof ResolverError) return error;

  const cause = error instanceof Error ? error : undefined;
  const message = error instanceof Error ? error.message : String(error);
  const context = { operation };

  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ResolverError({
      code: 'TIMEOUT',
      message: `Anthropic request timed out during ${operation}`,
      collaborator: COLLABORATOR,
      cause,
      context,
    });
  }

  if (error instanceof Anthropic.APIConnectionError) {
    return new ResolverError({
      code: 'UNAVAILABLE',
      message: `Anthropic API unreachable during ${operation}: ${message}`,
      collaborator: COLLABORATOR,
      cause,
      context,
    });
  }

  if (error instanceof Anthropic.APIError) {
    const status = error.status;
    if (status === 401 || status === 403) {
      return new ResolverError({
        code: 'AUTHENTICATION_FAILED',
        message: `Anthropic rejected the API key (${status})`,
        collaborator: COLLABORATOR,
        suggestion: 'Check ANTHROPIC_API_KEY or resolver.apiKey in the config file.',
        cause,
        context: { ...context, status },
      });
    }
    if (status === 429) {
      return new ResolverError({
        code: 'RATE_LIMITED',
        message: `Anthropic rate limit hit during ${operation}`,
        collaborator: COLLABORATOR,
        suggestion: 'Lower external.maxConcurrency or configure external.rateLimit.',
        cause,
        context: { ...context, status },
      });
    }
    if (status !== undefined && status >= 500) {
      return new ResolverError({
        code: 'UNAVAILABLE',
        message: `Anthropic API error ${status} during ${operation}: ${message}`,
        collaborator: COLLABORATOR,
        cause,
        context: { ...context, status },
      });
    }
    return new ResolverError({
      code: 'INVALID_RESPONSE',
      message: `Anthropic API error ${status ?? 'unknown'} during ${operation}: ${message}`,
      collaborator: COLLABORATOR,
      cause,
      context: { ...context, status },
    });
  }

  return new ResolverError({
    code: 'UNKNOWN',
    message,
    collaborator: COLLABORATOR,
    cause,
    context,
  });
}
