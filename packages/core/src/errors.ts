export class LinearDepsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid command invocation (missing or conflicting arguments).
 */
export class UsageError extends LinearDepsError {}

export class ConfigError extends LinearDepsError {}

export class ValidationError extends LinearDepsError {
  constructor(public readonly field: string, reason: string) {
    super(`validation error: ${field} ${reason}`);
  }
}

/**
 * A team or project reference that matched nothing, or more than one thing.
 */
export class ResolutionError extends LinearDepsError {
  constructor(
    public readonly resourceType: 'team' | 'project',
    public readonly value: string,
    reason: string,
    public readonly candidates: string[] = []
  ) {
    super(
      candidates.length > 0
        ? `failed to resolve ${resourceType} '${value}': ${reason} (available: ${candidates.join(', ')})`
        : `failed to resolve ${resourceType} '${value}': ${reason}`
    );
  }
}

/**
 * Wraps an upstream failure with the step that was being performed.
 */
export class FetchError extends LinearDepsError {
  constructor(public readonly step: string, cause: unknown) {
    super(`${step}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class ApiError extends LinearDepsError {
  constructor(message: string, public readonly status?: number) {
    super(message);
  }
}

export class AuthenticationError extends ApiError {
  constructor(status: number) {
    super(`authentication failed (HTTP ${status}); check LINEAR_API_KEY`, status);
  }
}

export class GraphQLError extends ApiError {
  constructor(public readonly messages: string[]) {
    super(`GraphQL error: ${messages.join('; ')}`);
  }
}

export class RootNotFoundError extends LinearDepsError {
  constructor(public readonly rootKey: string) {
    super('root issue not found');
  }
}
