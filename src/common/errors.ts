/**
 * Domain error taxonomy. Each error carries a stable code (surfaced in API responses)
 * and whether the caller may retry the same request later.
 */
export type OrchestratorErrorCode =
  | 'DefinitionInvalid'
  | 'ConcurrencyExceeded'
  | 'TriggerNotMatched'
  | 'InfrastructureError'
  | 'NotFound';

export abstract class OrchestratorError extends Error {
  abstract readonly code: OrchestratorErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface DefinitionIssue {
  /** Dotted path into the definition, e.g. jobs.build.steps.0.run */
  path: string;
  message: string;
}

/** Pipeline definition could not be loaded. Never retryable: the author has to fix it. */
export abstract class DefinitionInvalidError extends OrchestratorError {
  readonly code = 'DefinitionInvalid' as const;
  readonly retryable = false;
  abstract readonly kind: 'ParseError' | 'ValidationError';

  constructor(
    message: string,
    readonly issues: DefinitionIssue[] = [],
  ) {
    super(message);
  }
}

/** Malformed text or a structure that is not a mapping of jobs at all. */
export class ParseError extends DefinitionInvalidError {
  readonly kind = 'ParseError' as const;
}

/** Well-formed but semantically invalid: no jobs, empty job, unknown step type, cycle... */
export class ValidationError extends DefinitionInvalidError {
  readonly kind = 'ValidationError' as const;

  static fromIssues(issues: DefinitionIssue[]): ValidationError {
    const summary = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
    return new ValidationError(`Invalid pipeline definition: ${summary}`, issues);
  }
}

export class ConcurrencyExceededError extends OrchestratorError {
  readonly code = 'ConcurrencyExceeded' as const;
  readonly retryable = true;

  constructor(
    readonly branchKey: string,
    readonly limit: number,
  ) {
    super(`Queue for ${branchKey} is full (${limit} queued runs)`);
  }
}

export class TriggerNotMatchedError extends OrchestratorError {
  readonly code = 'TriggerNotMatched' as const;
  readonly retryable = false;
}

/** Runner unreachable, workspace not preparable, process not spawnable. */
export class InfrastructureError extends OrchestratorError {
  readonly code = 'InfrastructureError' as const;
  readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class NotFoundError extends OrchestratorError {
  readonly code = 'NotFound' as const;
  readonly retryable = false;
}

export function isOrchestratorError(err: unknown): err is OrchestratorError {
  return err instanceof OrchestratorError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
