/**
 * Error types raised by the resolution engine and its collaborators.
 * None of them are fatal to a resolution: callers log, alert and degrade.
 */

export class ResolverError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A store read or write failed. `operation` names the store method.
 */
export class PersistenceUnavailableError extends ResolverError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Mapping store ${operation} failed: ${detail}`, { cause });
    this.operation = operation;
  }
}

export type OverrideFileProblem = 'missing' | 'invalid';

export class OverrideFileUnreadableError extends ResolverError {
  readonly path: string;
  readonly problem: OverrideFileProblem;

  constructor(path: string, problem: OverrideFileProblem, cause?: unknown) {
    const detail = problem === 'missing' ? 'file not found' : 'not a flat JSON object of strings';
    super(`Manual mappings file ${path}: ${detail}`, { cause });
    this.path = path;
    this.problem = problem;
  }
}

export class ConfigError extends ResolverError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
