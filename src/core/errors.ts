/**
 * Custom Error Classes for Switchyard
 */

/**
 * Error thrown when a catalog file or entry is invalid
 */
export class CatalogError extends Error {
  public readonly source: string;
  public readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid capability catalog (${source}): ${issues.join('; ')}`);
    this.name = 'CatalogError';
    this.source = source;
    this.issues = issues;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CatalogError);
    }
  }
}

/**
 * Error thrown when a record references a plan the Selector never issued
 */
export class OrphanRecordError extends Error {
  public readonly planId: string;

  constructor(planId: string) {
    super(`Plan ${planId} was not issued by the selector; refusing to record an orphan execution`);
    this.name = 'OrphanRecordError';
    this.planId = planId;
  }
}

/**
 * Error thrown when the recorded request is not the one the plan was made for
 */
export class RequestMismatchError extends Error {
  public readonly requestId: string;
  public readonly planRequestId: string;

  constructor(requestId: string, planRequestId: string) {
    super(`Request ${requestId} does not match plan request ${planRequestId}`);
    this.name = 'RequestMismatchError';
    this.requestId = requestId;
    this.planRequestId = planRequestId;
  }
}

/**
 * Error thrown when configuration fails validation
 */
export class ConfigValidationError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.problems = problems;
  }
}

/**
 * Error thrown when a request context is not plain JSON data
 */
export class RequestContextError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid request context: ${issues.join('; ')}`);
    this.name = 'RequestContextError';
    this.issues = issues;
  }
}
