/** A single problem found while validating input. `path` is dot-joined, empty for the root. */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Raised synchronously when caller-supplied rules or configuration cannot
 * be turned into valid domain values. Never raised mid-analysis.
 */
export class ValidationError extends Error {
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
