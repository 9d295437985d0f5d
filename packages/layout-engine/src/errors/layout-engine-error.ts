/**
 * Single problem found while validating caller input
 */
export interface InputIssue {
  /**
   * Dotted path to the offending value (e.g., "elements.3.bbox")
   */
  path: string;

  /**
   * Human-readable description
   */
  message: string;
}

/**
 * LayoutEngineError
 *
 * Base error class for hard failures of the layout engine.
 */
export class LayoutEngineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LayoutEngineError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create LayoutEngineError from unknown error with context
   */
  static fromError(context: string, error: unknown): LayoutEngineError {
    return new LayoutEngineError(
      `${context}: ${LayoutEngineError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * MalformedElementError
 *
 * Thrown when a page batch violates the element contract
 * (unknown class, negative or inverted coordinates, duplicate ids).
 */
export class MalformedElementError extends LayoutEngineError {
  readonly issues: InputIssue[];

  constructor(message: string, issues: InputIssue[], options?: ErrorOptions) {
    super(message, options);
    this.name = 'MalformedElementError';
    this.issues = issues;
  }

  /**
   * Get formatted error summary
   */
  getSummary(): string {
    const lines = [`Malformed page input: ${this.issues.length} issue(s)`];
    for (const issue of this.issues) {
      lines.push(`  ${issue.path || '(root)'}: ${issue.message}`);
    }
    return lines.join('\n');
  }
}

/**
 * InvalidEngineOptionsError
 *
 * Thrown when engine options fail validation.
 */
export class InvalidEngineOptionsError extends LayoutEngineError {
  readonly issues: InputIssue[];

  constructor(issues: InputIssue[], options?: ErrorOptions) {
    super(
      `Invalid engine options: ${issues
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join('; ')}`,
      options,
    );
    this.name = 'InvalidEngineOptionsError';
    this.issues = issues;
  }
}
