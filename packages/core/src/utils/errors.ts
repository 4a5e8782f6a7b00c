/**
 * Error types and formatting helpers
 */

export interface ValidationIssue {
  /** JSON-pointer style path of the offending option, e.g. `/lineLimit` */
  path: string;
  message: string;
}

export class ExpandableTextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpandableTextError';
  }
}

/**
 * Thrown when ExpandableText options fail validation
 */
export class ConfigValidationError extends ExpandableTextError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues.map((issue) => `${issue.path || '/'}: ${issue.message}`).join('; ');
    super(`Invalid ExpandableText options: ${summary}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * Extract a printable message from any thrown value
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
