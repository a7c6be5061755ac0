import type { ZodError } from 'zod';

// ─── Validation Error ────────────────────────────────────

/** Flatten zod issues to one `path: message` line each. */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

/**
 * Malformed domain data or a programmer error at an API boundary.
 * Never caught by the run pipeline.
 */
export class ValidationError extends Error {
  override name = 'ValidationError' as const;
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }

  static fromZod(context: string, error: ZodError): ValidationError {
    return new ValidationError(context, formatZodIssues(error));
  }
}
