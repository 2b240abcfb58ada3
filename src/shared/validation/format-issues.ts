import type { ZodIssue } from 'zod';

/** `path: message` pairs joined by `; `, for single-line error messages. */
export function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
