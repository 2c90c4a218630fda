import { z } from 'zod';

export type ValidationIssue = z.ZodError['issues'][number];

/**
 * Validates an untrusted payload (request body, intake record) against a Zod schema.
 */
export function validateBody<T extends z.ZodType>(
  schema: T,
  body: unknown,
): { success: true; data: z.infer<T> } | { success: false; issues: ValidationIssue[] } {
  const result = schema.safeParse(body);
  if (!result.success) {
    return { success: false, issues: result.error.issues };
  }
  return { success: true, data: result.data };
}

/** One line per issue, `path: message`, for re-prompts and log lines. */
export function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('\n');
}
