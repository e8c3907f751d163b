import type { Context } from 'hono';
import { z } from 'zod';

/**
 * Validates a request body against a Zod schema.
 * Returns the parsed data, or a 400 response listing the first few issues.
 */
export function validateBody<T extends z.ZodType>(
  c: Context,
  schema: T,
  body: unknown,
): { success: true; data: z.infer<T> } | { success: false; response: Response } {
  const result = schema.safeParse(body);
  if (!result.success) {
    return { success: false, response: c.json({ error: 'Invalid request', issues: summarizeIssues(result.error.issues) }, 400) };
  }
  return { success: true, data: result.data };
}

export function summarizeIssues(issues: z.ZodIssue[], limit = 5): string[] {
  return issues.slice(0, limit).map((issue) => {
    const where = issue.path.join('.');
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}
