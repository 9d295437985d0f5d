import type { ZodError } from 'zod';

import type { InputIssue } from './layout-engine-error';

/**
 * Flatten zod issues into path/message pairs
 */
export function toInputIssues(error: ZodError): InputIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}
