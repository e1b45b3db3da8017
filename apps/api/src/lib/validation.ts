import { z } from 'zod';
import { DEFAULT_SESSION } from './sessions.js';

export const SessionQuerySchema = z.object({
  session: z
    .string()
    .trim()
    .min(1)
    .max(64)
    .regex(/^[\w.-]+$/, 'session may contain letters, digits, "_", "." and "-"')
    .default(DEFAULT_SESSION),
});

export interface ValidationErrorBody {
  error: string;
  issues: Array<{ path: string; message: string }>;
}

export function validationError(error: z.ZodError, what: string = 'request body'): ValidationErrorBody {
  return {
    error: `Invalid ${what}`,
    issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  };
}
