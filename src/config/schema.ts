/**
 * Zod validation schemas for configuration files
 */

import { z } from 'zod';
import { SNAPSHOT_CONSTANTS } from './constants.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const DepsnapConfigSchema = z
  .object({
    throttleMs: z
      .number()
      .int('throttleMs must be an integer')
      .min(SNAPSHOT_CONSTANTS.MIN_THROTTLE_MS, `throttleMs must be at least ${SNAPSHOT_CONSTANTS.MIN_THROTTLE_MS}`)
      .optional(),
    disabledFilters: z.array(z.string().trim().min(1)).optional(),
    logLevel: LogLevelSchema.optional(),
  })
  .strict();

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}
