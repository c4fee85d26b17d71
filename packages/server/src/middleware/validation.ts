import type { ZodError } from 'zod';
import { AppError } from '../errors/app-error.js';

/**
 * zValidator hook: turn a failed parse into `invalid_request`
 */
export function throwOnInvalid(result: { success: true } | { success: false; error: ZodError }): void {
  if (!result.success) {
    const messages = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw AppError.invalidRequest(messages.join(', '));
  }
}
