/**
 * PII sanitization for error logging
 *
 * Applicant SSNs, phone numbers and emails show up in gateway error
 * messages (validation failures echo the submitted value). Strip them
 * before the message reaches a log line.
 */

import { getErrorMessage } from '@/lib/errors';
import { sanitizePII } from '@/lib/security/sanitizer';

/**
 * Extract error message from unknown error and sanitize PII.
 */
export function sanitizeError(error: unknown): string {
  return sanitizePII(getErrorMessage(error));
}
