/**
 * PII Sanitization Pipeline
 *
 * Sanitizes data before it reaches any log line or toast detail.
 * Intake records carry applicant identity and credit data, so five
 * categories are stripped:
 *   - Identity numbers (SSN, tax id) → [SSN_REDACTED]
 *   - Contact info (emails, phones) → [CONTACT_REDACTED]
 *   - Credit data (income, bureau report payloads) → [CREDIT_REDACTED]
 *   - Credentials (service keys, JWTs, passwords) → [CREDENTIAL_REDACTED]
 *   - Consent document bodies → [DOCUMENT_REDACTED]
 */

const PII_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // Identity numbers
  { pattern: /\b\d{3}-\d{2}-\d{4}\b/g, replacement: '[SSN_REDACTED]' },
  { pattern: /\bSSN\s*[:=]?\s*\d{9}\b/gi, replacement: '[SSN_REDACTED]' },

  // Credentials
  { pattern: /\beyJ[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\b/g, replacement: '[JWT_REDACTED]' },
  { pattern: /\bsb_secret_\w{10,}\b/g, replacement: '[CREDENTIAL_REDACTED]' },
  { pattern: /password\s*[:=]\s*['"]?[^\s'"]{3,}/gi, replacement: 'password=[CREDENTIAL_REDACTED]' },

  // Contact info
  { pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, replacement: '[EMAIL_REDACTED]' },
  { pattern: /\b(?:\+?1[\s.-]?)?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}\b/g, replacement: '[PHONE_REDACTED]' },
];

/**
 * Sanitize a string by replacing PII patterns with safe placeholders.
 */
export function sanitizePII(input: string): string {
  if (typeof input !== 'string') return String(input);

  let result = input;
  for (const { pattern, replacement } of PII_PATTERNS) {
    result = result.replace(pattern, replacement);
  }

  return result;
}

/** Keys (lowercased) whose values are redacted whatever they contain */
const SENSITIVE_KEY_LABELS = new Map<string, string>([
  ['password', 'CREDENTIAL_REDACTED'],
  ['secret', 'CREDENTIAL_REDACTED'],
  ['token', 'CREDENTIAL_REDACTED'],
  ['apikey', 'CREDENTIAL_REDACTED'],
  ['api_key', 'CREDENTIAL_REDACTED'],
  ['authorization', 'CREDENTIAL_REDACTED'],
  ['servicerolekey', 'CREDENTIAL_REDACTED'],
  ['ssn', 'SSN_REDACTED'],
  ['socialsecuritynumber', 'SSN_REDACTED'],
  ['social_security_number', 'SSN_REDACTED'],
  ['birthdate', 'PII_MASKED'],
  ['birth_date', 'PII_MASKED'],
  ['annualincome', 'CREDIT_REDACTED'],
  ['annual_income', 'CREDIT_REDACTED'],
  ['annualhouseholdincome', 'CREDIT_REDACTED'],
  ['annual_household_income', 'CREDIT_REDACTED'],
  ['creditreport', 'CREDIT_REDACTED'],
  ['htmlsnapshot', 'DOCUMENT_REDACTED'],
  ['consentbody', 'DOCUMENT_REDACTED'],
]);

/**
 * Sanitize a value recursively for structured logging.
 * Structure is preserved; sensitive keys are fully redacted.
 */
export function sanitizeObject(obj: unknown, depth: number = 0): unknown {
  if (depth > 10) return '[MAX_DEPTH_REACHED]';
  if (obj === null || obj === undefined) return obj;
  if (typeof obj === 'string') return sanitizePII(obj);
  if (typeof obj === 'number' || typeof obj === 'boolean') return obj;

  if (obj instanceof Error) {
    return {
      name: obj.name,
      message: sanitizePII(obj.message),
      stack: obj.stack ? sanitizePII(obj.stack) : undefined,
    };
  }

  if (Array.isArray(obj)) {
    return obj.map(item => sanitizeObject(item, depth + 1));
  }

  if (typeof obj === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const label = SENSITIVE_KEY_LABELS.get(key.toLowerCase());
      sanitized[key] = label ? `[${label}]` : sanitizeObject(value, depth + 1);
    }
    return sanitized;
  }

  return obj;
}
