/**
 * Intake Configuration (environment-variable-controlled settings)
 *
 * Unset variables fall back to the production defaults below.
 *
 *   CREDIT_POLL_MAX_ATTEMPTS        counted poll attempts before giving up (5)
 *   CREDIT_POLL_INTERVAL_MS         gap between attempts (10000)
 *   CREDIT_POLL_INITIAL_DELAY_MS    wait before the first attempt (10000)
 *   CREDIT_DECISION_PENDING_VALUES  comma-separated non-final decision labels ("Pending")
 *   INTAKE_ACCOUNTS_TABLE           table holding intake accounts ("accounts")
 */

import { z } from 'zod';
import { IntakeConfigError } from '@/lib/errors';

// ============================================================================
// TYPES
// ============================================================================

export const pollerConfigSchema = z.object({
  maxAttempts: z.number().int().positive(),
  intervalMs: z.number().int().positive(),
  initialDelayMs: z.number().int().nonnegative(),
});

export type PollerConfig = z.infer<typeof pollerConfigSchema>;

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_POLLER_CONFIG: PollerConfig = {
  maxAttempts: 5,
  intervalMs: 10_000,
  initialDelayMs: 10_000,
};

export const DEFAULT_PENDING_DECISIONS: readonly string[] = ['Pending'];

export const DEFAULT_ACCOUNTS_TABLE = 'accounts';

// ============================================================================
// READERS
// ============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || 'value'}: ${issue.message}`);
}

/**
 * Validate a poller configuration supplied by a caller.
 *
 * @throws IntakeConfigError when a value is out of range
 */
export function parsePollerConfig(input: unknown): PollerConfig {
  const result = pollerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new IntakeConfigError(formatIssues(result.error));
  }
  return result.data;
}

const envInteger = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform(val => (val === undefined || val === '' ? fallback : Number(val)));

const pollerEnvSchema = z.object({
  CREDIT_POLL_MAX_ATTEMPTS: envInteger(DEFAULT_POLLER_CONFIG.maxAttempts),
  CREDIT_POLL_INTERVAL_MS: envInteger(DEFAULT_POLLER_CONFIG.intervalMs),
  CREDIT_POLL_INITIAL_DELAY_MS: envInteger(DEFAULT_POLLER_CONFIG.initialDelayMs),
});

/**
 * Poller settings from the environment.
 *
 * @throws IntakeConfigError when a variable is set to a non-integer or out of range
 */
export function getPollerConfig(env: NodeJS.ProcessEnv = process.env): PollerConfig {
  const raw = pollerEnvSchema.parse(env);
  try {
    return parsePollerConfig({
      maxAttempts: raw.CREDIT_POLL_MAX_ATTEMPTS,
      intervalMs: raw.CREDIT_POLL_INTERVAL_MS,
      initialDelayMs: raw.CREDIT_POLL_INITIAL_DELAY_MS,
    });
  } catch (error) {
    if (error instanceof IntakeConfigError) {
      throw new IntakeConfigError(
        error.issues.map(issue =>
          issue
            .replace(/^maxAttempts/, 'CREDIT_POLL_MAX_ATTEMPTS')
            .replace(/^intervalMs/, 'CREDIT_POLL_INTERVAL_MS')
            .replace(/^initialDelayMs/, 'CREDIT_POLL_INITIAL_DELAY_MS')
        )
      );
    }
    throw error;
  }
}

/**
 * Decision labels that mean "still waiting on the bureau".
 */
export function getPendingDecisionValues(env: NodeJS.ProcessEnv = process.env): string[] {
  const val = env.CREDIT_DECISION_PENDING_VALUES?.trim();
  if (!val) return [...DEFAULT_PENDING_DECISIONS];
  return val
    .split(',')
    .map(v => v.trim())
    .filter(v => v.length > 0);
}

export function getAccountsTable(env: NodeJS.ProcessEnv = process.env): string {
  return env.INTAKE_ACCOUNTS_TABLE?.trim() || DEFAULT_ACCOUNTS_TABLE;
}
