/**
 * Environment validation utility
 *
 * Call this at startup to ensure all required environment variables are set.
 */

import { getPollerConfig } from '@/lib/config/intake-config';
import { getErrorMessage } from '@/lib/errors';

export interface EnvCheckResult {
  valid: boolean;
  missing: string[];
  warnings: string[];
}

const REQUIRED_VARS = [
  'SUPABASE_URL',
  'SUPABASE_SERVICE_ROLE_KEY',
];

const PLACEHOLDER_PATTERN = /xxxxx|your-key-here|your-project/;

/**
 * Check if all required environment variables are set
 */
export function checkEnvironment(env: NodeJS.ProcessEnv = process.env): EnvCheckResult {
  const missing: string[] = [];
  const warnings: string[] = [];

  for (const varName of REQUIRED_VARS) {
    const value = env[varName];
    if (!value || PLACEHOLDER_PATTERN.test(value)) {
      missing.push(varName);
    }
  }

  try {
    getPollerConfig(env);
  } catch (error) {
    warnings.push(`${getErrorMessage(error)} - poller defaults cannot be applied`);
  }

  return {
    valid: missing.length === 0,
    missing,
    warnings,
  };
}
