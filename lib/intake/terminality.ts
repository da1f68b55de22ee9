// /lib/intake/terminality.ts
// Decides whether a credit decision value ends polling

import { DEFAULT_PENDING_DECISIONS } from '@/lib/config/intake-config';

export type TerminalityPredicate = (decision: string | null | undefined) => boolean;

/**
 * A decision is terminal when it is present, non-blank, and not one of the
 * pending sentinels (compared trimmed and case-insensitively).
 */
export function createTerminalityPredicate(
  pendingValues: readonly string[] = DEFAULT_PENDING_DECISIONS
): TerminalityPredicate {
  const pending = new Set(pendingValues.map(v => v.trim().toLowerCase()));

  return (decision) => {
    if (decision === null || decision === undefined) return false;
    const value = String(decision).trim();
    if (value === '') return false;
    return !pending.has(value.toLowerCase());
  };
}

export const isTerminalDecision: TerminalityPredicate = createTerminalityPredicate();
